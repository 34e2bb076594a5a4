/**
 * Unit tests for ChatClient retries and fallbacks.
 */

import { ChatClient, FALLBACK_REPLY } from "../../../src/pipeline/chat-client";
import { PromptManager } from "../../../src/prompts/prompt-manager";
import type { ChatOptions, ChatResponse, ILLM, Message } from "../../../src/adapters/llm";

type Step = (model: string | undefined) => ChatResponse | Error;

/** Answers each call with the next scripted step and records the model asked for. */
class ScriptedLLM implements ILLM {
  readonly models: Array<string | undefined> = [];
  readonly requests: Message[][] = [];

  constructor(private readonly steps: Step[]) {}

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    this.models.push(options?.model);
    this.requests.push(messages);
    const step = this.steps.shift();
    if (!step) throw new Error("no scripted reply");
    const out = step(options?.model);
    if (out instanceof Error) throw out;
    return out;
  }
}

function httpError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

function client(llm: ILLM, fallbackModel?: string): ChatClient {
  return new ChatClient(llm, new PromptManager({ systemPrompt: "sys" }), {
    retryAttempts: 2,
    timeoutMs: 1000,
    maxTokens: 100,
    fallbackModel,
    sleep: async () => undefined,
  });
}

describe("ChatClient", () => {
  it("returns the trimmed reply", async () => {
    const llm = new ScriptedLLM([() => ({ text: "  Sure.  ", model: "m1" })]);
    const res = await client(llm).complete("hello", undefined, []);
    expect(res).toMatchObject({ text: "Sure.", fallback: false, model: "m1", messageCount: 2 });
    expect(llm.requests[0].map((m) => m.content)).toEqual(["sys", "hello"]);
  });

  it("retries transient failures before succeeding", async () => {
    const llm = new ScriptedLLM([() => httpError(503), () => ({ text: "ok" })]);
    const res = await client(llm).complete("hello", undefined, []);
    expect(res.text).toBe("ok");
    expect(llm.models).toEqual([undefined, undefined]);
  });

  it("falls back to the second model after retries run out", async () => {
    const llm = new ScriptedLLM([() => httpError(500), () => httpError(500), (model) => ({ text: `from ${model}` })]);
    const res = await client(llm, "backup").complete("hello", undefined, []);
    expect(res).toMatchObject({ text: "from backup", fallback: false, model: "backup" });
    expect(llm.models).toEqual([undefined, undefined, "backup"]);
  });

  it("does not retry or switch models on an authentication failure", async () => {
    const llm = new ScriptedLLM([() => httpError(401)]);
    const res = await client(llm, "backup").complete("hello", undefined, []);
    expect(res.text).toBe(FALLBACK_REPLY);
    expect(res.fallback).toBe(true);
    expect(llm.models).toEqual([undefined]);
  });

  it("uses the canned reply when every model answers empty", async () => {
    const llm = new ScriptedLLM([() => ({ text: "   " }), () => ({ text: "" })]);
    const res = await client(llm, "backup").complete("hello", undefined, []);
    expect(res).toMatchObject({ text: FALLBACK_REPLY, fallback: true, messageCount: 2 });
    expect(llm.models).toEqual([undefined, "backup"]);
  });
});
