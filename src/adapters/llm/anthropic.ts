/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

type AnthropicMessage = Anthropic.MessageParam;

function toAnthropicMessage(m: Message & { role: "user" | "assistant" }): AnthropicMessage {
  if (m.role === "assistant" || !m.image) return { role: m.role, content: m.content };
  return {
    role: "user",
    content: [
      {
        type: "image",
        source: { type: "base64", media_type: m.image.mimeType, data: m.image.data.toString("base64") },
      },
      { type: "text", text: m.content },
    ],
  };
}

function isConversational(m: Message): m is Message & { role: "user" | "assistant" } {
  return m.role !== "system";
}

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey, maxRetries: 0 });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? this.cfg.model;
    const system = messages.find((m) => m.role === "system")?.content;
    const response = await this.client.messages.create({
      model,
      max_tokens: options?.maxTokens ?? 256,
      system: system ?? undefined,
      messages: messages.filter(isConversational).map(toAnthropicMessage),
    });
    const textBlock = response.content.find((b) => b.type === "text");
    const text = textBlock && textBlock.type === "text" ? textBlock.text : "";
    return { text, model };
  }
}
