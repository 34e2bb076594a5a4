/**
 * OpenAI Chat Completions LLM adapter.
 * Any OpenAI-compatible endpoint works through baseUrl (e.g. Groq).
 */

import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface OpenAILlmConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

function toOpenAIMessage(m: Message): ChatCompletionMessageParam {
  if (m.role === "system") return { role: "system", content: m.content };
  if (m.role === "assistant") return { role: "assistant", content: m.content };
  if (!m.image) return { role: "user", content: m.content };
  const dataUrl = `data:${m.image.mimeType};base64,${m.image.data.toString("base64")}`;
  return {
    role: "user",
    content: [
      { type: "text", text: m.content },
      { type: "image_url", image_url: { url: dataUrl } },
    ],
  };
}

export class OpenAILLM implements ILLM {
  private client: OpenAI;

  constructor(private readonly cfg: OpenAILlmConfig) {
    // Retries are owned by ChatClient.
    this.client = new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseUrl, maxRetries: 0 });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? this.cfg.model;
    const response = await this.client.chat.completions.create({
      model,
      messages: messages.map(toOpenAIMessage),
      max_tokens: options?.maxTokens ?? 256,
      stream: false,
    });
    const text = response.choices[0]?.message?.content ?? "";
    return { text, model };
  }
}
