/**
 * LLM (chat completion) adapter types.
 * Implementations are selected via LLM_PROVIDER (OpenAI-compatible, Anthropic, stub).
 */

export type MessageRole = "system" | "user" | "assistant";

/** Inline image attached to a user message. */
export interface MessageImage {
  /** Raw image bytes. */
  data: Buffer;
  mimeType: "image/jpeg" | "image/png";
}

export interface Message {
  role: MessageRole;
  content: string;
  /** Only honored on user messages. */
  image?: MessageImage;
}

export interface ChatOptions {
  maxTokens?: number;
  /** Overrides the adapter's configured model for this call (fallback model). */
  model?: string;
}

export interface ChatResponse {
  text: string;
  /** Model that produced the reply. */
  model?: string;
}

export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
