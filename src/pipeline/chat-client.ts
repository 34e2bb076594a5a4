/**
 * Chat completion with retries and an optional fallback model.
 * Never throws: total failure yields FALLBACK_REPLY with `fallback: true`.
 */

import type { ILLM, MessageImage } from "../adapters/llm";
import type { MemoryTurn } from "../memory/types";
import { PromptManager } from "../prompts/prompt-manager";
import { logger } from "../logging";
import { errorMessage } from "../errors";
import { withRetry, withTimeout, isAuthError, type RetryOptions } from "./resilience";

export const FALLBACK_REPLY = "I'm having trouble thinking right now. Please try again.";

export interface ChatClientConfig {
  retryAttempts: number;
  timeoutMs: number;
  maxTokens: number;
  fallbackModel?: string;
  /** Base backoff delay (default 1000 ms). */
  retryBaseDelayMs?: number;
  /** Injectable for tests. */
  sleep?: RetryOptions["sleep"];
}

export interface ChatResult {
  text: string;
  /** True when every attempt failed and `text` is the canned reply. */
  fallback: boolean;
  model?: string;
  messageCount: number;
  durationMs: number;
}

export class ChatClient {
  constructor(
    private readonly llm: ILLM,
    private readonly prompts: PromptManager,
    private readonly config: ChatClientConfig
  ) {}

  async complete(transcript: string, image: MessageImage | undefined, history: MemoryTurn[]): Promise<ChatResult> {
    const messages = this.prompts.buildMessages({ transcript, image, history });
    const startedAt = Date.now();
    const call = (model?: string): Promise<{ text: string; model?: string }> =>
      withTimeout(this.llm.chat(messages, { maxTokens: this.config.maxTokens, model }), this.config.timeoutMs, "LLM");

    try {
      const res = await withRetry(() => call(), {
        attempts: this.config.retryAttempts,
        baseDelayMs: this.config.retryBaseDelayMs ?? 1000,
        sleep: this.config.sleep,
        onRetry: (err, attempt, delayMs) =>
          logger.warn({ event: "LLM_RETRY", attempt: attempt + 1, delayMs, err: errorMessage(err) }, "LLM call failed; retrying"),
      });
      if (res.text.trim()) {
        return { text: res.text.trim(), fallback: false, model: res.model, messageCount: messages.length, durationMs: Date.now() - startedAt };
      }
      logger.warn({ event: "LLM_EMPTY_REPLY" }, "LLM returned an empty reply");
    } catch (err) {
      logger.error({ event: "LLM_FAILED", err: errorMessage(err), auth: isAuthError(err) }, "LLM call failed");
      // Credentials are shared across models; a fallback would fail the same way.
      if (isAuthError(err)) return this.fallback(messages.length, startedAt);
    }

    const fallbackModel = this.config.fallbackModel;
    if (fallbackModel) {
      logger.info({ event: "LLM_FALLBACK_MODEL", model: fallbackModel }, "Trying fallback model");
      try {
        const res = await call(fallbackModel);
        if (res.text.trim()) {
          return {
            text: res.text.trim(),
            fallback: false,
            model: res.model ?? fallbackModel,
            messageCount: messages.length,
            durationMs: Date.now() - startedAt,
          };
        }
      } catch (err) {
        logger.error({ event: "LLM_FALLBACK_FAILED", err: errorMessage(err) }, "Fallback model also failed");
      }
    }
    return this.fallback(messages.length, startedAt);
  }

  private fallback(messageCount: number, startedAt: number): ChatResult {
    return { text: FALLBACK_REPLY, fallback: true, messageCount, durationMs: Date.now() - startedAt };
  }
}
