import type { Message, MessageImage } from "../adapters/llm";
import type { MemoryTurn } from "../memory/types";

export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful AI assistant. Respond concisely and use natural language.";

/** Added when the device sent a photo with the question. */
export const IMAGE_ADDENDUM =
  "The user is wearing a camera; when an image is attached it shows what they are looking at.";

export interface PromptManagerConfig {
  /** Base system prompt. Defaults to DEFAULT_SYSTEM_PROMPT. */
  systemPrompt?: string;
  /** Prior turns sent with each request. */
  historyWindow?: number;
}

export interface BuildPromptArgs {
  /** Prior conversation, oldest first, not including the current transcript. */
  history: MemoryTurn[];
  transcript: string;
  image?: MessageImage;
}

/**
 * PromptManager
 *
 * Builds the message list for one spoken question: system prompt, a window of recent
 * turns, then the transcript (with the camera image attached when there is one).
 */
export class PromptManager {
  private readonly systemPrompt: string;
  private readonly historyWindow: number;

  constructor(cfg: PromptManagerConfig = {}) {
    this.systemPrompt = cfg.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.historyWindow = cfg.historyWindow ?? 5;
  }

  buildMessages(args: BuildPromptArgs): Message[] {
    const system = args.image ? [this.systemPrompt, IMAGE_ADDENDUM].join("\n\n") : this.systemPrompt;
    const window = this.historyWindow > 0 ? args.history.slice(-this.historyWindow) : [];
    const user: Message = { role: "user", content: args.transcript };
    if (args.image) user.image = args.image;
    return [
      { role: "system", content: system },
      ...window.map((t): Message => ({ role: t.role, content: t.content })),
      user,
    ];
  }
}
