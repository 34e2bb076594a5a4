/**
 * Conversation memory types for a capture session.
 */

export type TurnRole = "user" | "assistant";

export interface MemoryTurn {
  role: TurnRole;
  content: string;
  timestamp: number;
}

export interface SessionMemorySnapshot {
  /** Retained turns, oldest first. */
  turns: MemoryTurn[];
}

export interface ISessionMemory {
  /** Append a user or assistant turn; blank content is ignored. */
  append(role: TurnRole, content: string): void;

  getSnapshot(): SessionMemorySnapshot;

  /** The most recent `n` turns, oldest first. */
  recent(n: number): MemoryTurn[];

  clear(): void;
}
