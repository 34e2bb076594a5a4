/**
 * In-memory conversation history: rolling transcript with max turn count.
 */

import type { MemoryTurn, SessionMemorySnapshot, ISessionMemory, TurnRole } from "./types";

export interface SessionMemoryConfig {
  /** Max number of recent turns to keep. */
  maxTurns: number;
}

export class SessionMemory implements ISessionMemory {
  private turns: MemoryTurn[] = [];
  private readonly maxTurns: number;

  constructor(config: SessionMemoryConfig) {
    this.maxTurns = config.maxTurns;
  }

  get size(): number {
    return this.turns.length;
  }

  append(role: TurnRole, content: string): void {
    if (!content.trim()) return;
    this.turns.push({
      role,
      content: content.trim(),
      timestamp: Date.now(),
    });
    while (this.turns.length > this.maxTurns) {
      this.turns.shift();
    }
  }

  getSnapshot(): SessionMemorySnapshot {
    return { turns: [...this.turns] };
  }

  recent(n: number): MemoryTurn[] {
    if (n <= 0) return [];
    return this.turns.slice(-n);
  }

  clear(): void {
    this.turns = [];
  }
}
