/**
 * In-memory session registry.
 *
 * Owns every Session: creation (explicit or lazy on first connection), state transitions
 * with a capped event log, conversation history, and removal with artifact cleanup.
 * An idle sweep reclaims sessions that are not bound to a live connection.
 */

import { randomUUID } from "crypto";
import { logger, logTransition } from "../logging";
import { SessionExistsError, errorMessage } from "../errors";
import { SessionMemory } from "../memory/session";
import type { TurnRole } from "../memory/types";
import { removeFile } from "../storage/artifacts";
import {
  emptyAudioDescriptor,
  type Session,
  type SessionSnapshot,
  type SessionState,
} from "./types";

export const EVENT_LOG_CAP = 100;

export interface SessionRegistryConfig {
  maxHistoryTurns: number;
  /** Idle time before a session without a connection is removed. */
  sessionGraceMs: number;
  sweepIntervalMs: number;
  eventLogCap?: number;
}

export interface RegistryStats {
  totalSessions: number;
  byState: Record<SessionState, number>;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly bound = new Set<string>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly eventLogCap: number;

  constructor(private readonly config: SessionRegistryConfig) {
    this.eventLogCap = config.eventLogCap ?? EVENT_LOG_CAP;
  }

  /** Throws SessionExistsError when the id is taken. Generates a UUID when no id is given. */
  createSession(id?: string): Session {
    const sessionId = id ?? randomUUID();
    if (this.sessions.has(sessionId)) throw new SessionExistsError(sessionId);
    const now = Date.now();
    const session: Session = {
      id: sessionId,
      createdAt: now,
      lastActivityAt: now,
      state: "disconnected",
      capabilities: null,
      audio: emptyAudioDescriptor(),
      history: new SessionMemory({ maxTurns: this.config.maxHistoryTurns }),
      image: null,
      cameraUploading: false,
      rerecordAttempts: 0,
      diskUsageBytes: 0,
      tts: null,
      events: [],
    };
    this.sessions.set(sessionId, session);
    logger.info({ event: "SESSION_CREATED", sessionId }, "Session created");
    return session;
  }

  getSession(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  getOrCreateSession(id: string): Session {
    return this.sessions.get(id) ?? this.createSession(id);
  }

  hasSession(id: string): boolean {
    return this.sessions.has(id);
  }

  listSessions(): Session[] {
    return [...this.sessions.values()];
  }

  /** Marks the session as held by a live connection; bound sessions are never swept. */
  bind(id: string): void {
    this.bound.add(id);
  }

  release(id: string): void {
    this.bound.delete(id);
  }

  isBound(id: string): boolean {
    return this.bound.has(id);
  }

  /**
   * Delete the session's audio, image and TTS files, then forget it.
   * Returns false when the id was unknown.
   */
  async removeSession(id: string): Promise<boolean> {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.sessions.delete(id);
    this.bound.delete(id);
    await Promise.all([removeFile(session.audio.artifactPath), removeFile(session.image?.path), removeFile(session.tts?.path)]);
    session.audio = emptyAudioDescriptor();
    session.image = null;
    session.tts = null;
    session.diskUsageBytes = 0;
    logger.info({ event: "SESSION_REMOVED", sessionId: id }, "Session removed");
    return true;
  }

  updateState(session: Session, next: SessionState, reason?: string): void {
    const from = session.state;
    session.state = next;
    this.logEvent(session, "state_change", { from, to: next });
    logTransition(logger, session.id, from, next, reason);
  }

  logEvent(session: Session, type: string, data?: Record<string, unknown>): void {
    const timestamp = Date.now();
    session.events.push(data ? { type, timestamp, data } : { type, timestamp });
    if (session.events.length > this.eventLogCap) {
      session.events.splice(0, session.events.length - this.eventLogCap);
    }
    session.lastActivityAt = timestamp;
  }

  touch(session: Session): void {
    session.lastActivityAt = Date.now();
  }

  addConversationTurn(session: Session, role: TurnRole, text: string): void {
    session.history.append(role, text);
  }

  stats(): RegistryStats {
    const byState: Record<SessionState, number> = {
      disconnected: 0,
      connected: 0,
      idle: 0,
      recording: 0,
      processing: 0,
      playing: 0,
      stalled: 0,
      shutdown: 0,
    };
    for (const s of this.sessions.values()) byState[s.state] += 1;
    return { totalSessions: this.sessions.size, byState };
  }

  snapshot(session: Session): SessionSnapshot {
    const { sequenceHistory, ...audio } = session.audio;
    return {
      id: session.id,
      state: session.state,
      createdAt: new Date(session.createdAt).toISOString(),
      lastActivityAt: new Date(session.lastActivityAt).toISOString(),
      capabilities: session.capabilities,
      cameraUploading: session.cameraUploading,
      rerecordAttempts: session.rerecordAttempts,
      diskUsageBytes: session.diskUsageBytes,
      audio: { ...audio, sequenceCount: sequenceHistory.length },
      image: session.image
        ? {
            filename: session.image.filename,
            sizeBytes: session.image.sizeBytes,
            width: session.image.width,
            height: session.image.height,
          }
        : null,
      tts: session.tts
        ? { durationMs: session.tts.durationMs, sizeBytes: session.tts.sizeBytes, fallback: session.tts.fallback }
        : null,
      historyTurns: session.history.size,
      recentHistory: session.history.recent(5),
      recentEvents: session.events.slice(-10),
    };
  }

  /** Sessions idle longer than the grace period and not held by a connection. */
  idleSessions(now: number = Date.now()): Session[] {
    return this.listSessions().filter(
      (s) => !this.bound.has(s.id) && now - s.lastActivityAt > this.config.sessionGraceMs
    );
  }

  async sweepIdle(now: number = Date.now()): Promise<string[]> {
    const removed: string[] = [];
    for (const s of this.idleSessions(now)) {
      if (await this.removeSession(s.id)) removed.push(s.id);
    }
    if (removed.length > 0) {
      logger.info({ event: "SESSION_SWEEP", removed: removed.length }, "Removed idle sessions");
    }
    return removed;
  }

  startIdleSweep(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweepIdle().catch((err: unknown) => {
        logger.error({ event: "SESSION_SWEEP_FAILED", err: errorMessage(err) }, "Idle sweep failed");
      });
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopIdleSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Stop sweeping, move every session to shutdown, remove them all. */
  async shutdown(): Promise<void> {
    this.stopIdleSweep();
    for (const s of this.listSessions()) {
      if (s.state !== "shutdown") this.updateState(s, "shutdown", "server shutdown");
    }
    await Promise.all(this.listSessions().map((s) => this.removeSession(s.id)));
  }
}
