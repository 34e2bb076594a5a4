/**
 * Connection admission policy.
 *
 * Order of checks: session id, capacity, duplicate session, single-session conflict, token.
 * A refused transport is closed with the reason's close code. Admitted transports are bound
 * one-to-one to their session until `disconnect`.
 */

import { createHash, timingSafeEqual } from "crypto";
import { logger } from "../logging";
import { incrementCounter } from "../metrics";
import type { SessionRegistry } from "../session/registry";
import type { Session } from "../session/types";
import type { DeviceTransport } from "./transport";

export type RejectReason =
  | "missing_session"
  | "capacity"
  | "duplicate_session"
  | "single_session_conflict"
  | "auth_failure";

export const CLOSE_CODES: Record<RejectReason, number> = {
  missing_session: 4400,
  auth_failure: 4401,
  duplicate_session: 4409,
  single_session_conflict: 4423,
  capacity: 4429,
};

export type AcceptResult = { admitted: true; session: Session } | { admitted: false; reason: RejectReason };

export interface ConnectionGateConfig {
  token: string;
  maxConnections: number;
  singleSessionMode: boolean;
}

export const SESSION_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;

/** Token from `?token=` or an Authorization header (`Bearer <token>` or the bare token). */
export function extractToken(queryToken: string | null | undefined, authorization: string | undefined): string | undefined {
  if (queryToken) return queryToken;
  if (!authorization) return undefined;
  const trimmed = authorization.trim();
  const m = /^Bearer\s+(.+)$/i.exec(trimmed);
  return m ? m[1].trim() : trimmed || undefined;
}

/** Constant-time comparison; an empty expected token never matches. */
export function tokensMatch(expected: string, presented: string | undefined): boolean {
  if (!expected || presented === undefined) return false;
  // Hash both sides so lengths match for timingSafeEqual.
  const a = createHash("sha256").update(expected).digest();
  const b = createHash("sha256").update(presented).digest();
  return timingSafeEqual(a, b);
}

export class ConnectionGate {
  private readonly bySession = new Map<string, DeviceTransport>();
  private readonly byTransport = new Map<string, string>();

  constructor(
    private readonly registry: SessionRegistry,
    private readonly config: ConnectionGateConfig
  ) {}

  get activeCount(): number {
    return this.bySession.size;
  }

  transportFor(sessionId: string): DeviceTransport | undefined {
    return this.bySession.get(sessionId);
  }

  sessionFor(transport: DeviceTransport): string | undefined {
    return this.byTransport.get(transport.id);
  }

  /** Admission check only; does not bind or close anything. */
  evaluate(sessionId: string | null | undefined, authToken: string | undefined): RejectReason | null {
    if (!sessionId || !SESSION_ID_RE.test(sessionId)) return "missing_session";
    if (this.bySession.size >= this.config.maxConnections) return "capacity";
    if (this.bySession.has(sessionId)) return "duplicate_session";
    if (this.config.singleSessionMode && this.bySession.size > 0) return "single_session_conflict";
    if (!tokensMatch(this.config.token, authToken)) return "auth_failure";
    return null;
  }

  accept(transport: DeviceTransport, sessionId: string | null | undefined, authToken: string | undefined): AcceptResult {
    const reason = this.evaluate(sessionId, authToken);
    if (reason !== null || !sessionId) {
      const why = reason ?? "missing_session";
      incrementCounter("connectionsRejected");
      logger.warn({ event: "GATE_REJECTED", sessionId, reason: why, code: CLOSE_CODES[why] }, "Connection refused");
      transport.close(CLOSE_CODES[why], why);
      return { admitted: false, reason: why };
    }

    const session = this.registry.getOrCreateSession(sessionId);
    this.bySession.set(sessionId, transport);
    this.byTransport.set(transport.id, sessionId);
    this.registry.bind(sessionId);
    incrementCounter("connectionsAccepted");
    logger.info({ event: "GATE_ADMITTED", sessionId, active: this.bySession.size }, "Connection admitted");
    return { admitted: true, session };
  }

  /** Release the transport's binding. Returns the session id it held, if any. */
  disconnect(transport: DeviceTransport): string | undefined {
    const sessionId = this.byTransport.get(transport.id);
    if (sessionId === undefined) return undefined;
    this.byTransport.delete(transport.id);
    if (this.bySession.get(sessionId) === transport) {
      this.bySession.delete(sessionId);
      this.registry.release(sessionId);
    }
    logger.info({ event: "GATE_RELEASED", sessionId, active: this.bySession.size }, "Connection released");
    return sessionId;
  }
}
