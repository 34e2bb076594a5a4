/**
 * Structured logging for the capture gateway.
 * Connection, session, ingest, and provider events are logged as JSON with timestamps.
 *
 * Env:
 *   LOG_LEVEL  - debug | info | warn | error (default: info)
 *   LOG_FILE   - If set, append all logs to this path (creates dirs if needed).
 *   LOG_PRETTY - true | false (default: true outside production)
 */

import pino from "pino";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  logFile?: string;
}

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim();
  // Jest runs quiet unless a level is asked for.
  const fallback: LogLevel = process.env.JEST_WORKER_ID ? "silent" : "info";
  return LOG_LEVELS.find((l) => l === raw) ?? fallback;
}

function envPretty(): boolean {
  const raw = process.env.LOG_PRETTY?.trim();
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  return process.env.NODE_ENV !== "production" && !process.env.JEST_WORKER_ID;
}

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? envLevel(),
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? envPretty();
  const logFile = config.logFile ?? process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log ASR result (transcript length only; transcripts may carry PII). */
export function logAsrResult(log: pino.Logger, sessionId: string, textLength: number, durationMs?: number): void {
  log.info({ event: "ASR_RESULT", sessionId, textLength, durationMs }, "ASR completed");
}

/** Log LLM request/response (summary only). */
export function logLlmCall(
  log: pino.Logger,
  sessionId: string,
  messageCount: number,
  responseLength: number,
  durationMs?: number
): void {
  log.info({ event: "LLM_CALL", sessionId, messageCount, responseLength, durationMs }, "LLM completed");
}

/** Log TTS call. */
export function logTtsCall(
  log: pino.Logger,
  sessionId: string,
  textLength: number,
  audioBytes: number,
  durationMs?: number
): void {
  log.info({ event: "TTS_CALL", sessionId, textLength, audioBytes, durationMs }, "TTS completed");
}

/** Log a session state transition. */
export function logTransition(log: pino.Logger, sessionId: string, from: string, to: string, reason?: string): void {
  log.info({ event: "SESSION_STATE", sessionId, from, to, reason }, "Session state changed");
}

/** Log error. */
export function logError(log: pino.Logger, err: unknown, context?: Record<string, unknown>): void {
  if (err instanceof Error) {
    log.error({ err: err.message, stack: err.stack, ...context }, "Error");
  } else {
    log.error({ err: String(err), ...context }, "Error");
  }
}
