/**
 * Error types shared across the gateway.
 * Each carries a stable code; protocol errors surface to the device as { type: "error", code, message }.
 */

export type GatewayErrorCode =
  | "session_exists"
  | "protocol_error"
  | "invalid_state"
  | "service_error"
  | "timeout"
  | "quota_exceeded"
  | "invalid_image";

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(code: GatewayErrorCode, message: string) {
    super(message);
    this.name = "GatewayError";
    this.code = code;
  }
}

/** createSession was asked for an id that is already registered. */
export class SessionExistsError extends GatewayError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("session_exists", `Session already exists: ${sessionId}`);
    this.name = "SessionExistsError";
    this.sessionId = sessionId;
  }
}

/** Malformed or out-of-sequence frame from the device. */
export class ProtocolError extends GatewayError {
  constructor(message: string) {
    super("protocol_error", message);
    this.name = "ProtocolError";
  }
}

/** Failure from an external ASR/LLM/TTS provider. */
export class ServiceError extends GatewayError {
  readonly service: "asr" | "llm" | "tts";
  readonly status?: number;
  readonly retryable: boolean;

  constructor(service: "asr" | "llm" | "tts", message: string, opts: { status?: number; retryable?: boolean } = {}) {
    super("service_error", message);
    this.name = "ServiceError";
    this.service = service;
    this.status = opts.status;
    this.retryable = opts.retryable ?? true;
  }
}

export class TimeoutError extends GatewayError {
  constructor(label: string, ms: number) {
    super("timeout", `${label} timeout after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

export class ImageRejectedError extends GatewayError {
  /** HTTP status to answer the upload with. */
  readonly status: number;

  constructor(message: string, status = 400) {
    super(status === 507 ? "quota_exceeded" : "invalid_image", message);
    this.name = "ImageRejectedError";
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
