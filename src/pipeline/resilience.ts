/**
 * Timeout and retry helpers for external calls (ASR, LLM, TTS).
 * Backoff is base * 2^attempt; authentication failures are never retried.
 */

import { TimeoutError, ServiceError } from "../errors";

export interface RetryOptions {
  /** Total attempts including the first (>= 1). */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Decides whether an error is worth another attempt. Default: isRetryableError. */
  retryOn?: (err: unknown) => boolean;
  /** Called before each retry sleep. */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
}

export function withTimeout<T>(p: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    p.then(
      (v) => {
        clearTimeout(timer);
        resolve(v);
      },
      (e: unknown) => {
        clearTimeout(timer);
        reject(e);
      }
    );
  });
}

/** HTTP status carried by SDK errors (openai, anthropic) and ServiceError. */
export function errorStatus(err: unknown): number | undefined {
  if (err instanceof ServiceError) return err.status;
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

export function isAuthError(err: unknown): boolean {
  const status = errorStatus(err);
  return status === 401 || status === 403;
}

export function isRetryableError(err: unknown): boolean {
  if (isAuthError(err)) return false;
  if (err instanceof ServiceError) return err.retryable;
  const status = errorStatus(err);
  if (status !== undefined) return status === 408 || status === 429 || status >= 500;
  // No status: network failure, timeout or a local error worth one more try.
  return true;
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 30_000): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` up to `attempts` times. Rethrows the last error, or the first non-retryable one.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  const retryOn = opts.retryOn ?? isRetryableError;
  const sleep = opts.sleep ?? defaultSleep;
  let lastErr: unknown = new Error("withRetry: no attempts made");
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      if (attempt === attempts - 1 || !retryOn(err)) break;
      const delayMs = backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
      opts.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }
  throw lastErr;
}
