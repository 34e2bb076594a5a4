/**
 * Time-limited download tokens for TTS artifacts (GET /download/<token>).
 */

import { randomUUID } from "crypto";
import { logger } from "../logging";

interface DownloadEntry {
  filePath: string;
  sessionId: string;
  expiresAt: number;
}

export interface DownloadRegistryConfig {
  ttlMs: number;
  /** Prefix for issued URLs; empty gives a path-only URL. */
  publicBaseUrl?: string;
}

export class DownloadRegistry {
  private readonly entries = new Map<string, DownloadEntry>();

  constructor(private readonly config: DownloadRegistryConfig) {}

  /** Register a file and return its download URL. */
  issue(filePath: string, sessionId: string, now: number = Date.now()): { token: string; url: string } {
    this.prune(now);
    const token = randomUUID();
    this.entries.set(token, { filePath, sessionId, expiresAt: now + this.config.ttlMs });
    const base = (this.config.publicBaseUrl ?? "").replace(/\/+$/, "");
    const url = `${base}/download/${token}`;
    logger.info({ event: "DOWNLOAD_ISSUED", sessionId, expiresInMs: this.config.ttlMs }, "Download URL issued");
    return { token, url };
  }

  /** Path for a live token; null when unknown or expired. */
  resolve(token: string, now: number = Date.now()): string | null {
    const entry = this.entries.get(token);
    if (!entry) return null;
    if (now >= entry.expiresAt) {
      this.entries.delete(token);
      return null;
    }
    return entry.filePath;
  }

  /** Drop every token pointing at this file (after the artifact is replaced or removed). */
  revokeFile(filePath: string): void {
    for (const [token, entry] of this.entries) {
      if (entry.filePath === filePath) this.entries.delete(token);
    }
  }

  prune(now: number = Date.now()): void {
    for (const [token, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(token);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
