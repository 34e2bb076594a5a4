/**
 * Disk quota accounting and temp-dir reclamation.
 *
 * Usage is always recomputed from file sizes on disk. The periodic sweep deletes artifacts
 * whose owning session is gone (or no longer references them) once they are older than the
 * grace period, and asks the registry to drop live-but-idle sessions that hold no connection.
 */

import * as fs from "fs";
import * as path from "path";
import { logger } from "../logging";
import { errorMessage } from "../errors";
import type { Session } from "../session/types";
import { ensureDir, fileSize, isNotFound, parseArtifactName, removeFile } from "./artifacts";

/** The registry operations the sweep needs. */
export interface SessionDirectory {
  getSession(id: string): Session | undefined;
  isBound(id: string): boolean;
  removeSession(id: string): Promise<boolean>;
}

export interface QuotaConfig {
  tempDir: string;
  maxSessionBytes: number;
  maxStoreBytes: number;
  graceMs: number;
  sweepIntervalMs: number;
}

export interface StoreUsage {
  totalSizeBytes: number;
  fileCount: number;
  quotaBytes: number;
}

export interface SweepReport {
  filesDeleted: number;
  bytesFreed: number;
  sessionsRemoved: string[];
  usage: StoreUsage;
}

export type QuotaVerdict = { ok: true } | { ok: false; scope: "session" | "store"; usageBytes: number; limitBytes: number };

export const MB = 1024 * 1024;

function referencedPaths(session: Session): Set<string> {
  const paths = new Set<string>();
  if (session.audio.artifactPath) paths.add(path.resolve(session.audio.artifactPath));
  if (session.image) paths.add(path.resolve(session.image.path));
  if (session.tts) paths.add(path.resolve(session.tts.path));
  return paths;
}

export class StorageQuotaManager {
  private timer: NodeJS.Timeout | null = null;
  private sessions: SessionDirectory | null = null;

  constructor(private readonly config: QuotaConfig) {}

  get tempDir(): string {
    return this.config.tempDir;
  }

  async init(): Promise<void> {
    await ensureDir(this.config.tempDir);
    logger.info({ event: "TEMP_DIR_READY", tempDir: this.config.tempDir }, "Temp directory ready");
  }

  /** Registry used by the sweep; without one only orphan files are reclaimed. */
  attach(sessions: SessionDirectory): void {
    this.sessions = sessions;
  }

  /** Recompute the session's usage (audio + image + TTS) and store it on the session. */
  async sessionUsage(session: Session): Promise<number> {
    const sizes = await Promise.all([
      fileSize(session.audio.artifactPath),
      fileSize(session.image?.path),
      fileSize(session.tts?.path),
    ]);
    const total = sizes.reduce((a, b) => a + b, 0);
    session.diskUsageBytes = total;
    return total;
  }

  /** True when the recomputed usage is strictly above the per-session quota. */
  async isSessionOverQuota(session: Session): Promise<boolean> {
    return (await this.sessionUsage(session)) > this.config.maxSessionBytes;
  }

  async isStoreOverQuota(): Promise<boolean> {
    const usage = await this.storeUsage();
    return usage.totalSizeBytes > usage.quotaBytes;
  }

  async storeUsage(): Promise<StoreUsage> {
    let totalSizeBytes = 0;
    let fileCount = 0;
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.config.tempDir, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) return { totalSizeBytes: 0, fileCount: 0, quotaBytes: this.config.maxStoreBytes };
      throw err;
    }
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const size = await fileSize(path.join(this.config.tempDir, entry.name));
      totalSizeBytes += size;
      fileCount += 1;
    }
    return { totalSizeBytes, fileCount, quotaBytes: this.config.maxStoreBytes };
  }

  /**
   * Would adding `incomingBytes` to this session push it (or the whole store) past its limit?
   * `replacedBytes` is subtracted first, for uploads that replace an existing file.
   */
  async checkAdmission(session: Session, incomingBytes: number, replacedBytes = 0): Promise<QuotaVerdict> {
    const sessionBytes = (await this.sessionUsage(session)) - replacedBytes + incomingBytes;
    if (sessionBytes > this.config.maxSessionBytes) {
      return { ok: false, scope: "session", usageBytes: sessionBytes, limitBytes: this.config.maxSessionBytes };
    }
    const store = await this.storeUsage();
    const storeBytes = store.totalSizeBytes - replacedBytes + incomingBytes;
    if (storeBytes > this.config.maxStoreBytes) {
      return { ok: false, scope: "store", usageBytes: storeBytes, limitBytes: this.config.maxStoreBytes };
    }
    return { ok: true };
  }

  async sweep(now: number = Date.now()): Promise<SweepReport> {
    let filesDeleted = 0;
    let bytesFreed = 0;
    const sessionsRemoved: string[] = [];
    const staleOwners = new Set<string>();

    let names: string[];
    try {
      names = await fs.promises.readdir(this.config.tempDir);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      names = [];
    }

    for (const name of names) {
      const parsed = parseArtifactName(name);
      if (!parsed) continue;
      const filePath = path.resolve(this.config.tempDir, name);
      let mtimeMs: number;
      let size: number;
      try {
        const st = await fs.promises.stat(filePath);
        if (!st.isFile()) continue;
        mtimeMs = st.mtimeMs;
        size = st.size;
      } catch (err) {
        if (isNotFound(err)) continue;
        throw err;
      }
      if (now - mtimeMs <= this.config.graceMs) continue;

      const owner = this.sessions?.getSession(parsed.sessionId);
      if (owner && referencedPaths(owner).has(filePath)) {
        if (!this.sessions?.isBound(owner.id) && now - owner.lastActivityAt > this.config.graceMs) {
          staleOwners.add(owner.id);
        }
        continue;
      }
      if (await removeFile(filePath)) {
        filesDeleted += 1;
        bytesFreed += size;
        logger.debug({ event: "ORPHAN_ARTIFACT_DELETED", file: name, sessionId: parsed.sessionId }, "Deleted orphan artifact");
      }
    }

    for (const id of staleOwners) {
      if (this.sessions && (await this.sessions.removeSession(id))) sessionsRemoved.push(id);
    }

    const usage = await this.storeUsage();
    if (filesDeleted > 0 || sessionsRemoved.length > 0) {
      logger.info(
        { event: "STORAGE_SWEEP", filesDeleted, bytesFreed, sessionsRemoved: sessionsRemoved.length, ...usage },
        "Storage sweep reclaimed space"
      );
    }
    if (usage.totalSizeBytes > usage.quotaBytes) {
      logger.warn({ event: "STORE_QUOTA_EXCEEDED", ...usage }, "Temp store above quota");
    }
    return { filesDeleted, bytesFreed, sessionsRemoved, usage };
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        logger.error({ event: "STORAGE_SWEEP_FAILED", err: errorMessage(err) }, "Storage sweep failed");
      });
    }, this.config.sweepIntervalMs);
    this.timer.unref();
    logger.info({ event: "STORAGE_SWEEP_STARTED", intervalMs: this.config.sweepIntervalMs }, "Started storage sweep");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
