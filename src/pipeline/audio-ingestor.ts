/**
 * Audio ingestion: appends sequenced PCM16 chunks to the session's raw audio artifact.
 *
 * Sequence policy: the first chunk fixes the expected number. A chunk up to `seqTolerance`
 * ahead is taken as ordinary packet loss; further ahead is flagged "gap"; behind is
 * flagged "out_of_order". Flagged chunks are still appended (unless the gap policy drops
 * stale ones) and the expected number only ever moves forward.
 */

import * as fs from "fs";
import type { GapPolicy } from "../config";
import { logger } from "../logging";
import { incrementCounter } from "../metrics";
import { errorMessage } from "../errors";
import type { SessionRegistry } from "../session/registry";
import { emptyAudioDescriptor, type Session } from "../session/types";
import { artifactPath, ensureDir, fileExists, removeFile } from "../storage/artifacts";
import type { StorageQuotaManager } from "../storage/quota-manager";
import { pcmDurationSec } from "./audio-utils";

export type ChunkFlag = "in_order" | "tolerated_gap" | "gap" | "out_of_order";

export type IngestRejection = "no_recording" | "empty_chunk" | "quota_exceeded" | "write_failed";

export type IngestResult =
  | { ok: true; seq: number; flag: ChunkFlag; appended: boolean }
  | { ok: false; seq: number; reason: IngestRejection };

export type FinalizeResult =
  | { ok: true; artifactPath: string; durationSec: number; totalBytes: number }
  | { ok: false; reason: string };

export interface AudioIngestorConfig {
  sampleRate: number;
  seqTolerance: number;
  gapPolicy: GapPolicy;
}

export class AudioIngestor {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly quota: StorageQuotaManager,
    private readonly config: AudioIngestorConfig
  ) {}

  /** Open a fresh, empty artifact for a new recording, discarding any previous one. */
  async startSession(session: Session): Promise<string> {
    await this.cleanupSession(session);
    await ensureDir(this.quota.tempDir);
    const filePath = artifactPath(this.quota.tempDir, "audio", session.id, "raw");
    await fs.promises.writeFile(filePath, Buffer.alloc(0));
    session.audio = { ...emptyAudioDescriptor(), artifactPath: filePath, startedAt: Date.now() };
    await this.quota.sessionUsage(session);
    this.registry.logEvent(session, "recording_opened", { artifact: filePath });
    logger.info({ event: "RECORDING_STARTED", sessionId: session.id, artifact: filePath }, "Recording artifact opened");
    return filePath;
  }

  classify(session: Session, seq: number): ChunkFlag {
    const expected = session.audio.expectedSeq;
    if (expected === null || seq === expected) return "in_order";
    if (seq < expected) return "out_of_order";
    return seq - expected <= this.config.seqTolerance ? "tolerated_gap" : "gap";
  }

  async ingestChunk(session: Session, seq: number, bytes: Buffer): Promise<IngestResult> {
    const audio = session.audio;
    if (!audio.artifactPath) return this.reject(session, seq, "no_recording");
    if (bytes.length === 0) return this.reject(session, seq, "empty_chunk");

    // Usage is already over a limit: refuse without writing.
    if ((await this.quota.isSessionOverQuota(session)) || (await this.quota.isStoreOverQuota())) {
      return this.reject(session, seq, "quota_exceeded");
    }

    if (audio.expectedSeq === null) audio.expectedSeq = seq;
    const expected = audio.expectedSeq;
    const flag = this.classify(session, seq);

    if (flag === "gap") {
      incrementCounter("chunksFlaggedGap");
      this.registry.logEvent(session, "chunk_gap", { expected, received: seq });
      logger.warn({ event: "CHUNK_GAP", sessionId: session.id, expected, received: seq }, "Audio chunk gap beyond tolerance");
    } else if (flag === "out_of_order") {
      incrementCounter("chunksFlaggedOutOfOrder");
      this.registry.logEvent(session, "chunk_out_of_order", { expected, received: seq });
      logger.warn({ event: "CHUNK_OUT_OF_ORDER", sessionId: session.id, expected, received: seq }, "Late audio chunk");
      if (this.config.gapPolicy === "drop-stale") {
        return { ok: true, seq, flag, appended: false };
      }
    }

    try {
      await fs.promises.appendFile(audio.artifactPath, bytes);
    } catch (err) {
      logger.error({ event: "CHUNK_WRITE_FAILED", sessionId: session.id, seq, err: errorMessage(err) }, "Could not append chunk");
      return this.reject(session, seq, "write_failed");
    }

    audio.chunksReceived += 1;
    audio.totalBytes += bytes.length;
    audio.sequenceHistory.push(seq);
    audio.highestSeq = audio.highestSeq === null ? seq : Math.max(audio.highestSeq, seq);
    if (seq >= expected) audio.expectedSeq = seq + 1;
    this.registry.touch(session);
    incrementCounter("chunksAccepted");

    // Bytes are on disk either way; over quota is a signal for the caller to abort.
    if (await this.quota.isSessionOverQuota(session)) {
      logger.warn(
        { event: "SESSION_QUOTA_EXCEEDED", sessionId: session.id, usageBytes: session.diskUsageBytes },
        "Session exceeded disk quota"
      );
      return this.reject(session, seq, "quota_exceeded");
    }
    if (audio.chunksReceived % 10 === 0) {
      logger.debug(
        { event: "CHUNK_PROGRESS", sessionId: session.id, chunks: audio.chunksReceived, bytes: audio.totalBytes },
        "Audio ingest progress"
      );
    }
    return { ok: true, seq, flag, appended: true };
  }

  async finalizeSession(session: Session): Promise<FinalizeResult> {
    const filePath = session.audio.artifactPath;
    if (!filePath || !(await fileExists(filePath))) {
      logger.error({ event: "FINALIZE_NO_ARTIFACT", sessionId: session.id }, "No recording artifact to finalize");
      return { ok: false, reason: "no recording artifact" };
    }
    const { size } = await fs.promises.stat(filePath);
    const durationSec = pcmDurationSec(size, this.config.sampleRate);
    this.registry.logEvent(session, "recording_finalized", {
      durationSec,
      totalChunks: session.audio.chunksReceived,
      totalBytes: size,
    });
    logger.info(
      { event: "RECORDING_FINALIZED", sessionId: session.id, durationSec, totalBytes: size },
      "Recording finalized"
    );
    return { ok: true, artifactPath: filePath, durationSec, totalBytes: size };
  }

  /** Raw bytes of the open artifact (empty when there is none). */
  async readArtifact(session: Session): Promise<Buffer> {
    const filePath = session.audio.artifactPath;
    if (!filePath) return Buffer.alloc(0);
    try {
      return await fs.promises.readFile(filePath);
    } catch (err) {
      logger.warn({ event: "ARTIFACT_READ_FAILED", sessionId: session.id, err: errorMessage(err) }, "Could not read audio artifact");
      return Buffer.alloc(0);
    }
  }

  /** Delete the artifact and reset every counter. */
  async cleanupSession(session: Session): Promise<void> {
    const filePath = session.audio.artifactPath;
    session.audio = emptyAudioDescriptor();
    if (filePath && (await removeFile(filePath))) {
      logger.debug({ event: "RECORDING_CLEANED", sessionId: session.id, artifact: filePath }, "Recording artifact removed");
    }
    await this.quota.sessionUsage(session);
  }

  private reject(session: Session, seq: number, reason: IngestRejection): IngestResult {
    incrementCounter("chunksRejected");
    this.registry.logEvent(session, "chunk_rejected", { seq, reason });
    return { ok: false, seq, reason };
  }
}
