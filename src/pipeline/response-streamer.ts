/**
 * Streams a TTS WAV artifact to the device:
 * tts_ready, then per slice tts_chunk_meta + binary frame, then exactly one tts_done.
 */

import * as fs from "fs";
import { logger } from "../logging";
import { incrementCounter } from "../metrics";
import { errorMessage } from "../errors";
import type { MessageSink } from "../device/protocol";
import { parseWavHeader, WAV_HEADER_BYTES } from "./audio-utils";

export interface ResponseStreamerConfig {
  /** Slice size; same as the inbound chunk size. */
  chunkSizeBytes: number;
  /** Pause between slices. */
  pacingMs: number;
  /** Sample rate reported when the header cannot be read. */
  defaultSampleRate: number;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ResponseStreamer {
  constructor(private readonly config: ResponseStreamerConfig) {}

  /** Returns false when the file is missing or any send fails; nothing more is sent after that. */
  async stream(artifactPath: string, sink: MessageSink, sessionId: string): Promise<boolean> {
    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(artifactPath, "r");
    } catch (err) {
      logger.error({ event: "TTS_STREAM_OPEN_FAILED", sessionId, err: errorMessage(err) }, "TTS artifact not readable");
      return false;
    }

    try {
      const { size: fileSize } = await handle.stat();
      const header = Buffer.alloc(Math.min(fileSize, 4096));
      await handle.read(header, 0, header.length, 0);
      const info = parseWavHeader(header);
      if (!info) {
        logger.warn({ event: "TTS_WAV_HEADER_UNREADABLE", sessionId }, "TTS artifact has no readable WAV header");
      }
      const sampleRate = info?.sampleRate ?? this.config.defaultSampleRate;
      const durationMs = info
        ? info.durationMs
        : Math.round((Math.max(0, fileSize - WAV_HEADER_BYTES) / (sampleRate * 2)) * 1000);

      logger.info({ event: "TTS_STREAM_START", sessionId, fileSize, durationMs }, "Streaming TTS to device");
      if (!(await sink.sendJson({ type: "tts_ready", duration_ms: durationMs, sampleRate, format: "wav", fileSize }))) {
        return this.aborted(sessionId, "tts_ready");
      }

      const chunkSize = this.config.chunkSizeBytes;
      let seq = 0;
      let position = 0;
      while (position < fileSize) {
        const len = Math.min(chunkSize, fileSize - position);
        const slice = Buffer.alloc(len);
        const { bytesRead } = await handle.read(slice, 0, len, position);
        if (bytesRead === 0) break;
        const payload = bytesRead === len ? slice : slice.subarray(0, bytesRead);
        if (!(await sink.sendChunk({ type: "tts_chunk_meta", seq, len_bytes: payload.length }, payload))) {
          return this.aborted(sessionId, `chunk ${seq}`);
        }
        incrementCounter("ttsBytesStreamed", payload.length);
        position += payload.length;
        seq += 1;
        if (position < fileSize && this.config.pacingMs > 0) await delay(this.config.pacingMs);
      }

      if (!(await sink.sendJson({ type: "tts_done" }))) return this.aborted(sessionId, "tts_done");
      logger.info({ event: "TTS_STREAM_DONE", sessionId, chunks: seq, bytes: position }, "TTS streaming complete");
      return true;
    } catch (err) {
      logger.error({ event: "TTS_STREAM_FAILED", sessionId, err: errorMessage(err) }, "TTS streaming failed");
      return false;
    } finally {
      await handle.close();
    }
  }

  private aborted(sessionId: string, at: string): boolean {
    logger.warn({ event: "TTS_STREAM_ABORTED", sessionId, at }, "TTS send failed; aborting stream");
    return false;
  }
}
