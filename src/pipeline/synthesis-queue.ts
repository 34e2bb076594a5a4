/**
 * Single-worker speech synthesis queue: one TTS job runs at a time, process-wide.
 *
 * Each job writes `tts_<sessionId>_<ts>.wav` to the temp dir. When the engine fails or
 * returns nothing, a short fallback tone is written instead so the device still hears a reply.
 */

import * as fs from "fs";
import type { ITTS, VoiceOptions } from "../adapters/tts";
import { logger, logTtsCall } from "../logging";
import { errorMessage } from "../errors";
import { artifactPath, ensureDir } from "../storage/artifacts";
import { generateFallbackTone, isWav, parseWavHeader, pcmToWav } from "./audio-utils";
import { withRetry, withTimeout } from "./resilience";

export interface SynthesisResult {
  path: string;
  durationMs: number;
  sampleRate: number;
  sizeBytes: number;
  /** True when the audio is the fallback tone. */
  fallback: boolean;
  latencyMs: number;
}

export interface SynthesisQueueConfig {
  tempDir: string;
  sampleRate: number;
  timeoutMs: number;
  /** Attempts per job before falling back to the tone (default 2). */
  attempts?: number;
  retryBaseDelayMs?: number;
  voice?: VoiceOptions;
}

interface Job {
  sessionId: string;
  text: string;
}

export class SynthesisQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingJobs = 0;

  constructor(
    private readonly tts: ITTS,
    private readonly config: SynthesisQueueConfig
  ) {}

  /** Jobs queued or running. */
  get pending(): number {
    return this.pendingJobs;
  }

  /** Resolves once this job has run; rejects only when the artifact cannot be written. */
  enqueue(sessionId: string, text: string): Promise<SynthesisResult> {
    this.pendingJobs += 1;
    const run = this.tail.then(() => this.run({ sessionId, text }));
    this.tail = run.then(
      () => {
        this.pendingJobs -= 1;
      },
      () => {
        // The caller receives the rejection through `run`.
        this.pendingJobs -= 1;
      }
    );
    return run;
  }

  /** Wait for every queued job. */
  async drain(): Promise<void> {
    await this.tail;
  }

  private async run(job: Job): Promise<SynthesisResult> {
    const startedAt = Date.now();
    let wav = await this.synthesizeWav(job);
    let fallback = false;
    let info = wav ? parseWavHeader(wav) : null;
    if (!wav || !info || info.dataBytes === 0) {
      wav = generateFallbackTone(job.text, this.config.sampleRate);
      info = parseWavHeader(wav);
      fallback = true;
      logger.warn({ event: "TTS_FALLBACK_TONE", sessionId: job.sessionId }, "Using fallback tone for reply audio");
    }

    await ensureDir(this.config.tempDir);
    const filePath = artifactPath(this.config.tempDir, "tts", job.sessionId, "wav");
    await fs.promises.writeFile(filePath, wav);

    const latencyMs = Date.now() - startedAt;
    logTtsCall(logger, job.sessionId, job.text.length, wav.length, latencyMs);
    return {
      path: filePath,
      durationMs: info?.durationMs ?? 0,
      sampleRate: info?.sampleRate ?? this.config.sampleRate,
      sizeBytes: wav.length,
      fallback,
      latencyMs,
    };
  }

  /** Engine output as a WAV file, or null when the engine failed or produced nothing. */
  private async synthesizeWav(job: Job): Promise<Buffer | null> {
    const options: VoiceOptions = { ...this.config.voice, sampleRateHz: this.config.sampleRate };
    try {
      const audio = await withRetry(
        () => withTimeout(this.tts.synthesize(job.text, options), this.config.timeoutMs, "TTS"),
        {
          attempts: this.config.attempts ?? 2,
          baseDelayMs: this.config.retryBaseDelayMs ?? 500,
          onRetry: (err, attempt) =>
            logger.warn({ event: "TTS_RETRY", sessionId: job.sessionId, attempt: attempt + 1, err: errorMessage(err) }, "TTS failed; retrying"),
        }
      );
      if (audio.length === 0) return null;
      return isWav(audio) ? audio : pcmToWav(audio, this.config.sampleRate);
    } catch (err) {
      logger.error({ event: "TTS_FAILED", sessionId: job.sessionId, err: errorMessage(err) }, "TTS engine failed");
      return null;
    }
  }
}
