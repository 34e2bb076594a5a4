/**
 * Server-local Whisper ASR adapter.
 *
 * Talks to a long-lived worker process (faster-whisper) that keeps the model loaded:
 * - Node writes input audio to a temp WAV file.
 * - The worker answers { id, ok, result } lines over stdio (JSONL).
 *
 * Streaming sessions buffer PCM and, every `partialEveryMs` of new audio, transcribe the
 * buffer so far and report it as an interim hypothesis. The final transcript comes from `end()`.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { spawn, type ChildProcessWithoutNullStreams } from "child_process";
import * as readline from "readline";
import type { IASR, StreamingSession, StreamingSessionOptions, TranscriptResult } from "./types";
import { pcmToWav, pcmDurationMs } from "../../pipeline/audio-utils";
import { logger } from "../../logging";
import { errorMessage } from "../../errors";

export interface WhisperLocalConfig {
  /** Whisper model name or path (e.g. base, small). */
  model: string;
  /** Engine selector passed to the worker (default faster-whisper). */
  engine?: string;
  /** Python interpreter (default python3). */
  pythonPath?: string;
  /** Worker script (default scripts/whisper_local_worker.py under the working directory). */
  workerScript?: string;
  /** Audio between interim hypotheses (default 2000). 0 disables partials. */
  partialEveryMs?: number;
  /** Rate of raw "pcm16" input to transcribe() (default 16000). */
  sampleRateHz?: number;
}

type WorkerRequest = { id: number; op: "transcribe"; audioPath: string };

interface WorkerReply {
  id: number;
  ok: boolean;
  event?: string;
  error?: string;
  result?: { text?: string; language?: string };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseWorkerLine(line: string): WorkerReply | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(raw) || typeof raw.id !== "number" || typeof raw.ok !== "boolean") return null;
  const result = isRecord(raw.result) ? raw.result : undefined;
  return {
    id: raw.id,
    ok: raw.ok,
    event: typeof raw.event === "string" ? raw.event : undefined,
    error: typeof raw.error === "string" ? raw.error : undefined,
    result: result
      ? {
          text: typeof result.text === "string" ? result.text : undefined,
          language: typeof result.language === "string" ? result.language : undefined,
        }
      : undefined,
  };
}

export class WhisperLocalASR implements IASR {
  private worker: ChildProcessWithoutNullStreams | null = null;
  private rl: readline.Interface | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, { resolve: (r: TranscriptResult) => void; reject: (e: Error) => void }>();

  constructor(private readonly config: WhisperLocalConfig) {}

  /**
   * Supported formats: "wav" (default) and "pcm16" (mono, at `sampleRateHz`).
   */
  async transcribe(audioBuffer: Buffer, format: string = "wav"): Promise<TranscriptResult> {
    const wav = this.normalizeToWav(audioBuffer, format);
    const tmpPath = path.join(
      os.tmpdir(),
      `whisper-local-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}.wav`
    );
    try {
      await fs.promises.writeFile(tmpPath, wav);
      return await this.transcribeFile(tmpPath);
    } finally {
      await fs.promises.unlink(tmpPath).catch((err: unknown) => {
        logger.debug({ event: "WHISPER_LOCAL_TMP_CLEANUP", err: errorMessage(err) }, "whisper-local: temp cleanup failed");
      });
    }
  }

  createStreamingSession(options: StreamingSessionOptions): StreamingSession {
    const sampleRateHz = options.sampleRateHz ?? 16000;
    const partialEveryMs = this.config.partialEveryMs ?? 2000;
    const chunks: Buffer[] = [];
    let bytesSincePartial = 0;
    let partialInFlight = false;
    let closed = false;

    const emitPartial = (): void => {
      if (!options.onPartial || partialEveryMs <= 0 || partialInFlight) return;
      if (pcmDurationMs(bytesSincePartial, sampleRateHz) < partialEveryMs) return;
      bytesSincePartial = 0;
      partialInFlight = true;
      const snapshot = pcmToWav(Buffer.concat(chunks), sampleRateHz);
      void this.transcribe(snapshot, "wav")
        .then((r) => {
          if (!closed && r.text) options.onPartial?.({ text: r.text, isFinal: false, language: r.language });
        })
        .catch((err: unknown) => {
          logger.debug({ event: "WHISPER_LOCAL_PARTIAL_FAILED", err: errorMessage(err) }, "whisper-local: partial failed");
        })
        .finally(() => {
          partialInFlight = false;
        });
    };

    return {
      push: (chunk: Buffer) => {
        if (closed) return;
        chunks.push(chunk);
        bytesSincePartial += chunk.length;
        emitPartial();
      },
      end: async () => {
        closed = true;
        return this.transcribe(pcmToWav(Buffer.concat(chunks), sampleRateHz), "wav");
      },
      abort: () => {
        closed = true;
        chunks.length = 0;
      },
    };
  }

  async close(): Promise<void> {
    this.stopWorker();
  }

  private normalizeToWav(audioBuffer: Buffer, format: string): Buffer {
    const fmt = (format || "wav").toLowerCase();
    if (fmt === "wav") return audioBuffer;
    if (fmt === "pcm16" || fmt === "pcm") return pcmToWav(audioBuffer, this.config.sampleRateHz ?? 16000);
    throw new Error(`WhisperLocalASR: unsupported format '${format}'. Supported: wav | pcm16`);
  }

  private async transcribeFile(audioPath: string): Promise<TranscriptResult> {
    const worker = this.ensureWorker();
    const id = this.nextId++;
    const req: WorkerRequest = { id, op: "transcribe", audioPath };
    const startedAt = Date.now();

    const p = new Promise<TranscriptResult>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });
    worker.stdin.write(JSON.stringify(req) + "\n");

    try {
      const result = await p;
      logger.debug(
        { event: "WHISPER_LOCAL_RESULT", id, textLength: result.text.length, durationMs: Date.now() - startedAt },
        "whisper-local: transcription completed"
      );
      return result;
    } catch (e) {
      logger.error({ event: "WHISPER_LOCAL_ERROR", id, err: errorMessage(e) }, "whisper-local: transcription failed");
      throw e;
    }
  }

  private ensureWorker(): ChildProcessWithoutNullStreams {
    if (this.worker && this.worker.exitCode == null) return this.worker;
    return this.startWorker();
  }

  private startWorker(): ChildProcessWithoutNullStreams {
    this.stopWorker();

    const engine = (this.config.engine || "faster-whisper").trim();
    const model = (this.config.model || "base").trim();
    const python = (this.config.pythonPath || "python3").trim();
    const scriptPath = path.resolve(this.config.workerScript || path.join(process.cwd(), "scripts", "whisper_local_worker.py"));
    if (!fs.existsSync(scriptPath)) {
      throw new Error(`WhisperLocalASR: worker script not found at ${scriptPath}`);
    }

    logger.info({ event: "WHISPER_LOCAL_WORKER_START", python, engine, model, scriptPath }, "whisper-local: starting worker");

    const child = spawn(python, [scriptPath, "--engine", engine, "--model", model], {
      stdio: ["pipe", "pipe", "pipe"],
      env: process.env,
    });
    this.worker = child;

    child.on("exit", (code, signal) => {
      logger.warn({ event: "WHISPER_LOCAL_WORKER_EXIT", code, signal }, "whisper-local: worker exited");
      this.dropWorker(child, `whisper-local worker exited (code=${code}, signal=${signal})`);
    });

    // Spawn failures (ENOENT, EACCES) arrive here instead of throwing from spawn().
    child.on("error", (err) => {
      logger.error({ event: "WHISPER_LOCAL_WORKER_ERROR", python, err: errorMessage(err) }, "whisper-local: worker failed");
      this.dropWorker(child, `whisper-local worker failed: ${errorMessage(err)}`);
    });

    // EPIPE when the worker dies with a request still being written.
    child.stdin.on("error", (err) => {
      logger.warn({ event: "WHISPER_LOCAL_STDIN_ERROR", err: errorMessage(err) }, "whisper-local: worker stdin closed");
      this.dropWorker(child, `whisper-local worker stdin failed: ${errorMessage(err)}`);
    });

    child.stderr.on("data", (buf: Buffer) => {
      const msg = buf.toString("utf8").trim();
      if (msg) logger.warn({ event: "WHISPER_LOCAL_WORKER_STDERR", msg }, "whisper-local: worker stderr");
    });

    const rl = readline.createInterface({ input: child.stdout });
    this.rl = rl;
    rl.on("line", (line) => this.handleLine(line.trim()));
    return child;
  }

  private handleLine(line: string): void {
    if (!line) return;
    const msg = parseWorkerLine(line);
    if (!msg) {
      logger.warn({ event: "WHISPER_LOCAL_WORKER_BAD_JSON", line }, "whisper-local: could not parse worker JSON");
      return;
    }
    if (msg.event === "READY") {
      logger.info({ event: "WHISPER_LOCAL_WORKER_READY" }, "whisper-local: worker ready");
      return;
    }
    const pending = this.pending.get(msg.id);
    if (!pending) {
      logger.debug({ event: "WHISPER_LOCAL_WORKER_UNMATCHED", id: msg.id }, "whisper-local: response for unknown request id");
      return;
    }
    this.pending.delete(msg.id);
    if (!msg.ok) {
      pending.reject(new Error(msg.error || "Unknown worker error"));
      return;
    }
    pending.resolve({ text: (msg.result?.text ?? "").trim(), language: msg.result?.language });
  }

  /** Fail everything in flight and forget `child` if it is still the current worker. */
  private dropWorker(child: ChildProcessWithoutNullStreams, reason: string): void {
    for (const pending of this.pending.values()) pending.reject(new Error(reason));
    this.pending.clear();
    if (this.worker === child) {
      this.worker = null;
      this.rl?.close();
      this.rl = null;
    }
  }

  private stopWorker(): void {
    if (!this.worker) return;
    const worker = this.worker;
    this.worker = null;
    this.rl?.close();
    this.rl = null;
    worker.kill();
    for (const pending of this.pending.values()) pending.reject(new Error("whisper-local worker stopped"));
    this.pending.clear();
  }
}
