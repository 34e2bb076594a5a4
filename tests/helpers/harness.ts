import type { IASR } from "../../src/adapters/asr";
import type { ILLM } from "../../src/adapters/llm";
import type { ITTS } from "../../src/adapters/tts";
import { StubASR } from "../../src/adapters/asr";
import { StubLLM } from "../../src/adapters/llm";
import { StubTTS } from "../../src/adapters/tts";
import { SessionRegistry } from "../../src/session/registry";
import { StorageQuotaManager } from "../../src/storage/quota-manager";
import { DownloadRegistry } from "../../src/storage/downloads";
import { ImageStore } from "../../src/storage/image-store";
import { AudioIngestor } from "../../src/pipeline/audio-ingestor";
import { ChatClient } from "../../src/pipeline/chat-client";
import { SynthesisQueue } from "../../src/pipeline/synthesis-queue";
import { ResponseStreamer } from "../../src/pipeline/response-streamer";
import { PromptManager } from "../../src/prompts/prompt-manager";
import {
  SessionController,
  type SessionControllerConfig,
  type SessionControllerDeps,
} from "../../src/pipeline/session-controller";
import type { GapPolicy } from "../../src/config";
import { FakeTransport } from "./fakes";

export interface HarnessOptions {
  tempDir: string;
  asr?: IASR;
  llm?: ILLM;
  tts?: ITTS;
  maxSessionBytes?: number;
  maxStoreBytes?: number;
  chunkSizeBytes?: number;
  gapPolicy?: GapPolicy;
  controller?: Partial<SessionControllerConfig>;
}

export interface Harness {
  deps: SessionControllerDeps;
  registry: SessionRegistry;
  quota: StorageQuotaManager;
  downloads: DownloadRegistry;
  transport: FakeTransport;
  controller: SessionController;
}

export const CONTROLLER_DEFAULTS: SessionControllerConfig = {
  sampleRate: 16000,
  ackEvery: 4,
  maxRerecordAttempts: 2,
  historyWindow: 5,
  minTranscriptChars: 3,
  playbackReadyTimeoutMs: 60_000,
  asrTimeoutMs: 1000,
  asrAttempts: 1,
  retryBaseDelayMs: 1,
};

/** Controller wired to real storage in `tempDir` and stub adapters, on a fake transport. */
export function buildHarness(opts: HarnessOptions): Harness {
  const registry = new SessionRegistry({ maxHistoryTurns: 10, sessionGraceMs: 30_000, sweepIntervalMs: 60_000 });
  const quota = new StorageQuotaManager({
    tempDir: opts.tempDir,
    maxSessionBytes: opts.maxSessionBytes ?? 10_000_000,
    maxStoreBytes: opts.maxStoreBytes ?? 50_000_000,
    graceMs: 30_000,
    sweepIntervalMs: 60_000,
  });
  quota.attach(registry);
  const downloads = new DownloadRegistry({ ttlMs: 300_000, publicBaseUrl: "http://gateway.test" });
  const deps: SessionControllerDeps = {
    registry,
    quota,
    downloads,
    asr: opts.asr ?? new StubASR(),
    ingestor: new AudioIngestor(registry, quota, {
      sampleRate: 16000,
      seqTolerance: 5,
      gapPolicy: opts.gapPolicy ?? "append",
    }),
    chat: new ChatClient(opts.llm ?? new StubLLM("Hello back"), new PromptManager(), {
      retryAttempts: 1,
      timeoutMs: 1000,
      maxTokens: 256,
      sleep: async () => undefined,
    }),
    synthesis: new SynthesisQueue(opts.tts ?? new StubTTS(), {
      tempDir: opts.tempDir,
      sampleRate: 16000,
      timeoutMs: 1000,
      attempts: 1,
      retryBaseDelayMs: 1,
    }),
    streamer: new ResponseStreamer({ chunkSizeBytes: opts.chunkSizeBytes ?? 16000, pacingMs: 0, defaultSampleRate: 16000 }),
    images: new ImageStore(registry, quota, { maxBytes: 2 * 1024 * 1024, maxDimension: 1600 }),
  };
  const transport = new FakeTransport();
  const session = registry.createSession("dev-1");
  registry.bind(session.id);
  const controller = new SessionController(session, transport, deps, { ...CONTROLLER_DEFAULTS, ...opts.controller });
  return { deps, registry, quota, downloads, transport, controller };
}

/** Send one JSON frame and wait for it to be handled. */
export function sendJson(controller: SessionController, msg: Record<string, unknown>): Promise<void> {
  return controller.enqueue({ kind: "text", text: JSON.stringify(msg) });
}

/** audio_chunk_meta followed by its binary frame. */
export async function sendChunk(controller: SessionController, seq: number, data: Buffer): Promise<void> {
  await sendJson(controller, { type: "audio_chunk_meta", seq, len_bytes: data.length });
  await controller.enqueue({ kind: "binary", data });
}
