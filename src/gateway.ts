/**
 * Wires the gateway from config: adapters, registry, storage, pipeline, HTTP + WebSocket.
 * Tests pass their own adapters through `overrides`.
 */

import type * as http from "http";
import type { AppConfig } from "./config";
import { createASR, type IASR } from "./adapters/asr";
import { createLLM, type ILLM } from "./adapters/llm";
import { createTTS, type ITTS } from "./adapters/tts";
import { logger } from "./logging";
import { SessionRegistry } from "./session/registry";
import { MB, StorageQuotaManager } from "./storage/quota-manager";
import { DownloadRegistry } from "./storage/downloads";
import { ImageStore } from "./storage/image-store";
import { AudioIngestor } from "./pipeline/audio-ingestor";
import { ChatClient } from "./pipeline/chat-client";
import { SynthesisQueue } from "./pipeline/synthesis-queue";
import { ResponseStreamer } from "./pipeline/response-streamer";
import { PromptManager } from "./prompts/prompt-manager";
import { ConnectionGate } from "./device/connection-gate";
import { DeviceServer } from "./device/ws-server";
import { createHttpServer } from "./http-server";

export interface GatewayOverrides {
  asr?: IASR;
  llm?: ILLM;
  tts?: ITTS;
}

export interface Gateway {
  readonly server: http.Server;
  readonly registry: SessionRegistry;
  readonly quota: StorageQuotaManager;
  readonly gate: ConnectionGate;
  readonly devices: DeviceServer;
  readonly downloads: DownloadRegistry;
  /** Start sweeps and listen; resolves with the bound port. */
  listen(): Promise<number>;
  close(): Promise<void>;
}

export function createGateway(config: AppConfig, overrides: GatewayOverrides = {}): Gateway {
  const asr = overrides.asr ?? createASR(config);
  const llm = overrides.llm ?? createLLM(config);
  const tts = overrides.tts ?? createTTS(config);

  const registry = new SessionRegistry({
    maxHistoryTurns: config.session.maxHistoryTurns,
    sessionGraceMs: config.storage.sessionGraceSec * 1000,
    sweepIntervalMs: config.storage.sweepIntervalSec * 1000,
  });
  const quota = new StorageQuotaManager({
    tempDir: config.storage.tempDir,
    maxSessionBytes: config.storage.maxSessionDiskMb * MB,
    maxStoreBytes: config.storage.maxStoreDiskMb * MB,
    graceMs: config.storage.sessionGraceSec * 1000,
    sweepIntervalMs: config.storage.storageSweepIntervalSec * 1000,
  });
  quota.attach(registry);

  const downloads = new DownloadRegistry({ ttlMs: config.downloads.ttlSec * 1000, publicBaseUrl: config.server.publicBaseUrl });
  const images = new ImageStore(registry, quota, config.image);
  const ingestor = new AudioIngestor(registry, quota, {
    sampleRate: config.audio.sampleRate,
    seqTolerance: config.audio.seqTolerance,
    gapPolicy: config.audio.gapPolicy,
  });
  const chat = new ChatClient(
    llm,
    new PromptManager({ systemPrompt: config.llm.systemPrompt, historyWindow: config.session.historyWindow }),
    {
      retryAttempts: config.llm.retryAttempts,
      timeoutMs: config.timeouts.llmMs,
      maxTokens: config.llm.maxTokens,
      fallbackModel: config.llm.fallbackModel,
    }
  );
  const synthesis = new SynthesisQueue(tts, {
    tempDir: config.storage.tempDir,
    sampleRate: config.tts.sampleRate,
    timeoutMs: config.timeouts.ttsMs,
    // Voice names are provider-specific and live on the adapter.
    voice: { languageCode: config.tts.languageCode },
  });
  const streamer = new ResponseStreamer({
    chunkSizeBytes: config.audio.chunkSizeBytes,
    pacingMs: config.tts.pacingMs,
    defaultSampleRate: config.tts.sampleRate,
  });

  const gate = new ConnectionGate(registry, {
    token: config.server.wsToken,
    maxConnections: config.server.maxConnections,
    singleSessionMode: config.server.singleSessionMode,
  });
  const devices = new DeviceServer({
    path: config.server.wsPath,
    gate,
    deps: { registry, ingestor, quota, asr, chat, synthesis, streamer, images, downloads },
    controller: {
      sampleRate: config.audio.sampleRate,
      ackEvery: config.audio.ackEvery,
      maxRerecordAttempts: config.session.maxRerecordAttempts,
      historyWindow: config.session.historyWindow,
      minTranscriptChars: config.session.minTranscriptChars,
      playbackReadyTimeoutMs: config.session.playbackReadyTimeoutSec * 1000,
      asrTimeoutMs: config.timeouts.asrMs,
      asrAttempts: 2,
      retryBaseDelayMs: 500,
    },
  });

  const server = createHttpServer({
    registry,
    quota,
    images,
    downloads,
    token: config.server.wsToken,
    maxImageBytes: config.image.maxBytes,
    connectionCount: () => gate.activeCount,
    notifyImageReceived: async (sessionId, filename) => {
      await devices.controllerFor(sessionId)?.pushImageReceived(filename);
    },
  });
  devices.attach(server);

  return {
    server,
    registry,
    quota,
    gate,
    devices,
    downloads,
    async listen(): Promise<number> {
      await quota.init();
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.server.port, config.server.host, () => {
          server.off("error", reject);
          resolve();
        });
      });
      registry.startIdleSweep();
      quota.start();
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : config.server.port;
      logger.info({ event: "GATEWAY_LISTENING", host: config.server.host, port, wsPath: config.server.wsPath }, "Gateway listening");
      return port;
    },
    async close(): Promise<void> {
      quota.stop();
      registry.stopIdleSweep();
      await devices.close();
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeAllConnections();
      });
      await synthesis.drain();
      await registry.shutdown();
      await asr.close?.();
      logger.info({ event: "GATEWAY_CLOSED" }, "Gateway closed");
    },
  };
}
