/**
 * Per-connection session protocol controller.
 *
 * Flow: recording_started -> audio chunks (ingest + recognizer) -> recording_stopped ->
 * finalize -> ASR -> LLM -> TTS -> ready_for_playback -> stream -> playback_complete.
 * Frames are handled one at a time through a promise chain, so a finalize pipeline
 * (including its external calls) completes before the next frame is looked at.
 */

import type { IASR, StreamingSession } from "../adapters/asr";
import { openRecognitionSession } from "../adapters/asr";
import { decodeClientMessage, type ClientMessage, type ServerMessage } from "../device/protocol";
import { OutboundChannel } from "../device/outbound";
import type { DeviceTransport } from "../device/transport";
import { GatewayError, ProtocolError, errorMessage } from "../errors";
import { logger, logAsrResult, logError, logLlmCall } from "../logging";
import { incrementCounter, recordTurnMetrics } from "../metrics";
import type { SessionRegistry } from "../session/registry";
import type { Session, SessionState } from "../session/types";
import { removeFile } from "../storage/artifacts";
import type { DownloadRegistry } from "../storage/downloads";
import type { ImageStore } from "../storage/image-store";
import type { StorageQuotaManager } from "../storage/quota-manager";
import type { AudioIngestor } from "./audio-ingestor";
import { isPcm16Aligned } from "./audio-utils";
import type { ChatClient } from "./chat-client";
import type { ResponseStreamer } from "./response-streamer";
import type { SynthesisQueue, SynthesisResult } from "./synthesis-queue";
import { withRetry, withTimeout } from "./resilience";

export interface SessionControllerDeps {
  registry: SessionRegistry;
  ingestor: AudioIngestor;
  quota: StorageQuotaManager;
  asr: IASR;
  chat: ChatClient;
  synthesis: SynthesisQueue;
  streamer: ResponseStreamer;
  images: ImageStore;
  downloads: DownloadRegistry;
}

export interface SessionControllerConfig {
  sampleRate: number;
  /** Send an ack after every Nth stored chunk. */
  ackEvery: number;
  maxRerecordAttempts: number;
  /** Prior turns handed to the chat call. */
  historyWindow: number;
  minTranscriptChars: number;
  playbackReadyTimeoutMs: number;
  asrTimeoutMs: number;
  asrAttempts: number;
  retryBaseDelayMs: number;
}

export type InboundFrame = { kind: "text"; text: string } | { kind: "binary"; data: Buffer };

export const INTERVENTION_MESSAGE = "Recording keeps failing. Please check the microphone, then press the button to continue.";

export class SessionController {
  private readonly outbound: OutboundChannel;
  private chain: Promise<void> = Promise.resolve();
  private pendingChunk: { seq: number; lenBytes: number } | null = null;
  private recognizer: StreamingSession | null = null;
  private playbackTimer: NodeJS.Timeout | null = null;
  private recordingStoppedAt: number | null = null;
  private closed = false;

  constructor(
    readonly session: Session,
    transport: DeviceTransport,
    private readonly deps: SessionControllerDeps,
    private readonly config: SessionControllerConfig
  ) {
    this.outbound = new OutboundChannel(transport, session.id);
  }

  /**
   * Called once the gate admitted the connection; queued ahead of any frame.
   * A stalled session stays stalled.
   */
  start(): Promise<void> {
    const step = this.chain.then(async () => {
      if (this.session.state !== "stalled") this.setState("connected", "connection admitted");
      await this.send({ type: "ready", session: this.session.id });
    });
    this.chain = step;
    return step;
  }

  /** Queue a frame; the returned promise settles when that frame has been handled. */
  enqueue(frame: InboundFrame): Promise<void> {
    const step = this.chain.then(() => this.handleFrame(frame));
    this.chain = step;
    return step;
  }

  /** Resolves when every queued frame has been handled. */
  idle(): Promise<void> {
    return this.chain;
  }

  /** Connection gone: stop timers, discard the recognizer, drop any later sends. */
  disconnect(): void {
    if (this.closed) return;
    this.closed = true;
    this.outbound.close();
    this.clearPlaybackTimer();
    this.recognizer?.abort();
    this.recognizer = null;
    this.pendingChunk = null;
    if (this.session.state !== "shutdown") this.deps.registry.updateState(this.session, "disconnected", "connection closed");
  }

  /** HTTP image uploads for this session are acknowledged over the socket. */
  async pushImageReceived(filename: string): Promise<boolean> {
    return this.send({ type: "image_received", filename });
  }

  private async handleFrame(frame: InboundFrame): Promise<void> {
    if (this.closed) return;
    try {
      if (frame.kind === "binary") {
        await this.handleBinary(frame.data);
      } else {
        if (this.pendingChunk) {
          const { seq } = this.pendingChunk;
          this.pendingChunk = null;
          await this.sendError(new ProtocolError(`Expected binary audio frame for chunk ${seq}`));
        }
        await this.handleMessage(decodeClientMessage(frame.text));
      }
    } catch (err) {
      if (err instanceof GatewayError) {
        await this.sendError(err);
        return;
      }
      logError(logger, err, { event: "FRAME_FAILED", sessionId: this.session.id });
      await this.send({ type: "error", message: "Internal error" });
    }
  }

  private async handleMessage(msg: ClientMessage): Promise<void> {
    this.deps.registry.touch(this.session);
    switch (msg.kind) {
      case "hello":
        this.session.capabilities = msg.capabilities;
        this.deps.registry.logEvent(this.session, "hello", { ...msg.capabilities });
        logger.info({ event: "DEVICE_HELLO", sessionId: this.session.id, ...msg.capabilities }, "Device capabilities recorded");
        return;
      case "client_on":
        return this.onClientOn();
      case "recording_started":
        return this.onRecordingStarted();
      case "audio_chunk_meta":
        return this.onChunkMeta(msg.seq, msg.lenBytes);
      case "recording_stopped":
        return this.onRecordingStopped();
      case "image_captured":
        this.session.cameraUploading = true;
        this.deps.registry.logEvent(this.session, "image_captured");
        logger.info({ event: "IMAGE_CAPTURED", sessionId: this.session.id }, "Device captured an image; upload pending");
        return;
      case "ready_for_playback":
        return this.onReadyForPlayback();
      case "playback_complete":
        return this.onPlaybackComplete();
      case "ping":
        await this.send({ type: "pong" });
        return;
      case "unrecognized":
        await this.send({ type: "error", message: `Unknown message type: ${msg.type}` });
        return;
      case "invalid":
        throw new ProtocolError(msg.error);
      default: {
        const unhandled: never = msg;
        throw new ProtocolError(`Unhandled message: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async onClientOn(): Promise<void> {
    if (this.session.state === "stalled") {
      this.session.rerecordAttempts = 0;
      this.deps.registry.logEvent(this.session, "user_intervention");
      logger.info({ event: "USER_INTERVENTION", sessionId: this.session.id }, "Session resumed after intervention");
      this.setState("idle", "user intervention");
      return;
    }
    this.setState("idle", "client_on");
  }

  private async onRecordingStarted(): Promise<void> {
    const state = this.session.state;
    if (state === "processing" || state === "stalled") {
      throw new GatewayError("invalid_state", `Cannot start recording while ${state}`);
    }
    this.clearPlaybackTimer();
    this.recognizer?.abort();
    this.pendingChunk = null;
    await this.deps.ingestor.startSession(this.session);
    this.recognizer = openRecognitionSession(this.deps.asr, {
      sampleRateHz: this.config.sampleRate,
      onPartial: (part) => {
        // Sends never reject; a false result just means the device is gone.
        void this.send({ type: "partial", text: part.text, stable: part.isFinal });
      },
    });
    this.setState("recording", "recording_started");
  }

  private async onChunkMeta(seq: number, lenBytes: number): Promise<void> {
    if (this.session.state !== "recording") throw new GatewayError("invalid_state", "Not recording");
    if (lenBytes === 0) throw new ProtocolError(`Chunk ${seq} is empty`);
    if (!isPcm16Aligned(lenBytes)) throw new ProtocolError(`Chunk ${seq} is not PCM16-aligned (${lenBytes} bytes)`);
    const max = this.session.capabilities?.maxChunkBytes;
    if (max && lenBytes > max) {
      throw new ProtocolError(`Chunk ${seq} exceeds max_chunk_bytes (${lenBytes} > ${max})`);
    }
    this.pendingChunk = { seq, lenBytes };
  }

  private async handleBinary(data: Buffer): Promise<void> {
    const pending = this.pendingChunk;
    if (!pending) throw new ProtocolError("Binary frame without audio_chunk_meta");
    this.pendingChunk = null;
    if (data.length !== pending.lenBytes) {
      throw new ProtocolError(`Chunk ${pending.seq} length mismatch: declared ${pending.lenBytes}, got ${data.length}`);
    }
    if (this.session.state !== "recording") throw new GatewayError("invalid_state", "Not recording");

    const result = await this.deps.ingestor.ingestChunk(this.session, pending.seq, data);
    if (!result.ok) {
      if (result.reason === "quota_exceeded") {
        await this.abortRecording();
        await this.requestRerecord("disk quota exceeded");
        return;
      }
      await this.send({ type: "error", message: `Chunk ${result.seq} rejected: ${result.reason}` });
      return;
    }
    if (!result.appended) return;
    this.recognizer?.push(data);
    if (this.session.audio.chunksReceived % this.config.ackEvery === 0) {
      await this.send({ type: "ack", ref: "chunk", seq: result.seq });
    }
  }

  private async onRecordingStopped(): Promise<void> {
    if (this.session.state !== "recording") throw new GatewayError("invalid_state", "Not recording");
    this.recordingStoppedAt = Date.now();
    this.setState("processing", "recording_stopped");
    await this.runFinalizePipeline();
  }

  private async runFinalizePipeline(): Promise<void> {
    const session = this.session;
    const finalized = await this.deps.ingestor.finalizeSession(session);
    if (!finalized.ok) {
      this.recognizer?.abort();
      this.recognizer = null;
      await this.requestRerecord("finalize failed");
      return;
    }

    const asrStartedAt = Date.now();
    const transcript = await this.recognize();
    const asrLatencyMs = Date.now() - asrStartedAt;
    if (transcript === null || !transcript.trim()) {
      await this.requestRerecord("empty transcript");
      return;
    }
    const text = transcript.trim();
    if (text.length < this.config.minTranscriptChars) {
      await this.requestRerecord("transcript too short");
      return;
    }

    const history = session.history.recent(this.config.historyWindow);
    this.deps.registry.addConversationTurn(session, "user", text);
    this.deps.registry.logEvent(session, "transcript", { chars: text.length });

    const image = await this.deps.images.prepareForChat(session);
    const reply = await this.deps.chat.complete(text, image, history);
    logLlmCall(logger, session.id, reply.messageCount, reply.text.length, reply.durationMs);
    if (reply.fallback) {
      await this.send({ type: "error", message: "Language model unavailable", code: "llm_unavailable" });
    }
    this.deps.registry.addConversationTurn(session, "assistant", reply.text);
    await this.send({ type: "llm", text: reply.text });

    let synthesized: SynthesisResult;
    try {
      synthesized = await this.deps.synthesis.enqueue(session.id, reply.text);
    } catch (err) {
      logError(logger, err, { event: "TTS_ARTIFACT_FAILED", sessionId: session.id });
      await this.send({ type: "error", message: "TTS generation failed" });
      this.setState("idle", "tts failed");
      return;
    }

    const previous = session.tts;
    if (previous && previous.path !== synthesized.path) {
      this.deps.downloads.revokeFile(previous.path);
      await removeFile(previous.path);
    }
    session.tts = {
      path: synthesized.path,
      durationMs: synthesized.durationMs,
      sampleRate: synthesized.sampleRate,
      sizeBytes: synthesized.sizeBytes,
      createdAt: Date.now(),
      fallback: synthesized.fallback,
    };
    await this.deps.quota.sessionUsage(session);
    this.deps.registry.logEvent(session, "tts_ready", { durationMs: synthesized.durationMs, fallback: synthesized.fallback });
    this.startPlaybackTimer();

    recordTurnMetrics({
      sessionId: session.id,
      asrLatencyMs,
      llmLatencyMs: reply.durationMs,
      ttsLatencyMs: synthesized.latencyMs,
      endOfRecordingToReplyMs: this.recordingStoppedAt === null ? undefined : Date.now() - this.recordingStoppedAt,
      recordedBytes: finalized.totalBytes,
      llmFallback: reply.fallback,
    });
  }

  /**
   * Final transcript, or null when recognition failed. The first attempt ends the live
   * recognizer; retries transcribe the finalized artifact in one batch call.
   */
  private async recognize(): Promise<string | null> {
    const recognizer = this.recognizer;
    this.recognizer = null;
    const startedAt = Date.now();
    try {
      const result = await withRetry(
        async (attempt) => {
          if (attempt === 0 && recognizer) {
            return withTimeout(recognizer.end(), this.config.asrTimeoutMs, "ASR");
          }
          recognizer?.abort();
          const audio = await this.deps.ingestor.readArtifact(this.session);
          return withTimeout(this.deps.asr.transcribe(audio, "pcm16"), this.config.asrTimeoutMs, "ASR");
        },
        {
          attempts: this.config.asrAttempts,
          baseDelayMs: this.config.retryBaseDelayMs,
          onRetry: (err, attempt, delayMs) =>
            logger.warn(
              { event: "ASR_RETRY", sessionId: this.session.id, attempt: attempt + 1, delayMs, err: errorMessage(err) },
              "ASR failed; retrying"
            ),
        }
      );
      logAsrResult(logger, this.session.id, result.text.length, Date.now() - startedAt);
      return result.text;
    } catch (err) {
      logger.error({ event: "ASR_FAILED", sessionId: this.session.id, err: errorMessage(err) }, "Speech recognition failed");
      return null;
    }
  }

  private async onReadyForPlayback(): Promise<void> {
    if (this.session.state === "recording") throw new GatewayError("invalid_state", "Cannot play back while recording");
    this.clearPlaybackTimer();
    const tts = this.session.tts;
    if (!tts) {
      await this.send({ type: "error", message: "No TTS audio ready" });
      return;
    }
    this.setState("playing", "ready_for_playback");
    const streamed = await this.deps.streamer.stream(tts.path, this.outbound, this.session.id);
    if (!streamed) await this.offerDownload();
  }

  /** The reply has been heard: its artifact and any download link for it go away. */
  private async onPlaybackComplete(): Promise<void> {
    this.clearPlaybackTimer();
    const tts = this.session.tts;
    if (tts) {
      this.session.tts = null;
      this.deps.downloads.revokeFile(tts.path);
      await removeFile(tts.path);
    }
    await this.deps.ingestor.cleanupSession(this.session);
    this.setState("idle", "playback_complete");
  }

  private async abortRecording(): Promise<void> {
    this.recognizer?.abort();
    this.recognizer = null;
    this.pendingChunk = null;
    await this.deps.ingestor.cleanupSession(this.session);
    this.deps.registry.logEvent(this.session, "recording_aborted");
  }

  /** Attempts count for the whole session; only client_on after a stall clears them. */
  private async requestRerecord(reason: string): Promise<void> {
    if (this.closed) return;
    const session = this.session;
    if (session.rerecordAttempts < this.config.maxRerecordAttempts) {
      session.rerecordAttempts += 1;
      incrementCounter("rerecordRequests");
      this.deps.registry.logEvent(session, "rerecord_requested", { reason, attempt: session.rerecordAttempts });
      logger.info({ event: "RERECORD_REQUESTED", sessionId: session.id, reason, attempt: session.rerecordAttempts }, "Asking device to re-record");
      await this.send({ type: "request_rerecord", reason });
      this.setState("idle", reason);
      return;
    }
    incrementCounter("interventionRequests");
    this.deps.registry.logEvent(session, "intervention_requested", { reason });
    logger.warn({ event: "INTERVENTION_REQUESTED", sessionId: session.id, reason }, "Re-record attempts exhausted");
    await this.send({ type: "request_user_intervention", message: INTERVENTION_MESSAGE });
    this.setState("stalled", reason);
  }

  private async offerDownload(): Promise<void> {
    const tts = this.session.tts;
    if (this.closed || !tts) return;
    const { url } = this.deps.downloads.issue(tts.path, this.session.id);
    incrementCounter("downloadsOffered");
    await this.send({ type: "offer_download", url });
    // The reply is still playable through the URL; the device may record again.
    this.setState("idle", "download offered");
  }

  private startPlaybackTimer(): void {
    if (this.closed) return;
    this.clearPlaybackTimer();
    this.playbackTimer = setTimeout(() => {
      this.playbackTimer = null;
      logger.info({ event: "PLAYBACK_READY_TIMEOUT", sessionId: this.session.id }, "Device did not request playback; offering download");
      this.offerDownload().catch((err: unknown) => logError(logger, err, { event: "OFFER_DOWNLOAD_FAILED", sessionId: this.session.id }));
    }, this.config.playbackReadyTimeoutMs);
    this.playbackTimer.unref();
  }

  private clearPlaybackTimer(): void {
    if (this.playbackTimer) {
      clearTimeout(this.playbackTimer);
      this.playbackTimer = null;
    }
  }

  /** No-op after disconnect so a pipeline still in flight cannot revive the session. */
  private setState(next: SessionState, reason: string): void {
    if (this.closed || this.session.state === next) return;
    this.deps.registry.updateState(this.session, next, reason);
  }

  private send(msg: ServerMessage): Promise<boolean> {
    return this.outbound.sendJson(msg);
  }

  private async sendError(err: GatewayError): Promise<void> {
    logger.warn({ event: "PROTOCOL_ERROR", sessionId: this.session.id, code: err.code, err: err.message }, "Frame refused");
    await this.send({ type: "error", message: err.message, code: err.code });
  }
}
