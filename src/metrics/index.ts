/**
 * High-signal metrics for the gateway.
 * Turn latencies are logged per turn; counters are exposed through /health.
 */

import { logger } from "../logging";

/** Last turn timing (ms). */
export interface TurnMetrics {
  sessionId?: string;
  asrLatencyMs?: number;
  llmLatencyMs?: number;
  ttsLatencyMs?: number;
  /** recording_stopped to tts_ready (primary KPI). */
  endOfRecordingToReplyMs?: number;
  /** Bytes of audio that went into the transcript. */
  recordedBytes?: number;
  /** Whether the LLM fell back to the canned reply. */
  llmFallback?: boolean;
}

/** Running counters since process start (or last reset). */
export interface GatewayCounters {
  connectionsAccepted: number;
  connectionsRejected: number;
  chunksAccepted: number;
  chunksFlaggedGap: number;
  chunksFlaggedOutOfOrder: number;
  chunksRejected: number;
  rerecordRequests: number;
  interventionRequests: number;
  ttsBytesStreamed: number;
  downloadsOffered: number;
}

export type CounterName = keyof GatewayCounters;

function zeroCounters(): GatewayCounters {
  return {
    connectionsAccepted: 0,
    connectionsRejected: 0,
    chunksAccepted: 0,
    chunksFlaggedGap: 0,
    chunksFlaggedOutOfOrder: 0,
    chunksRejected: 0,
    rerecordRequests: 0,
    interventionRequests: 0,
    ttsBytesStreamed: 0,
    downloadsOffered: 0,
  };
}

let lastTurnMetrics: TurnMetrics = {};
let counters: GatewayCounters = zeroCounters();

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      session_id: metrics.sessionId,
      asr_latency_ms: metrics.asrLatencyMs,
      llm_latency_ms: metrics.llmLatencyMs,
      tts_latency_ms: metrics.ttsLatencyMs,
      end_of_recording_to_reply_ms: metrics.endOfRecordingToReplyMs,
      recorded_bytes: metrics.recordedBytes,
      llm_fallback: metrics.llmFallback,
    },
    "Turn latency"
  );
}

export function incrementCounter(name: CounterName, by = 1): void {
  counters[name] += by;
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}

export function getCounters(): GatewayCounters {
  return { ...counters };
}

/** Test helper. */
export function resetMetrics(): void {
  lastTurnMetrics = {};
  counters = zeroCounters();
}
