/**
 * Session data model. Sessions are owned by the SessionRegistry; the audio descriptor
 * is mutated only by the AudioIngestor.
 */

import type { SessionMemory } from "../memory/session";
import type { MemoryTurn } from "../memory/types";

export type SessionState =
  | "disconnected"
  | "connected"
  | "idle"
  | "recording"
  | "processing"
  | "playing"
  | "stalled"
  | "shutdown";

/** What the device reported in its hello frame. */
export interface ClientCapabilities {
  psram: boolean;
  /** Largest audio payload the device will send; null when not declared. */
  maxChunkBytes: number | null;
}

export interface AudioBufferDescriptor {
  artifactPath: string | null;
  chunksReceived: number;
  totalBytes: number;
  expectedSeq: number | null;
  highestSeq: number | null;
  sequenceHistory: number[];
  startedAt: number | null;
}

export interface ImageArtifact {
  path: string;
  filename: string;
  mimeType: "image/jpeg" | "image/png";
  sizeBytes: number;
  width: number;
  height: number;
  uploadedAt: number;
}

export interface TtsArtifact {
  path: string;
  durationMs: number;
  sampleRate: number;
  sizeBytes: number;
  createdAt: number;
  /** Set when the bytes came from the fallback tone. */
  fallback: boolean;
}

export interface SessionEvent {
  type: string;
  timestamp: number;
  data?: Record<string, unknown>;
}

export interface Session {
  readonly id: string;
  readonly createdAt: number;
  lastActivityAt: number;
  state: SessionState;
  capabilities: ClientCapabilities | null;
  audio: AudioBufferDescriptor;
  history: SessionMemory;
  image: ImageArtifact | null;
  /** Device announced a capture and the upload has not arrived yet. */
  cameraUploading: boolean;
  rerecordAttempts: number;
  diskUsageBytes: number;
  tts: TtsArtifact | null;
  events: SessionEvent[];
}

/** JSON view served by GET /state. */
export interface SessionSnapshot {
  id: string;
  state: SessionState;
  createdAt: string;
  lastActivityAt: string;
  capabilities: ClientCapabilities | null;
  cameraUploading: boolean;
  rerecordAttempts: number;
  diskUsageBytes: number;
  audio: Omit<AudioBufferDescriptor, "sequenceHistory"> & { sequenceCount: number };
  image: { filename: string; sizeBytes: number; width: number; height: number } | null;
  tts: { durationMs: number; sizeBytes: number; fallback: boolean } | null;
  historyTurns: number;
  recentHistory: MemoryTurn[];
  recentEvents: SessionEvent[];
}

export function emptyAudioDescriptor(): AudioBufferDescriptor {
  return {
    artifactPath: null,
    chunksReceived: 0,
    totalBytes: 0,
    expectedSeq: null,
    highestSeq: null,
    sequenceHistory: [],
    startedAt: null,
  };
}
