/**
 * Device wire protocol.
 *
 * Text frames are JSON objects with a mandatory `type`; unknown fields are ignored.
 * Binary frames carry PCM16 (inbound) or WAV slices (outbound) and always follow a
 * `*_chunk_meta` frame announcing their length.
 */

import type { ClientCapabilities } from "../session/types";

export type ClientMessage =
  | { kind: "hello"; capabilities: ClientCapabilities }
  | { kind: "client_on" }
  | { kind: "recording_started" }
  | { kind: "audio_chunk_meta"; seq: number; lenBytes: number }
  | { kind: "recording_stopped" }
  | { kind: "image_captured" }
  | { kind: "ready_for_playback" }
  | { kind: "playback_complete" }
  | { kind: "ping" }
  | { kind: "unrecognized"; type: string }
  | { kind: "invalid"; error: string };

export type ServerMessage =
  | { type: "ready"; session: string }
  | { type: "error"; message: string; code?: string }
  | { type: "ack"; ref: "chunk"; seq: number }
  | { type: "partial"; text: string; stable: boolean }
  | { type: "llm"; text: string }
  | { type: "tts_ready"; duration_ms: number; sampleRate: number; format: "wav"; fileSize: number }
  | { type: "tts_chunk_meta"; seq: number; len_bytes: number }
  | { type: "tts_done" }
  | { type: "offer_download"; url: string }
  | { type: "request_rerecord"; reason: string }
  | { type: "request_user_intervention"; message: string }
  | { type: "image_received"; filename: string }
  | { type: "pong" };

/** Outbound side of a device connection. A false result means the frame was not delivered. */
export interface MessageSink {
  sendJson(msg: ServerMessage): Promise<boolean>;
  /** A `*_chunk_meta` frame and its binary payload, with nothing sent between them. */
  sendChunk(meta: ServerMessage, data: Buffer): Promise<boolean>;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isNonNegativeInt(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0;
}

function decodeCapabilities(raw: unknown): ClientCapabilities | string {
  if (raw === undefined) return { psram: false, maxChunkBytes: null };
  if (!isRecord(raw)) return "capabilities must be an object";
  const psram = raw.psram === undefined ? false : raw.psram;
  if (typeof psram !== "boolean") return "capabilities.psram must be a boolean";
  const max = raw.max_chunk_bytes;
  if (max !== undefined && max !== null && !(isNonNegativeInt(max) && max > 0)) {
    return "capabilities.max_chunk_bytes must be a positive integer";
  }
  return { psram, maxChunkBytes: isNonNegativeInt(max) ? max : null };
}

/** Decode one text frame. Never throws. */
export function decodeClientMessage(text: string): ClientMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { kind: "invalid", error: "Invalid JSON" };
  }
  if (!isRecord(raw)) return { kind: "invalid", error: "Message must be a JSON object" };
  const type = raw.type;
  if (typeof type !== "string" || !type) return { kind: "invalid", error: "Missing message type" };

  switch (type) {
    case "hello": {
      const caps = decodeCapabilities(raw.capabilities);
      return typeof caps === "string" ? { kind: "invalid", error: caps } : { kind: "hello", capabilities: caps };
    }
    case "audio_chunk_meta": {
      if (!isNonNegativeInt(raw.seq)) return { kind: "invalid", error: "audio_chunk_meta.seq must be a non-negative integer" };
      if (!isNonNegativeInt(raw.len_bytes)) {
        return { kind: "invalid", error: "audio_chunk_meta.len_bytes must be a non-negative integer" };
      }
      return { kind: "audio_chunk_meta", seq: raw.seq, lenBytes: raw.len_bytes };
    }
    case "client_on":
    case "recording_started":
    case "recording_stopped":
    case "image_captured":
    case "ready_for_playback":
    case "playback_complete":
    case "ping":
      return { kind: type };
    default:
      return { kind: "unrecognized", type };
  }
}

export function encodeServerMessage(msg: ServerMessage): string {
  return JSON.stringify(msg);
}
