/**
 * Unit tests for decoding device messages.
 */

import { decodeClientMessage } from "../../../src/device/protocol";

describe("decodeClientMessage", () => {
  it("decodes simple control messages and ignores extra fields", () => {
    expect(decodeClientMessage('{"type":"recording_started","extra":1}')).toEqual({ kind: "recording_started" });
    expect(decodeClientMessage('{"type":"ping"}')).toEqual({ kind: "ping" });
  });

  it("decodes hello capabilities", () => {
    expect(decodeClientMessage('{"type":"hello","capabilities":{"psram":true,"max_chunk_bytes":4096}}')).toEqual({
      kind: "hello",
      capabilities: { psram: true, maxChunkBytes: 4096 },
    });
    expect(decodeClientMessage('{"type":"hello"}')).toEqual({
      kind: "hello",
      capabilities: { psram: false, maxChunkBytes: null },
    });
    expect(decodeClientMessage('{"type":"hello","capabilities":{"max_chunk_bytes":0}}')).toEqual({
      kind: "invalid",
      error: "capabilities.max_chunk_bytes must be a positive integer",
    });
  });

  it("decodes audio_chunk_meta", () => {
    expect(decodeClientMessage('{"type":"audio_chunk_meta","seq":3,"len_bytes":640}')).toEqual({
      kind: "audio_chunk_meta",
      seq: 3,
      lenBytes: 640,
    });
    expect(decodeClientMessage('{"type":"audio_chunk_meta","seq":-1,"len_bytes":640}')).toEqual({
      kind: "invalid",
      error: "audio_chunk_meta.seq must be a non-negative integer",
    });
    expect(decodeClientMessage('{"type":"audio_chunk_meta","seq":1,"len_bytes":"640"}')).toEqual({
      kind: "invalid",
      error: "audio_chunk_meta.len_bytes must be a non-negative integer",
    });
  });

  it("reports malformed frames", () => {
    expect(decodeClientMessage("{nope")).toEqual({ kind: "invalid", error: "Invalid JSON" });
    expect(decodeClientMessage("[1,2]")).toEqual({ kind: "invalid", error: "Message must be a JSON object" });
    expect(decodeClientMessage('{"seq":1}')).toEqual({ kind: "invalid", error: "Missing message type" });
  });

  it("passes unknown types through for the caller to reject", () => {
    expect(decodeClientMessage('{"type":"reboot"}')).toEqual({ kind: "unrecognized", type: "reboot" });
  });
});
