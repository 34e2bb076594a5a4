/**
 * Unit tests for TTS streaming to the device.
 */

import * as fs from "fs";
import * as path from "path";
import { ResponseStreamer } from "../../../src/pipeline/response-streamer";
import { pcmToWav } from "../../../src/pipeline/audio-utils";
import type { MessageSink, ServerMessage } from "../../../src/device/protocol";
import { makeTempDir, removeDir } from "../../helpers/fakes";

/** Records frames; sends fail once `failAt` frames have gone out. */
class RecordingSink implements MessageSink {
  readonly json: ServerMessage[] = [];
  readonly binary: Buffer[] = [];
  failAt: number | null = null;

  async sendJson(msg: ServerMessage): Promise<boolean> {
    if (this.full()) return false;
    this.json.push(msg);
    return true;
  }

  async sendChunk(meta: ServerMessage, data: Buffer): Promise<boolean> {
    if (!(await this.sendJson(meta))) return false;
    if (this.full()) return false;
    this.binary.push(data);
    return true;
  }

  private full(): boolean {
    return this.failAt !== null && this.json.length + this.binary.length >= this.failAt;
  }
}

describe("ResponseStreamer", () => {
  let tempDir: string;
  const streamer = new ResponseStreamer({ chunkSizeBytes: 16000, pacingMs: 0, defaultSampleRate: 16000 });

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  async function writeFile(name: string, data: Buffer): Promise<string> {
    const file = path.join(tempDir, name);
    await fs.promises.writeFile(file, data);
    return file;
  }

  it("sends tts_ready, meta and binary pairs, then one tts_done", async () => {
    const file = await writeFile("tts_a_1.wav", pcmToWav(Buffer.alloc(40000, 3), 16000));
    const sink = new RecordingSink();

    expect(await streamer.stream(file, sink, "a")).toBe(true);
    expect(sink.json).toEqual([
      { type: "tts_ready", duration_ms: 1250, sampleRate: 16000, format: "wav", fileSize: 40044 },
      { type: "tts_chunk_meta", seq: 0, len_bytes: 16000 },
      { type: "tts_chunk_meta", seq: 1, len_bytes: 16000 },
      { type: "tts_chunk_meta", seq: 2, len_bytes: 8044 },
      { type: "tts_done" },
    ]);
    expect(sink.binary.map((b) => b.length)).toEqual([16000, 16000, 8044]);
    expect(Buffer.concat(sink.binary).equals(await fs.promises.readFile(file))).toBe(true);
  });

  it("stops without tts_done when a send fails", async () => {
    const file = await writeFile("tts_a_2.wav", pcmToWav(Buffer.alloc(40000), 16000));
    const sink = new RecordingSink();
    sink.failAt = 3;

    expect(await streamer.stream(file, sink, "a")).toBe(false);
    expect(sink.json.map((m) => m.type)).toEqual(["tts_ready", "tts_chunk_meta"]);
    expect(sink.binary.length).toBe(1);
  });

  it("returns false for a missing artifact", async () => {
    const sink = new RecordingSink();
    expect(await streamer.stream(path.join(tempDir, "gone.wav"), sink, "a")).toBe(false);
    expect(sink.json).toEqual([]);
  });

  it("estimates duration when the header is unreadable", async () => {
    const file = await writeFile("tts_a_3.wav", Buffer.alloc(1044, 7));
    const sink = new RecordingSink();
    expect(await streamer.stream(file, sink, "a")).toBe(true);
    expect(sink.json[0]).toEqual({ type: "tts_ready", duration_ms: 31, sampleRate: 16000, format: "wav", fileSize: 1044 });
  });
});
