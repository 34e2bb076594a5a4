/**
 * Unit tests for the synthesis queue.
 */

import * as fs from "fs";
import { SynthesisQueue } from "../../../src/pipeline/synthesis-queue";
import { pcmToWav } from "../../../src/pipeline/audio-utils";
import { StubTTS, type ITTS, type VoiceOptions } from "../../../src/adapters/tts";
import { listDir, makeTempDir, removeDir } from "../../helpers/fakes";

class FailingTTS implements ITTS {
  calls = 0;

  async synthesize(): Promise<Buffer> {
    this.calls += 1;
    throw new Error("engine down");
  }
}

/** Tracks how many synthesize calls overlap. */
class SlowTTS implements ITTS {
  active = 0;
  maxActive = 0;
  readonly order: string[] = [];

  async synthesize(text: string, _options?: VoiceOptions): Promise<Buffer> {
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setTimeout(resolve, 10));
    this.order.push(text);
    this.active -= 1;
    return Buffer.alloc(320);
  }
}

describe("SynthesisQueue", () => {
  let tempDir: string;

  function queue(tts: ITTS): SynthesisQueue {
    return new SynthesisQueue(tts, { tempDir, sampleRate: 16000, timeoutMs: 1000, attempts: 2, retryBaseDelayMs: 1 });
  }

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it("writes a fallback tone when the engine returns nothing", async () => {
    const res = await queue(new StubTTS()).enqueue("s1", "hi");
    expect(res).toMatchObject({ fallback: true, sizeBytes: 32044, durationMs: 1000, sampleRate: 16000 });
    expect((await fs.promises.stat(res.path)).size).toBe(32044);
  });

  it("falls back to the tone after the engine keeps failing", async () => {
    const tts = new FailingTTS();
    const res = await queue(tts).enqueue("s1", "hi");
    expect(tts.calls).toBe(2);
    expect(res.fallback).toBe(true);
  });

  it("wraps raw PCM in a WAV header", async () => {
    const res = await queue(new StubTTS(Buffer.alloc(3200))).enqueue("s1", "hello");
    expect(res).toMatchObject({ fallback: false, sizeBytes: 3244, durationMs: 100 });
  });

  it("keeps engine WAV output as is", async () => {
    const wav = pcmToWav(Buffer.alloc(16000, 2), 16000);
    const res = await queue(new StubTTS(wav)).enqueue("s1", "hello");
    expect((await fs.promises.readFile(res.path)).equals(wav)).toBe(true);
    expect(res.durationMs).toBe(500);
  });

  it("runs one job at a time in arrival order", async () => {
    const tts = new SlowTTS();
    const q = queue(tts);
    const jobs = [q.enqueue("a", "first"), q.enqueue("b", "second"), q.enqueue("c", "third")];
    expect(q.pending).toBe(3);
    const results = await Promise.all(jobs);
    await q.drain();

    expect(tts.maxActive).toBe(1);
    expect(tts.order).toEqual(["first", "second", "third"]);
    expect(q.pending).toBe(0);
    expect(await listDir(tempDir)).toEqual(results.map((r) => r.path.slice(tempDir.length + 1)).sort());
  });
});
