/**
 * Unit tests for ASR adapters (stub, recognition sessions and factory).
 */

import * as fs from "fs";
import * as path from "path";
import { OpenAIWhisperASR, StubASR, WhisperLocalASR, createASR, openRecognitionSession } from "../../../src/adapters/asr";
import type { IASR, TranscriptResult } from "../../../src/adapters/asr";
import { testConfig } from "../../helpers/config";
import { makeTempDir, removeDir } from "../../helpers/fakes";

/** Batch-only recognizer that echoes the byte count it was given. */
class CountingASR implements IASR {
  readonly formats: Array<string | undefined> = [];

  async transcribe(audio: Buffer, format?: string): Promise<TranscriptResult> {
    this.formats.push(format);
    return { text: `${audio.length} bytes` };
  }
}

describe("StubASR", () => {
  it("returns empty transcript", async () => {
    const asr = new StubASR();
    const result = await asr.transcribe(Buffer.alloc(100));
    expect(result.text).toBe("");
  });

  it("returns the configured transcript", async () => {
    expect((await new StubASR("hello there").transcribe(Buffer.alloc(2))).text).toBe("hello there");
  });
});

describe("openRecognitionSession", () => {
  it("buffers pushed PCM for batch adapters and transcribes it at end", async () => {
    const asr = new CountingASR();
    const session = openRecognitionSession(asr);
    session.push(Buffer.alloc(100));
    session.push(Buffer.alloc(60));
    expect((await session.end()).text).toBe("160 bytes");
    expect(asr.formats).toEqual(["pcm16"]);
  });

  it("drops buffered audio on abort", async () => {
    const session = openRecognitionSession(new CountingASR());
    session.push(Buffer.alloc(100));
    session.abort();
    session.push(Buffer.alloc(10));
    expect((await session.end()).text).toBe("0 bytes");
  });
});

describe("WhisperLocalASR worker", () => {
  const workerScript = path.join(__dirname, "../../fixtures/echo-rate-worker.cjs");
  let asr: WhisperLocalASR | null = null;
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await asr?.close();
    asr = null;
    await removeDir(tempDir);
  });

  it("wraps raw pcm16 at the configured sample rate", async () => {
    asr = new WhisperLocalASR({ model: "base", pythonPath: process.execPath, workerScript, sampleRateHz: 8000 });
    expect((await asr.transcribe(Buffer.alloc(320), "pcm16")).text).toBe("8000");
  });

  it("rejects the request when the interpreter cannot be spawned", async () => {
    const script = path.join(tempDir, "worker.py");
    await fs.promises.writeFile(script, "");
    asr = new WhisperLocalASR({ model: "base", pythonPath: path.join(tempDir, "no-such-python"), workerScript: script });
    await expect(asr.transcribe(Buffer.alloc(320), "pcm16")).rejects.toThrow(/^whisper-local worker/);
  });
});

describe("createASR", () => {
  it("returns StubASR when provider is stub", () => {
    expect(createASR(testConfig({ asr: { provider: "stub" } }))).toBeInstanceOf(StubASR);
  });

  it("returns StubASR when provider is openai but no api key", () => {
    expect(createASR(testConfig({ asr: { provider: "openai", apiKey: undefined } }))).toBeInstanceOf(StubASR);
  });

  it("returns OpenAIWhisperASR when an api key is set", () => {
    expect(createASR(testConfig({ asr: { provider: "openai", apiKey: "test-secret" } }))).toBeInstanceOf(OpenAIWhisperASR);
  });

  it("returns WhisperLocalASR when provider is whisper-local", () => {
    const asr = createASR(testConfig({ asr: { provider: "whisper-local", whisperModel: "base", whisperEngine: "faster-whisper" } }));
    expect(asr).toBeInstanceOf(WhisperLocalASR);
  });
});
