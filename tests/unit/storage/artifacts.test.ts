/**
 * Unit tests for artifact naming and file helpers.
 */

import * as path from "path";
import { artifactFileName, fileSize, parseArtifactName, removeFile } from "../../../src/storage/artifacts";
import { makeTempDir, removeDir } from "../../helpers/fakes";

describe("artifact names", () => {
  it("parses kind, session, timestamp and extension", () => {
    expect(parseArtifactName("audio_dev-1_1700000000000.raw")).toEqual({
      kind: "audio",
      sessionId: "dev-1",
      timestamp: 1700000000000,
      ext: "raw",
    });
    expect(parseArtifactName("tts_a_b_12.wav")).toEqual({ kind: "tts", sessionId: "a_b", timestamp: 12, ext: "wav" });
    expect(parseArtifactName("notes.txt")).toBeNull();
    expect(parseArtifactName("video_x_1.mp4")).toBeNull();
  });

  it("never hands out the same timestamp twice", () => {
    const a = parseArtifactName(artifactFileName("tts", "s", "wav"));
    const b = parseArtifactName(artifactFileName("tts", "s", "wav"));
    expect(a && b && b.timestamp > a.timestamp).toBe(true);
  });
});

describe("file helpers", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it("treats missing files as empty and not removable", async () => {
    const missing = path.join(tempDir, "missing.raw");
    expect(await fileSize(missing)).toBe(0);
    expect(await fileSize(null)).toBe(0);
    expect(await removeFile(missing)).toBe(false);
    expect(await removeFile(undefined)).toBe(false);
  });
});
