/**
 * Unit tests for disk usage accounting, admission checks, and the artifact sweep.
 */

import * as fs from "fs";
import * as path from "path";
import { SessionRegistry } from "../../../src/session/registry";
import { StorageQuotaManager } from "../../../src/storage/quota-manager";
import { listDir, makeTempDir, removeDir } from "../../helpers/fakes";

describe("StorageQuotaManager", () => {
  let tempDir: string;
  let registry: SessionRegistry;

  function build(maxSessionBytes = 100, maxStoreBytes = 1000): StorageQuotaManager {
    const quota = new StorageQuotaManager({ tempDir, maxSessionBytes, maxStoreBytes, graceMs: 30_000, sweepIntervalMs: 60_000 });
    quota.attach(registry);
    return quota;
  }

  async function writeFile(name: string, bytes: number, ageMs = 0): Promise<string> {
    const file = path.join(tempDir, name);
    await fs.promises.writeFile(file, Buffer.alloc(bytes));
    if (ageMs > 0) {
      const t = (Date.now() - ageMs) / 1000;
      await fs.promises.utimes(file, t, t);
    }
    return file;
  }

  beforeEach(async () => {
    tempDir = await makeTempDir();
    registry = new SessionRegistry({ maxHistoryTurns: 10, sessionGraceMs: 30_000, sweepIntervalMs: 60_000 });
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it("recomputes session usage from the files on disk", async () => {
    const quota = build();
    const s = registry.createSession("s1");
    s.audio.artifactPath = await writeFile("audio_s1_1.raw", 40);
    s.tts = { path: await writeFile("tts_s1_2.wav", 30), durationMs: 0, sampleRate: 16000, sizeBytes: 30, createdAt: 0, fallback: false };

    expect(await quota.sessionUsage(s)).toBe(70);
    expect(s.diskUsageBytes).toBe(70);
    await fs.promises.appendFile(s.audio.artifactPath, Buffer.alloc(40));
    expect(await quota.isSessionOverQuota(s)).toBe(true);
  });

  it("treats usage equal to the quota as within it", async () => {
    const quota = build();
    const s = registry.createSession("s1");
    s.audio.artifactPath = await writeFile("audio_s1_1.raw", 100);
    expect(await quota.isSessionOverQuota(s)).toBe(false);
  });

  it("checks admission against the session and the store", async () => {
    const quota = build(100, 150);
    const s = registry.createSession("s1");
    s.audio.artifactPath = await writeFile("audio_s1_1.raw", 60);
    await writeFile("audio_other_1.raw", 80);

    expect(await quota.checkAdmission(s, 50)).toEqual({ ok: false, scope: "session", usageBytes: 110, limitBytes: 100 });
    expect(await quota.checkAdmission(s, 20)).toEqual({ ok: false, scope: "store", usageBytes: 160, limitBytes: 150 });
    expect(await quota.checkAdmission(s, 20, 15)).toEqual({ ok: true });
  });

  it("reports store usage, zero when the directory is missing", async () => {
    await writeFile("a.bin", 5);
    await writeFile("b.bin", 7);
    expect(await build().storeUsage()).toEqual({ totalSizeBytes: 12, fileCount: 2, quotaBytes: 1000 });

    const missing = new StorageQuotaManager({
      tempDir: path.join(tempDir, "nope"),
      maxSessionBytes: 1,
      maxStoreBytes: 1,
      graceMs: 1,
      sweepIntervalMs: 1,
    });
    expect(await missing.storeUsage()).toEqual({ totalSizeBytes: 0, fileCount: 0, quotaBytes: 1 });
  });

  it("sweeps old orphans and stale sessions, keeping live and fresh files", async () => {
    const quota = build();
    const now = Date.now();
    await writeFile("audio_ghost_1000.raw", 10, 120_000);
    await writeFile("tts_ghost_2000.wav", 5);
    await writeFile("notes.txt", 3, 120_000);

    const live = registry.createSession("live");
    live.audio.artifactPath = await writeFile("audio_live_3000.raw", 20, 120_000);
    live.lastActivityAt = now - 120_000;
    registry.bind("live");

    const gone = registry.createSession("gone");
    const imagePath = await writeFile("image_gone_4000.png", 8, 120_000);
    gone.image = { path: imagePath, filename: "image_gone_4000.png", mimeType: "image/png", sizeBytes: 8, width: 1, height: 1, uploadedAt: 0 };
    gone.lastActivityAt = now - 60_000;

    const report = await quota.sweep(now);

    expect(report.filesDeleted).toBe(1);
    expect(report.bytesFreed).toBe(10);
    expect(report.sessionsRemoved).toEqual(["gone"]);
    expect(report.usage).toEqual({ totalSizeBytes: 28, fileCount: 3, quotaBytes: 1000 });
    expect(await listDir(tempDir)).toEqual(["audio_live_3000.raw", "notes.txt", "tts_ghost_2000.wav"]);
    expect(registry.hasSession("live")).toBe(true);
    expect(registry.hasSession("gone")).toBe(false);
  });
});
