/**
 * Unit tests for the session registry.
 */

import * as fs from "fs";
import * as path from "path";
import { SessionRegistry } from "../../../src/session/registry";
import { SessionExistsError } from "../../../src/errors";
import { makeTempDir, removeDir } from "../../helpers/fakes";

function newRegistry(overrides: { maxHistoryTurns?: number; eventLogCap?: number } = {}): SessionRegistry {
  return new SessionRegistry({
    maxHistoryTurns: overrides.maxHistoryTurns ?? 10,
    sessionGraceMs: 30_000,
    sweepIntervalMs: 60_000,
    eventLogCap: overrides.eventLogCap,
  });
}

describe("SessionRegistry", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it("creates sessions and refuses duplicate ids", () => {
    const registry = newRegistry();
    const s = registry.createSession("dev-1");
    expect(s.state).toBe("disconnected");
    expect(s.rerecordAttempts).toBe(0);
    expect(() => registry.createSession("dev-1")).toThrow(SessionExistsError);
    expect(registry.getOrCreateSession("dev-1")).toBe(s);
    expect(registry.hasSession("dev-1")).toBe(true);
  });

  it("generates an id when none is given", () => {
    const registry = newRegistry();
    const s = registry.createSession();
    expect(s.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(registry.listSessions()).toEqual([s]);
  });

  it("records state changes as events", () => {
    const registry = newRegistry();
    const s = registry.createSession("dev-1");
    registry.updateState(s, "connected");
    registry.updateState(s, "idle");

    expect(s.state).toBe("idle");
    expect(s.events.map((e) => e.data)).toEqual([
      { from: "disconnected", to: "connected" },
      { from: "connected", to: "idle" },
    ]);
  });

  it("caps the event log, dropping the oldest entries", () => {
    const registry = newRegistry({ eventLogCap: 3 });
    const s = registry.createSession("dev-1");
    for (let i = 0; i < 5; i++) registry.logEvent(s, `e${i}`);
    expect(s.events.map((e) => e.type)).toEqual(["e2", "e3", "e4"]);
  });

  it("keeps only the last K conversation turns", () => {
    const registry = newRegistry({ maxHistoryTurns: 2 });
    const s = registry.createSession("dev-1");
    registry.addConversationTurn(s, "user", "one");
    registry.addConversationTurn(s, "assistant", "two");
    registry.addConversationTurn(s, "user", "three");
    expect(s.history.getSnapshot().turns.map((t) => t.content)).toEqual(["two", "three"]);
  });

  it("counts sessions by state", () => {
    const registry = newRegistry();
    registry.createSession("a");
    registry.updateState(registry.createSession("b"), "idle");
    const stats = registry.stats();
    expect(stats.totalSessions).toBe(2);
    expect(stats.byState.disconnected).toBe(1);
    expect(stats.byState.idle).toBe(1);
    expect(stats.byState.recording).toBe(0);
  });

  it("removes a session together with its artifacts", async () => {
    const registry = newRegistry();
    const s = registry.createSession("dev-1");
    const audio = path.join(tempDir, "audio_dev-1_1.raw");
    const image = path.join(tempDir, "image_dev-1_2.png");
    const tts = path.join(tempDir, "tts_dev-1_3.wav");
    for (const f of [audio, image, tts]) await fs.promises.writeFile(f, "x");
    s.audio.artifactPath = audio;
    s.image = { path: image, filename: "image_dev-1_2.png", mimeType: "image/png", sizeBytes: 1, width: 1, height: 1, uploadedAt: 0 };
    s.tts = { path: tts, durationMs: 0, sampleRate: 16000, sizeBytes: 1, createdAt: 0, fallback: false };

    expect(await registry.removeSession("dev-1")).toBe(true);
    expect(await fs.promises.readdir(tempDir)).toEqual([]);
    expect(registry.hasSession("dev-1")).toBe(false);
    expect(await registry.removeSession("dev-1")).toBe(false);
  });

  it("sweeps idle sessions that are not bound to a connection", async () => {
    const registry = newRegistry();
    const now = Date.now();
    const idle = registry.createSession("idle");
    const bound = registry.createSession("bound");
    const fresh = registry.createSession("fresh");
    idle.lastActivityAt = now - 31_000;
    bound.lastActivityAt = now - 31_000;
    fresh.lastActivityAt = now - 1_000;
    registry.bind("bound");
    const audio = path.join(tempDir, "audio_idle_1.raw");
    const image = path.join(tempDir, "image_idle_2.jpg");
    const tts = path.join(tempDir, "tts_idle_3.wav");
    for (const f of [audio, image, tts]) await fs.promises.writeFile(f, "x");
    idle.audio.artifactPath = audio;
    idle.image = { path: image, filename: "image_idle_2.jpg", mimeType: "image/jpeg", sizeBytes: 1, width: 1, height: 1, uploadedAt: 0 };
    idle.tts = { path: tts, durationMs: 0, sampleRate: 16000, sizeBytes: 1, createdAt: 0, fallback: false };

    expect(await registry.sweepIdle(now)).toEqual(["idle"]);
    expect(registry.listSessions().map((s) => s.id)).toEqual(["bound", "fresh"]);
    expect(await fs.promises.readdir(tempDir)).toEqual([]);

    registry.release("bound");
    expect(registry.isBound("bound")).toBe(false);
    expect(await registry.sweepIdle(now)).toEqual(["bound"]);
  });

  it("builds a JSON-safe snapshot", () => {
    const registry = newRegistry();
    const s = registry.createSession("dev-1");
    s.audio.sequenceHistory.push(0, 1, 2);
    registry.addConversationTurn(s, "user", "hello");
    const snap = registry.snapshot(s);

    expect(snap.id).toBe("dev-1");
    expect(snap.audio.sequenceCount).toBe(3);
    expect("sequenceHistory" in snap.audio).toBe(false);
    expect(snap.historyTurns).toBe(1);
    expect(snap.recentHistory[0].content).toBe("hello");
    expect(snap.createdAt).toBe(new Date(s.createdAt).toISOString());
    expect(JSON.parse(JSON.stringify(snap))).toEqual(snap);
  });

  it("shutdown moves every session to shutdown and removes them", async () => {
    const registry = newRegistry();
    const s = registry.createSession("dev-1");
    await registry.shutdown();
    expect(s.state).toBe("shutdown");
    expect(registry.listSessions()).toEqual([]);
  });
});
