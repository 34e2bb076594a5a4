/**
 * Unit tests for expiring download tokens.
 */

import { DownloadRegistry } from "../../../src/storage/downloads";

describe("DownloadRegistry", () => {
  it("issues a URL under the public base and resolves it until expiry", () => {
    const downloads = new DownloadRegistry({ ttlMs: 300, publicBaseUrl: "http://gateway.test/" });
    const { token, url } = downloads.issue("/tmp/tts_a_1.wav", "a", 1000);

    expect(url).toBe(`http://gateway.test/download/${token}`);
    expect(downloads.resolve(token, 1299)).toBe("/tmp/tts_a_1.wav");
    expect(downloads.resolve(token, 1300)).toBeNull();
    expect(downloads.size).toBe(0);
  });

  it("issues path-only URLs without a base", () => {
    const downloads = new DownloadRegistry({ ttlMs: 300 });
    const { token, url } = downloads.issue("/tmp/x.wav", "a");
    expect(url).toBe(`/download/${token}`);
  });

  it("returns null for unknown tokens", () => {
    expect(new DownloadRegistry({ ttlMs: 300 }).resolve("missing")).toBeNull();
  });

  it("revokes every token for a replaced file", () => {
    const downloads = new DownloadRegistry({ ttlMs: 300 });
    const first = downloads.issue("/tmp/old.wav", "a", 0);
    downloads.issue("/tmp/old.wav", "a", 0);
    const kept = downloads.issue("/tmp/new.wav", "a", 0);
    downloads.revokeFile("/tmp/old.wav");

    expect(downloads.size).toBe(1);
    expect(downloads.resolve(first.token, 1)).toBeNull();
    expect(downloads.resolve(kept.token, 1)).toBe("/tmp/new.wav");
  });

  it("prunes expired entries", () => {
    const downloads = new DownloadRegistry({ ttlMs: 100 });
    downloads.issue("/tmp/a.wav", "a", 0);
    downloads.issue("/tmp/b.wav", "a", 50);
    downloads.prune(120);
    expect(downloads.size).toBe(1);
  });
});
