import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MetadataCache } from "../src/cache.js";
import { makeTempDir } from "./helpers.js";

const TTL = 1000;

function asStrings(payload: unknown): string[] | undefined {
  return Array.isArray(payload) && payload.every(item => typeof item === "string") ? payload : undefined;
}

describe("MetadataCache", () => {
  let dir: string;
  let cachePath: string;
  let clock: number;
  const now = () => clock;

  beforeEach(async () => {
    dir = await makeTempDir();
    cachePath = path.join(dir, "cache.json");
    clock = 1_700_000_000_000;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("returns a miss for an absent file", async () => {
    const cache = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    await expect(cache.get("packages:plugin", asStrings)).resolves.toBeUndefined();
  });

  it("round-trips entries through disk", async () => {
    const writer = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    await writer.set("packages:plugin", ["a", "b"]);

    const reader = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    const hit = await reader.get("packages:plugin", asStrings);
    expect(hit).toEqual({ entry: { payload: ["a", "b"], fetchedAt: clock, ttl: TTL }, fresh: true });

    const stored = await fs.readJson(cachePath);
    expect(stored.version).toBe(1);
    expect(stored.updatedAt).toBe(new Date(clock).toISOString());
  });

  it("reports entries as stale once the TTL elapses", async () => {
    const cache = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    await cache.set("packages:patch", ["x"]);

    clock += TTL - 1;
    expect((await cache.get("packages:patch", asStrings))?.fresh).toBe(true);
    clock += 1;
    const stale = await cache.get("packages:patch", asStrings);
    expect(stale?.fresh).toBe(false);
    expect(stale?.entry.payload).toEqual(["x"]);
  });

  it("treats a corrupt file as empty", async () => {
    await fs.writeFile(cachePath, "{ not json");
    const cache = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    await expect(cache.get("packages:plugin", asStrings)).resolves.toBeUndefined();

    await cache.set("packages:plugin", ["fresh"]);
    expect((await fs.readJson(cachePath)).entries["packages:plugin"].payload).toEqual(["fresh"]);
  });

  it("drops malformed entries and keeps the rest", async () => {
    await fs.writeJson(cachePath, {
      version: 1,
      updatedAt: "2024-01-01T00:00:00.000Z",
      entries: {
        good: { payload: ["ok"], fetchedAt: clock, ttl: TTL },
        noTtl: { payload: ["ok"], fetchedAt: clock },
        badStamp: { payload: ["ok"], fetchedAt: "yesterday", ttl: TTL }
      }
    });
    const cache = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    const stats = await cache.stats();
    expect(stats.count).toBe(1);
    expect(stats.keys).toEqual([{ key: "good", fetchedAt: new Date(clock).toISOString(), fresh: true }]);
  });

  it("treats payloads failing validation as misses", async () => {
    const cache = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    await cache.set("packages:plugin", { unexpected: true });
    await expect(cache.get("packages:plugin", asStrings)).resolves.toBeUndefined();
  });

  it("reinitialises on a version mismatch", async () => {
    await fs.writeJson(cachePath, { version: 99, entries: { key: { payload: ["old"], fetchedAt: clock, ttl: TTL } } });
    const cache = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    expect((await cache.stats()).count).toBe(0);
  });

  it("clears every entry", async () => {
    const cache = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    await cache.set("a", ["1"]);
    await cache.set("b", ["2"]);
    await cache.clear();
    expect((await cache.stats()).count).toBe(0);
    expect((await fs.readJson(cachePath)).entries).toEqual({});
  });

  it("serialises concurrent writes without losing keys", async () => {
    const cache = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    await Promise.all(["a", "b", "c"].map(key => cache.set(key, [key])));
    const reread = new MetadataCache({ path: cachePath, ttlMs: TTL, now });
    expect((await reread.stats()).keys.map(entry => entry.key).sort()).toEqual(["a", "b", "c"]);
  });
});
