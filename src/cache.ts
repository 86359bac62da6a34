// CHANGE: Manage persistent TTL-stamped metadata cache.
// WHY: Unauthenticated GitHub calls are rate limited; listings are reused for four weeks.

import { Mutex } from "async-mutex";
import { CACHE } from "./config.js";
import { debug, info } from "./logger.js";
import type { CacheEntry } from "./types.js";
import { isRecord, readJsonObject, writeJsonAtomic } from "./utils/json-file.js";

export interface MetadataCacheOptions {
  readonly path?: string;
  readonly ttlMs?: number;
  readonly now?: () => number;
}

/**
 * Result of a cache lookup; `fresh` is false once the entry outlived its TTL.
 */
export interface CacheLookup<T> {
  readonly entry: CacheEntry<T>;
  readonly fresh: boolean;
}

export interface CacheStats {
  readonly path: string;
  readonly count: number;
  readonly updatedAt: string;
  readonly keys: ReadonlyArray<{ readonly key: string; readonly fetchedAt: string; readonly fresh: boolean }>;
}

function toEntry(raw: unknown): CacheEntry<unknown> | undefined {
  if (!isRecord(raw) || !("payload" in raw)) {
    return undefined;
  }
  const { fetchedAt, ttl } = raw;
  if (typeof fetchedAt !== "number" || !Number.isFinite(fetchedAt) || typeof ttl !== "number" || ttl <= 0) {
    return undefined;
  }
  return { payload: raw.payload, fetchedAt, ttl };
}

/**
 * Keyed cache persisted as a single JSON file.
 *
 * Entries live in an immutable map that is swapped on every write, so concurrent readers see either the
 * previous or the next state. Disk writes are serialised and go through a temporary file.
 */
export class MetadataCache {
  readonly path: string;
  readonly ttlMs: number;
  private readonly now: () => number;
  private readonly writeLock = new Mutex();
  private entries: ReadonlyMap<string, CacheEntry<unknown>> = new Map();
  private updatedAt = "";
  private loading: Promise<void> | undefined;

  constructor(options: MetadataCacheOptions = {}) {
    this.path = options.path ?? CACHE.PATH;
    this.ttlMs = options.ttlMs ?? CACHE.TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Load cache from disk once; corrupt files and entries are dropped as misses.
   */
  load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.readFromDisk();
    }
    return this.loading;
  }

  private async readFromDisk(): Promise<void> {
    const parsed = await readJsonObject(this.path);
    if (!parsed) {
      return;
    }
    if (parsed.version !== CACHE.VERSION || !isRecord(parsed.entries)) {
      info("Cache version mismatch, reinitialising.");
      return;
    }
    const entries = new Map<string, CacheEntry<unknown>>();
    for (const [key, raw] of Object.entries(parsed.entries)) {
      const entry = toEntry(raw);
      if (entry) {
        entries.set(key, entry);
      } else {
        debug(`Dropping malformed cache entry ${key}.`);
      }
    }
    this.entries = entries;
    this.updatedAt = typeof parsed.updatedAt === "string" ? parsed.updatedAt : "";
    debug(`Cache loaded with ${entries.size} entries from ${this.path}.`);
  }

  isFresh(entry: CacheEntry<unknown>): boolean {
    return this.now() - entry.fetchedAt < entry.ttl;
  }

  /**
   * Retrieve cached entry by key.
   *
   * @param parse - Narrows the stored payload; returning undefined treats the entry as a miss.
   */
  async get<T>(key: string, parse: (payload: unknown) => T | undefined): Promise<CacheLookup<T> | undefined> {
    await this.load();
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    const payload = parse(entry.payload);
    if (payload === undefined) {
      debug(`Cache entry ${key} failed validation, treating as miss.`);
      return undefined;
    }
    return {
      entry: { payload, fetchedAt: entry.fetchedAt, ttl: entry.ttl },
      fresh: this.isFresh(entry)
    };
  }

  /**
   * Store payload and persist.
   */
  async set<T>(key: string, payload: T, ttl: number = this.ttlMs): Promise<CacheEntry<T>> {
    await this.load();
    const entry: CacheEntry<T> = { payload, fetchedAt: this.now(), ttl };
    const next = new Map(this.entries);
    next.set(key, entry);
    this.entries = next;
    await this.save();
    return entry;
  }

  /**
   * Remove all entries from cache and persist.
   */
  async clear(): Promise<void> {
    await this.load();
    this.entries = new Map();
    await this.save();
  }

  /**
   * Obtain simple statistics for CLI reporting.
   */
  async stats(): Promise<CacheStats> {
    await this.load();
    return {
      path: this.path,
      count: this.entries.size,
      updatedAt: this.updatedAt,
      keys: Array.from(this.entries, ([key, entry]) => ({
        key,
        fetchedAt: new Date(entry.fetchedAt).toISOString(),
        fresh: this.isFresh(entry)
      }))
    };
  }

  private save(): Promise<void> {
    return this.writeLock.runExclusive(async () => {
      const updatedAt = new Date(this.now()).toISOString();
      await writeJsonAtomic(this.path, {
        version: CACHE.VERSION,
        updatedAt,
        entries: Object.fromEntries(this.entries)
      });
      this.updatedAt = updatedAt;
      debug(`Cache saved with ${this.entries.size} entries.`);
    });
  }
}
