// CHANGE: Remember packages the user marked as favorites.
// WHY: Favorites are a host-side preference, so they live beside the metadata cache rather than on the device.

import { Mutex } from "async-mutex";
import { CACHE } from "./config.js";
import { IOError, describeError } from "./errors.js";
import { debug, info } from "./logger.js";
import { readJsonObject, writeJsonAtomic } from "./utils/json-file.js";

const FAVORITES_VERSION = 1;

export interface FavoritesStoreOptions {
  readonly path?: string;
}

/**
 * Set of favorite package ids persisted as `{ version, favorites: string[] }`.
 */
export class FavoritesStore {
  readonly path: string;
  private readonly writeLock = new Mutex();
  private ids: ReadonlySet<string> = new Set();
  private loading: Promise<void> | undefined;

  constructor(options: FavoritesStoreOptions = {}) {
    this.path = options.path ?? CACHE.FAVORITES_PATH;
  }

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
    const { version, favorites } = parsed;
    if (version !== FAVORITES_VERSION || !Array.isArray(favorites)) {
      info(`Favorites at ${this.path} have an unknown format, reinitialising.`);
      return;
    }
    this.ids = new Set(favorites.filter((id): id is string => typeof id === "string" && id.length > 0));
  }

  async list(): Promise<string[]> {
    await this.load();
    return Array.from(this.ids).sort();
  }

  async has(packageId: string): Promise<boolean> {
    await this.load();
    return this.ids.has(packageId);
  }

  /**
   * @returns false when the id was already a favorite.
   * @throws IOError when the file cannot be written; the set is left as it was.
   */
  async add(packageId: string): Promise<boolean> {
    return this.update(packageId, true);
  }

  /**
   * @returns false when the id was not a favorite.
   */
  async remove(packageId: string): Promise<boolean> {
    return this.update(packageId, false);
  }

  private async update(packageId: string, favorite: boolean): Promise<boolean> {
    await this.load();
    return this.writeLock.runExclusive(async () => {
      if (this.ids.has(packageId) === favorite) {
        return false;
      }
      const next = new Set(this.ids);
      if (favorite) {
        next.add(packageId);
      } else {
        next.delete(packageId);
      }
      try {
        await writeJsonAtomic(this.path, { version: FAVORITES_VERSION, favorites: Array.from(next).sort() });
      } catch (error) {
        throw new IOError(`Failed to save favorites: ${describeError(error)}`, error);
      }
      this.ids = next;
      debug(`${favorite ? "Added" : "Removed"} favorite ${packageId} (${next.size} total).`);
      return true;
    });
  }
}
