import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { IOError } from "../src/errors.js";
import { FavoritesStore } from "../src/favorites.js";
import { makeTempDir } from "./helpers.js";

describe("FavoritesStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    filePath = path.join(dir, "favorites.json");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("starts empty when the file is absent", async () => {
    const store = new FavoritesStore({ path: filePath });
    await expect(store.list()).resolves.toEqual([]);
    await expect(store.has("calibre-sync")).resolves.toBe(false);
  });

  it("adds and removes favorites and persists them sorted", async () => {
    const store = new FavoritesStore({ path: filePath });

    await expect(store.add("zlibrary")).resolves.toBe(true);
    await expect(store.add("calibre-sync")).resolves.toBe(true);
    await expect(store.add("calibre-sync")).resolves.toBe(false);

    await expect(fs.readJson(filePath)).resolves.toEqual({ version: 1, favorites: ["calibre-sync", "zlibrary"] });
    await expect(new FavoritesStore({ path: filePath }).has("zlibrary")).resolves.toBe(true);

    await expect(store.remove("zlibrary")).resolves.toBe(true);
    await expect(store.remove("zlibrary")).resolves.toBe(false);
    await expect(new FavoritesStore({ path: filePath }).list()).resolves.toEqual(["calibre-sync"]);
  });

  it("keeps concurrent additions", async () => {
    const store = new FavoritesStore({ path: filePath });
    await Promise.all(["c", "a", "b"].map(id => store.add(id)));
    await expect(new FavoritesStore({ path: filePath }).list()).resolves.toEqual(["a", "b", "c"]);
  });

  it("drops non-string entries and resets unknown formats", async () => {
    await fs.writeJson(filePath, { version: 1, favorites: ["calibre-sync", 3, ""] });
    await expect(new FavoritesStore({ path: filePath }).list()).resolves.toEqual(["calibre-sync"]);

    await fs.writeJson(filePath, { version: 2, favorites: ["calibre-sync"] });
    await expect(new FavoritesStore({ path: filePath }).list()).resolves.toEqual([]);
  });

  it("leaves the set unchanged when the file cannot be written", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "");
    const store = new FavoritesStore({ path: path.join(blocker, "favorites.json") });

    await expect(store.add("calibre-sync")).rejects.toBeInstanceOf(IOError);
    await expect(store.has("calibre-sync")).resolves.toBe(false);
  });
});
