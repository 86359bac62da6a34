import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { IOError } from "../src/errors.js";
import { InstalledRecordStore, toInstalledRecord } from "../src/records.js";
import type { InstalledRecord } from "../src/types.js";
import { makeDevice, makeTempDir } from "./helpers.js";

function record(packageId: string, overrides: Partial<InstalledRecord> = {}): InstalledRecord {
  return {
    packageId,
    kind: "plugin",
    installedVersion: "1.0.0",
    installPath: path.resolve("/device/koreader/plugins", `${packageId}.koplugin`),
    installedAt: "2024-05-01T00:00:00.000Z",
    ...overrides
  };
}

describe("toInstalledRecord", () => {
  it("accepts complete records", () => {
    expect(toInstalledRecord(record("calibre-sync"))).toEqual(record("calibre-sync"));
  });

  it("rejects relative install paths and unknown kinds", () => {
    expect(toInstalledRecord({ ...record("a"), installPath: "plugins/a.koplugin" })).toBeUndefined();
    expect(toInstalledRecord({ ...record("a"), kind: "theme" })).toBeUndefined();
    expect(toInstalledRecord({ ...record("a"), installedVersion: 3 })).toBeUndefined();
  });
});

describe("InstalledRecordStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("stores records inside the KOReader directory of the device", async () => {
    const device = await makeDevice(dir);
    const store = InstalledRecordStore.forDevice(device);
    expect(store.path).toBe(path.join(device.markerDir, "koreader-store.json"));

    await store.upsert(record("calibre-sync"));

    const reread = InstalledRecordStore.forDevice(device);
    await expect(reread.list()).resolves.toEqual([record("calibre-sync")]);
    const file = await fs.readJson(store.path);
    expect(file.version).toBe(1);
    expect(Object.keys(file.records)).toEqual(["calibre-sync"]);
  });

  it("replaces a record whole on upsert", async () => {
    const store = new InstalledRecordStore(path.join(dir, "records.json"));
    await store.upsert(record("calibre-sync"));
    await store.upsert(record("calibre-sync", { installedVersion: "2.0.0" }));
    await expect(store.get("calibre-sync")).resolves.toEqual(record("calibre-sync", { installedVersion: "2.0.0" }));
    expect(await store.list()).toHaveLength(1);
  });

  it("removes records and treats absent ones as a no-op", async () => {
    const store = new InstalledRecordStore(path.join(dir, "records.json"));
    await store.upsert(record("a"));
    await store.upsert(record("b"));

    await expect(store.remove("a")).resolves.toEqual(record("a"));
    await expect(store.remove("a")).resolves.toBeUndefined();
    expect((await store.list()).map(item => item.packageId)).toEqual(["b"]);
  });

  it("drops malformed or mismatched entries when loading", async () => {
    const filePath = path.join(dir, "records.json");
    await fs.writeJson(filePath, {
      version: 1,
      records: { good: record("good"), renamed: record("other"), broken: { packageId: "broken" } }
    });
    const store = new InstalledRecordStore(filePath);
    expect((await store.list()).map(item => item.packageId)).toEqual(["good"]);
  });

  it("keeps persisting concurrent upserts of different ids", async () => {
    const filePath = path.join(dir, "records.json");
    const store = new InstalledRecordStore(filePath);
    await Promise.all(["a", "b", "c"].map(id => store.upsert(record(id))));
    const reread = new InstalledRecordStore(filePath);
    expect((await reread.list()).map(item => item.packageId).sort()).toEqual(["a", "b", "c"]);
  });

  it("rolls back the in-memory record when the file cannot be written", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "");
    const store = new InstalledRecordStore(path.join(blocker, "records.json"));

    await expect(store.upsert(record("a"))).rejects.toBeInstanceOf(IOError);
    await expect(store.get("a")).resolves.toBeUndefined();
  });
});
