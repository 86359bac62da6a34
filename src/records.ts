// CHANGE: Persist installed-package records per device.
// WHY: The on-device record file is the source of truth for what is installed; only the installer writes it.

import { Mutex } from "async-mutex";
import path from "path";
import { DEVICE } from "./config.js";
import { IOError, describeError } from "./errors.js";
import { debug, info } from "./logger.js";
import { PACKAGE_KINDS, type DevicePath, type InstalledRecord, type PackageKind } from "./types.js";
import { isRecord, readJsonObject, writeJsonAtomic } from "./utils/json-file.js";
import { KeyedMutex } from "./utils/lock.js";

function isPackageKind(value: unknown): value is PackageKind {
  return typeof value === "string" && PACKAGE_KINDS.some(kind => kind === value);
}

/**
 * Narrow a persisted record, rejecting any with missing or mistyped fields.
 */
export function toInstalledRecord(raw: unknown): InstalledRecord | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const { packageId, kind, installedVersion, installPath, installedAt } = raw;
  if (
    typeof packageId !== "string" ||
    !isPackageKind(kind) ||
    typeof installedVersion !== "string" ||
    typeof installPath !== "string" ||
    !path.isAbsolute(installPath) ||
    typeof installedAt !== "string"
  ) {
    return undefined;
  }
  return { packageId, kind, installedVersion, installPath, installedAt };
}

/**
 * Installed records of one device, stored in `<markerDir>/koreader-store.json`.
 */
export class InstalledRecordStore {
  readonly path: string;
  private readonly recordLock = new KeyedMutex();
  private readonly fileLock = new Mutex();
  private records: ReadonlyMap<string, InstalledRecord> = new Map();
  private loading: Promise<void> | undefined;

  constructor(filePath: string) {
    this.path = filePath;
  }

  static forDevice(device: DevicePath): InstalledRecordStore {
    return new InstalledRecordStore(path.join(device.markerDir, DEVICE.RECORDS_FILE));
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
    if (parsed.version !== DEVICE.RECORDS_VERSION || !isRecord(parsed.records)) {
      info(`Installed records at ${this.path} have an unknown format, reinitialising.`);
      return;
    }
    const records = new Map<string, InstalledRecord>();
    for (const [key, raw] of Object.entries(parsed.records)) {
      const record = toInstalledRecord(raw);
      if (record && record.packageId === key) {
        records.set(key, record);
      } else {
        debug(`Dropping malformed installed record ${key}.`);
      }
    }
    this.records = records;
  }

  async get(packageId: string): Promise<InstalledRecord | undefined> {
    await this.load();
    return this.records.get(packageId);
  }

  async list(): Promise<InstalledRecord[]> {
    await this.load();
    return Array.from(this.records.values());
  }

  /**
   * Create or replace the record for `record.packageId`.
   *
   * @throws IOError when the record file cannot be written; the in-memory state is rolled back.
   */
  async upsert(record: InstalledRecord): Promise<void> {
    await this.load();
    await this.recordLock.runExclusive(record.packageId, () => this.commit(record.packageId, record));
  }

  /**
   * Remove the record for `packageId`; absent records are a no-op.
   *
   * @returns The removed record, if there was one.
   */
  async remove(packageId: string): Promise<InstalledRecord | undefined> {
    await this.load();
    return this.recordLock.runExclusive(packageId, async () => {
      const existing = this.records.get(packageId);
      if (!existing) {
        return undefined;
      }
      await this.commit(packageId, undefined);
      return existing;
    });
  }

  private replace(packageId: string, record: InstalledRecord | undefined): void {
    const next = new Map(this.records);
    if (record) {
      next.set(packageId, record);
    } else {
      next.delete(packageId);
    }
    this.records = next;
  }

  private async commit(packageId: string, record: InstalledRecord | undefined): Promise<void> {
    const previous = this.records.get(packageId);
    this.replace(packageId, record);
    try {
      await this.fileLock.runExclusive(async () => {
        await writeJsonAtomic(this.path, {
          version: DEVICE.RECORDS_VERSION,
          updatedAt: new Date().toISOString(),
          records: Object.fromEntries(this.records)
        });
      });
    } catch (error) {
      this.replace(packageId, previous);
      throw new IOError(`Failed to persist installed record for ${packageId}: ${describeError(error)}`, error);
    }
    debug(`Installed records saved (${this.records.size}) at ${this.path}.`);
  }
}
