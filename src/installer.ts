// CHANGE: Run download, verify, extract and record steps per package as observable background jobs.
// WHY: Install directories only ever change through a rename of fully staged content.

import { isAxiosError } from "axios";
import { randomBytes } from "crypto";
import fs from "fs-extra";
import os from "os";
import pLimit from "p-limit";
import path from "path";
import type { RepositoryClient } from "./api.js";
import { NET } from "./config.js";
import {
  CancellationError,
  FetchError,
  IOError,
  IntegrityError,
  InvalidDeviceError,
  JobConflictError,
  StoreError,
  describeError
} from "./errors.js";
import { debug, error as logError, info, warn } from "./logger.js";
import { InstalledRecordStore } from "./records.js";
import {
  TERMINAL_STATUSES,
  type DevicePath,
  type InstallJob,
  type InstalledRecord,
  type PackageMetadata
} from "./types.js";
import { extractZip, isArchive } from "./utils/archive.js";
import { parseSha256Digest, sha256File } from "./utils/hashing.js";
import { downloadToFile, executeWithRetry } from "./utils/http.js";
import { safeSegment } from "./utils/package-id.js";

export type ReleaseResolver = Pick<RepositoryClient, "getReleaseAsset">;

export type InstallListener = (job: InstallJob) => void;

export interface InstallWorkerOptions {
  readonly client: ReleaseResolver;
  /** Download attempts per job, including the first. */
  readonly attempts?: number;
  readonly retryBaseDelayMs?: number;
  /** Jobs running at once across different packages. */
  readonly concurrency?: number;
  readonly tempDir?: string;
  readonly recordStore?: (device: DevicePath) => InstalledRecordStore;
}

/**
 * Caller-side view of a submitted install.
 *
 * `done` resolves with the terminal job state and never rejects.
 */
export interface InstallJobHandle {
  readonly packageId: string;
  readonly done: Promise<InstallJob>;
  snapshot(): InstallJob;
  /** Replays the current state, then every transition; returns an unsubscribe function. */
  subscribe(listener: InstallListener): () => void;
  cancel(): void;
}

/**
 * Content moved into place but not yet committed to the record store.
 *
 * @property backup - Previous install renamed aside, kept until the record is written.
 */
interface PromotedInstall {
  readonly installPath: string;
  readonly backup?: string;
}

function toStoreError(error: unknown): StoreError {
  return error instanceof StoreError ? error : new IOError(describeError(error), error);
}

function isInside(parent: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(candidate));
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

function suffix(): string {
  return randomBytes(4).toString("hex");
}

class TrackedJob {
  readonly controller = new AbortController();
  private state: InstallJob;
  private readonly listeners = new Set<InstallListener>();

  constructor(packageId: string, targetPath: string) {
    this.state = { packageId, targetPath, progressBytes: 0, totalBytes: 0, status: "queued" };
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  snapshot(): InstallJob {
    return this.state;
  }

  isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this.state.status);
  }

  subscribe(listener: InstallListener): () => void {
    this.listeners.add(listener);
    this.notify(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  update(patch: Partial<Omit<InstallJob, "packageId">>): void {
    if (this.isTerminal()) {
      return;
    }
    const previous = this.state.status;
    this.state = { ...this.state, ...patch };
    if (patch.status && patch.status !== previous) {
      debug(`Job ${this.state.packageId}: ${previous} -> ${patch.status}`);
    }
    for (const listener of this.listeners) {
      this.notify(listener);
    }
  }

  /**
   * Throw if cancellation was requested; called between chunks and around each extracted file.
   */
  checkpoint(): void {
    if (this.signal.aborted) {
      throw new CancellationError(`Install of ${this.state.packageId} canceled`);
    }
  }

  private notify(listener: InstallListener): void {
    try {
      listener(this.state);
    } catch (error) {
      logError(`Progress listener failed for ${this.state.packageId}: ${describeError(error)}`);
    }
  }
}

/**
 * Installs and uninstalls packages on a device, one active operation per package id.
 */
export class InstallWorker {
  private readonly client: ReleaseResolver;
  private readonly attempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly tempDir: string;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly createStore: (device: DevicePath) => InstalledRecordStore;
  private readonly stores = new Map<string, InstalledRecordStore>();
  private readonly active = new Map<string, TrackedJob | "uninstall">();

  constructor(options: InstallWorkerOptions) {
    this.client = options.client;
    this.attempts = Math.max(1, options.attempts ?? NET.DOWNLOAD_ATTEMPTS);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? NET.RETRY_BASE_DELAY_MS;
    this.tempDir = options.tempDir ?? os.tmpdir();
    this.limit = pLimit(Math.max(1, options.concurrency ?? NET.CONCURRENCY));
    this.createStore = options.recordStore ?? (device => InstalledRecordStore.forDevice(device));
  }

  /**
   * Installed-record store for a device; one instance per KOReader directory.
   */
  records(device: DevicePath): InstalledRecordStore {
    const existing = this.stores.get(device.markerDir);
    if (existing) {
      return existing;
    }
    const store = this.createStore(device);
    this.stores.set(device.markerDir, store);
    return store;
  }

  /**
   * Snapshots of jobs that have not reached a terminal state.
   */
  activeJobs(): InstallJob[] {
    const jobs: InstallJob[] = [];
    for (const entry of this.active.values()) {
      if (entry !== "uninstall") {
        jobs.push(entry.snapshot());
      }
    }
    return jobs;
  }

  /**
   * Start installing the latest release of `packageId` onto `device`.
   *
   * @throws JobConflictError when an install or uninstall for the same id is still running.
   */
  submit(packageId: string, device: DevicePath): InstallJobHandle {
    if (this.active.has(packageId)) {
      throw new JobConflictError(packageId);
    }
    const job = new TrackedJob(packageId, device.pluginsDir);
    this.active.set(packageId, job);
    const done = this.limit(() => this.run(job, device)).then(
      () => job.snapshot(),
      (cause: unknown) => {
        job.update({ status: "failed", error: toStoreError(cause) });
        return job.snapshot();
      }
    );
    const settled = done.then(snapshot => {
      this.active.delete(packageId);
      return snapshot;
    });
    return {
      packageId,
      done: settled,
      snapshot: () => job.snapshot(),
      subscribe: listener => job.subscribe(listener),
      cancel: () => {
        if (!job.isTerminal()) {
          debug(`Cancel requested for ${packageId}.`);
          job.controller.abort();
        }
      }
    };
  }

  /**
   * Remove an installed package and its record. Removing an absent package is a no-op.
   *
   * @throws JobConflictError when another job for `packageId` is running.
   * @throws IOError when the installed files or the record cannot be removed.
   */
  async uninstall(packageId: string, device: DevicePath): Promise<void> {
    if (this.active.has(packageId)) {
      throw new JobConflictError(packageId);
    }
    this.active.set(packageId, "uninstall");
    try {
      const store = this.records(device);
      const record = await store.get(packageId);
      if (!record) {
        debug(`Uninstall of ${packageId}: nothing installed.`);
        return;
      }
      await this.removeInstallPath(record, device);
      await store.remove(packageId);
      info(`Uninstalled ${packageId} from ${record.installPath}.`);
    } finally {
      this.active.delete(packageId);
    }
  }

  private async run(job: TrackedJob, device: DevicePath): Promise<void> {
    let workDir: string | undefined;
    try {
      job.checkpoint();
      if (!device.isValid) {
        throw new InvalidDeviceError("WrongLayout", device.rootPath);
      }
      const resolved = await this.client.getReleaseAsset(job.snapshot().packageId);
      if (!resolved.ok) {
        throw resolved.error;
      }
      if (resolved.warning) {
        warn(`Installing from cached metadata: ${resolved.warning.message}`);
      }
      const metadata = resolved.value;
      const parentDir = metadata.kind === "plugin" ? device.pluginsDir : device.patchesDir;
      job.update({ totalBytes: metadata.assetSize, version: metadata.latestVersion, targetPath: parentDir });
      job.checkpoint();

      workDir = await fs.mkdtemp(path.join(this.tempDir, "koreader-store-"));
      const assetPath = path.join(workDir, safeSegment(metadata.assetName, "asset"));
      job.update({ status: "downloading" });
      await this.download(job, metadata, assetPath);

      job.update({ status: "verifying" });
      await this.verify(metadata, assetPath);
      job.checkpoint();

      job.update({ status: "extracting" });
      const promoted = await this.extract(job, metadata, assetPath, parentDir);
      try {
        await this.record(device, metadata, promoted.installPath);
      } catch (cause) {
        await this.restore(promoted);
        throw cause;
      }
      if (promoted.backup) {
        await this.cleanup(promoted.backup);
      }
      job.update({ status: "completed", targetPath: promoted.installPath });
      info(`Installed ${metadata.id} ${metadata.latestVersion} at ${promoted.installPath}.`);
    } catch (cause) {
      if (cause instanceof CancellationError || job.signal.aborted) {
        job.update({
          status: "canceled",
          error: cause instanceof CancellationError ? cause : new CancellationError()
        });
        info(`Install of ${job.snapshot().packageId} canceled.`);
      } else {
        const failure = toStoreError(cause);
        job.update({ status: "failed", error: failure });
        logError(`Install of ${job.snapshot().packageId} failed: ${failure.message}`);
      }
    } finally {
      if (workDir) {
        await this.cleanup(workDir);
      }
    }
  }

  /**
   * @throws FetchError once retries are exhausted on a network or HTTP failure.
   */
  private async download(job: TrackedJob, metadata: PackageMetadata, assetPath: string): Promise<void> {
    try {
      await this.downloadWithRetry(job, metadata, assetPath);
    } catch (cause) {
      if (isAxiosError(cause)) {
        throw new FetchError(`Download of ${metadata.id} failed: ${describeError(cause)}`, cause);
      }
      throw cause;
    }
    job.checkpoint();
  }

  private async downloadWithRetry(job: TrackedJob, metadata: PackageMetadata, assetPath: string): Promise<void> {
    await executeWithRetry(
      async attempt => {
        if (attempt > 0) {
          job.update({ progressBytes: 0 });
        }
        job.checkpoint();
        await downloadToFile(metadata.downloadUrl, assetPath, {
          signal: job.signal,
          onProgress: bytes => job.update({ progressBytes: bytes })
        });
      },
      { attempts: this.attempts, baseDelayMs: this.retryBaseDelayMs, signal: job.signal }
    );
  }

  private async verify(metadata: PackageMetadata, assetPath: string): Promise<void> {
    const { size } = await fs.stat(assetPath);
    if (size !== metadata.assetSize) {
      throw new IntegrityError("size", String(metadata.assetSize), String(size));
    }
    const expected = parseSha256Digest(metadata.checksum);
    if (expected) {
      const actual = await sha256File(assetPath);
      if (actual !== expected) {
        throw new IntegrityError("checksum", expected, actual);
      }
    }
  }

  /**
   * Stage the asset beside its destination, then rename it into place.
   */
  private async extract(job: TrackedJob, metadata: PackageMetadata, assetPath: string, parentDir: string): Promise<PromotedInstall> {
    const id = safeSegment(metadata.id, "package");
    const stagingDir = path.join(parentDir, `.staging-${id}-${suffix()}`);
    await fs.ensureDir(stagingDir);
    try {
      let source: string;
      let destinationName: string;
      if (isArchive(metadata.assetName)) {
        const { rootDir } = await extractZip(assetPath, stagingDir, () => job.checkpoint());
        source = rootDir ? path.join(stagingDir, rootDir) : stagingDir;
        if (metadata.kind === "plugin") {
          destinationName = rootDir?.endsWith(".koplugin") ? rootDir : `${id}.koplugin`;
        } else {
          destinationName = rootDir ?? id;
        }
      } else {
        destinationName = safeSegment(metadata.assetName, id);
        source = path.join(stagingDir, destinationName);
        job.checkpoint();
        await fs.copy(assetPath, source);
      }
      job.checkpoint();
      const installPath = path.join(parentDir, destinationName);
      return { installPath, backup: await this.promote(source, installPath) };
    } catch (cause) {
      throw cause instanceof StoreError ? cause : new IOError(`Extraction of ${metadata.id} failed: ${describeError(cause)}`, cause);
    } finally {
      await this.cleanup(stagingDir);
    }
  }

  /**
   * Swap staged content into `installPath`, restoring the previous install if the rename fails.
   *
   * @returns Where the previous install was moved, if there was one.
   */
  private async promote(source: string, installPath: string): Promise<string | undefined> {
    const backup = (await fs.pathExists(installPath)) ? `${installPath}.old-${suffix()}` : undefined;
    if (backup) {
      await fs.rename(installPath, backup);
    }
    try {
      await fs.rename(source, installPath);
    } catch (cause) {
      if (backup) {
        await fs.rename(backup, installPath);
      }
      throw cause;
    }
    return backup;
  }

  /**
   * Undo a promotion whose record could not be written.
   */
  private async restore(promoted: PromotedInstall): Promise<void> {
    try {
      await fs.remove(promoted.installPath);
      if (promoted.backup) {
        await fs.rename(promoted.backup, promoted.installPath);
      }
    } catch (cause) {
      logError(`Could not restore previous install at ${promoted.installPath}: ${describeError(cause)}`);
    }
  }

  private async record(device: DevicePath, metadata: PackageMetadata, installPath: string): Promise<void> {
    const store = this.records(device);
    const previous = await store.get(metadata.id);
    const record: InstalledRecord = {
      packageId: metadata.id,
      kind: metadata.kind,
      installedVersion: metadata.latestVersion,
      installPath,
      installedAt: new Date().toISOString()
    };
    await store.upsert(record);
    if (previous && previous.installPath !== installPath) {
      debug(`Removing previous install location ${previous.installPath}.`);
      try {
        await this.removeInstallPath(previous, device);
      } catch (cause) {
        warn(`Previous install of ${metadata.id} left in place: ${describeError(cause)}`);
      }
    }
  }

  private async removeInstallPath(record: InstalledRecord, device: DevicePath): Promise<void> {
    if (!isInside(device.pluginsDir, record.installPath) && !isInside(device.patchesDir, record.installPath)) {
      throw new IOError(`Refusing to remove ${record.installPath}: outside the device plugin and patch directories`);
    }
    try {
      await fs.remove(record.installPath);
    } catch (cause) {
      throw new IOError(`Failed to remove ${record.installPath}: ${describeError(cause)}`, cause);
    }
  }

  private async cleanup(target: string): Promise<void> {
    try {
      await fs.remove(target);
    } catch (cause) {
      warn(`Could not remove temporary path ${target}: ${describeError(cause)}`);
    }
  }
}
