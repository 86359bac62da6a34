// CHANGE: Define strongly typed domain models for the acquisition and installation pipeline.
// WHY: Remote JSON is narrowed into these shapes at the boundary; nothing downstream handles raw payloads.

import type { StoreError } from "./errors.js";

/**
 * Parsed JSON object whose fields have not been narrowed yet.
 */
export type JsonRecord = { readonly [key: string]: unknown };

export type PackageKind = "plugin" | "patch";

export const PACKAGE_KINDS: readonly PackageKind[] = ["plugin", "patch"];

/**
 * One installable unit resolved from a repository's latest release.
 *
 * @property id - Stable slug derived from the repository name.
 * @property description - Raw markdown, rendered by the caller if at all.
 * @property latestVersion - Release tag as published.
 * @property assetSize - Size in bytes reported for the release asset.
 * @property publishedAt - ISO timestamp of the release.
 * @property checksum - `sha256:<hex>` digest when the API reports one.
 *
 * Invariant: records are replaced whole on refetch, never merged.
 */
export interface PackageMetadata {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly latestVersion: string;
  readonly downloadUrl: string;
  readonly assetName: string;
  readonly assetSize: number;
  readonly publishedAt: string;
  readonly kind: PackageKind;
  readonly repository: string;
  readonly htmlUrl?: string;
  readonly stars?: number;
  readonly checksum?: string;
}

/**
 * Persisted fact that a package version is installed on a device.
 *
 * Invariant: `installPath` is absolute and lies under the device's plugins or patches directory.
 */
export interface InstalledRecord {
  readonly packageId: string;
  readonly kind: PackageKind;
  readonly installedVersion: string;
  readonly installPath: string;
  readonly installedAt: string;
}

/**
 * Time-stamped cached payload.
 *
 * @property fetchedAt - Epoch milliseconds of the successful fetch.
 * @property ttl - Lifetime in milliseconds.
 */
export interface CacheEntry<T> {
  readonly payload: T;
  readonly fetchedAt: number;
  readonly ttl: number;
}

/**
 * Validated location of a KOReader installation.
 *
 * @property rootPath - Path detected or supplied by the user.
 * @property markerDir - Directory holding `koreader.sh` or `settings.reader.lua`.
 */
export interface DevicePath {
  readonly rootPath: string;
  readonly markerDir: string;
  readonly pluginsDir: string;
  readonly patchesDir: string;
  readonly isValid: boolean;
}

/**
 * What the host can tell about a KOReader installation.
 *
 * @property version - Contents of `git-rev`, or `Unknown` when absent or unreadable.
 */
export interface DeviceInfo {
  readonly markerDir: string;
  readonly platform: NodeJS.Platform;
  readonly version: string;
  readonly valid: boolean;
  readonly pluginsExist: boolean;
  readonly patchesExist: boolean;
}

export type InstallStatus =
  | "queued"
  | "downloading"
  | "verifying"
  | "extracting"
  | "completed"
  | "failed"
  | "canceled";

export const TERMINAL_STATUSES: ReadonlySet<InstallStatus> = new Set<InstallStatus>(["completed", "failed", "canceled"]);

/**
 * Snapshot of one in-flight install.
 *
 * @property targetPath - Final install location once known, otherwise the kind's directory.
 * @property totalBytes - Expected asset size, zero until metadata is resolved.
 */
export interface InstallJob {
  readonly packageId: string;
  readonly targetPath: string;
  readonly progressBytes: number;
  readonly totalBytes: number;
  readonly status: InstallStatus;
  readonly version?: string;
  readonly error?: StoreError;
}

/**
 * Outcome of an operation that reports failure as a value.
 *
 * `warning` is set when the value was served in a degraded way.
 */
export type Result<T, E extends StoreError = StoreError> =
  | { readonly ok: true; readonly value: T; readonly warning?: StoreError }
  | { readonly ok: false; readonly error: E };

/**
 * Installed package with a newer release available.
 */
export interface OutdatedPackage {
  readonly record: InstalledRecord;
  readonly latest: PackageMetadata;
}
