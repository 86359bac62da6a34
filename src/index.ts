#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner and expose the library surface.
// WHY: Importing the package must not trigger command parsing.

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { RepositoryClient, type FetchOptions, type RepositoryClientOptions } from "./api.js";
export { MetadataCache, type CacheLookup, type CacheStats } from "./cache.js";
export { DeviceLocator, type DeviceLocatorOptions } from "./device.js";
export * from "./errors.js";
export { FavoritesStore, type FavoritesStoreOptions } from "./favorites.js";
export {
  PACKAGE_CATEGORIES,
  PACKAGE_SORTS,
  PACKAGE_STATUSES,
  filterPackages,
  type FilterContext,
  type PackageCategory,
  type PackageFilter,
  type PackageSort,
  type PackageStatus
} from "./filters.js";
export { InstallWorker, type InstallJobHandle, type InstallListener, type InstallWorkerOptions } from "./installer.js";
export { InstalledRecordStore } from "./records.js";
export type * from "./types.js";
export { PACKAGE_KINDS, TERMINAL_STATUSES } from "./types.js";
export { findOutdated } from "./updates.js";
export { compare, isNewer, parseVersion, sortByVersion, type Ordering } from "./version.js";
