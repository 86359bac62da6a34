// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: Command actions take their collaborators as arguments so they run without process-wide side effects.

import { Command, InvalidArgumentError } from "commander";
import { RepositoryClient } from "./api.js";
import { DeviceLocator } from "./device.js";
import { FavoritesStore } from "./favorites.js";
import {
  PACKAGE_CATEGORIES,
  PACKAGE_SORTS,
  filterPackages,
  type FilterContext,
  type PackageCategory,
  type PackageSort,
  type PackageStatus
} from "./filters.js";
import { InstallWorker, type InstallJobHandle } from "./installer.js";
import { debug, error as logError, info, setLogLevel, warn } from "./logger.js";
import { PACKAGE_KINDS, type DevicePath, type InstallJob, type PackageKind, type PackageMetadata, type Result } from "./types.js";
import { findOutdated } from "./updates.js";

export interface CliContext {
  readonly client: RepositoryClient;
  readonly locator: DeviceLocator;
  readonly worker: InstallWorker;
  readonly favorites: FavoritesStore;
}

export interface DeviceOption {
  readonly device?: string;
}

export interface ListOptions extends DeviceOption {
  readonly refresh?: boolean;
  readonly search?: string;
  readonly category?: PackageCategory;
  readonly sort?: PackageSort;
  readonly favorites?: boolean;
  readonly installed?: boolean;
  readonly notInstalled?: boolean;
  readonly updates?: boolean;
}

export function createContext(): CliContext {
  const client = new RepositoryClient();
  return {
    client,
    locator: new DeviceLocator(),
    worker: new InstallWorker({ client }),
    favorites: new FavoritesStore()
  };
}

function choiceParser<T extends string>(choices: readonly T[]): (value: string) => T {
  return value => {
    const choice = choices.find(candidate => candidate === value.toLowerCase());
    if (!choice) {
      throw new InvalidArgumentError(`Expected one of: ${choices.join(", ")}`);
    }
    return choice;
  };
}

const parseKind = choiceParser(PACKAGE_KINDS);

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  if (result.warning) {
    warn(result.warning.message);
  }
  return result.value;
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  const kib = bytes / 1024;
  return kib < 1024 ? `${kib.toFixed(1)} KiB` : `${(kib / 1024).toFixed(1)} MiB`;
}

/**
 * Use the manual path when given, otherwise the single usable detected device.
 *
 * @throws Error when detection finds no usable device or more than one.
 */
export async function resolveDevice(locator: DeviceLocator, manualPath?: string): Promise<DevicePath> {
  if (manualPath) {
    const validated = await locator.validate(manualPath);
    if (!validated.ok) {
      throw validated.error;
    }
    return validated.value;
  }
  const usable = (await locator.detect()).filter(candidate => candidate.isValid);
  if (usable.length === 0) {
    throw new Error("No KOReader device detected. Connect the device or pass --device <path>.");
  }
  if (usable.length > 1) {
    throw new Error(`Several KOReader devices found (${usable.map(item => item.markerDir).join(", ")}); pass --device <path>.`);
  }
  const validated = await locator.validate(usable[0].rootPath);
  if (!validated.ok) {
    throw validated.error;
  }
  return validated.value;
}

/**
 * Log status transitions at INFO and download progress at DEBUG.
 */
export function reportProgress(handle: InstallJobHandle): () => void {
  let lastStatus: InstallJob["status"] | undefined;
  return handle.subscribe(job => {
    if (job.status !== lastStatus) {
      lastStatus = job.status;
      info(`${job.packageId}: ${job.status}${job.error ? ` (${job.error.message})` : ""}`);
      return;
    }
    if (job.status === "downloading" && job.totalBytes > 0) {
      debug(`${job.packageId}: ${formatBytes(job.progressBytes)} / ${formatBytes(job.totalBytes)}`);
    }
  });
}

/**
 * Submit installs and wait for every job; Ctrl+C cancels all of them.
 *
 * @returns Terminal job states, in submission order.
 */
export async function installAction(ids: readonly string[], options: DeviceOption, context: CliContext): Promise<InstallJob[]> {
  const device = await resolveDevice(context.locator, options.device);
  const handles: InstallJobHandle[] = [];
  for (const id of ids) {
    try {
      const handle = context.worker.submit(id, device);
      reportProgress(handle);
      handles.push(handle);
    } catch (cause) {
      logError(cause instanceof Error ? cause.message : String(cause));
      process.exitCode = 1;
    }
  }
  const cancelAll = () => {
    warn("Interrupted, canceling installs.");
    handles.forEach(handle => handle.cancel());
  };
  process.once("SIGINT", cancelAll);
  try {
    const results = await Promise.all(handles.map(handle => handle.done));
    if (results.some(job => job.status !== "completed")) {
      process.exitCode = 1;
    }
    return results;
  } finally {
    process.removeListener("SIGINT", cancelAll);
  }
}

export async function uninstallAction(ids: readonly string[], options: DeviceOption, context: CliContext): Promise<void> {
  const device = await resolveDevice(context.locator, options.device);
  for (const id of ids) {
    await context.worker.uninstall(id, device);
  }
}

function statusOf(options: ListOptions): PackageStatus {
  if (options.favorites) {
    return "favorites";
  }
  if (options.installed) {
    return "installed";
  }
  if (options.notInstalled) {
    return "not-installed";
  }
  return options.updates ? "updates" : "all";
}

/**
 * Print the packages of `kind` matching the filter options.
 *
 * The device is only resolved when an install status filter is set.
 */
export async function listAction(kind: PackageKind, options: ListOptions, context: CliContext): Promise<PackageMetadata[]> {
  const listed = unwrap(await context.client.listPackages(kind, { forceRefresh: options.refresh }));
  const status = statusOf(options);
  const favorites = new Set(await context.favorites.list());
  let installed: FilterContext["installed"];
  if (status === "installed" || status === "not-installed" || status === "updates") {
    const device = await resolveDevice(context.locator, options.device);
    const records = await context.worker.records(device).list();
    installed = new Map(records.map(record => [record.packageId, record.installedVersion] as const));
  }
  const packages = filterPackages(
    listed,
    { search: options.search, category: options.category, status, sort: options.sort },
    { favorites, installed }
  );
  console.table(
    packages.map(item => ({
      id: item.id,
      version: item.latestVersion,
      size: formatBytes(item.assetSize),
      published: item.publishedAt.slice(0, 10),
      stars: item.stars ?? "",
      favorite: favorites.has(item.id) ? "yes" : "",
      repository: item.repository
    }))
  );
  info(`${packages.length} of ${listed.length} ${kind} package(s).`);
  return packages;
}

export async function favoriteAction(change: "add" | "remove", ids: readonly string[], context: CliContext): Promise<void> {
  for (const id of ids) {
    const changed = change === "add" ? await context.favorites.add(id) : await context.favorites.remove(id);
    if (changed) {
      info(`${change === "add" ? "Added" : "Removed"} favorite ${id}.`);
    } else {
      info(`${id} ${change === "add" ? "is already" : "is not"} a favorite.`);
    }
  }
}

export async function installedAction(options: DeviceOption, context: CliContext): Promise<void> {
  const device = await resolveDevice(context.locator, options.device);
  const records = await context.worker.records(device).list();
  console.table(records.map(record => ({ id: record.packageId, kind: record.kind, version: record.installedVersion, path: record.installPath })));
}

async function listOutdated(device: DevicePath, context: CliContext) {
  const records = await context.worker.records(device).list();
  const packages: PackageMetadata[] = [];
  for (const kind of PACKAGE_KINDS) {
    packages.push(...unwrap(await context.client.listPackages(kind)));
  }
  return findOutdated(records, packages);
}

export async function outdatedAction(options: DeviceOption, context: CliContext): Promise<void> {
  const device = await resolveDevice(context.locator, options.device);
  const outdated = await listOutdated(device, context);
  if (outdated.length === 0) {
    info("All installed packages are up to date.");
    return;
  }
  console.table(outdated.map(({ record, latest }) => ({ id: record.packageId, installed: record.installedVersion, latest: latest.latestVersion })));
}

/**
 * Install the latest release of every outdated package, or of the given ids only.
 */
export async function updateAction(ids: readonly string[], options: DeviceOption, context: CliContext): Promise<void> {
  const device = await resolveDevice(context.locator, options.device);
  const wanted = new Set(ids);
  const targets = (await listOutdated(device, context))
    .map(item => item.record.packageId)
    .filter(id => wanted.size === 0 || wanted.has(id));
  if (targets.length === 0) {
    info("Nothing to update.");
    return;
  }
  await installAction(targets, { device: device.rootPath }, context);
}

export async function devicesAction(context: CliContext): Promise<DevicePath[]> {
  const devices = await context.locator.detect();
  if (devices.length === 0) {
    info("No KOReader device detected; pass --device <path> to other commands.");
    return devices;
  }
  const rows = await Promise.all(
    devices.map(async device => {
      const details = await context.locator.info(device);
      return {
        root: device.rootPath,
        koreader: device.markerDir,
        version: details.version,
        usable: device.isValid,
        plugins: details.pluginsExist,
        patches: details.patchesExist
      };
    })
  );
  console.table(rows);
  return devices;
}

/**
 * Construct commander program with configured commands.
 *
 * @param context - Collaborators, created on first use when omitted.
 */
export function buildProgram(context?: CliContext): Command {
  let shared = context;
  const ctx = (): CliContext => {
    if (!shared) {
      shared = createContext();
    }
    return shared;
  };
  const program = new Command();
  program
    .name("koreader-store")
    .description("Install KOReader plugins and patches from GitHub releases")
    .version("1.0.0")
    .option("--log-level <level>", "debug, info, warn or error")
    .hook("preAction", command => {
      const level: unknown = command.opts().logLevel;
      if (typeof level === "string") {
        setLogLevel(level);
      }
    });

  program
    .command("list")
    .description("List available packages")
    .argument("<kind>", "plugin or patch", parseKind)
    .option("-r, --refresh", "ignore fresh cache entries")
    .option("-s, --search <text>", "match names and descriptions")
    .option("--category <category>", PACKAGE_CATEGORIES.join(", "), choiceParser(PACKAGE_CATEGORIES))
    .option("--sort <key>", PACKAGE_SORTS.join(", "), choiceParser(PACKAGE_SORTS))
    .option("--favorites", "only favorites")
    .option("--installed", "only packages installed on the device")
    .option("--not-installed", "only packages missing from the device")
    .option("--updates", "only installed packages with a newer release")
    .option("-d, --device <path>", "KOReader directory or device root")
    .action(async (kind: PackageKind, options: ListOptions) => {
      await listAction(kind, options, ctx());
    });
  program
    .command("install")
    .description("Install packages by id")
    .argument("<ids...>")
    .option("-d, --device <path>", "KOReader directory or device root")
    .action(async (ids: string[], options: DeviceOption) => {
      await installAction(ids, options, ctx());
    });
  program
    .command("uninstall")
    .description("Remove installed packages")
    .argument("<ids...>")
    .option("-d, --device <path>", "KOReader directory or device root")
    .action(async (ids: string[], options: DeviceOption) => uninstallAction(ids, options, ctx()));
  program
    .command("installed")
    .description("Show packages installed on the device")
    .option("-d, --device <path>", "KOReader directory or device root")
    .action(async (options: DeviceOption) => installedAction(options, ctx()));
  program
    .command("outdated")
    .description("Show installed packages with a newer release")
    .option("-d, --device <path>", "KOReader directory or device root")
    .action(async (options: DeviceOption) => outdatedAction(options, ctx()));
  program
    .command("update")
    .description("Update outdated packages")
    .argument("[ids...]")
    .option("-d, --device <path>", "KOReader directory or device root")
    .action(async (ids: string[], options: DeviceOption) => updateAction(ids, options, ctx()));
  program
    .command("devices")
    .description("Detect connected KOReader devices")
    .action(async () => {
      await devicesAction(ctx());
    });

  const favoriteCommand = program.command("favorite").description("Manage favorite packages");
  favoriteCommand
    .command("add")
    .description("Mark packages as favorites")
    .argument("<ids...>")
    .action(async (ids: string[]) => favoriteAction("add", ids, ctx()));
  favoriteCommand
    .command("remove")
    .description("Unmark favorite packages")
    .argument("<ids...>")
    .action(async (ids: string[]) => favoriteAction("remove", ids, ctx()));
  favoriteCommand
    .command("list")
    .description("Show favorite package ids")
    .action(async () => {
      const ids = await ctx().favorites.list();
      ids.forEach(id => console.log(id));
      info(`${ids.length} favorite(s).`);
    });

  const cacheCommand = program.command("cache").description("Metadata cache operations");
  cacheCommand
    .command("info")
    .description("Display cache statistics")
    .action(async () => {
      console.log(await ctx().client.cacheInfo());
    });
  cacheCommand
    .command("clear")
    .description("Remove all cached metadata")
    .action(async () => ctx().client.clearCache());

  return program;
}

/**
 * Execute CLI with provided argv array.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (cause) {
    logError(`CLI failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    process.exitCode = 1;
  }
}
