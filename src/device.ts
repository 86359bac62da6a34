// CHANGE: Locate KOReader installations on mounted volumes and validate manual paths.
// WHY: The device path is threaded explicitly into every install, so detection only proposes candidates.

import fs from "fs-extra";
import os from "os";
import path from "path";
import { DEVICE } from "./config.js";
import { InvalidDeviceError, describeError, type InvalidDeviceReason } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import type { DeviceInfo, DevicePath, Result } from "./types.js";

export interface DeviceLocatorOptions {
  readonly platform?: NodeJS.Platform;
  readonly homeDir?: string;
  /** Replaces the platform's mount point enumeration. */
  readonly listRoots?: () => Promise<string[]>;
}

const WINDOWS_DRIVES = "DEFGHIJKLMNOPQRSTUVWXYZ".split("");
const DENIED_CODES = new Set(["EACCES", "EPERM", "EROFS"]);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

async function isWritable(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

async function childDirectories(parent: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(parent, { withFileTypes: true });
    return entries.filter(entry => entry.isDirectory()).map(entry => path.join(parent, entry.name));
  } catch {
    return [];
  }
}

/**
 * Whether `dir` holds a KOReader launcher or reader settings file.
 */
export async function hasMarker(dir: string): Promise<boolean> {
  if (!(await isDirectory(dir))) {
    return false;
  }
  for (const marker of DEVICE.MARKER_FILES) {
    if (await fs.pathExists(path.join(dir, marker))) {
      return true;
    }
  }
  return false;
}

/**
 * Find the KOReader directory at `root` itself or at one of the usual vendor locations below it.
 */
export async function findMarkerDir(root: string): Promise<string | undefined> {
  const candidates = [root, ...DEVICE.SEARCH_LOCATIONS.map(location => path.join(root, location, DEVICE.MARKER_DIR))];
  for (const candidate of candidates) {
    if (await hasMarker(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

const UNKNOWN_VERSION = "Unknown";

async function readVersion(markerDir: string): Promise<string> {
  const versionFile = path.join(markerDir, DEVICE.VERSION_FILE);
  if (!(await fs.pathExists(versionFile))) {
    return UNKNOWN_VERSION;
  }
  try {
    return (await fs.readFile(versionFile, "utf8")).trim() || UNKNOWN_VERSION;
  } catch (error) {
    warn(`Could not read ${versionFile}: ${describeError(error)}`);
    return UNKNOWN_VERSION;
  }
}

function layoutFor(rootPath: string, markerDir: string, isValid: boolean): DevicePath {
  return {
    rootPath,
    markerDir,
    pluginsDir: path.join(markerDir, DEVICE.PLUGINS_DIR),
    patchesDir: path.join(markerDir, DEVICE.PATCHES_DIR),
    isValid
  };
}

function invalid(reason: InvalidDeviceReason, at: string, cause?: unknown): Result<DevicePath, InvalidDeviceError> {
  return { ok: false, error: new InvalidDeviceError(reason, at, cause) };
}

/**
 * Finds KOReader installations on mounted volumes.
 */
export class DeviceLocator {
  private readonly platform: NodeJS.Platform;
  private readonly homeDir: string;
  private readonly listRoots: () => Promise<string[]>;

  constructor(options: DeviceLocatorOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.homeDir = options.homeDir ?? os.homedir();
    this.listRoots = options.listRoots ?? (() => this.platformRoots());
  }

  /**
   * Enumerate plausible device roots for the host platform. Missing mount points are skipped.
   */
  async platformRoots(): Promise<string[]> {
    const home = path.join(this.homeDir, DEVICE.MARKER_DIR);
    switch (this.platform) {
      case "win32": {
        const drives = WINDOWS_DRIVES.map(letter => `${letter}:\\`);
        const present: string[] = [];
        for (const drive of drives) {
          if (await isDirectory(drive)) {
            present.push(drive);
          }
        }
        return [...present, home, "C:/koreader", "C:/Program Files/koreader", "C:/Program Files (x86)/koreader"];
      }
      case "darwin":
        return [...(await childDirectories("/Volumes")), home, "/Applications/koreader"];
      default: {
        const userMounts: string[] = [];
        for (const base of ["/media", "/run/media"]) {
          for (const userDir of await childDirectories(base)) {
            userMounts.push(...(await childDirectories(userDir)));
          }
        }
        return [...userMounts, ...(await childDirectories("/mnt")), home, "/opt/koreader"];
      }
    }
  }

  /**
   * Return every root holding a KOReader directory. Never fails; an empty list means nothing was found.
   */
  async detect(): Promise<DevicePath[]> {
    let roots: string[];
    try {
      roots = await this.listRoots();
    } catch (error) {
      debug(`Mount point enumeration failed: ${describeError(error)}`);
      roots = [];
    }
    const found = new Map<string, DevicePath>();
    for (const root of roots) {
      const markerDir = await findMarkerDir(root);
      if (!markerDir || found.has(markerDir)) {
        continue;
      }
      found.set(markerDir, layoutFor(root, markerDir, await this.layoutUsable(markerDir)));
    }
    info(`Detected ${found.size} KOReader device(s).`);
    return Array.from(found.values());
  }

  /**
   * Check `inputPath` and create missing plugin and patch directories.
   */
  async validate(inputPath: string): Promise<Result<DevicePath, InvalidDeviceError>> {
    const rootPath = path.resolve(inputPath);
    if (!(await isDirectory(rootPath))) {
      return invalid("NotFound", rootPath);
    }
    const markerDir = await findMarkerDir(rootPath);
    if (!markerDir) {
      return invalid("WrongLayout", rootPath);
    }
    if (!(await isWritable(markerDir))) {
      return invalid("NotWritable", markerDir);
    }
    const device = layoutFor(rootPath, markerDir, true);
    for (const dir of [device.pluginsDir, device.patchesDir]) {
      try {
        await fs.ensureDir(dir);
      } catch (error) {
        const code = errorCode(error);
        return invalid(code && DENIED_CODES.has(code) ? "NotWritable" : "WrongLayout", dir, error);
      }
      if (!(await isWritable(dir))) {
        return invalid("NotWritable", dir);
      }
    }
    debug(`Validated KOReader device at ${markerDir}.`);
    return { ok: true, value: device };
  }

  /**
   * Describe an installation: firmware revision, host platform and which package directories exist.
   */
  async info(device: DevicePath): Promise<DeviceInfo> {
    const valid = (await hasMarker(device.markerDir)) && (await this.layoutUsable(device.markerDir));
    return {
      markerDir: device.markerDir,
      platform: this.platform,
      version: valid ? await readVersion(device.markerDir) : UNKNOWN_VERSION,
      valid,
      pluginsExist: await isDirectory(device.pluginsDir),
      patchesExist: await isDirectory(device.patchesDir)
    };
  }

  private async layoutUsable(markerDir: string): Promise<boolean> {
    if (!(await isWritable(markerDir))) {
      return false;
    }
    for (const sub of [DEVICE.PLUGINS_DIR, DEVICE.PATCHES_DIR]) {
      const dir = path.join(markerDir, sub);
      if (await fs.pathExists(dir)) {
        if (!(await isDirectory(dir)) || !(await isWritable(dir))) {
          return false;
        }
      }
    }
    return true;
  }
}
