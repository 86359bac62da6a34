// CHANGE: Expand zip release assets entry by entry.
// WHY: Cancellation is checked around every file and no entry may land outside the staging directory.

import AdmZip from "adm-zip";
import fs from "fs-extra";
import path from "path";
import { IOError } from "../errors.js";
import { safeSegment } from "./package-id.js";

const IGNORED_PREFIXES = ["__MACOSX/"];

export interface ExtractResult {
  readonly files: number;
  /** Name of the single directory holding every entry, when the archive has one. */
  readonly rootDir?: string;
}

export function isArchive(fileName: string): boolean {
  return /\.zip$/i.test(fileName);
}

function commonRoot(names: readonly string[]): string | undefined {
  let root: string | undefined;
  for (const name of names) {
    const segments = name.split("/").filter(segment => segment !== "");
    const isNested = segments.length > 1 || name.endsWith("/");
    if (!isNested || (root !== undefined && root !== segments[0])) {
      return undefined;
    }
    root = segments[0];
  }
  return root;
}

/**
 * Extract `archivePath` into `destination`.
 *
 * @param checkpoint - Called before and after each file; throwing aborts the extraction.
 * @throws IOError for unreadable archives or entries escaping `destination`.
 */
export async function extractZip(archivePath: string, destination: string, checkpoint: () => void): Promise<ExtractResult> {
  let archive: AdmZip;
  try {
    archive = new AdmZip(archivePath);
  } catch (error) {
    throw new IOError(`Unreadable archive ${path.basename(archivePath)}`, error);
  }
  const base = path.resolve(destination);
  // Archives written on Windows may use backslashes; every lookup below uses the normalised name.
  const entries = archive
    .getEntries()
    .map(entry => ({ entry, name: entry.entryName.replace(/\\/g, "/") }))
    .filter(({ name }) => !IGNORED_PREFIXES.some(prefix => name.startsWith(prefix)));
  let files = 0;
  for (const { entry, name } of entries) {
    checkpoint();
    const target = path.resolve(base, name);
    const relative = path.relative(base, target);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new IOError(`Archive entry escapes install directory: ${name}`);
    }
    if (entry.isDirectory || name.endsWith("/")) {
      await fs.ensureDir(target);
    } else {
      await fs.outputFile(target, entry.getData());
      files += 1;
    }
    checkpoint();
  }
  const root = commonRoot(entries.map(({ name }) => name));
  // A root whose name would need sanitising is treated as plain content.
  return { files, rootDir: root !== undefined && safeSegment(root, "") === root ? root : undefined };
}
