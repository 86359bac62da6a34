// CHANGE: Share atomic JSON persistence between the metadata cache and installed-record store.
// WHY: A crash mid-write must leave either the previous file or the new one on disk.

import { randomBytes } from "crypto";
import fs from "fs-extra";
import path from "path";
import { describeError } from "../errors.js";
import { debug, info } from "../logger.js";
import type { JsonRecord } from "../types.js";

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a JSON object from disk.
 *
 * @returns Parsed object, or undefined when the file is absent, unreadable or not an object.
 */
export async function readJsonObject(filePath: string): Promise<JsonRecord | undefined> {
  if (!(await fs.pathExists(filePath))) {
    debug(`${filePath} absent, starting empty.`);
    return undefined;
  }
  try {
    const parsed: unknown = await fs.readJson(filePath);
    if (!isRecord(parsed)) {
      info(`${filePath} does not hold a JSON object, reinitialising.`);
      return undefined;
    }
    return parsed;
  } catch (error) {
    info(`${filePath} read failed (${describeError(error)}), reinitialising.`);
    return undefined;
  }
}

/**
 * Persist state atomically by writing to a temporary sibling before rename.
 */
export async function writeJsonAtomic(filePath: string, payload: object): Promise<void> {
  await fs.ensureDir(path.dirname(path.resolve(filePath)));
  const tempPath = `${filePath}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await fs.writeJson(tempPath, payload, { spaces: 2 });
    await fs.move(tempPath, filePath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath);
    throw error;
  }
}
