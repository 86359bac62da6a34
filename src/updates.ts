// CHANGE: Flag installed packages whose listed release is newer.
// WHY: Records with unparseable versions are reported as outdated rather than skipped.

import { debug } from "./logger.js";
import type { InstalledRecord, OutdatedPackage, PackageMetadata } from "./types.js";
import { isNewer } from "./version.js";

/**
 * Join installed records with listed packages by id and keep those with a newer release.
 *
 * Records for packages missing from the listing are ignored.
 */
export function findOutdated(
  records: readonly InstalledRecord[],
  packages: readonly PackageMetadata[]
): OutdatedPackage[] {
  const byId = new Map(packages.map(item => [item.id, item] as const));
  const outdated: OutdatedPackage[] = [];
  for (const record of records) {
    const latest = byId.get(record.packageId);
    if (!latest) {
      debug(`No listing for installed package ${record.packageId}.`);
      continue;
    }
    if (isNewer(latest.latestVersion, record.installedVersion)) {
      outdated.push({ record, latest });
    }
  }
  return outdated;
}
