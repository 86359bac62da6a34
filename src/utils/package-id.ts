// CHANGE: Provide canonical package id derivation shared across modules.
// WHY: Listings, cache keys and installed records must agree on one slug per repository.

import sanitize from "sanitize-filename";

const PLUGIN_SUFFIX = /\.koplugin$/i;

/**
 * Compute stable package id from a repository name.
 *
 * @param repositoryName - Repository name without owner, e.g. `calibre-sync.koplugin`.
 * @returns Lower-cased slug without the `.koplugin` suffix.
 */
export function packageId(repositoryName: string): string {
  return repositoryName.trim().toLowerCase().replace(PLUGIN_SUFFIX, "");
}

/**
 * Make a remote-supplied name safe to use as a single path segment.
 *
 * @returns Sanitized name, or `fallback` when nothing usable remains.
 */
export function safeSegment(name: string, fallback: string): string {
  const cleaned = sanitize(name).trim();
  return cleaned === "" || cleaned === "." || cleaned === ".." ? fallback : cleaned;
}
