// CHANGE: Centralise configuration source with environment validation.
// WHY: Network limits, cache lifetime and device layout must agree across client, locator and installer.

import * as dotenv from "dotenv";

dotenv.config();

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * GitHub endpoints and discovery topics.
 *
 * Invariant: `TOKEN` may be empty; requests are then sent unauthenticated.
 */
export const GITHUB = {
  API_BASE: (process.env.KOSTORE_GITHUB_API ?? "https://api.github.com").replace(/\/+$/, ""),
  TOKEN: process.env.KOSTORE_GITHUB_TOKEN ?? process.env.GITHUB_TOKEN ?? "",
  TOPICS: {
    plugin: "koreader-plugin",
    patch: "koreader-user-patch"
  },
  PER_PAGE: 100,
  // Search API never serves more than 1000 results.
  MAX_PAGES: 10
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `CONCURRENCY` and `DOWNLOAD_ATTEMPTS` must be positive.
 */
export const NET = {
  TIMEOUT: positiveInt(process.env.HTTP_TIMEOUT, 30000),
  CONCURRENCY: positiveInt(process.env.KOSTORE_CONCURRENCY, 4),
  DOWNLOAD_ATTEMPTS: positiveInt(process.env.KOSTORE_DOWNLOAD_ATTEMPTS, 3),
  RETRY_BASE_DELAY_MS: 500
} as const;

/**
 * Metadata cache settings.
 */
export const CACHE = {
  PATH: process.env.KOSTORE_CACHE_PATH ?? "koreader-store-cache.json",
  VERSION: 1,
  TTL_MS: 4 * 7 * 24 * 60 * 60 * 1000,
  // Release lookups and listings missing some repositories are refetched sooner.
  SHORT_TTL_MS: 60 * 60 * 1000,
  FAVORITES_PATH: process.env.KOSTORE_FAVORITES_PATH ?? "koreader-store-favorites.json"
} as const;

/**
 * Expected on-device layout of a KOReader installation.
 */
export const DEVICE = {
  MARKER_DIR: "koreader",
  MARKER_FILES: ["koreader.sh", "settings.reader.lua"],
  SEARCH_LOCATIONS: [".adds", "extensions", "documents", ".kobo", "applications", ""],
  PLUGINS_DIR: "plugins",
  PATCHES_DIR: "patches",
  VERSION_FILE: "git-rev",
  RECORDS_FILE: "koreader-store.json",
  RECORDS_VERSION: 1
} as const;
