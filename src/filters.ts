// CHANGE: Narrow and order package listings by text, category, install status and sort key.
// WHY: Listings come from the cache unfiltered; views apply these criteria on top without refetching.

import type { PackageMetadata } from "./types.js";
import { isNewer } from "./version.js";

export const PACKAGE_CATEGORIES = ["all", "top-rated", "recent"] as const;
export const PACKAGE_STATUSES = ["all", "favorites", "installed", "not-installed", "updates"] as const;
export const PACKAGE_SORTS = ["stars", "updated", "name"] as const;

export type PackageCategory = (typeof PACKAGE_CATEGORIES)[number];
export type PackageStatus = (typeof PACKAGE_STATUSES)[number];
export type PackageSort = (typeof PACKAGE_SORTS)[number];

export const TOP_RATED_STARS = 50;
export const RECENT_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PackageFilter {
  /** Case-insensitive substring of the name or description. */
  readonly search?: string;
  readonly category?: PackageCategory;
  readonly status?: PackageStatus;
  /** Listing order is kept when omitted. */
  readonly sort?: PackageSort;
}

/**
 * Facts about the user's setup that status filters depend on.
 *
 * @property installed - Installed version by package id.
 */
export interface FilterContext {
  readonly favorites?: ReadonlySet<string>;
  readonly installed?: ReadonlyMap<string, string>;
  readonly now?: Date;
}

function matchesSearch(item: PackageMetadata, query: string): boolean {
  return query.length === 0 || item.name.toLowerCase().includes(query) || item.description.toLowerCase().includes(query);
}

function matchesCategory(item: PackageMetadata, category: PackageCategory, now: Date): boolean {
  switch (category) {
    case "all":
      return true;
    case "top-rated":
      return (item.stars ?? 0) >= TOP_RATED_STARS;
    case "recent": {
      const published = Date.parse(item.publishedAt);
      if (Number.isNaN(published)) {
        return false;
      }
      return Math.floor((now.getTime() - published) / DAY_MS) <= RECENT_DAYS;
    }
  }
}

function matchesStatus(item: PackageMetadata, status: PackageStatus, context: FilterContext): boolean {
  const installedVersion = context.installed?.get(item.id);
  switch (status) {
    case "all":
      return true;
    case "favorites":
      return context.favorites?.has(item.id) ?? false;
    case "installed":
      return installedVersion !== undefined;
    case "not-installed":
      return installedVersion === undefined;
    case "updates":
      return installedVersion !== undefined && isNewer(item.latestVersion, installedVersion);
  }
}

function comparator(sort: PackageSort): (a: PackageMetadata, b: PackageMetadata) => number {
  switch (sort) {
    case "stars":
      return (a, b) => (b.stars ?? 0) - (a.stars ?? 0);
    case "updated":
      return (a, b) => (a.publishedAt < b.publishedAt ? 1 : a.publishedAt > b.publishedAt ? -1 : 0);
    case "name":
      return (a, b) => {
        const left = a.name.toLowerCase();
        const right = b.name.toLowerCase();
        return left < right ? -1 : left > right ? 1 : 0;
      };
  }
}

/**
 * Apply `filter` to `packages` and return a new array; ties keep listing order.
 */
export function filterPackages(
  packages: readonly PackageMetadata[],
  filter: PackageFilter,
  context: FilterContext = {}
): PackageMetadata[] {
  const query = (filter.search ?? "").trim().toLowerCase();
  const now = context.now ?? new Date();
  const matched = packages.filter(
    item =>
      matchesSearch(item, query) &&
      matchesCategory(item, filter.category ?? "all", now) &&
      matchesStatus(item, filter.status ?? "all", context)
  );
  return filter.sort ? matched.sort(comparator(filter.sort)) : matched;
}
