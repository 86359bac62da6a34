// CHANGE: Compare release tags under a relaxed semantic-version grammar.
// WHY: Update checks run on vendor-supplied tags and must never throw on malformed input.

export type Ordering = "less" | "equal" | "greater";

/** Numeric core components are numbers; others such as `x` or `r2` stay strings. */
type CoreComponent = number | string;

interface ParsedVersion {
  readonly core: readonly CoreComponent[];
  readonly prerelease: readonly string[];
}

const VERSION_PATTERN = /^[vV]?(\d+(?:\.[0-9A-Za-z]+)*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;
const NUMERIC = /^\d+$/;

/**
 * Parse a version string, returning null when it does not match the grammar.
 *
 * The first core component must be numeric; later ones may be alphanumeric, as in `1.x` or `2024.05.r2`.
 */
export function parseVersion(raw: string): ParsedVersion | null {
  const match = VERSION_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }
  const [, core, prerelease] = match;
  return {
    core: core.split(".").map(part => (NUMERIC.test(part) ? Number.parseInt(part, 10) : part)),
    prerelease: prerelease ? prerelease.split(".") : []
  };
}

function sign(value: number): Ordering {
  if (value < 0) {
    return "less";
  }
  return value > 0 ? "greater" : "equal";
}

function lexical(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function compareIdentifiers(a: string, b: string): number {
  if (NUMERIC.test(a) && NUMERIC.test(b)) {
    return Number.parseInt(a, 10) - Number.parseInt(b, 10);
  }
  return lexical(a, b);
}

function compareCore(a: CoreComponent, b: CoreComponent): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  return lexical(String(a), String(b));
}

function compareParsed(a: ParsedVersion, b: ParsedVersion): number {
  const length = Math.max(a.core.length, b.core.length);
  for (let index = 0; index < length; index += 1) {
    const delta = compareCore(a.core[index] ?? 0, b.core[index] ?? 0);
    if (delta !== 0) {
      return delta;
    }
  }
  if (a.prerelease.length === 0 || b.prerelease.length === 0) {
    // A release orders after any of its pre-releases.
    return b.prerelease.length - a.prerelease.length;
  }
  const shared = Math.min(a.prerelease.length, b.prerelease.length);
  for (let index = 0; index < shared; index += 1) {
    const delta = compareIdentifiers(a.prerelease[index], b.prerelease[index]);
    if (delta !== 0) {
      return delta;
    }
  }
  return a.prerelease.length - b.prerelease.length;
}

/**
 * Order two version strings.
 *
 * Malformed strings are equal to one another and less than any well-formed version.
 */
export function compare(a: string, b: string): Ordering {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (!left || !right) {
    if (left) {
      return "greater";
    }
    return right ? "less" : "equal";
  }
  return sign(compareParsed(left, right));
}

/**
 * Whether `remote` should replace `installed`.
 *
 * An unparseable installed version counts as outdated against any well-formed remote.
 */
export function isNewer(remote: string, installed: string): boolean {
  return compare(remote, installed) === "greater";
}

/**
 * Sort items newest first by the version picked from each.
 */
export function sortByVersion<T>(items: readonly T[], pick: (item: T) => string): T[] {
  return [...items].sort((a, b) => {
    const ordering = compare(pick(b), pick(a));
    if (ordering === "equal") {
      return 0;
    }
    return ordering === "less" ? -1 : 1;
  });
}
