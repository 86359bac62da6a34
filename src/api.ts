// CHANGE: Implement GitHub-facing package discovery and release resolution behind the metadata cache.
// WHY: Fresh cache entries avoid network calls; failed refreshes fall back to stale data before erroring.

import { isAxiosError } from "axios";
import { MetadataCache, type CacheStats } from "./cache.js";
import { CACHE, GITHUB } from "./config.js";
import { FetchError, StaleDataWarning, describeError } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import { PACKAGE_KINDS, type PackageKind, type PackageMetadata, type Result } from "./types.js";
import { authHeaders, getJson } from "./utils/http.js";
import { isRecord } from "./utils/json-file.js";
import { packageId } from "./utils/package-id.js";

export interface RepositoryClientOptions {
  readonly cache?: MetadataCache;
  readonly token?: string;
  readonly apiBase?: string;
  readonly maxPages?: number;
  /** Lifetime of release lookups and of listings that skipped failed repositories. */
  readonly shortTtlMs?: number;
}

export interface FetchOptions {
  /** Skip a fresh cache entry; a stale fallback is still served if the refresh fails. */
  readonly forceRefresh?: boolean;
}

/**
 * Repository fields carried over from the search listing.
 */
export interface RepositoryInfo {
  readonly name: string;
  readonly fullName: string;
  readonly description: string;
  readonly htmlUrl?: string;
  readonly stars?: number;
}

interface Fetched<T> {
  readonly value: T;
  /** Overrides the cache's default lifetime for this entry. */
  readonly ttl?: number;
}

interface ReleaseAsset {
  readonly name: string;
  readonly url: string;
  readonly size: number;
  readonly digest?: string;
}

const ASSET_PREFERENCE: Record<PackageKind, RegExp> = {
  plugin: /\.zip$/i,
  patch: /\.lua$/i
};

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function isPackageKind(value: unknown): value is PackageKind {
  return typeof value === "string" && PACKAGE_KINDS.some(kind => kind === value);
}

/**
 * Extract the `rel="next"` target from a GitHub `Link` header.
 */
export function parseNextLink(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part.trim());
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Narrow one item of a repository search response.
 */
export function toRepositoryInfo(raw: unknown): RepositoryInfo | undefined {
  if (!isRecord(raw) || typeof raw.name !== "string" || typeof raw.full_name !== "string") {
    return undefined;
  }
  return {
    name: raw.name,
    fullName: raw.full_name,
    description: typeof raw.description === "string" ? raw.description : "",
    htmlUrl: optionalString(raw.html_url),
    stars: typeof raw.stargazers_count === "number" ? raw.stargazers_count : undefined
  };
}

function toAsset(raw: unknown): ReleaseAsset | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const name = optionalString(raw.name);
  const url = optionalString(raw.browser_download_url);
  const size = raw.size;
  if (!name || !url || typeof size !== "number" || !Number.isInteger(size) || size < 0) {
    return undefined;
  }
  return { name, url, size, digest: optionalString(raw.digest) };
}

function pickAsset(assets: readonly ReleaseAsset[], kind: PackageKind): ReleaseAsset | undefined {
  return assets.find(asset => ASSET_PREFERENCE[kind].test(asset.name)) ?? assets[0];
}

/**
 * Combine a repository with its latest release into package metadata.
 *
 * @returns undefined when the release has no tag, no timestamp or no downloadable asset.
 */
export function toPackageFromRelease(raw: unknown, repository: RepositoryInfo, kind: PackageKind): PackageMetadata | undefined {
  if (!isRecord(raw) || raw.draft === true) {
    return undefined;
  }
  const tag = optionalString(raw.tag_name);
  const publishedAt = optionalString(raw.published_at) ?? optionalString(raw.created_at);
  const assets = Array.isArray(raw.assets) ? raw.assets.map(toAsset).filter((asset): asset is ReleaseAsset => asset !== undefined) : [];
  const asset = pickAsset(assets, kind);
  if (!tag || !publishedAt || !asset) {
    return undefined;
  }
  return {
    id: packageId(repository.name),
    name: repository.name,
    description: repository.description,
    latestVersion: tag,
    downloadUrl: asset.url,
    assetName: asset.name,
    assetSize: asset.size,
    publishedAt,
    kind,
    repository: repository.fullName,
    htmlUrl: repository.htmlUrl,
    stars: repository.stars,
    checksum: asset.digest
  };
}

/**
 * Narrow cached package metadata, rejecting records with missing fields.
 */
export function toPackageMetadata(raw: unknown): PackageMetadata | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const { id, name, description, latestVersion, downloadUrl, assetName, assetSize, publishedAt, kind, repository } = raw;
  if (
    typeof id !== "string" ||
    typeof name !== "string" ||
    typeof description !== "string" ||
    typeof latestVersion !== "string" ||
    typeof downloadUrl !== "string" ||
    typeof assetName !== "string" ||
    typeof assetSize !== "number" ||
    typeof publishedAt !== "string" ||
    !isPackageKind(kind) ||
    typeof repository !== "string"
  ) {
    return undefined;
  }
  return {
    id,
    name,
    description,
    latestVersion,
    downloadUrl,
    assetName,
    assetSize,
    publishedAt,
    kind,
    repository,
    htmlUrl: optionalString(raw.htmlUrl),
    stars: typeof raw.stars === "number" ? raw.stars : undefined,
    checksum: optionalString(raw.checksum)
  };
}

export function toPackageList(raw: unknown): PackageMetadata[] | undefined {
  if (!Array.isArray(raw)) {
    return undefined;
  }
  const packages: PackageMetadata[] = [];
  for (const item of raw) {
    const parsed = toPackageMetadata(item);
    if (!parsed) {
      return undefined;
    }
    packages.push(parsed);
  }
  return packages;
}

/**
 * Collapse duplicate ids; the last record wins while keeping the first position.
 */
export function dedupeById(packages: readonly PackageMetadata[]): PackageMetadata[] {
  const byId = new Map<string, PackageMetadata>();
  for (const item of packages) {
    byId.set(item.id, item);
  }
  return Array.from(byId.values());
}

function isNotFound(error: unknown): boolean {
  return isAxiosError(error) && error.response?.status === 404;
}

/**
 * Client for package listings and release assets hosted on GitHub.
 */
export class RepositoryClient {
  readonly cache: MetadataCache;
  private readonly token: string;
  private readonly apiBase: string;
  private readonly maxPages: number;
  private readonly shortTtlMs: number;

  constructor(options: RepositoryClientOptions = {}) {
    this.cache = options.cache ?? new MetadataCache();
    this.token = options.token ?? GITHUB.TOKEN;
    this.apiBase = (options.apiBase ?? GITHUB.API_BASE).replace(/\/+$/, "");
    this.maxPages = options.maxPages ?? GITHUB.MAX_PAGES;
    this.shortTtlMs = options.shortTtlMs ?? CACHE.SHORT_TTL_MS;
    if (!this.token) {
      debug("No GitHub token configured; using unauthenticated rate limits.");
    }
  }

  /**
   * List packages of one kind, newest listing from cache or GitHub.
   */
  listPackages(kind: PackageKind, options: FetchOptions = {}): Promise<Result<PackageMetadata[]>> {
    return this.cached(`packages:${kind}`, toPackageList, () => this.fetchPackages(kind), options);
  }

  /**
   * Re-resolve the latest release of a listed package.
   */
  async getReleaseAsset(id: string, options: FetchOptions = {}): Promise<Result<PackageMetadata>> {
    const located = await this.locate(id);
    if (!located.ok) {
      return located;
    }
    const listed = located.value;
    const repository: RepositoryInfo = {
      name: listed.name,
      fullName: listed.repository,
      description: listed.description,
      htmlUrl: listed.htmlUrl,
      stars: listed.stars
    };
    const result = await this.cached(
      `release:${id}`,
      toPackageMetadata,
      async () => {
        const release = await this.fetchRelease(repository, listed.kind);
        if (!release) {
          throw new FetchError(`No release asset published for ${listed.repository}`);
        }
        return { value: release, ttl: this.shortTtlMs };
      },
      options
    );
    if (!result.ok) {
      return result;
    }
    return { ...result, warning: result.warning ?? located.warning };
  }

  cacheInfo(): Promise<CacheStats> {
    return this.cache.stats();
  }

  async clearCache(): Promise<void> {
    await this.cache.clear();
    info("Metadata cache cleared.");
  }

  private async locate(id: string): Promise<Result<PackageMetadata>> {
    let lastFailure: FetchError | undefined;
    for (const kind of PACKAGE_KINDS) {
      const listing = await this.listPackages(kind);
      if (!listing.ok) {
        lastFailure = listing.error instanceof FetchError ? listing.error : new FetchError(listing.error.message, listing.error);
        continue;
      }
      const found = listing.value.find(item => item.id === id);
      if (found) {
        return { ok: true, value: found, warning: listing.warning };
      }
    }
    return { ok: false, error: lastFailure ?? new FetchError(`Unknown package: ${id}`) };
  }

  private async cached<T>(
    key: string,
    parse: (payload: unknown) => T | undefined,
    fetcher: () => Promise<Fetched<T>>,
    options: FetchOptions
  ): Promise<Result<T>> {
    const lookup = await this.cache.get(key, parse);
    if (lookup?.fresh && !options.forceRefresh) {
      debug(`Cache hit for ${key}.`);
      return { ok: true, value: lookup.entry.payload };
    }
    let fetched: Fetched<T>;
    try {
      fetched = await fetcher();
    } catch (error) {
      if (lookup) {
        const warning = new StaleDataWarning(key, lookup.entry.fetchedAt, error);
        warn(`${warning.message} (${describeError(error)})`);
        return { ok: true, value: lookup.entry.payload, warning };
      }
      return { ok: false, error: new FetchError(`Failed to fetch ${key}: ${describeError(error)}`, error) };
    }
    try {
      await this.cache.set(key, fetched.value, fetched.ttl);
    } catch (error) {
      debug(`Cache write for ${key} failed: ${describeError(error)}`);
    }
    return { ok: true, value: fetched.value };
  }

  private async fetchRepositories(kind: PackageKind): Promise<RepositoryInfo[]> {
    const repositories: RepositoryInfo[] = [];
    const topic = encodeURIComponent(`topic:${GITHUB.TOPICS[kind]}`);
    let url: string | undefined = `${this.apiBase}/search/repositories?q=${topic}&per_page=${GITHUB.PER_PAGE}`;
    let page = 0;
    while (url && page < this.maxPages) {
      const response: { readonly data: unknown; readonly headers: Record<string, string> } = await getJson<unknown>(
        url,
        authHeaders(this.token)
      );
      if (!isRecord(response.data) || !Array.isArray(response.data.items)) {
        throw new FetchError(`Malformed search response: ${url}`);
      }
      for (const item of response.data.items) {
        const repository = toRepositoryInfo(item);
        if (repository) {
          repositories.push(repository);
        } else {
          debug(`Skipping malformed repository entry on ${url}.`);
        }
      }
      page += 1;
      url = parseNextLink(response.headers.link);
    }
    debug(`Found ${repositories.length} ${kind} repositories in ${page} page(s).`);
    return repositories;
  }

  private async fetchRelease(repository: RepositoryInfo, kind: PackageKind): Promise<PackageMetadata | undefined> {
    const url = `${this.apiBase}/repos/${repository.fullName}/releases/latest`;
    try {
      const response = await getJson<unknown>(url, authHeaders(this.token));
      return toPackageFromRelease(response.data, repository, kind);
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Resolve the latest release of every repository carrying the kind's topic.
   *
   * Repositories whose release lookup fails are skipped and the listing is cached with the short lifetime.
   * The listing fails only when the search fails or every lookup does.
   */
  private async fetchPackages(kind: PackageKind): Promise<Fetched<PackageMetadata[]>> {
    const repositories = await this.fetchRepositories(kind);
    const settled = await Promise.allSettled(repositories.map(repository => this.fetchRelease(repository, kind)));
    const packages: PackageMetadata[] = [];
    const failures: unknown[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        failures.push(outcome.reason);
        warn(`Release lookup for ${repositories[index].fullName} failed: ${describeError(outcome.reason)}`);
      } else if (outcome.value) {
        packages.push(outcome.value);
      }
    });
    if (failures.length > 0 && failures.length === repositories.length) {
      throw failures[0];
    }
    const skipped = repositories.length - failures.length - packages.length;
    if (skipped > 0) {
      debug(`Skipped ${skipped} ${kind} repositories without a usable release asset.`);
    }
    const unique = dedupeById(packages);
    info(`Fetched ${unique.length} ${kind} packages from GitHub.`);
    return failures.length > 0 ? { value: unique, ttl: this.shortTtlMs } : { value: unique };
  }
}
