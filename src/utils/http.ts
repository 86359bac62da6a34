// CHANGE: Provide HTTP utilities with a shared concurrency limit and opt-in retries.
// WHY: Metadata calls fail fast to the cache layer; asset downloads retry with bounded backoff.

import axios, { isAxiosError, type AxiosResponse } from "axios";
import fs from "fs-extra";
import pLimit from "p-limit";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { GITHUB, NET } from "../config.js";
import { CancellationError, describeError } from "../errors.js";
import { debug } from "../logger.js";

export interface RetryOptions {
  readonly attempts: number;
  readonly baseDelayMs: number;
  readonly signal?: AbortSignal;
}

export interface DownloadOptions {
  readonly signal?: AbortSignal;
  readonly onProgress?: (receivedBytes: number) => void;
}

const concurrencyLimit = pLimit(Math.max(1, NET.CONCURRENCY));

const httpClient = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "koreader-store/1.0",
    Accept: "application/vnd.github+json"
  }
});

function sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    }
  }
  return out;
}

/**
 * Headers for GitHub API calls; `Authorization` only when a token is configured.
 */
export function authHeaders(token: string = GITHUB.TOKEN): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}

/**
 * Whether an error is worth another attempt: dropped connections, timeouts and 5xx responses.
 */
export function isTransient(error: unknown): boolean {
  if (!isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  const isNetworkIssue =
    error.code === "ECONNRESET" ||
    error.code === "ETIMEDOUT" ||
    error.code === "ECONNABORTED" ||
    error.code === "ECONNREFUSED" ||
    error.code === "EAI_AGAIN";
  const isRetryableStatus = typeof status === "number" && status >= 500 && status < 600;
  return isNetworkIssue || isRetryableStatus;
}

/**
 * Run an operation, retrying transient failures with exponential backoff.
 *
 * Non-transient errors and cancellation are rethrown immediately.
 */
export async function executeWithRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      const nextAttempt = attempt + 1;
      if (nextAttempt >= attempts || !isTransient(error) || options.signal?.aborted) {
        throw error;
      }
      const backoff = options.baseDelayMs * 2 ** attempt;
      debug(`HTTP retry (${nextAttempt}/${attempts}) after ${backoff}ms: ${describeError(error)}`);
      await sleep(backoff, options.signal);
    }
  }
}

/**
 * Perform GET request expecting JSON payload. No retries: callers fall back to cached data.
 */
export async function getJson<T>(
  url: string,
  headers: Record<string, string> = {}
): Promise<{ readonly data: T; readonly headers: Record<string, string>; readonly status: number }> {
  const response = await concurrencyLimit(() => httpClient.get<T>(url, { headers }));
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

/**
 * Stream a binary payload to `destination`, reporting cumulative bytes after each chunk.
 *
 * Cancellation is checked between chunks; the partially written file is left for the caller to remove.
 *
 * @returns Number of bytes written.
 */
export async function downloadToFile(url: string, destination: string, options: DownloadOptions = {}): Promise<number> {
  return concurrencyLimit(async () => {
    if (options.signal?.aborted) {
      throw new CancellationError();
    }
    const response = await httpClient.get<Readable>(url, {
      responseType: "stream",
      headers: { Accept: "application/octet-stream" },
      signal: options.signal
    });
    let received = 0;
    await pipeline(
      response.data,
      async function* (source: AsyncIterable<Buffer | string>) {
        for await (const chunk of source) {
          if (options.signal?.aborted) {
            throw new CancellationError();
          }
          const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
          received += buffer.byteLength;
          options.onProgress?.(received);
          yield buffer;
        }
      },
      fs.createWriteStream(destination)
    );
    debug(`Downloaded ${received} bytes from ${url}`);
    return received;
  });
}

export { httpClient };
