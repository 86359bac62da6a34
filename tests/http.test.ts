// CHANGE: Confirm retry policy and streaming download helpers.
// WHY: Metadata calls must fail fast to the cache layer while downloads retry transient failures only.

import fs from "fs-extra";
import path from "path";
import { Readable } from "stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CancellationError } from "../src/errors.js";
import { authHeaders, downloadToFile, executeWithRetry, getJson, httpClient, isTransient } from "../src/utils/http.js";
import { axiosResponse, httpError, makeTempDir, networkError } from "./helpers.js";

describe("isTransient", () => {
  it("accepts dropped connections and server errors only", () => {
    expect(isTransient(networkError("ECONNRESET"))).toBe(true);
    expect(isTransient(networkError("ETIMEDOUT"))).toBe(true);
    expect(isTransient(httpError(503))).toBe(true);
    expect(isTransient(httpError(404))).toBe(false);
    expect(isTransient(new Error("plain"))).toBe(false);
  });
});

describe("executeWithRetry", () => {
  it("retries transient failures until an attempt succeeds", async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(httpError(502))
      .mockRejectedValueOnce(networkError())
      .mockResolvedValueOnce("ok");

    await expect(executeWithRetry(operation, { attempts: 3, baseDelayMs: 0 })).resolves.toBe("ok");
    expect(operation.mock.calls.map(call => call[0])).toEqual([0, 1, 2]);
  });

  it("does not retry client errors", async () => {
    const notFound = httpError(404);
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(notFound);

    await expect(executeWithRetry(operation, { attempts: 3, baseDelayMs: 0 })).rejects.toBe(notFound);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("does not retry once the signal has aborted", async () => {
    const controller = new AbortController();
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockImplementation(async () => {
      controller.abort();
      throw networkError();
    });

    await expect(executeWithRetry(operation, { attempts: 3, baseDelayMs: 10, signal: controller.signal })).rejects.toThrow(
      "socket hang up"
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("getJson", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns data with lower-cased headers and does not retry", async () => {
    const spy = vi
      .spyOn(httpClient, "get")
      .mockResolvedValueOnce(axiosResponse({ value: "ok" }, { Link: "<https://api.test/?page=2>; rel=\"next\"" }));

    const response = await getJson<{ readonly value: string }>("https://api.test/data", authHeaders("test-token"));

    expect(response).toEqual({
      data: { value: "ok" },
      headers: { link: "<https://api.test/?page=2>; rel=\"next\"" },
      status: 200
    });
    expect(spy).toHaveBeenCalledWith("https://api.test/data", { headers: { Authorization: "Bearer test-token" } });
  });

  it("propagates server errors to the caller", async () => {
    const spy = vi.spyOn(httpClient, "get").mockRejectedValueOnce(httpError(500));
    await expect(getJson("https://api.test/data")).rejects.toThrow("HTTP 500");
    expect(spy).toHaveBeenCalledTimes(1);
  });
});

describe("downloadToFile", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("streams chunks to disk and reports cumulative progress", async () => {
    const dir = await makeTempDir();
    const destination = path.join(dir, "asset.zip");
    vi.spyOn(httpClient, "get").mockResolvedValueOnce(axiosResponse(Readable.from([Buffer.from("abc"), Buffer.from("defg")])));
    const progress: number[] = [];

    const written = await downloadToFile("https://dl.test/asset.zip", destination, { onProgress: bytes => progress.push(bytes) });

    expect(written).toBe(7);
    expect(progress).toEqual([3, 7]);
    await expect(fs.readFile(destination, "utf8")).resolves.toBe("abcdefg");
    await fs.remove(dir);
  });

  it("refuses to start once canceled", async () => {
    const spy = vi.spyOn(httpClient, "get");
    const controller = new AbortController();
    controller.abort();

    await expect(downloadToFile("https://dl.test/asset.zip", "unused", { signal: controller.signal })).rejects.toBeInstanceOf(
      CancellationError
    );
    expect(spy).not.toHaveBeenCalled();
  });
});
