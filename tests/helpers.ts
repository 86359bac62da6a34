import { AxiosError, AxiosHeaders, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import fs from "fs-extra";
import os from "os";
import path from "path";
import { DeviceLocator } from "../src/device.js";
import type { DevicePath, PackageMetadata } from "../src/types.js";

const requestConfig: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };

export function axiosResponse<T>(data: T, headers: Record<string, string> = {}, status = 200): AxiosResponse<T> {
  return { data, status, statusText: String(status), headers, config: requestConfig };
}

export function httpError(status: number, message = `HTTP ${status}`): AxiosError {
  return new AxiosError(message, "ERR_BAD_RESPONSE", requestConfig, undefined, axiosResponse(null, {}, status));
}

export function networkError(code = "ECONNRESET"): AxiosError {
  return new AxiosError("socket hang up", code, requestConfig);
}

export async function makeTempDir(prefix = "koreader-store-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Lay out a KOReader directory at `<root>/<location>/koreader` and return the validated device.
 */
export async function makeDevice(root: string, location = ".adds"): Promise<DevicePath> {
  const markerDir = path.join(root, location, "koreader");
  await fs.outputFile(path.join(markerDir, "koreader.sh"), "#!/bin/sh\n");
  const result = await new DeviceLocator().validate(root);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

export function samplePackage(overrides: Partial<PackageMetadata> = {}): PackageMetadata {
  return {
    id: "calibre-sync",
    name: "calibre-sync.koplugin",
    description: "Sync with *calibre*",
    latestVersion: "2.3.0",
    downloadUrl: "https://example.com/calibre-sync.zip",
    assetName: "calibre-sync.zip",
    assetSize: 4096,
    publishedAt: "2024-05-01T00:00:00Z",
    kind: "plugin",
    repository: "reader-dev/calibre-sync.koplugin",
    ...overrides
  };
}
