// CHANGE: Introduce the error taxonomy shared by client, locator and installer.
// WHY: Callers branch on `code`; every failure path resolves to one of these classes.

export type StoreErrorCode =
  | "FETCH_ERROR"
  | "STALE_DATA"
  | "INVALID_DEVICE"
  | "INTEGRITY_ERROR"
  | "JOB_CONFLICT"
  | "CANCELED"
  | "IO_ERROR";

/**
 * Base class for every error raised or returned by the store core.
 */
export abstract class StoreError extends Error {
  abstract readonly code: StoreErrorCode;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network or API failure with no usable cached data.
 */
export class FetchError extends StoreError {
  readonly code = "FETCH_ERROR" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/**
 * Non-fatal: cached data was served past its TTL because the refresh failed.
 */
export class StaleDataWarning extends StoreError {
  readonly code = "STALE_DATA" as const;

  constructor(
    readonly key: string,
    readonly fetchedAt: number,
    cause?: unknown
  ) {
    super(`Serving stale data for ${key} fetched at ${new Date(fetchedAt).toISOString()}`, { cause });
  }
}

export type InvalidDeviceReason = "NotFound" | "NotWritable" | "WrongLayout";

export class InvalidDeviceError extends StoreError {
  readonly code = "INVALID_DEVICE" as const;

  constructor(
    readonly reason: InvalidDeviceReason,
    readonly path: string,
    cause?: unknown
  ) {
    super(`Invalid device at ${path}: ${reason}`, { cause });
  }
}

/**
 * Downloaded asset does not match the size or checksum advertised by the release.
 */
export class IntegrityError extends StoreError {
  readonly code = "INTEGRITY_ERROR" as const;

  constructor(
    readonly check: "size" | "checksum",
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Integrity check failed (${check}): expected ${expected}, got ${actual}`);
  }
}

export class JobConflictError extends StoreError {
  readonly code = "JOB_CONFLICT" as const;

  constructor(readonly packageId: string) {
    super(`A job for ${packageId} is already in progress`);
  }
}

export class CancellationError extends StoreError {
  readonly code = "CANCELED" as const;

  constructor(message = "Operation canceled") {
    super(message);
  }
}

/**
 * Generic filesystem failure during extraction, record persistence or uninstall.
 */
export class IOError extends StoreError {
  readonly code = "IO_ERROR" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
