/**
 * Error hierarchy for the price pipeline.
 *
 * Configuration and whole-table I/O errors end a run. Fetch, partition write
 * and merge validation errors are per-symbol and are collected into reports.
 */

export abstract class PriceStoreError extends Error {
  /** Error code for programmatic error handling */
  abstract readonly code: string;

  constructor(
    message: string,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Bad or missing universe lists, credentials or settings. Raised before any
 * network call is made.
 */
export class ConfigurationError extends PriceStoreError {
  readonly code: string = "CONFIGURATION_ERROR";
}

export class AuthenticationError extends ConfigurationError {
  override readonly code: string = "AUTHENTICATION_ERROR";
}

export type FetchErrorKind = "transient" | "permanent";

export type FetchErrorReason =
  | "network"
  | "rate-limited"
  | "server-error"
  | "not-found"
  | "auth"
  | "bad-request"
  | "invalid-payload";

export class FetchError extends PriceStoreError {
  readonly code: string = "FETCH_ERROR";

  constructor(
    readonly symbol: string,
    readonly kind: FetchErrorKind,
    readonly reason: FetchErrorReason,
    message: string,
    cause?: unknown
  ) {
    super(message, cause);
  }

  get retryable(): boolean {
    return this.kind === "transient";
  }
}

export class PartitionWriteError extends PriceStoreError {
  readonly code: string = "PARTITION_WRITE_ERROR";

  constructor(
    readonly symbol: string,
    message: string,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/** A partition whose file cannot be read or lacks the partition columns. */
export class MergeValidationError extends PriceStoreError {
  readonly code: string = "MERGE_VALIDATION_ERROR";

  constructor(
    readonly symbol: string,
    message: string,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/** The consolidated table cannot be read or written. Fatal for the load. */
export class MergeIOError extends PriceStoreError {
  readonly code: string = "MERGE_IO_ERROR";
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
