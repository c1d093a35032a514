export class BucketSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BucketSyncError";
  }
}

/** Unusable flag, glob, duration or config file. Raised before any listing. */
export class ConfigurationError extends BucketSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Enumeration failed after its retries; no plan may be built from it. */
export class ListingError extends BucketSyncError {
  constructor(
    message: string,
    public readonly scope: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ListingError";
  }
}

/** A single request or part upload failed after its retries. */
export class TransferError extends BucketSyncError {
  constructor(
    message: string,
    public readonly key: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransferError";
  }
}

export class WatchCycleError extends BucketSyncError {
  constructor(
    message: string,
    public readonly cycle: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WatchCycleError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
