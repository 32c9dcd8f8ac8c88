/**
 * Base error for the watcher. `code` is a short machine-readable identifier
 * that ends up in log lines.
 */
export class KernelWatchError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The kernel listing could not be fetched or read. Skips the cycle. */
export class FetchError extends KernelWatchError {
  public readonly competition: string;
  public readonly status?: number;

  constructor(
    message: string,
    competition: string,
    status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, "FETCH_FAILED", options);
    this.competition = competition;
    this.status = status;
  }
}

/** The notification channel rejected the message or could not be reached. */
export class DeliveryError extends KernelWatchError {
  public readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, "DELIVERY_FAILED", options);
    this.status = status;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof KernelWatchError) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
