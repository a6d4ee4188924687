/**
 * Signal Digest — Error Types
 */

/**
 * Non-2xx response from an outbound HTTP call.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpError';
  }
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Raised when the operation was cancelled by the caller's signal.
 */
export class CancelledError extends Error {
  constructor() {
    super('Operation cancelled');
    this.name = 'CancelledError';
  }
}

/**
 * Record store failure. The only error the pipeline lets escape a batch.
 */
export class StoreError extends Error {
  constructor(
    message: string,
    readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(code ? `${message} (code: ${code})` : message, options);
    this.name = 'StoreError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
