/**
 * Base error for every failure the pipeline raises on purpose.
 * `retryable` marks transient faults (timeouts, connectivity).
 */
export class RagError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'RagError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
