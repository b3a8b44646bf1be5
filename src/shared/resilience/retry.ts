/**
 * Timeout and bounded exponential backoff around calls that leave the process
 * (embedding model, chat model, vector database).
 */

import { Logger } from '@nestjs/common';
import { RagError, toError } from '../errors/rag-error';

export class OperationTimeoutError extends RagError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', true);
    this.name = 'OperationTimeoutError';
  }
}

export interface RetryOptions {
  /** Used in log lines and timeout messages */
  operation: string;
  maxAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
  logger: Logger;
  /** Defaults to retrying everything */
  isRetryable?: (error: Error) => boolean;
}

/**
 * Run `task` with a deadline. The signal is aborted when the deadline passes,
 * so clients that accept one can drop the underlying request.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new OperationTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Attempt `task` up to `maxAttempts` times, doubling the delay after each
 * failure (retryDelayMs, 2x, 4x, ...). The last error is rethrown as is.
 */
export async function withRetry<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.maxAttempts));
  let lastError = new Error(`${options.operation} was never attempted`);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await withTimeout(task, options.timeoutMs, options.operation);
    } catch (error) {
      lastError = toError(error);

      const retryable = options.isRetryable
        ? options.isRetryable(lastError)
        : true;

      if (!retryable || attempt === attempts) {
        options.logger.error(
          `${options.operation} failed on attempt ${attempt}/${attempts}: ${lastError.message}`,
        );
        break;
      }

      const delay = options.retryDelayMs * Math.pow(2, attempt - 1);
      options.logger.warn(
        `${options.operation} failed (attempt ${attempt}/${attempts}), retrying in ${delay}ms: ${lastError.message}`,
      );
      await sleep(delay);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
