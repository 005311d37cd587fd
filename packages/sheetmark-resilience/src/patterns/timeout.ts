/**
 * Timeout Pattern
 * Execute operations with time limits
 */

import { TimeoutOptions } from '../types';

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Race `fn` against a timer. The timer is cleared once `fn` settles so no
 * handle outlives the call.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeout, onTimeout } = options;
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(`Operation timed out after ${timeout}ms`, timeout));
    }, timeout);
  });

  try {
    return await Promise.race([fn(), expiry]);
  } finally {
    clearTimeout(timer);
  }
}
