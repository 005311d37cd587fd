/**
 * Bulkhead Pattern
 * Limit concurrent executions to prevent resource exhaustion
 */

import { BulkheadOptions, BulkheadStats } from '../types';

export class BulkheadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BulkheadError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class Bulkhead {
  private currentConcurrent = 0;
  private readonly queue: Array<() => void> = [];

  private readonly maxConcurrent: number;
  private readonly maxQueue: number;
  private readonly onCapacity?: () => void;

  constructor(options: BulkheadOptions) {
    this.maxConcurrent = Math.max(1, options.maxConcurrent);
    this.maxQueue = options.maxQueue || 0;
    this.onCapacity = options.onCapacity;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.currentConcurrent < this.maxConcurrent) {
      return this.executeImmediately(fn);
    }

    if (this.queue.length >= this.maxQueue) {
      this.onCapacity?.();
      throw new BulkheadError(
        `Bulkhead at capacity: ${this.currentConcurrent} concurrent, ${this.queue.length} queued`
      );
    }

    return this.queueExecution(fn);
  }

  private async executeImmediately<T>(fn: () => Promise<T>): Promise<T> {
    this.currentConcurrent++;

    try {
      return await fn();
    } finally {
      this.currentConcurrent--;
      this.processQueue();
    }
  }

  private queueExecution<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.executeImmediately(fn).then(resolve, reject);
      });
    });
  }

  private processQueue(): void {
    if (this.currentConcurrent >= this.maxConcurrent) return;

    const start = this.queue.shift();
    start?.();
  }

  getStats(): BulkheadStats {
    return {
      currentConcurrent: this.currentConcurrent,
      queueLength: this.queue.length,
      maxConcurrent: this.maxConcurrent,
      maxQueue: this.maxQueue,
      utilization: (this.currentConcurrent / this.maxConcurrent) * 100,
    };
  }
}
