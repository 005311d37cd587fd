/**
 * Type definitions for @sheetmark/resilience
 */

export interface TimeoutOptions {
  /** Timeout in milliseconds */
  timeout: number;

  onTimeout?: () => void;
}

export interface BulkheadOptions {
  /** Maximum concurrent executions */
  maxConcurrent: number;

  /** Maximum queue size (default: 0, no queue) */
  maxQueue?: number;

  onCapacity?: () => void;
}

export interface BulkheadStats {
  currentConcurrent: number;
  queueLength: number;
  maxConcurrent: number;
  maxQueue: number;
  utilization: number;
}

/** One alternative in a fallback chain */
export interface FallbackStrategy<I, O> {
  name: string;
  run: (input: I) => Promise<O>;
  /** Overrides the chain-wide timeout for this strategy */
  timeout?: number;
}

export interface FallbackAttempt {
  strategy: string;
  error: unknown;
  durationMs: number;
}

export interface FallbackResult<O> {
  value: O;
  /** Name of the strategy that produced the value */
  strategy: string;
  /** Position of that strategy in the chain */
  index: number;
  /** Failures of the strategies tried before it */
  attempts: FallbackAttempt[];
}

export interface FallbackChainOptions {
  /** Per-strategy timeout in milliseconds (default: none) */
  timeout?: number;

  /** Called after a failed strategy; `next` is the strategy about to run, if any */
  onFailure?: (attempt: FallbackAttempt, next: string | undefined) => void;
}
