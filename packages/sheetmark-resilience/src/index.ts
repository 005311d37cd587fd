/**
 * @sheetmark/resilience
 */

export { FallbackChain, FallbackExhaustedError } from './patterns/fallback-chain';
export { withTimeout, TimeoutError } from './patterns/timeout';
export { Bulkhead, BulkheadError } from './patterns/bulkhead';

export type {
  TimeoutOptions,
  BulkheadOptions,
  BulkheadStats,
  FallbackStrategy,
  FallbackAttempt,
  FallbackResult,
  FallbackChainOptions,
} from './types';
