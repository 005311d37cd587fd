/**
 * Fallback Chain Pattern
 * Try alternatives in order until one succeeds
 */

import { FallbackAttempt, FallbackChainOptions, FallbackResult, FallbackStrategy } from '../types';
import { withTimeout } from './timeout';

export class FallbackExhaustedError extends Error {
  constructor(public readonly attempts: FallbackAttempt[]) {
    super(
      attempts.length === 0
        ? 'Fallback chain has no strategies'
        : `All ${attempts.length} strategies failed: ${attempts.map((a) => a.strategy).join(', ')}`
    );
    this.name = 'FallbackExhaustedError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class FallbackChain<I, O> {
  private readonly strategies: ReadonlyArray<FallbackStrategy<I, O>>;
  private readonly options: FallbackChainOptions;

  constructor(strategies: ReadonlyArray<FallbackStrategy<I, O>>, options: FallbackChainOptions = {}) {
    this.strategies = strategies;
    this.options = options;
  }

  /**
   * Run strategies in order. Each one is tried only after the previous one
   * rejected; the first value wins.
   */
  async execute(input: I): Promise<FallbackResult<O>> {
    const attempts: FallbackAttempt[] = [];

    for (let index = 0; index < this.strategies.length; index++) {
      const strategy = this.strategies[index];
      const startedAt = Date.now();

      try {
        const value = await this.runStrategy(strategy, input);
        return { value, strategy: strategy.name, index, attempts };
      } catch (error) {
        const attempt: FallbackAttempt = {
          strategy: strategy.name,
          error,
          durationMs: Date.now() - startedAt,
        };
        attempts.push(attempt);
        this.options.onFailure?.(attempt, this.strategies[index + 1]?.name);
      }
    }

    throw new FallbackExhaustedError(attempts);
  }

  private runStrategy(strategy: FallbackStrategy<I, O>, input: I): Promise<O> {
    const timeout = strategy.timeout ?? this.options.timeout;
    if (timeout === undefined || timeout <= 0) {
      return strategy.run(input);
    }
    return withTimeout(() => strategy.run(input), { timeout });
  }
}
