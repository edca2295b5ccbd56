/**
 * @fileoverview Time-bounded memoization of another variable
 */

import { ProxyVariable } from './proxy-variable';
import type { Variable } from './variable';
import { InvalidVariableError } from './errors';
import { Clock, isMapping, systemClock } from './types';

/**
 * Re-reads the wrapped variable only when the cached value is older than
 * the timeout.
 *
 * Not synchronized: two readers that both observe an expired cache each
 * fetch from the wrapped variable, and the later store wins. Refresh is
 * at-least-once, not exactly-once.
 */
export class CachingVariable<T = unknown> extends ProxyVariable<T> {
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private cached: { value: T } | null = null;
  private lastCached: number | null = null;

  constructor(target: Variable<T>, timeoutMs: number, clock: Clock = systemClock) {
    super(target.getName(), target);
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidVariableError(
        `Cache timeout for ${target.getName()} must be a positive number of milliseconds, got ${timeoutMs}`,
      );
    }
    this.timeoutMs = timeoutMs;
    this.clock = clock;
  }

  getTimeoutMs(): number {
    return this.timeoutMs;
  }

  isLive(): boolean {
    return false;
  }

  /** Decided from the cached value, so a fresh cache is not bypassed */
  isExpandable(): boolean {
    return this.isExpansionRequested() && isMapping(this.getValue());
  }

  /** Time of the last fetch from the wrapped variable */
  getLastUpdated(): number | null {
    return this.lastCached;
  }

  getValue(): T {
    const now = this.clock();
    let cached = this.cached;
    if (cached === null || this.lastCached === null || now - this.lastCached > this.timeoutMs) {
      cached = { value: super.getValue() };
      this.cached = cached;
      this.lastCached = now;
    }
    return cached.value;
  }
}
