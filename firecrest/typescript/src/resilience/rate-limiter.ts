/**
 * Per-category call spacing
 */

import { ConfigurationError } from '../errors/categories.js';
import {
  SERVICE_CATEGORIES,
  type RateLimiterConfig,
  type RateLimitHook,
  type ServiceCategory,
  type TimeBetweenCalls,
} from './types.js';

export const DEFAULT_TIME_BETWEEN_CALLS_MS = 5000;

/**
 * Enforces a minimum interval between the issue times of consecutive calls
 * in the same service category.
 *
 * A caller reserves its slot synchronously when it enters `wait`, so callers
 * that wait concurrently are released in arrival order, one interval apart.
 * The reservation stands even if the caller is aborted while sleeping: the
 * recorded timestamp is the call's issue time, not its completion time.
 */
export class RateLimiter {
  private readonly intervals: TimeBetweenCalls;
  private readonly lastIssue = new Map<ServiceCategory, number>();
  private readonly notBefore = new Map<ServiceCategory, number>();
  private hooks: RateLimitHook[] = [];

  constructor(config: RateLimiterConfig = createDefaultRateLimiterConfig()) {
    const base = config.defaultIntervalMs;
    assertInterval('default', base);
    this.intervals = {
      compute: base,
      reservations: base,
      status: base,
      storage: base,
      tasks: base,
      utilities: base,
    };
    this.configure(config.intervals ?? {});
  }

  addHook(hook: RateLimitHook): void {
    this.hooks.push(hook);
  }

  /**
   * Waits until a call in `category` may be issued and returns its issue time (epoch ms)
   */
  async wait(category: ServiceCategory, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();

    const now = Date.now();
    const previous = this.lastIssue.get(category);
    let issueAt = previous === undefined ? now : Math.max(now, previous + this.intervals[category]);
    issueAt = Math.max(issueAt, this.notBefore.get(category) ?? 0);
    this.lastIssue.set(category, issueAt);

    const waitMs = issueAt - now;
    if (waitMs > 0) {
      this.hooks.forEach(hook => hook.onThrottled(category, waitMs));
      await sleep(waitMs, signal);
    }

    return issueAt;
  }

  /**
   * Keeps every call in `category` from being issued before `timestampMs`.
   * Used when the server signals that the category is over its quota.
   */
  deferUntil(category: ServiceCategory, timestampMs: number): void {
    const current = this.notBefore.get(category) ?? 0;
    if (timestampMs > current) {
      this.notBefore.set(category, timestampMs);
    }
  }

  /**
   * Changes the interval of one category; takes effect on the next `wait`
   */
  setTimeBetweenCalls(category: ServiceCategory, intervalMs: number): void {
    assertInterval(category, intervalMs);
    this.intervals[category] = intervalMs;
  }

  configure(intervals: Partial<TimeBetweenCalls>): void {
    for (const category of SERVICE_CATEGORIES) {
      const interval = intervals[category];
      if (interval !== undefined) {
        this.setTimeBetweenCalls(category, interval);
      }
    }
  }

  getTimeBetweenCalls(): Readonly<TimeBetweenCalls> {
    return { ...this.intervals };
  }

  /**
   * Issue time of the last reserved call in `category`, if any
   */
  getLastIssue(category: ServiceCategory): number | undefined {
    return this.lastIssue.get(category);
  }

  reset(): void {
    this.lastIssue.clear();
    this.notBefore.clear();
  }
}

export function createDefaultRateLimiterConfig(): RateLimiterConfig {
  return {
    defaultIntervalMs: DEFAULT_TIME_BETWEEN_CALLS_MS,
  };
}

function assertInterval(category: string, intervalMs: number): void {
  if (!Number.isFinite(intervalMs) || intervalMs < 0) {
    throw new ConfigurationError(
      `Time between calls for '${category}' must be a non-negative number of milliseconds`,
      { category, intervalMs }
    );
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
