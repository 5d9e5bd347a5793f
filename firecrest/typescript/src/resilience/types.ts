/**
 * Rate limiting types
 */

/**
 * FirecREST microservices. The category of a request is the first segment of its path.
 */
export const SERVICE_CATEGORIES = [
  'compute',
  'reservations',
  'status',
  'storage',
  'tasks',
  'utilities',
] as const;

export type ServiceCategory = (typeof SERVICE_CATEGORIES)[number];

/**
 * Minimum milliseconds between the start of two calls, per category
 */
export type TimeBetweenCalls = Record<ServiceCategory, number>;

export interface RateLimiterConfig {
  /** Interval used for every category not listed in `intervals` */
  defaultIntervalMs: number;
  intervals?: Partial<TimeBetweenCalls>;
}

export interface RateLimitHook {
  /** Called when a caller has to wait before its call may be issued */
  onThrottled(category: ServiceCategory, waitMs: number): void;
}

export function isServiceCategory(value: string): value is ServiceCategory {
  return SERVICE_CATEGORIES.some(category => category === value);
}
