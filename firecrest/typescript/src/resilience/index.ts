export {
  SERVICE_CATEGORIES,
  isServiceCategory,
  type ServiceCategory,
  type TimeBetweenCalls,
  type RateLimiterConfig,
  type RateLimitHook,
} from './types.js';
export {
  RateLimiter,
  createDefaultRateLimiterConfig,
  DEFAULT_TIME_BETWEEN_CALLS_MS,
} from './rate-limiter.js';
