export { createRateLimiter } from './rate-limiter';
export { shouldSendFrame } from './helpers';
export type { RateLimiter, RateLimiterState } from './types';
