export { retry, backoffDelay } from './retry';
export type { RetryPolicy, RetryDecision, RetryOptions } from './retry';
export { IntervalRateLimiter, NoopRateLimiter } from './rateLimiter';
export type { RateLimiter, Sleep } from './rateLimiter';
export { TimerManager, timerManager } from './timerManager';
