/**
 * @speech-relay/resilience: circuit breaker, rate limiter, retry and deadlines.
 */

export {
  CircuitBreaker,
  BreakerSet,
  type CircuitState,
  type ProviderStatus,
  type ProviderHealth,
  type Clock,
  type FailureKind,
  type StateChangeListener,
  type CircuitBreakerOptions,
  type BreakerPass,
} from "./circuit-breaker.js";

export {
  TokenBucketLimiter,
  KeyedRateLimiter,
  type Lease,
  type LimiterStats,
} from "./rate-limiter.js";

export { withRetry, classifyError, sleep, type RetryOptions } from "./retry.js";

export { withDeadline, type DeadlineOptions } from "./deadline.js";
