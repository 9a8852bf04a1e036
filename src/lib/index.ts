/**
 * Library core modules
 * Barrel export for lib utilities
 */

export {
	type ConfigError,
	loadTextAnalyticsConfig,
	type TextAnalyticsConfig,
} from './config.js'
export {
	DISPATCH_DEFAULTS,
	type DispatchDefaults,
	RETRY_DEFAULTS,
	type RetryDefaults,
	TEXT_ANALYTICS_LIMITS,
} from './constants.js'
export {
	createTokenBucket,
	type RateLimiterConfig,
	type RateLimiterStatus,
	type TokenBucket,
} from './rate-limiter.js'
