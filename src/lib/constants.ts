/**
 * Dispatch constants
 * Default configuration values and service limits
 */

/**
 * Default dispatch configuration
 * These values can be overridden by user options
 */
export const DISPATCH_DEFAULTS = {
	/** Max items per batch */
	maxBatchSize: 5,
	/** Max sum of size hints per batch */
	maxBatchPayload: Number.POSITIVE_INFINITY,
	/** Sequential by default */
	maxConcurrentBatches: 1,
	/** Let in-flight batches finish on cancellation */
	cancelPolicy: 'wait',
} as const

/**
 * Default retry configuration for withRetry()
 */
export const RETRY_DEFAULTS = {
	/** Max retry attempts per batch */
	maxRetries: 3,
	/** Initial retry delay in milliseconds */
	retryDelay: 1000,
	/** Max retry delay in milliseconds */
	maxRetryDelay: 60_000,
} as const

/**
 * Azure AI Language text-analytics request limits
 */
export const TEXT_ANALYTICS_LIMITS = {
	/** Documents per synchronous request */
	maxDocuments: 5,
	/** Characters per document */
	maxDocumentLength: 5120,
} as const

export type DispatchDefaults = typeof DISPATCH_DEFAULTS
export type RetryDefaults = typeof RETRY_DEFAULTS
