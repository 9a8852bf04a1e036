/**
 * text-batch-dispatch
 * Bounded batch dispatch for text-analytics style APIs
 *
 * Features:
 * - Greedy, order-preserving batching by item count and payload size
 * - Injected transport, one call per batch, per-item correlation by id
 * - Concurrency limit, per-batch timeout, cancellation and rate limiting
 * - Azure AI Language text-analytics transports and facade
 */

// Main API exports
export { dispatch, partition } from './batch/index.js'
export type {
	AnalyzeFn,
	TextAnalyzer,
	TextAnalyzerConfig,
} from './text-analyzer.js'
export { createTextAnalyzer } from './text-analyzer.js'
// Configuration exports
export type { ConfigError, TextAnalyticsConfig } from './lib/config.js'
export { loadTextAnalyticsConfig } from './lib/config.js'
// Constants exports
export {
	DISPATCH_DEFAULTS,
	RETRY_DEFAULTS,
	TEXT_ANALYTICS_LIMITS,
} from './lib/constants.js'
export type {
	RateLimiterConfig,
	RateLimiterStatus,
	TokenBucket,
} from './lib/rate-limiter.js'
// Rate limiter exports
export { createTokenBucket } from './lib/rate-limiter.js'
// Transport exports
export type {
	OperationResultMap,
	RetryOptions,
	TextAnalyticsOperation,
	TextAnalyticsTransports,
} from './transports/index.js'
export {
	createEntitiesTransport,
	createKeyPhrasesTransport,
	createLanguageDetectionTransport,
	createLinkedEntitiesTransport,
	createSentimentTransport,
	createTextAnalyticsClient,
	createTransports,
	toTextDocuments,
	withRetry,
} from './transports/index.js'
// Formatting exports
export type {
	DocumentDescriber,
	EntitiesDocument,
	KeyPhrasesDocument,
	LanguageDocument,
	LinkedEntitiesDocument,
	SentimentDocument,
} from './format.js'
export {
	describeEntities,
	describeKeyPhrases,
	describeLanguage,
	describeLinkedEntities,
	describeSentiment,
	formatReport,
} from './format.js'
// Type exports
export type {
	Batch,
	BatchProgress,
	BatchResponse,
	CancelPolicy,
	DispatchError,
	DispatchErrorCode,
	DispatchOptions,
	DispatchReport,
	ItemOutcome,
	ItemResult,
	RemoteItemError,
	RequestItem,
	Result,
	Transport,
	TransportContext,
} from './types/index.js'
export {
	DispatchConfigError,
	dispatchError,
	itemFail,
	itemSuccess,
} from './types/index.js'
// Logger exports (for debugging)
export { dispatchLogger, logger, transportLogger } from './utils/logger.js'
