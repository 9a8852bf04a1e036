/**
 * Transports module
 * Text-analytics transports and the retry decorator
 */

export type {
	OperationResultMap,
	TextAnalyticsTransports,
} from './registry.js'
export { createTextAnalyticsClient, createTransports } from './registry.js'
export type { RetryOptions } from './retry.js'
export { withRetry } from './retry.js'
export type { TextAnalyticsOperation } from './text-analytics.js'
export {
	createEntitiesTransport,
	createKeyPhrasesTransport,
	createLanguageDetectionTransport,
	createLinkedEntitiesTransport,
	createSentimentTransport,
	toTextDocuments,
} from './text-analytics.js'
