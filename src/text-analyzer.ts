/**
 * Text Analyzer
 * Main facade for batched text-analytics operations - the primary public API
 */

import type {
	TextAnalyticsClient,
	TextDocumentInput,
} from '@azure/ai-text-analytics'

import { dispatch } from './batch/index.js'
import { TEXT_ANALYTICS_LIMITS } from './lib/constants.js'
import type { TextAnalyticsConfig } from './lib/config.js'
import type { OperationResultMap } from './transports/registry.js'
import {
	createTextAnalyticsClient,
	createTransports,
} from './transports/registry.js'
import type { RetryOptions } from './transports/retry.js'
import { withRetry } from './transports/retry.js'
import type { TextAnalyticsOperation } from './transports/text-analytics.js'
import { toTextDocuments } from './transports/text-analytics.js'
import type {
	DispatchOptions,
	DispatchReport,
	Transport,
} from './types/index.js'

/**
 * Text analyzer configuration
 * Either a ready SDK client or the configuration to build one
 */
export type TextAnalyzerConfig = (
	| { client: TextAnalyticsClient; service?: undefined }
	| { service: TextAnalyticsConfig; client?: undefined }
) & {
	/** Dispatch defaults (merged over the service limits) */
	dispatch?: DispatchOptions
	/** Retry wholesale batch failures (false or omitted to disable) */
	retry?: RetryOptions | false
}

/**
 * Analyze call signature: texts plus optional language(s) and per-call options
 */
export type AnalyzeFn<V> = (
	texts: string | readonly string[],
	languages?: string | readonly string[],
	options?: DispatchOptions,
) => Promise<DispatchReport<V>>

/**
 * Text analyzer instance interface
 */
export interface TextAnalyzer {
	/** Get the underlying SDK client */
	readonly client: TextAnalyticsClient
	/** Sentiment with per-sentence scores */
	analyzeSentiment: AnalyzeFn<OperationResultMap['sentiment']>
	/** Key phrases */
	extractKeyPhrases: AnalyzeFn<OperationResultMap['keyPhrases']>
	/** Primary language (language hints ignored) */
	detectLanguage: AnalyzeFn<OperationResultMap['languageDetection']>
	/** Categorized named entities */
	recognizeEntities: AnalyzeFn<OperationResultMap['entities']>
	/** Entities linked to a knowledge base */
	recognizeLinkedEntities: AnalyzeFn<OperationResultMap['linkedEntities']>
}

/**
 * Use the given client or build one from the service configuration
 */
const resolveClient = (config: TextAnalyzerConfig): TextAnalyticsClient => {
	if (config.client) return config.client
	if (config.service) return createTextAnalyticsClient(config.service)
	throw new Error('Either client or service configuration is required')
}

/**
 * Create a text analyzer instance
 *
 * @param config - Text analyzer configuration
 * @returns TextAnalyzer instance
 *
 * @example
 * ```typescript
 * const config = loadTextAnalyticsConfig(process.env)
 * if (!config.success) throw new Error(config.error.message)
 *
 * const analyzer = createTextAnalyzer({
 *   service: config.data,
 *   retry: { maxRetries: 2 },
 * })
 *
 * const report = await analyzer.analyzeSentiment([
 *   'The hotel was lovely.',
 *   'The food was cold.',
 * ])
 * ```
 */
export const createTextAnalyzer = (
	config: TextAnalyzerConfig,
): TextAnalyzer => {
	const client = resolveClient(config)
	const transports = createTransports(client)

	const defaults: DispatchOptions = {
		maxBatchSize: TEXT_ANALYTICS_LIMITS.maxDocuments,
		maxBatchPayload:
			TEXT_ANALYTICS_LIMITS.maxDocuments *
			TEXT_ANALYTICS_LIMITS.maxDocumentLength,
		...(config.service?.timeout === undefined
			? {}
			: { perBatchTimeout: config.service.timeout }),
		...config.dispatch,
	}

	const analyze = <K extends TextAnalyticsOperation>(
		operation: K,
	): AnalyzeFn<OperationResultMap[K]> => {
		const transport: Transport<TextDocumentInput, OperationResultMap[K]> =
			config.retry
				? withRetry(transports[operation], config.retry)
				: transports[operation]

		return (texts, languages, options) =>
			dispatch(toTextDocuments(texts, languages), transport, {
				...defaults,
				...options,
			})
	}

	return {
		client,
		analyzeSentiment: analyze('sentiment'),
		extractKeyPhrases: analyze('keyPhrases'),
		detectLanguage: analyze('languageDetection'),
		recognizeEntities: analyze('entities'),
		recognizeLinkedEntities: analyze('linkedEntities'),
	}
}
