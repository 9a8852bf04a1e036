/**
 * Transport registry
 * Factory pattern for text-analytics clients and transports
 */

import type {
	AnalyzeSentimentSuccessResult,
	DetectLanguageSuccessResult,
	ExtractKeyPhrasesSuccessResult,
	RecognizeCategorizedEntitiesSuccessResult,
	RecognizeLinkedEntitiesSuccessResult,
	TextDocumentInput,
} from '@azure/ai-text-analytics'
import { AzureKeyCredential, TextAnalyticsClient } from '@azure/ai-text-analytics'

import type { TextAnalyticsConfig } from '../lib/config.js'
import type { Transport } from '../types/index.js'
import type { TextAnalyticsOperation } from './text-analytics.js'
import {
	createEntitiesTransport,
	createKeyPhrasesTransport,
	createLanguageDetectionTransport,
	createLinkedEntitiesTransport,
	createSentimentTransport,
} from './text-analytics.js'

/**
 * Operation to success document mapping
 */
export interface OperationResultMap {
	sentiment: AnalyzeSentimentSuccessResult
	keyPhrases: ExtractKeyPhrasesSuccessResult
	languageDetection: DetectLanguageSuccessResult
	entities: RecognizeCategorizedEntitiesSuccessResult
	linkedEntities: RecognizeLinkedEntitiesSuccessResult
}

/**
 * Operation to transport mapping
 */
export type TextAnalyticsTransports = {
	[K in TextAnalyticsOperation]: Transport<
		TextDocumentInput,
		OperationResultMap[K]
	>
}

/**
 * Create the SDK client from configuration
 * @param config - Text-analytics configuration
 */
export const createTextAnalyticsClient = (
	config: TextAnalyticsConfig,
): TextAnalyticsClient =>
	new TextAnalyticsClient(
		config.endpoint,
		new AzureKeyCredential(config.apiKey),
	)

/**
 * Create a transport for every text-analytics operation
 * @param client - SDK client instance
 */
export const createTransports = (
	client: TextAnalyticsClient,
): TextAnalyticsTransports => ({
	sentiment: createSentimentTransport(client),
	keyPhrases: createKeyPhrasesTransport(client),
	languageDetection: createLanguageDetectionTransport(client),
	entities: createEntitiesTransport(client),
	linkedEntities: createLinkedEntitiesTransport(client),
})
