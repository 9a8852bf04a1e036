/**
 * Azure AI Language text-analytics transports
 * One SDK call per batch, error documents mapped to per-item failures
 */

import type {
	AnalyzeSentimentSuccessResult,
	DetectLanguageInput,
	DetectLanguageSuccessResult,
	ExtractKeyPhrasesSuccessResult,
	RecognizeCategorizedEntitiesSuccessResult,
	RecognizeLinkedEntitiesSuccessResult,
	TextAnalyticsClient,
	TextAnalyticsErrorResult,
	TextDocumentInput,
} from '@azure/ai-text-analytics'

import type { BatchResponse, RequestItem, Transport } from '../types/index.js'
import { transportLogger } from '../utils/logger.js'

/**
 * Text-analytics operation names
 */
export type TextAnalyticsOperation =
	| 'sentiment'
	| 'keyPhrases'
	| 'languageDetection'
	| 'entities'
	| 'linkedEntities'

/**
 * Build request items from one or more texts
 *
 * Document ids are the text positions ("0", "1", ...); the size hint is the
 * text length in characters.
 *
 * @param texts - A single text or a list of texts
 * @param languages - A language code for every text, or one per text
 * @returns Request items ready for dispatch()
 */
export const toTextDocuments = (
	texts: string | readonly string[],
	languages?: string | readonly string[],
): RequestItem<TextDocumentInput>[] => {
	const list = typeof texts === 'string' ? [texts] : texts

	return list.map((text, i) => {
		const language =
			typeof languages === 'string' ? languages : languages?.[i]
		const id = String(i)
		return {
			id,
			payload: { id, text, ...(language ? { language } : {}) },
			sizeHint: text.length,
		}
	})
}

/**
 * Shape shared by every SDK success document
 */
interface DocumentSuccessResult {
	readonly id: string
	error?: undefined
}

/**
 * Type guard for SDK error documents
 */
const isErrorResult = <T extends DocumentSuccessResult>(
	result: T | TextAnalyticsErrorResult,
): result is TextAnalyticsErrorResult => result.error !== undefined

/**
 * Map an SDK result array to a batch response
 */
const toBatchResponse = <T extends DocumentSuccessResult>(
	operation: TextAnalyticsOperation,
	results: ReadonlyArray<T | TextAnalyticsErrorResult>,
): BatchResponse<T> =>
	results.map((result): BatchResponse<T>[number] => {
		if (isErrorResult(result)) {
			transportLogger.warn('Document rejected by service', {
				details: {
					operation,
					id: result.id,
					code: result.error.code,
				},
			})
			return {
				id: result.id,
				outcome: {
					success: false,
					error: {
						code: result.error.code,
						message: result.error.message,
					},
				},
			}
		}
		return { id: result.id, outcome: { success: true, data: result } }
	})

/**
 * Create a transport running one text-analytics call per batch
 */
const createDocumentTransport =
	<I, T extends DocumentSuccessResult>(
		operation: TextAnalyticsOperation,
		call: (
			documents: I[],
			abortSignal: AbortSignal,
		) => Promise<ReadonlyArray<T | TextAnalyticsErrorResult>>,
	): Transport<I, T> =>
	async (batch, context) => {
		const documents = batch.items.map(item => item.payload)
		const results = await call(documents, context.signal)
		return toBatchResponse(operation, results)
	}

/**
 * Sentiment analysis transport
 */
export const createSentimentTransport = (
	client: TextAnalyticsClient,
): Transport<TextDocumentInput, AnalyzeSentimentSuccessResult> =>
	createDocumentTransport<TextDocumentInput, AnalyzeSentimentSuccessResult>(
		'sentiment',
		(documents, abortSignal) =>
			client.analyzeSentiment(documents, { abortSignal }),
	)

/**
 * Key phrase extraction transport
 */
export const createKeyPhrasesTransport = (
	client: TextAnalyticsClient,
): Transport<TextDocumentInput, ExtractKeyPhrasesSuccessResult> =>
	createDocumentTransport<TextDocumentInput, ExtractKeyPhrasesSuccessResult>(
		'keyPhrases',
		(documents, abortSignal) =>
			client.extractKeyPhrases(documents, { abortSignal }),
	)

/**
 * Language detection transport
 * Document language hints are dropped; detection takes none
 */
export const createLanguageDetectionTransport = (
	client: TextAnalyticsClient,
): Transport<TextDocumentInput, DetectLanguageSuccessResult> =>
	createDocumentTransport<TextDocumentInput, DetectLanguageSuccessResult>(
		'languageDetection',
		(documents, abortSignal) => {
			const inputs: DetectLanguageInput[] = documents.map(
				({ id, text }) => ({ id, text }),
			)
			return client.detectLanguage(inputs, { abortSignal })
		},
	)

/**
 * Named entity recognition transport
 */
export const createEntitiesTransport = (
	client: TextAnalyticsClient,
): Transport<TextDocumentInput, RecognizeCategorizedEntitiesSuccessResult> =>
	createDocumentTransport<
		TextDocumentInput,
		RecognizeCategorizedEntitiesSuccessResult
	>('entities', (documents, abortSignal) =>
		client.recognizeEntities(documents, { abortSignal }),
	)

/**
 * Linked entity recognition transport
 */
export const createLinkedEntitiesTransport = (
	client: TextAnalyticsClient,
): Transport<TextDocumentInput, RecognizeLinkedEntitiesSuccessResult> =>
	createDocumentTransport<
		TextDocumentInput,
		RecognizeLinkedEntitiesSuccessResult
	>('linkedEntities', (documents, abortSignal) =>
		client.recognizeLinkedEntities(documents, { abortSignal }),
	)
