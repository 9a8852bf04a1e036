/**
 * Report formatting
 * Renders dispatch reports of text-analytics documents as readable lines
 */

import type { DispatchReport } from './types/index.js'

const SEPARATOR = '-'.repeat(30)

interface SentimentScores {
	positive: number
	neutral: number
	negative: number
}

/**
 * Fields read from a sentiment document
 */
export interface SentimentDocument {
	sentiment: string
	confidenceScores: SentimentScores
	sentences: ReadonlyArray<{
		text: string
		sentiment: string
		confidenceScores: SentimentScores
	}>
}

/**
 * Fields read from a key phrase document
 */
export interface KeyPhrasesDocument {
	keyPhrases: readonly string[]
}

/**
 * Fields read from a language detection document
 */
export interface LanguageDocument {
	primaryLanguage: {
		name: string
		iso6391Name: string
		confidenceScore: number
	}
}

/**
 * Fields read from an entity recognition document
 */
export interface EntitiesDocument {
	entities: ReadonlyArray<{
		text: string
		category: string
		subCategory?: string | undefined
		confidenceScore: number
	}>
}

/**
 * Fields read from a linked entity recognition document
 */
export interface LinkedEntitiesDocument {
	entities: ReadonlyArray<{
		name: string
		url: string
		dataSource: string
		dataSourceEntityId?: string | undefined
		matches: ReadonlyArray<{ text: string; confidenceScore: number }>
	}>
}

/**
 * Turns one successful document into lines
 */
export type DocumentDescriber<V> = (id: string, document: V) => string[]

const formatScores = (scores: SentimentScores): string =>
	`Positive=${scores.positive.toFixed(2)}, ` +
	`Neutral=${scores.neutral.toFixed(2)}, ` +
	`Negative=${scores.negative.toFixed(2)}`

export const describeSentiment: DocumentDescriber<SentimentDocument> = (
	id,
	document,
) => [
	`Document ${id} sentiment: ${document.sentiment}`,
	`Overall scores: ${formatScores(document.confidenceScores)}`,
	'Sentence sentiment:',
	...document.sentences.flatMap((sentence, i) => [
		`  Sentence ${i + 1} sentiment: ${sentence.sentiment}`,
		`  Scores: ${formatScores(sentence.confidenceScores)}`,
		`  Text: ${sentence.text}`,
	]),
]

export const describeKeyPhrases: DocumentDescriber<KeyPhrasesDocument> = (
	id,
	document,
) => [
	`Document ${id} key phrases:`,
	...document.keyPhrases.map(phrase => `  - ${phrase}`),
]

export const describeLanguage: DocumentDescriber<LanguageDocument> = (
	id,
	{ primaryLanguage },
) => [
	`Document ${id} language: ${primaryLanguage.name}`,
	`ISO6391 name: ${primaryLanguage.iso6391Name}`,
	`Confidence score: ${primaryLanguage.confidenceScore.toFixed(4)}`,
]

export const describeEntities: DocumentDescriber<EntitiesDocument> = (
	id,
	document,
) => [
	`Document ${id} entities:`,
	...document.entities.flatMap(entity => [
		`  - Text: ${entity.text}`,
		`    Category: ${entity.category}`,
		...(entity.subCategory ? [`    Subcategory: ${entity.subCategory}`] : []),
		`    Confidence score: ${entity.confidenceScore.toFixed(4)}`,
	]),
]

export const describeLinkedEntities: DocumentDescriber<
	LinkedEntitiesDocument
> = (id, document) => [
	`Document ${id} linked entities:`,
	...document.entities.flatMap(entity => [
		`  - Name: ${entity.name}`,
		`    ID: ${entity.dataSourceEntityId ?? 'n/a'}`,
		`    URL: ${entity.url}`,
		`    Data source: ${entity.dataSource}`,
		'    Matches:',
		...entity.matches.flatMap(match => [
			`      - Text: ${match.text}`,
			`        Confidence score: ${match.confidenceScore.toFixed(4)}`,
		]),
	]),
]

/**
 * Render a dispatch report, one block per item in input order
 *
 * @param report - Dispatch report
 * @param describe - Formatter for successful documents
 * @returns Lines ready to print
 *
 * @example
 * ```typescript
 * const report = await analyzer.analyzeSentiment(texts)
 * console.log(formatReport(report, describeSentiment).join('\n'))
 * ```
 */
export const formatReport = <V>(
	report: DispatchReport<V>,
	describe: DocumentDescriber<V>,
): string[] => {
	if (report.results.length === 0) return ['No results to display']

	return report.results.flatMap(result =>
		result.success
			? [...describe(result.id, result.data), SEPARATOR]
			: [`Document ${result.id} had an error: ${result.error.message}`],
	)
}
