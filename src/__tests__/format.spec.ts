/**
 * Report formatting tests
 */

import { describe, expect, it } from 'vitest'

import type { KeyPhrasesDocument } from '../format.js'
import {
	describeEntities,
	describeKeyPhrases,
	describeLanguage,
	describeLinkedEntities,
	describeSentiment,
	formatReport,
} from '../format.js'
import type { DispatchReport } from '../types/index.js'
import { itemFail, itemSuccess } from '../types/index.js'

const SEPARATOR = '------------------------------'

describe('formatReport', () => {
	it('should print a placeholder for an empty report', () => {
		const report: DispatchReport<KeyPhrasesDocument> = {
			results: [],
			batchCount: 0,
			failedBatchCount: 0,
			total: 0,
			successful: 0,
			failed: 0,
		}

		expect(formatReport(report, describeKeyPhrases)).toEqual([
			'No results to display',
		])
	})

	it('should describe successes and print failures in order', () => {
		const report: DispatchReport<KeyPhrasesDocument> = {
			results: [
				itemSuccess('0', { keyPhrases: ['Space Needle', 'Seattle'] }),
				itemFail('1', 'REMOTE_ERROR', 'Document text is empty.'),
			],
			batchCount: 1,
			failedBatchCount: 0,
			total: 2,
			successful: 1,
			failed: 1,
		}

		expect(formatReport(report, describeKeyPhrases)).toEqual([
			'Document 0 key phrases:',
			'  - Space Needle',
			'  - Seattle',
			SEPARATOR,
			'Document 1 had an error: Document text is empty.',
		])
	})
})

describe('document describers', () => {
	it('should describe sentiment with two-decimal scores', () => {
		const lines = describeSentiment('0', {
			sentiment: 'positive',
			confidenceScores: { positive: 0.987, neutral: 0.01, negative: 0.003 },
			sentences: [
				{
					text: 'The weather was perfect.',
					sentiment: 'positive',
					confidenceScores: { positive: 1, neutral: 0, negative: 0 },
				},
			],
		})

		expect(lines).toEqual([
			'Document 0 sentiment: positive',
			'Overall scores: Positive=0.99, Neutral=0.01, Negative=0.00',
			'Sentence sentiment:',
			'  Sentence 1 sentiment: positive',
			'  Scores: Positive=1.00, Neutral=0.00, Negative=0.00',
			'  Text: The weather was perfect.',
		])
	})

	it('should describe the primary language', () => {
		expect(
			describeLanguage('2', {
				primaryLanguage: {
					name: 'French',
					iso6391Name: 'fr',
					confidenceScore: 1,
				},
			}),
		).toEqual([
			'Document 2 language: French',
			'ISO6391 name: fr',
			'Confidence score: 1.0000',
		])
	})

	it('should print subcategories only when present', () => {
		const lines = describeEntities('0', {
			entities: [
				{
					text: 'Seattle',
					category: 'Location',
					subCategory: 'GPE',
					confidenceScore: 0.95,
				},
				{ text: 'last week', category: 'DateTime', confidenceScore: 0.8 },
			],
		})

		expect(lines).toEqual([
			'Document 0 entities:',
			'  - Text: Seattle',
			'    Category: Location',
			'    Subcategory: GPE',
			'    Confidence score: 0.9500',
			'  - Text: last week',
			'    Category: DateTime',
			'    Confidence score: 0.8000',
		])
	})

	it('should describe linked entities with their matches', () => {
		const lines = describeLinkedEntities('1', {
			entities: [
				{
					name: 'Space Needle',
					url: 'https://en.wikipedia.org/wiki/Space_Needle',
					dataSource: 'Wikipedia',
					dataSourceEntityId: 'Space Needle',
					matches: [{ text: 'Space Needle', confidenceScore: 0.42 }],
				},
			],
		})

		expect(lines).toEqual([
			'Document 1 linked entities:',
			'  - Name: Space Needle',
			'    ID: Space Needle',
			'    URL: https://en.wikipedia.org/wiki/Space_Needle',
			'    Data source: Wikipedia',
			'    Matches:',
			'      - Text: Space Needle',
			'        Confidence score: 0.4200',
		])
	})
})
