/**
 * Batcher tests
 */

import { describe, expect, it } from 'vitest'

import { partition } from '../batch/partition.js'
import { DispatchConfigError } from '../types/index.js'
import { createItem, createItems } from './helpers/test-utils.js'

const ids = (batch: { items: readonly { id: string }[] }): string[] =>
	batch.items.map(item => item.id)

describe('partition', () => {
	it('should split 7 unit items into batches of 5 and 2', () => {
		const batches = partition(createItems(7), 5, 100)

		expect(batches.map(ids)).toEqual([
			['item-0', 'item-1', 'item-2', 'item-3', 'item-4'],
			['item-5', 'item-6'],
		])
		expect(batches.map(batch => batch.start)).toEqual([0, 5])
		expect(batches.map(batch => batch.size)).toEqual([5, 2])
		expect(batches.every(batch => !batch.oversized)).toBe(true)
	})

	it('should return no batches for empty input', () => {
		expect(partition([], 5, 100)).toEqual([])
	})

	it('should close a batch before exceeding the payload budget', () => {
		const items = [
			createItem('a', 40),
			createItem('b', 40),
			createItem('c', 30),
			createItem('d', 60),
		]

		const batches = partition(items, 5, 100)

		expect(batches.map(ids)).toEqual([['a', 'b'], ['c', 'd']])
		expect(batches.map(batch => batch.size)).toEqual([80, 90])
	})

	it('should fill a batch up to exactly the payload budget', () => {
		const items = [createItem('a', 50), createItem('b', 50)]

		const batches = partition(items, 5, 100)

		expect(batches.map(ids)).toEqual([['a', 'b']])
	})

	it('should isolate an oversized item in its own flagged batch', () => {
		const items = [
			createItem('a', 10),
			createItem('big', 200),
			createItem('b', 10),
		]

		const batches = partition(items, 5, 100)

		expect(batches.map(ids)).toEqual([['a'], ['big'], ['b']])
		expect(batches.map(batch => batch.oversized)).toEqual([
			false,
			true,
			false,
		])
		expect(batches.map(batch => batch.index)).toEqual([0, 1, 2])
		expect(batches.map(batch => batch.start)).toEqual([0, 1, 2])
	})

	it('should preserve input order across batches', () => {
		const items = createItems(23, index => (index % 4) * 10)

		const batches = partition(items, 3, 45)

		expect(batches.flatMap(ids)).toEqual(items.map(item => item.id))
		for (const batch of batches) {
			expect(batch.items.length).toBeLessThanOrEqual(3)
			expect(batch.size).toBeLessThanOrEqual(45)
		}
	})

	it('should accept an unbounded payload budget', () => {
		const items = [createItem('a', 1_000_000), createItem('b', 1_000_000)]

		const batches = partition(items, 5, Number.POSITIVE_INFINITY)

		expect(batches.map(ids)).toEqual([['a', 'b']])
	})

	it('should throw DispatchConfigError for non-positive limits', () => {
		expect(() => partition(createItems(1), 0, 100)).toThrow(
			DispatchConfigError,
		)
		expect(() => partition(createItems(1), 5, 0)).toThrow(
			'maxPayload must be greater than 0, got 0',
		)
		expect(() => partition(createItems(1), -1, 100)).toThrow(
			'maxCount must be a positive integer, got -1',
		)
	})

	it('should reject a fractional batch size', () => {
		expect(() => partition(createItems(1), 2.5, 100)).toThrow(
			DispatchConfigError,
		)
	})
})
