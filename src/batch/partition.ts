/**
 * Batcher
 * Greedy, order-preserving partition of request items into bounded batches
 */

import type { Batch, RequestItem } from '../types/index.js'
import { DispatchConfigError } from '../types/index.js'

/**
 * Partition items into batches of at most maxCount items and maxPayload total size
 *
 * An item whose sizeHint alone exceeds maxPayload closes the current batch and
 * is emitted on its own, flagged `oversized`.
 *
 * @param items - Items in input order
 * @param maxCount - Max items per batch (integer > 0)
 * @param maxPayload - Max sum of size hints per batch (> 0, may be Infinity)
 * @returns Batches in input order
 * @throws DispatchConfigError when a limit is not positive
 *
 * @example
 * ```typescript
 * partition(items, 5, 100)
 * // 7 items of size 1 -> [5 items], [2 items]
 * ```
 */
export const partition = <P>(
	items: readonly RequestItem<P>[],
	maxCount: number,
	maxPayload: number,
): Batch<P>[] => {
	if (!Number.isInteger(maxCount) || maxCount <= 0) {
		throw new DispatchConfigError(
			`maxCount must be a positive integer, got ${maxCount}`,
		)
	}
	if (Number.isNaN(maxPayload) || maxPayload <= 0) {
		throw new DispatchConfigError(
			`maxPayload must be greater than 0, got ${maxPayload}`,
		)
	}

	const batches: Batch<P>[] = []
	let current: RequestItem<P>[] = []
	let currentStart = 0
	let currentSize = 0

	const push = (
		batchItems: RequestItem<P>[],
		start: number,
		size: number,
		oversized: boolean,
	): void => {
		batches.push({
			index: batches.length,
			start,
			items: batchItems,
			size,
			oversized,
		})
	}

	const flush = (): void => {
		if (current.length === 0) return
		push(current, currentStart, currentSize, false)
		current = []
		currentSize = 0
	}

	for (const [position, item] of items.entries()) {
		if (item.sizeHint > maxPayload) {
			flush()
			push([item], position, item.sizeHint, true)
			continue
		}

		if (
			current.length >= maxCount ||
			currentSize + item.sizeHint > maxPayload
		) {
			flush()
		}

		if (current.length === 0) currentStart = position
		current.push(item)
		currentSize += item.sizeHint
	}

	flush()

	return batches
}
