/**
 * Batch dispatcher
 * Sends partitioned batches through an injected transport and reassembles
 * per-item results in input order
 */

import { createTokenBucket } from '../lib/rate-limiter.js'
import type {
	Batch,
	BatchResponse,
	DispatchOptions,
	DispatchReport,
	ItemOutcome,
	ItemResult,
	RequestItem,
	ResolvedDispatchOptions,
	Transport,
} from '../types/index.js'
import { itemFail, itemSuccess } from '../types/index.js'
import { asCause, getErrorMessage } from '../utils/index.js'
import { dispatchLogger } from '../utils/logger.js'
import { resolveDispatchOptions, validateItems } from './options.js'
import { partition } from './partition.js'

/**
 * How a single transport invocation settled
 */
type BatchSettlement<V> =
	| { kind: 'response'; response: BatchResponse<V> }
	| { kind: 'error'; error: unknown }
	| { kind: 'timeout' }
	| { kind: 'cancelled' }

/**
 * Outcome of one dispatched batch
 */
interface BatchOutcome<V> {
	results: ItemResult<V>[]
	/** Whole batch failed (transport error, timeout, abandoned) */
	wholesale: boolean
}

/**
 * Promise settling when a signal aborts, with a disposer for its listener
 */
const whenAborted = <T>(
	signal: AbortSignal,
	value: T,
): { promise: Promise<T>; dispose: () => void } => {
	let dispose = (): void => undefined
	const promise = new Promise<T>(resolve => {
		if (signal.aborted) {
			resolve(value)
			return
		}
		const onAbort = (): void => resolve(value)
		signal.addEventListener('abort', onAbort, { once: true })
		dispose = () => signal.removeEventListener('abort', onAbort)
	})
	return { promise, dispose }
}

/**
 * Fail every item of a batch with the same error
 */
const failBatch = <P, V>(
	batch: Batch<P>,
	code: 'TRANSPORT_ERROR' | 'TIMEOUT' | 'CANCELLED' | 'TOO_LARGE',
	message: string,
	cause?: Error,
): ItemResult<V>[] =>
	batch.items.map(item =>
		itemFail<V>(item.id, code, message, {
			cause,
			batchIndex: batch.index,
		}),
	)

/**
 * Match a transport response back to the items of the batch it was sent for
 *
 * Unknown ids are logged and ignored. Items with no outcome, or with more than
 * one, fail with CORRELATION_ERROR.
 */
const correlate = <P, V>(
	batch: Batch<P>,
	response: BatchResponse<V>,
): ItemResult<V>[] => {
	const batchIds = new Set(batch.items.map(item => item.id))
	const outcomes = new Map<string, ItemOutcome<V>>()
	const duplicates = new Set<string>()

	for (const entry of response) {
		if (!batchIds.has(entry.id)) {
			dispatchLogger.warn('Response item does not belong to batch', {
				details: { batchIndex: batch.index, id: entry.id },
			})
			continue
		}
		if (outcomes.has(entry.id)) {
			dispatchLogger.warn('Duplicate response item', {
				details: { batchIndex: batch.index, id: entry.id },
			})
			duplicates.add(entry.id)
			continue
		}
		outcomes.set(entry.id, entry.outcome)
	}

	return batch.items.map(item => {
		const outcome = outcomes.get(item.id)

		if (duplicates.has(item.id)) {
			return itemFail<V>(
				item.id,
				'CORRELATION_ERROR',
				'Transport returned more than one outcome for item',
				{ batchIndex: batch.index },
			)
		}
		if (!outcome) {
			dispatchLogger.warn('Missing response item', {
				details: { batchIndex: batch.index, id: item.id },
			})
			return itemFail<V>(
				item.id,
				'CORRELATION_ERROR',
				'Transport returned no outcome for item',
				{ batchIndex: batch.index },
			)
		}
		if (outcome.success) {
			return itemSuccess(item.id, outcome.data)
		}
		return itemFail<V>(item.id, 'REMOTE_ERROR', outcome.error.message, {
			batchIndex: batch.index,
			remoteCode: outcome.error.code,
		})
	})
}

/**
 * Invoke the transport for one batch under the timeout and cancel policy
 */
const runBatch = async <P, V>(
	batch: Batch<P>,
	transport: Transport<P, V>,
	config: ResolvedDispatchOptions,
): Promise<BatchOutcome<V>> => {
	const controller = new AbortController()
	const disposers: Array<() => void> = []
	const { signal, perBatchTimeout, cancelPolicy } = config

	// Under 'wait' the transport keeps its signal until timeout
	if (signal && cancelPolicy === 'abandon') {
		const onCancel = (): void => controller.abort(signal.reason)
		if (signal.aborted) {
			onCancel()
		} else {
			signal.addEventListener('abort', onCancel, { once: true })
			disposers.push(() => signal.removeEventListener('abort', onCancel))
		}
	}

	const call: Promise<BatchSettlement<V>> = Promise.resolve()
		.then(() =>
			transport(batch, {
				signal: controller.signal,
				batchIndex: batch.index,
			}),
		)
		.then(
			(response): BatchSettlement<V> => ({ kind: 'response', response }),
			(error: unknown): BatchSettlement<V> => ({ kind: 'error', error }),
		)

	const races: Promise<BatchSettlement<V>>[] = [call]

	if (perBatchTimeout !== undefined) {
		races.push(
			new Promise<BatchSettlement<V>>(resolve => {
				const timeoutId = setTimeout(
					() => resolve({ kind: 'timeout' }),
					perBatchTimeout,
				)
				disposers.push(() => clearTimeout(timeoutId))
			}),
		)
	}

	if (signal && cancelPolicy === 'abandon') {
		const cancelled = whenAborted<BatchSettlement<V>>(signal, {
			kind: 'cancelled',
		})
		races.push(cancelled.promise)
		disposers.push(cancelled.dispose)
	}

	let settlement: BatchSettlement<V>
	try {
		settlement = await Promise.race(races)
	} finally {
		for (const dispose of disposers) dispose()
	}

	switch (settlement.kind) {
		case 'response': {
			if (!Array.isArray(settlement.response)) {
				dispatchLogger.error('Transport returned a malformed response', {
					details: { batchIndex: batch.index },
				})
				return {
					results: failBatch(
						batch,
						'TRANSPORT_ERROR',
						'Transport returned a malformed response',
					),
					wholesale: true,
				}
			}
			return {
				results: correlate(batch, settlement.response),
				wholesale: false,
			}
		}
		case 'error': {
			const message = getErrorMessage(
				settlement.error,
				'Transport failed',
			)
			dispatchLogger.warn('Batch transport failed', {
				details: {
					batchIndex: batch.index,
					items: batch.items.length,
					message,
				},
			})
			return {
				results: failBatch(
					batch,
					'TRANSPORT_ERROR',
					message,
					asCause(settlement.error),
				),
				wholesale: true,
			}
		}
		case 'timeout': {
			controller.abort(new Error('Batch timed out'))
			dispatchLogger.warn('Batch timed out', {
				details: { batchIndex: batch.index, timeoutMs: perBatchTimeout },
			})
			return {
				results: failBatch(
					batch,
					'TIMEOUT',
					`Batch ${batch.index} timed out after ${perBatchTimeout}ms`,
				),
				wholesale: true,
			}
		}
		case 'cancelled': {
			controller.abort(new Error('Dispatch cancelled'))
			return {
				results: failBatch(
					batch,
					'CANCELLED',
					'Dispatch cancelled while batch was in flight',
				),
				wholesale: true,
			}
		}
	}
}

/**
 * Dispatch request items in bounded batches through a transport
 *
 * Features:
 * - Greedy, order-preserving batching (count and payload limits)
 * - Oversized items fail with TOO_LARGE without a transport call
 * - Up to maxConcurrentBatches batches in flight
 * - Per-batch timeout and whole-dispatch cancellation
 * - Optional rate limiting between batch starts
 *
 * Every failure after validation is recorded per item; the returned report
 * always holds one result per item, in input order.
 *
 * @param items - Request items, ids unique within the call
 * @param transport - Performs the remote call for one batch
 * @param options - Dispatch options
 * @returns Dispatch report
 * @throws DispatchConfigError before any work when options or items are invalid
 *
 * @example
 * ```typescript
 * const report = await dispatch(items, async batch =>
 *   batch.items.map(item => ({ id: item.id, outcome: { success: true, data: item.payload } })),
 * { maxBatchSize: 5, maxConcurrentBatches: 2 })
 * ```
 */
export const dispatch = async <P, V>(
	items: readonly RequestItem<P>[],
	transport: Transport<P, V>,
	options?: DispatchOptions,
): Promise<DispatchReport<V>> => {
	const config = resolveDispatchOptions(options)
	validateItems(items)

	const batches = partition(
		items,
		config.maxBatchSize,
		config.maxBatchPayload,
	)
	const slots: Array<ItemResult<V> | undefined> = items.map(() => undefined)

	const store = (batch: Batch<P>, results: ItemResult<V>[]): void => {
		for (const [offset, result] of results.entries()) {
			slots[batch.start + offset] = result
		}
	}

	const pending: Batch<P>[] = []
	for (const batch of batches) {
		if (batch.oversized) {
			store(
				batch,
				failBatch(
					batch,
					'TOO_LARGE',
					`Item size ${batch.size} exceeds max batch payload ${config.maxBatchPayload}`,
				),
			)
		} else {
			pending.push(batch)
		}
	}

	const rateLimiter =
		config.rateLimit === undefined
			? undefined
			: createTokenBucket({ limit: config.rateLimit, burstCapacity: 1 })

	let nextBatch = 0
	let batchCount = 0
	let failedBatchCount = 0
	let completedBatches = 0
	let successful = 0
	let failed = 0

	const skip = (batch: Batch<P>): void => {
		store(
			batch,
			failBatch(
				batch,
				'CANCELLED',
				'Dispatch cancelled before batch started',
			),
		)
	}

	const worker = async (): Promise<void> => {
		while (nextBatch < pending.length) {
			const batch = pending[nextBatch]
			nextBatch += 1
			if (!batch) break

			if (config.signal?.aborted) {
				skip(batch)
				continue
			}
			if (rateLimiter && !(await rateLimiter.acquire(config.signal))) {
				skip(batch)
				continue
			}
			if (config.signal?.aborted) {
				skip(batch)
				continue
			}

			batchCount += 1
			const outcome = await runBatch(batch, transport, config)
			store(batch, outcome.results)

			completedBatches += 1
			if (outcome.wholesale) failedBatchCount += 1
			for (const result of outcome.results) {
				if (result.success) successful += 1
				else failed += 1
			}

			if (config.onBatchComplete) {
				try {
					config.onBatchComplete({
						batchIndex: batch.index,
						completedBatches,
						totalBatches: pending.length,
						successful,
						failed,
					})
				} catch (error) {
					dispatchLogger.warn('Batch progress callback failed', {
						details: {
							batchIndex: batch.index,
							error: getErrorMessage(error),
						},
					})
				}
			}
		}
	}

	const workerCount = Math.min(config.maxConcurrentBatches, pending.length)
	try {
		await Promise.all(Array.from({ length: workerCount }, () => worker()))
	} finally {
		rateLimiter?.destroy()
	}

	if (config.signal?.aborted) {
		dispatchLogger.warn('Dispatch cancelled', {
			details: { dispatched: batchCount, batches: pending.length },
		})
	}

	const results = items.map(
		(item, position) =>
			slots[position] ??
			itemFail<V>(item.id, 'CANCELLED', 'Item was never dispatched'),
	)
	const report: DispatchReport<V> = {
		results,
		batchCount,
		failedBatchCount,
		total: items.length,
		successful: results.filter(result => result.success).length,
		failed: results.filter(result => !result.success).length,
	}

	dispatchLogger.info('Dispatch completed', {
		details: {
			total: report.total,
			successful: report.successful,
			failed: report.failed,
			batchCount,
			failedBatchCount,
		},
	})

	return report
}
