/**
 * Batch dispatch type definitions
 * Options accepted by dispatch() and the report it returns
 */

import type { ItemResult } from './result.js'

/**
 * What happens to in-flight batches when the dispatch is cancelled
 * - 'wait': let them finish and record their real outcome
 * - 'abandon': abort their signal and mark their items CANCELLED
 */
export type CancelPolicy = 'wait' | 'abandon'

/**
 * Progress stats passed to onBatchComplete
 */
export interface BatchProgress {
	/** Index of the batch that just completed */
	batchIndex: number
	/** Dispatched batches completed so far */
	completedBatches: number
	/** Batches that will be dispatched (oversized batches excluded) */
	totalBatches: number
	/** Successful items so far */
	successful: number
	/** Failed items so far */
	failed: number
}

/**
 * Dispatch options
 */
export interface DispatchOptions {
	/** Max items per batch (default: 5) */
	maxBatchSize?: number
	/** Max sum of item size hints per batch (default: unbounded) */
	maxBatchPayload?: number
	/** Batches sent concurrently (default: 1) */
	maxConcurrentBatches?: number
	/** Time budget per transport call in milliseconds (default: none) */
	perBatchTimeout?: number
	/** Max batch starts per second (default: none) */
	rateLimit?: number
	/** Cancels the whole dispatch */
	signal?: AbortSignal
	/** In-flight behaviour on cancellation (default: 'wait') */
	cancelPolicy?: CancelPolicy
	/** Progress callback (called after each dispatched batch completes) */
	onBatchComplete?: (progress: BatchProgress) => void
}

/**
 * Dispatch options with defaults applied
 */
export interface ResolvedDispatchOptions {
	maxBatchSize: number
	maxBatchPayload: number
	maxConcurrentBatches: number
	perBatchTimeout: number | undefined
	rateLimit: number | undefined
	signal: AbortSignal | undefined
	cancelPolicy: CancelPolicy
	onBatchComplete: ((progress: BatchProgress) => void) | undefined
}

/**
 * Report returned by dispatch(), one result per submitted item
 */
export interface DispatchReport<V> {
	/** Item results in input order */
	results: ItemResult<V>[]
	/** Batches the transport was invoked for */
	batchCount: number
	/** Dispatched batches that failed as a whole */
	failedBatchCount: number
	/** Total items submitted */
	total: number
	/** Successful items */
	successful: number
	/** Failed items */
	failed: number
}
