/**
 * Transport type definitions
 * The caller-supplied function that performs one remote call per batch
 */

/**
 * A labelled unit of work submitted to the dispatcher
 */
export interface RequestItem<P> {
	/** Identifier, unique within one dispatch call */
	readonly id: string
	/** Opaque payload handed to the transport */
	readonly payload: P
	/** Size of the payload (e.g. character count), counted against maxBatchPayload */
	readonly sizeHint: number
}

/**
 * Contiguous, non-empty slice of the submitted items
 */
export interface Batch<P> {
	/** Position of this batch in the partition */
	readonly index: number
	/** Input position of the first item */
	readonly start: number
	/** Items in input order */
	readonly items: readonly RequestItem<P>[]
	/** Sum of the items' size hints */
	readonly size: number
	/** Single item larger than the payload budget; never sent */
	readonly oversized: boolean
}

/**
 * Error reported by the remote service for one item
 */
export interface RemoteItemError {
	message: string
	code?: string | undefined
}

/**
 * Per-item outcome returned by a transport
 */
export type ItemOutcome<V> =
	| { success: true; data: V }
	| { success: false; error: RemoteItemError }

/**
 * Transport response for one batch
 */
export type BatchResponse<V> = ReadonlyArray<{
	id: string
	outcome: ItemOutcome<V>
}>

/**
 * Context handed to the transport for each batch invocation
 */
export interface TransportContext {
	/** Aborted on timeout or when the dispatch is cancelled */
	signal: AbortSignal
	/** Index of the batch being sent */
	batchIndex: number
	/** Attempt number (1-based), set by retrying transports */
	attempt?: number | undefined
}

/**
 * Transport function - performs the remote call for one batch.
 * Throwing or rejecting is a wholesale failure for that batch.
 */
export type Transport<P, V> = (
	batch: Batch<P>,
	context: TransportContext,
) => Promise<BatchResponse<V>> | BatchResponse<V>
