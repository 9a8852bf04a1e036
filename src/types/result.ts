/**
 * Result type definitions
 * Discriminated unions for per-item dispatch outcomes
 */

/**
 * Base result type - discriminated union for success/error
 */
export type Result<T, E = Error> =
	| { success: true; data: T }
	| { success: false; error: E }

/**
 * Dispatch error codes
 * - TOO_LARGE: item alone exceeds the batch payload budget, never sent
 * - TRANSPORT_ERROR: transport failed for the whole batch
 * - REMOTE_ERROR: remote service rejected this item
 * - CORRELATION_ERROR: response could not be matched back to this item
 * - TIMEOUT: batch exceeded its time budget
 * - CANCELLED: dispatch cancelled before (or while) the batch ran
 */
export type DispatchErrorCode =
	| 'TOO_LARGE'
	| 'TRANSPORT_ERROR'
	| 'REMOTE_ERROR'
	| 'CORRELATION_ERROR'
	| 'TIMEOUT'
	| 'CANCELLED'

/**
 * Per-item dispatch error with details
 */
export interface DispatchError {
	/** Error code */
	code: DispatchErrorCode
	/** Human-readable message */
	message: string
	/** Original error if available */
	cause?: Error | undefined
	/** Index of the batch the item belonged to */
	batchIndex?: number | undefined
	/** Error code reported by the remote service */
	remoteCode?: string | undefined
}

/**
 * Outcome for a single request item, keyed by its id
 */
export type ItemResult<V> =
	| { success: true; id: string; data: V }
	| { success: false; id: string; error: DispatchError }

// ============================================
// Result Factory Functions
// ============================================

/**
 * Create a failure result with the given error
 */
export const fail = <E>(error: E): { success: false; error: E } => ({
	success: false,
	error,
})

/**
 * Create a DispatchError object
 */
export const dispatchError = (
	code: DispatchErrorCode,
	message: string,
	options?: {
		cause?: Error | undefined
		batchIndex?: number | undefined
		remoteCode?: string | undefined
	},
): DispatchError => ({
	code,
	message,
	...options,
})

/**
 * Create a successful item result
 */
export const itemSuccess = <V>(id: string, data: V): ItemResult<V> => ({
	success: true,
	id,
	data,
})

/**
 * Create a failed item result with a DispatchError
 */
export const itemFail = <V = never>(
	id: string,
	code: DispatchErrorCode,
	message: string,
	options?: {
		cause?: Error | undefined
		batchIndex?: number | undefined
		remoteCode?: string | undefined
	},
): ItemResult<V> => ({
	success: false,
	id,
	error: dispatchError(code, message, options),
})

/**
 * Raised before any dispatch work starts when options or input are invalid
 */
export class DispatchConfigError extends Error {
	readonly code = 'INVALID_CONFIG' as const

	constructor(
		message: string,
		readonly issues: readonly string[] = [message],
	) {
		super(message)
		this.name = 'DispatchConfigError'
	}
}
