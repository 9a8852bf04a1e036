/**
 * Utility functions for the library
 */

/**
 * Extract error message from unknown error
 * Standardizes error message extraction across the codebase
 *
 * @param error - Unknown error value
 * @param fallback - Fallback message if error is not an Error instance
 * @returns Error message string
 */
export const getErrorMessage = (
	error: unknown,
	fallback = 'Unknown error',
): string => (error instanceof Error ? error.message : fallback)

/**
 * Narrow an unknown thrown value to an Error cause
 */
export const asCause = (error: unknown): Error | undefined =>
	error instanceof Error ? error : undefined

/**
 * Delay execution for specified milliseconds
 * @param ms - Milliseconds to wait
 * @param signal - Ends the wait early when aborted
 * @returns Promise resolving true after the delay, false if aborted first
 */
export const delay = (ms: number, signal?: AbortSignal): Promise<boolean> =>
	new Promise(resolve => {
		if (signal?.aborted) {
			resolve(false)
			return
		}

		const onAbort = (): void => {
			clearTimeout(timeoutId)
			resolve(false)
		}
		const timeoutId = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort)
			resolve(true)
		}, ms)

		signal?.addEventListener('abort', onAbort, { once: true })
	})

/**
 * Calculate exponential backoff delay with jitter
 * @param attempt - Current attempt number (1-based)
 * @param retryDelay - Base retry delay in ms
 * @param maxRetryDelay - Maximum retry delay in ms
 * @returns Backoff delay in ms
 */
export const calculateBackoff = (
	attempt: number,
	retryDelay: number,
	maxRetryDelay: number,
): number => {
	const baseDelay = retryDelay * 2 ** (attempt - 1)
	// Add jitter (0-25% of delay)
	const jitter = baseDelay * Math.random() * 0.25
	return Math.min(baseDelay + jitter, maxRetryDelay)
}
