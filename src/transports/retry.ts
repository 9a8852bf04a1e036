/**
 * Retrying transport decorator
 * The dispatcher never retries; callers opt in by wrapping their transport
 */

import { RETRY_DEFAULTS } from '../lib/constants.js'
import type { Transport } from '../types/index.js'
import { calculateBackoff, delay, getErrorMessage } from '../utils/index.js'
import { transportLogger } from '../utils/logger.js'

/**
 * Retry options
 */
export interface RetryOptions {
	/** Max retry attempts after the first call */
	maxRetries?: number
	/** Initial retry delay in milliseconds */
	retryDelay?: number
	/** Max retry delay in milliseconds */
	maxRetryDelay?: number
	/** Decide whether a thrown error is worth retrying (default: always) */
	shouldRetry?: (error: unknown) => boolean
}

/**
 * Wrap a transport so wholesale failures are retried with exponential backoff
 *
 * Retries stop as soon as the batch signal aborts (timeout or cancellation);
 * the last error is then rethrown.
 *
 * @param transport - Transport to wrap
 * @param options - Retry options
 * @returns Transport with the same contract
 *
 * @example
 * ```typescript
 * const transport = withRetry(createSentimentTransport(client), { maxRetries: 2 })
 * ```
 */
export const withRetry = <P, V>(
	transport: Transport<P, V>,
	options: RetryOptions = {},
): Transport<P, V> => {
	const maxRetries = options.maxRetries ?? RETRY_DEFAULTS.maxRetries
	const retryDelay = options.retryDelay ?? RETRY_DEFAULTS.retryDelay
	const maxRetryDelay = options.maxRetryDelay ?? RETRY_DEFAULTS.maxRetryDelay
	const shouldRetry = options.shouldRetry ?? (() => true)

	return async (batch, context) => {
		for (let attempt = 1; ; attempt++) {
			try {
				return await transport(batch, { ...context, attempt })
			} catch (error) {
				if (
					attempt > maxRetries ||
					context.signal.aborted ||
					!shouldRetry(error)
				) {
					throw error
				}

				const backoff = calculateBackoff(
					attempt,
					retryDelay,
					maxRetryDelay,
				)
				transportLogger.warn('Batch attempt failed, retrying', {
					details: {
						batchIndex: context.batchIndex,
						attempt,
						backoffMs: Math.round(backoff),
						error: getErrorMessage(error),
					},
				})

				const waited = await delay(backoff, context.signal)
				if (!waited) throw error
			}
		}
	}
}
