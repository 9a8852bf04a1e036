/**
 * Batch rate limiter
 * Token Bucket algorithm spacing out batch starts within one dispatch
 */

import { delay } from '../utils/index.js'

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
	/** Maximum batch starts per second */
	limit: number
	/** Burst capacity (default = limit) */
	burstCapacity?: number
}

/**
 * Rate limiter status
 */
export interface RateLimiterStatus {
	/** Configured limit (batches/second) */
	limit: number
	/** Current available tokens */
	availableTokens: number
	/** Burst capacity */
	burstCapacity: number
	/** Time of last token refill */
	lastRefillTime: number
}

/**
 * Token bucket interface
 */
export interface TokenBucket {
	/**
	 * Acquire permission to start a batch (waits until rate allows).
	 * Resolves false without taking a token when the signal aborts first.
	 */
	acquire(signal?: AbortSignal): Promise<boolean>
	/** Get current rate limiter status */
	getStatus(): RateLimiterStatus
	/** Shutdown and release resources */
	destroy(): void
}

/**
 * Create a token bucket rate limiter
 *
 * @param config - Rate limiter configuration
 * @returns TokenBucket instance
 *
 * @example
 * ```typescript
 * const limiter = createTokenBucket({ limit: 2, burstCapacity: 1 })
 * await limiter.acquire()  // Waits until rate allows
 * ```
 */
export const createTokenBucket = (config: RateLimiterConfig): TokenBucket => {
	if (config.limit <= 0) {
		throw new Error('Rate limit must be greater than 0')
	}

	const capacity = config.burstCapacity ?? config.limit
	const refillRate = config.limit / 1000 // tokens per millisecond

	let tokens = capacity
	let lastRefillTime = Date.now()
	let isDestroyed = false
	// Serializes waiters so concurrent workers are spaced out, not released together
	let queue: Promise<unknown> = Promise.resolve()

	/**
	 * Refill tokens based on elapsed time
	 */
	const refill = (): void => {
		const now = Date.now()
		const elapsed = now - lastRefillTime
		const tokensToAdd = elapsed * refillRate

		tokens = Math.min(capacity, tokens + tokensToAdd)
		lastRefillTime = now
	}

	const take = async (signal?: AbortSignal): Promise<boolean> => {
		if (isDestroyed) {
			throw new Error('Rate limiter has been destroyed')
		}
		if (signal?.aborted) return false

		refill()

		if (tokens >= 1) {
			tokens -= 1
			return true
		}

		// Calculate wait time for next token
		const tokensNeeded = 1 - tokens
		const waitTime = tokensNeeded / refillRate

		const completed = await delay(waitTime, signal)
		if (!completed) return false

		// After waiting, take the token
		tokens = 0
		lastRefillTime = Date.now()
		return true
	}

	const acquire = (signal?: AbortSignal): Promise<boolean> => {
		const next = queue.then(() => take(signal))
		queue = next.catch(() => undefined)
		return next
	}

	const getStatus = (): RateLimiterStatus => {
		refill()
		return {
			limit: config.limit,
			availableTokens: tokens,
			burstCapacity: capacity,
			lastRefillTime,
		}
	}

	const destroy = (): void => {
		isDestroyed = true
		tokens = 0
	}

	return {
		acquire,
		getStatus,
		destroy,
	}
}
