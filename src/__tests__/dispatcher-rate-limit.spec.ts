/**
 * Dispatcher cancellation around rate-limited batch starts
 */

import { beforeEach, describe, expect, it, vi } from 'vitest'

import { dispatch } from '../batch/dispatcher.js'
import type { Transport } from '../types/index.js'
import { createItems, echoTransport } from './helpers/test-utils.js'

const limiter = vi.hoisted(() => ({
	// Runs after the token is granted, before the batch starts
	onGranted: (): void => undefined,
}))

// Mock rate limiter so a token is always granted
vi.mock('../lib/rate-limiter.js', () => ({
	createTokenBucket: vi.fn(() => ({
		acquire: vi.fn(async () => {
			limiter.onGranted()
			return true
		}),
		getStatus: vi.fn(),
		destroy: vi.fn(),
	})),
}))

// Mock logger
vi.mock('../utils/logger.js', () => ({
	logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
	dispatchLogger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
	transportLogger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}))

describe('dispatch with a rate limit', () => {
	beforeEach(() => {
		vi.clearAllMocks()
		limiter.onGranted = () => undefined
	})

	it('should send every batch once tokens are granted', async () => {
		const transport = vi.fn(echoTransport)

		const report = await dispatch(createItems(4), transport, {
			maxBatchSize: 2,
			rateLimit: 10,
		})

		expect(transport).toHaveBeenCalledTimes(2)
		expect(report.successful).toBe(4)
	})

	it.each(['wait', 'abandon'] as const)(
		'should not start a batch cancelled after its token was granted (%s)',
		async cancelPolicy => {
			const controller = new AbortController()
			limiter.onGranted = () => controller.abort()
			const transport = vi.fn<Transport<string, string>>(echoTransport)

			const report = await dispatch(createItems(4), transport, {
				maxBatchSize: 2,
				rateLimit: 10,
				signal: controller.signal,
				cancelPolicy,
			})

			expect(transport).not.toHaveBeenCalled()
			expect(report.batchCount).toBe(0)
			expect(
				report.results.map(result =>
					result.success ? 'ok' : result.error.message,
				),
			).toEqual([
				'Dispatch cancelled before batch started',
				'Dispatch cancelled before batch started',
				'Dispatch cancelled before batch started',
				'Dispatch cancelled before batch started',
			])
		},
	)
})
