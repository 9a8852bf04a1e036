/**
 * Logger functionality tests
 */

import { createLogger } from '@nextnode/logger'
import { describe, expect, it, vi } from 'vitest'

import { dispatchLogger, logger, transportLogger } from '../utils/logger.js'

// Mock @nextnode/logger
vi.mock('@nextnode/logger', () => ({
	createLogger: vi.fn(
		(): { info: () => void; warn: () => void; error: () => void } => ({
			info: vi.fn(),
			warn: vi.fn(),
			error: vi.fn(),
		}),
	),
}))

describe('Logger Utilities', () => {
	it('should create main logger', () => {
		expect(logger).toBeDefined()
		expect(logger.info).toBeDefined()
		expect(logger.warn).toBeDefined()
		expect(logger.error).toBeDefined()
	})

	it('should create prefixed loggers', () => {
		expect(dispatchLogger).toBeDefined()
		expect(transportLogger).toBeDefined()
		expect(createLogger).toHaveBeenCalledWith({ prefix: 'DISPATCH' })
		expect(createLogger).toHaveBeenCalledWith({ prefix: 'TRANSPORT' })
	})
})
