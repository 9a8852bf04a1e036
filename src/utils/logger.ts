/**
 * Logger utility for text-batch-dispatch
 * Centralized logging with @nextnode/logger
 */

import { createLogger } from '@nextnode/logger'

/** Main library logger */
export const logger = createLogger()

/** Batch dispatch logger */
export const dispatchLogger = createLogger({
	prefix: 'DISPATCH',
})

/** Transport operations logger */
export const transportLogger = createLogger({
	prefix: 'TRANSPORT',
})
