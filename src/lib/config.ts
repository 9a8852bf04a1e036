/**
 * Text-analytics configuration
 * Reads service credentials from an explicit environment record
 */

import { z } from 'zod'

import type { Result } from '../types/index.js'
import { fail } from '../types/index.js'
import { logger } from '../utils/logger.js'

/**
 * Text-analytics service configuration
 */
export interface TextAnalyticsConfig {
	/** Azure AI Language endpoint URL */
	endpoint: string
	/** Resource key */
	apiKey: string
	/** Request timeout in ms, forwarded as the per-batch timeout */
	timeout?: number | undefined
}

/**
 * Configuration loading error
 */
export interface ConfigError {
	code: 'CONFIG_ERROR'
	message: string
	/** One entry per invalid variable */
	issues: string[]
}

const envSchema = z.object({
	COG_SERVICE_ENDPOINT: z
		.string({ required_error: 'is required' })
		.url('must be a URL'),
	COG_SERVICE_KEY: z.string({ required_error: 'is required' }).min(1),
	COG_SERVICE_TIMEOUT: z.coerce.number().int().positive().optional(),
})

/**
 * Load text-analytics configuration from environment variables
 *
 * Recognized variables: COG_SERVICE_ENDPOINT, COG_SERVICE_KEY and the optional
 * COG_SERVICE_TIMEOUT (milliseconds).
 *
 * @param env - Environment record, usually process.env
 * @returns Configuration, or the list of invalid variables
 *
 * @example
 * ```typescript
 * const config = loadTextAnalyticsConfig(process.env)
 * if (!config.success) throw new Error(config.error.message)
 * ```
 */
export const loadTextAnalyticsConfig = (
	env: Record<string, string | undefined>,
): Result<TextAnalyticsConfig, ConfigError> => {
	const parsed = envSchema.safeParse(env)

	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			issue => `${issue.path.join('.')} ${issue.message}`,
		)
		logger.warn('Text analytics credentials not configured', {
			details: { issues },
		})
		return fail({
			code: 'CONFIG_ERROR',
			message: `Invalid text analytics configuration: ${issues.join(', ')}`,
			issues,
		})
	}

	return {
		success: true,
		data: {
			endpoint: parsed.data.COG_SERVICE_ENDPOINT,
			apiKey: parsed.data.COG_SERVICE_KEY,
			timeout: parsed.data.COG_SERVICE_TIMEOUT,
		},
	}
}
