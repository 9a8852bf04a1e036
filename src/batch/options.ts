/**
 * Dispatch option validation
 * Applies defaults and rejects invalid configuration before any work starts
 */

import { z } from 'zod'

import { DISPATCH_DEFAULTS } from '../lib/constants.js'
import type {
	DispatchOptions,
	RequestItem,
	ResolvedDispatchOptions,
} from '../types/index.js'
import { DispatchConfigError } from '../types/index.js'

const positiveInt = z.number().int().positive()

const dispatchOptionsSchema = z.object({
	maxBatchSize: positiveInt.optional(),
	maxBatchPayload: z.number().positive().optional(),
	maxConcurrentBatches: positiveInt.optional(),
	perBatchTimeout: z.number().finite().positive().optional(),
	rateLimit: z.number().finite().positive().optional(),
	signal: z.instanceof(AbortSignal).optional(),
	cancelPolicy: z.enum(['wait', 'abandon']).optional(),
	onBatchComplete: z.function().optional(),
})

const formatIssues = (error: z.ZodError): string[] =>
	error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)

/**
 * Validate dispatch options and apply defaults
 *
 * @param options - User-supplied options
 * @returns Options with every default resolved
 * @throws DispatchConfigError when an option is out of range
 */
export const resolveDispatchOptions = (
	options: DispatchOptions = {},
): ResolvedDispatchOptions => {
	const parsed = dispatchOptionsSchema.safeParse(options)
	if (!parsed.success) {
		const issues = formatIssues(parsed.error)
		throw new DispatchConfigError(
			`Invalid dispatch options: ${issues.join('; ')}`,
			issues,
		)
	}

	return {
		maxBatchSize: options.maxBatchSize ?? DISPATCH_DEFAULTS.maxBatchSize,
		maxBatchPayload:
			options.maxBatchPayload ?? DISPATCH_DEFAULTS.maxBatchPayload,
		maxConcurrentBatches:
			options.maxConcurrentBatches ??
			DISPATCH_DEFAULTS.maxConcurrentBatches,
		perBatchTimeout: options.perBatchTimeout,
		rateLimit: options.rateLimit,
		signal: options.signal,
		cancelPolicy: options.cancelPolicy ?? DISPATCH_DEFAULTS.cancelPolicy,
		onBatchComplete: options.onBatchComplete,
	}
}

/**
 * Check that item ids are unique and size hints are non-negative integers
 *
 * @throws DispatchConfigError listing every offending item
 */
export const validateItems = <P>(items: readonly RequestItem<P>[]): void => {
	const seen = new Set<string>()
	const issues: string[] = []

	for (const [position, item] of items.entries()) {
		if (seen.has(item.id)) {
			issues.push(`items.${position}.id: duplicate id "${item.id}"`)
		}
		seen.add(item.id)

		if (!Number.isInteger(item.sizeHint) || item.sizeHint < 0) {
			issues.push(
				`items.${position}.sizeHint: expected a non-negative integer`,
			)
		}
	}

	if (issues.length > 0) {
		throw new DispatchConfigError(
			`Invalid request items: ${issues.join('; ')}`,
			issues,
		)
	}
}
