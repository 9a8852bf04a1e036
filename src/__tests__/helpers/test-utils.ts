/**
 * Shared test utilities
 * Common helpers for dispatcher and transport tests
 */

import type {
	BatchResponse,
	RequestItem,
	Transport,
} from '../../types/index.js'

/**
 * Create a request item whose payload is its own id
 */
export const createItem = (id: string, sizeHint = 1): RequestItem<string> => ({
	id,
	payload: `payload-${id}`,
	sizeHint,
})

/**
 * Create `count` items named item-0, item-1, ...
 *
 * @param count - Number of items
 * @param sizeOf - Size hint per position (default: 1)
 */
export const createItems = (
	count: number,
	sizeOf: (index: number) => number = () => 1,
): RequestItem<string>[] =>
	Array.from({ length: count }, (_, index) =>
		createItem(`item-${index}`, sizeOf(index)),
	)

type ResponseEntry<V> = BatchResponse<V>[number]

/**
 * Successful response entry
 */
export const ok = <V>(id: string, data: V): ResponseEntry<V> => ({
	id,
	outcome: { success: true, data },
})

/**
 * Remote error response entry
 */
export const rejected = <V = string>(
	id: string,
	message: string,
	code?: string,
): ResponseEntry<V> => ({
	id,
	outcome: { success: false, error: { message, code } },
})

/**
 * Build a successful response for every item of a batch
 */
export const echoResponse = (
	items: readonly RequestItem<string>[],
): BatchResponse<string> => items.map(item => ok(item.id, item.payload))

/**
 * Transport echoing every payload back as a success
 */
export const echoTransport: Transport<string, string> = batch =>
	echoResponse(batch.items)

/**
 * Resolve after `ms`, or reject when the signal aborts first
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
	new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new Error('aborted'))
			return
		}
		const timeoutId = setTimeout(resolve, ms)
		signal?.addEventListener(
			'abort',
			() => {
				clearTimeout(timeoutId)
				reject(new Error('aborted'))
			},
			{ once: true },
		)
	})
