/**
 * Batch module
 * Exports the batcher, dispatcher and option validation
 */

export { dispatch } from './dispatcher.js'
export { resolveDispatchOptions, validateItems } from './options.js'
export { partition } from './partition.js'
