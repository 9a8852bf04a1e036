/**
 * Type definitions for text-batch-dispatch
 * Barrel export for all type definitions
 */

// Batch types
export type {
	BatchProgress,
	CancelPolicy,
	DispatchOptions,
	DispatchReport,
	ResolvedDispatchOptions,
} from './batch.js'
// Result types (discriminated unions)
export type {
	DispatchError,
	DispatchErrorCode,
	ItemResult,
	Result,
} from './result.js'
// Result factory functions
export {
	DispatchConfigError,
	dispatchError,
	fail,
	itemFail,
	itemSuccess,
} from './result.js'
// Transport types (function capability)
export type {
	Batch,
	BatchResponse,
	ItemOutcome,
	RemoteItemError,
	RequestItem,
	Transport,
	TransportContext,
} from './transport.js'
