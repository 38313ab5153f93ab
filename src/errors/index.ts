// ---------------------------------------------------------------------------
// Error barrel — re-exports all error factories, type guards, and utilities
// ---------------------------------------------------------------------------

export {
	type AskshError,
	type AskshErrorOptions,
	createAskshError,
	describeReason,
	EXIT_CODES,
	hasCode,
	isAskshError,
	toError,
	wrapError,
} from './base.js';
export {
	createBackendInvalidResponseError,
	createBackendTimeoutError,
	createBackendUnreachableError,
	isBackendError,
	isBackendInvalidResponseError,
	isBackendTimeoutError,
	isBackendUnreachableError,
} from './backend.js';
export {
	createConfigLoadError,
	createInvalidOptionValueError,
	createStartupError,
	createUnknownOptionError,
	isConfigError,
	isConfigLoadError,
	isInvalidOptionValueError,
	isStartupError,
	isUnknownOptionError,
} from './config.js';
export { createExecutionError, isExecutionError } from './execution.js';
export {
	createPersistenceError,
	isPersistenceError,
	type PersistenceOperation,
} from './persistence.js';
export { createUsageError, isUsageError } from './usage.js';
