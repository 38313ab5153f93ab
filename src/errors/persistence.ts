// ---------------------------------------------------------------------------
// Persistence Errors — config/history writes
// ---------------------------------------------------------------------------

import type { AskshError } from './base.js';
import { createAskshError, describeReason, EXIT_CODES, hasCode } from './base.js';

export type PersistenceOperation = 'save' | 'append' | 'clear';

export const createPersistenceError = (
	path: string,
	operation: PersistenceOperation,
	options: { cause?: unknown } = {},
): AskshError & {
	readonly path: string;
	readonly operation: PersistenceOperation;
} =>
	Object.assign(
		createAskshError(
			`Failed to ${operation} ${path}${options.cause !== undefined ? ` (${describeReason(options.cause)})` : ''}`,
			{
				name: 'PersistenceError',
				code: 'PERSISTENCE_FAILED',
				exitCode: EXIT_CODES.ioError,
				cause: options.cause,
				metadata: { path, operation },
			},
		),
		{ path, operation },
	);

export const isPersistenceError = (
	value: unknown,
): value is AskshError & {
	readonly path: string;
	readonly operation: PersistenceOperation;
} => hasCode(value, 'PERSISTENCE_FAILED');
