// ---------------------------------------------------------------------------
// Execution Errors — the confirmed command could not be started
// ---------------------------------------------------------------------------

import type { AskshError } from './base.js';
import { createAskshError, EXIT_CODES, hasCode } from './base.js';

export const createExecutionError = (
	command: string,
	reason: string,
	options: { cause?: unknown } = {},
): AskshError & { readonly command: string } =>
	Object.assign(
		createAskshError(`Could not execute command: ${reason}`, {
			name: 'ExecutionError',
			code: 'EXECUTION_FAILED',
			exitCode: EXIT_CODES.osError,
			cause: options.cause,
			metadata: { command },
		}),
		{ command },
	);

export const isExecutionError = (
	value: unknown,
): value is AskshError & { readonly command: string } =>
	hasCode(value, 'EXECUTION_FAILED');
