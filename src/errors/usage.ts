// ---------------------------------------------------------------------------
// Usage Errors — bad command-line flags
// ---------------------------------------------------------------------------

import type { AskshError } from './base.js';
import { createAskshError, EXIT_CODES, hasCode } from './base.js';

export const createUsageError = (message: string): AskshError =>
	createAskshError(message, {
		name: 'UsageError',
		code: 'USAGE_ERROR',
		exitCode: EXIT_CODES.usage,
	});

export const isUsageError = (value: unknown): value is AskshError =>
	hasCode(value, 'USAGE_ERROR');
