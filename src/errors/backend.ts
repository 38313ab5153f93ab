// ---------------------------------------------------------------------------
// Backend Errors — inference endpoint failures
// ---------------------------------------------------------------------------

import type { AskshError } from './base.js';
import { createAskshError, EXIT_CODES, hasCode, isAskshError } from './base.js';

export const createBackendUnreachableError = (
	url: string,
	options: { status?: number; reason: string; cause?: unknown },
): AskshError & {
	readonly url: string;
	readonly status: number | undefined;
	readonly reason: string;
} => {
	const detail =
		options.status !== undefined
			? `HTTP ${options.status}${options.reason ? ` - ${options.reason}` : ''}`
			: options.reason;
	return Object.assign(
		createAskshError(`Backend at ${url} is unreachable: ${detail}`, {
			name: 'BackendUnreachableError',
			code: 'BACKEND_UNREACHABLE',
			exitCode: EXIT_CODES.unavailable,
			cause: options.cause,
			metadata: { url, status: options.status, reason: options.reason },
		}),
		{ url, status: options.status, reason: options.reason },
	);
};

export const createBackendTimeoutError = (
	url: string,
	timeoutMs: number,
	options: { cause?: unknown } = {},
): AskshError & { readonly url: string; readonly timeoutMs: number } =>
	Object.assign(
		createAskshError(`Backend at ${url} timed out after ${timeoutMs}ms`, {
			name: 'BackendTimeoutError',
			code: 'BACKEND_TIMEOUT',
			exitCode: EXIT_CODES.tempFail,
			cause: options.cause,
			metadata: { url, timeoutMs },
		}),
		{ url, timeoutMs },
	);

export const createBackendInvalidResponseError = (
	url: string,
	reason: string,
	options: { cause?: unknown } = {},
): AskshError & { readonly url: string } =>
	Object.assign(
		createAskshError(`Backend at ${url} sent an invalid response: ${reason}`, {
			name: 'BackendInvalidResponseError',
			code: 'BACKEND_INVALID_RESPONSE',
			exitCode: EXIT_CODES.protocol,
			cause: options.cause,
			metadata: { url, reason },
		}),
		{ url },
	);

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isBackendError = (value: unknown): value is AskshError =>
	isAskshError(value) && value.code.startsWith('BACKEND_');

export const isBackendUnreachableError = (
	value: unknown,
): value is AskshError & {
	readonly url: string;
	readonly status: number | undefined;
	readonly reason: string;
} => hasCode(value, 'BACKEND_UNREACHABLE');

export const isBackendTimeoutError = (
	value: unknown,
): value is AskshError & { readonly url: string; readonly timeoutMs: number } =>
	hasCode(value, 'BACKEND_TIMEOUT');

export const isBackendInvalidResponseError = (
	value: unknown,
): value is AskshError & { readonly url: string } =>
	hasCode(value, 'BACKEND_INVALID_RESPONSE');
