// ---------------------------------------------------------------------------
// AskshError — base interface, factory, type guard, and utilities
// ---------------------------------------------------------------------------

/**
 * Every failure asksh reports is an `AskshError`: a plain `Error` carrying a
 * machine-readable `code` and the process exit status used when the failure
 * ends a one-shot run.
 */
export interface AskshError extends Error {
	/** Machine-readable error code (e.g. "BACKEND_TIMEOUT"). */
	readonly code: string;
	/** sysexits-style status for one-shot mode. */
	readonly exitCode: number;
	readonly metadata: Readonly<Record<string, unknown>>;
	/** Plain-object representation for logging. */
	readonly toJSON: () => Record<string, unknown>;
}

export interface AskshErrorOptions {
	readonly name?: string;
	readonly code?: string;
	readonly exitCode?: number;
	readonly cause?: unknown;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Exit statuses (sysexits.h)
// ---------------------------------------------------------------------------

export const EXIT_CODES = Object.freeze({
	ok: 0,
	failure: 1,
	usage: 64,
	unavailable: 69,
	osError: 71,
	ioError: 74,
	tempFail: 75,
	protocol: 76,
	config: 78,
});

// ---------------------------------------------------------------------------
// Base factory
// ---------------------------------------------------------------------------

const describeCause = (cause: unknown): unknown =>
	cause instanceof Error ? { name: cause.name, message: cause.message } : cause;

export const createAskshError = (
	message: string,
	options: AskshErrorOptions = {},
): AskshError => {
	const err = new Error(message, { cause: options.cause });
	err.name = options.name ?? 'AskshError';

	const code = options.code ?? 'ASKSH_ERROR';
	const exitCode = options.exitCode ?? EXIT_CODES.failure;
	const metadata = Object.freeze({ ...options.metadata });

	return Object.assign(err, {
		code,
		exitCode,
		metadata,
		toJSON: (): Record<string, unknown> => ({
			name: err.name,
			code,
			message: err.message,
			exitCode,
			metadata,
			cause: describeCause(err.cause),
			stack: err.stack,
		}),
	});
};

// ---------------------------------------------------------------------------
// Base type guard
// ---------------------------------------------------------------------------

/**
 * Duck-typed on `code`/`exitCode` rather than `instanceof`, so errors built
 * by any factory in this directory pass.
 */
export const isAskshError = (value: unknown): value is AskshError =>
	value instanceof Error &&
	'code' in value &&
	typeof value.code === 'string' &&
	'exitCode' in value &&
	typeof value.exitCode === 'number' &&
	'toJSON' in value &&
	typeof value.toJSON === 'function';

export const hasCode = (value: unknown, code: string): value is AskshError =>
	isAskshError(value) && value.code === code;

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

/**
 * Normalise an unknown thrown value into a proper `Error` instance.
 */
export const toError = (value: unknown): Error => {
	if (value instanceof Error) return value;
	if (typeof value === 'string') return new Error(value);
	return new Error(String(value));
};

/**
 * Wrap an unknown cause in an `AskshError`, keeping it as `cause`.
 */
export const wrapError = (
	message: string,
	cause: unknown,
	code?: string,
): AskshError => createAskshError(message, { cause, code });

/**
 * Human-readable reason for a cause: the system error code when there is one
 * (ECONNREFUSED, ENOTFOUND, EACCES…), otherwise its message.
 */
export const describeReason = (cause: unknown): string => {
	if (cause instanceof Error) {
		if ('code' in cause && typeof cause.code === 'string') return cause.code;
		if (cause.cause !== undefined) return describeReason(cause.cause);
		return cause.message;
	}
	return String(cause);
};
