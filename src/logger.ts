// ---------------------------------------------------------------------------
// Structured Logger — Functional API
// ---------------------------------------------------------------------------
//
// Logger "instances" are frozen records of functions closing over a shared
// state object, so a child logger follows its parent's level and transports.
// ---------------------------------------------------------------------------

import { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze([
	'debug',
	'info',
	'warn',
	'error',
	'none',
]);

const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = Object.freeze({
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	none: 4,
});

export const isLogLevel = (value: unknown): value is LogLevel =>
	typeof value === 'string' && LOG_LEVELS.some((level) => level === value);

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export interface LogEntry {
	readonly level: LogLevel;
	readonly message: string;
	readonly timestamp: string;
	readonly context?: string;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface LogTransport {
	readonly write: (entry: LogEntry) => void;
}

// ---------------------------------------------------------------------------
// Built-in Transports
// ---------------------------------------------------------------------------

export interface StreamTransportOptions {
	readonly stream?: NodeJS.WritableStream;
	/** Force colour on/off; defaults to chalk's detection. */
	readonly color?: boolean;
}

const levelColour = (chalk: ChalkInstance, level: LogLevel): ChalkInstance => {
	switch (level) {
		case 'debug':
			return chalk.gray;
		case 'info':
			return chalk.cyan;
		case 'warn':
			return chalk.yellow;
		default:
			return chalk.red;
	}
};

/**
 * Writes one line per entry to a stream (stderr by default), so log output
 * never mixes with the command text printed on stdout.
 */
export const createStreamTransport = (
	options: StreamTransportOptions = {},
): LogTransport => {
	const stream = options.stream ?? process.stderr;
	const chalk =
		options.color === undefined
			? new Chalk()
			: new Chalk({ level: options.color ? 1 : 0 });

	return Object.freeze({
		write(entry: LogEntry): void {
			const tag = levelColour(chalk, entry.level)(
				entry.level.toUpperCase().padEnd(5),
			);
			const prefix = entry.context ? ` [${entry.context}]` : '';
			const meta =
				entry.metadata !== undefined && Object.keys(entry.metadata).length > 0
					? ` ${chalk.dim(JSON.stringify(entry.metadata))}`
					: '';
			stream.write(
				`${tag} ${chalk.dim(entry.timestamp)}${prefix} ${entry.message}${meta}\n`,
			);
		},
	});
};

/**
 * A transport backed by a mutable array — useful for testing.
 */
export interface MemoryTransportHandle extends LogTransport {
	readonly entries: LogEntry[];
	readonly clear: () => void;
	readonly filter: (level: LogLevel) => readonly LogEntry[];
}

export const createMemoryTransport = (): MemoryTransportHandle => {
	const entries: LogEntry[] = [];

	return {
		entries,
		write(entry: LogEntry): void {
			entries.push(entry);
		},
		clear(): void {
			entries.length = 0;
		},
		filter(level: LogLevel): readonly LogEntry[] {
			return entries.filter((e) => e.level === level);
		},
	};
};

// ---------------------------------------------------------------------------
// Logger interface — a record of functions
// ---------------------------------------------------------------------------

export interface Logger {
	readonly debug: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly info: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly warn: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly error: (
		message: string,
		errorOrMetadata?: unknown,
	) => void;
	readonly child: (childContext: string) => Logger;
	readonly setLevel: (level: LogLevel) => void;
	readonly getLevel: () => LogLevel;
	readonly addTransport: (transport: LogTransport) => void;
	readonly clearTransports: () => void;
}

export interface LoggerOptions {
	readonly context?: string;
	readonly level?: LogLevel;
	readonly transports?: readonly LogTransport[];
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

const resolveErrorMetadata = (
	errorOrMetadata: unknown,
): Readonly<Record<string, unknown>> | undefined => {
	if (errorOrMetadata === undefined) return undefined;

	if (errorOrMetadata instanceof Error) {
		const cause = errorOrMetadata.cause;
		return {
			errorName: errorOrMetadata.name,
			errorMessage: errorOrMetadata.message,
			...('code' in errorOrMetadata ? { code: errorOrMetadata.code } : {}),
			...(cause != null
				? { cause: cause instanceof Error ? cause.message : String(cause) }
				: {}),
		};
	}

	if (typeof errorOrMetadata === 'object' && errorOrMetadata !== null) {
		return Object.fromEntries(Object.entries(errorOrMetadata));
	}

	return { value: String(errorOrMetadata) };
};

/** Shared by a logger and all of its children. */
interface LoggerState {
	level: LogLevel;
	readonly transports: LogTransport[];
}

const buildLogger = (
	context: string | undefined,
	state: LoggerState,
): Logger => {
	const log = (
		level: LogLevel,
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	): void => {
		if (level === 'none') return;
		if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[state.level]) return;

		const entry: LogEntry = Object.freeze({
			level,
			message,
			timestamp: new Date().toISOString(),
			context,
			metadata,
		});

		for (const transport of state.transports) {
			transport.write(entry);
		}
	};

	return Object.freeze({
		debug: (message: string, metadata?: Readonly<Record<string, unknown>>) =>
			log('debug', message, metadata),
		info: (message: string, metadata?: Readonly<Record<string, unknown>>) =>
			log('info', message, metadata),
		warn: (message: string, metadata?: Readonly<Record<string, unknown>>) =>
			log('warn', message, metadata),
		error: (message: string, errorOrMetadata?: unknown) =>
			log('error', message, resolveErrorMetadata(errorOrMetadata)),

		child: (childContext: string): Logger =>
			buildLogger(context ? `${context}:${childContext}` : childContext, state),

		setLevel: (level: LogLevel): void => {
			state.level = level;
		},
		getLevel: (): LogLevel => state.level,

		addTransport: (transport: LogTransport): void => {
			state.transports.push(transport);
		},
		clearTransports: (): void => {
			state.transports.length = 0;
		},
	});
};

export const createLogger = (options: LoggerOptions = {}): Logger =>
	buildLogger(options.context, {
		level: options.level ?? 'warn',
		transports: options.transports
			? [...options.transports]
			: [createStreamTransport()],
	});

/** A logger that drops everything; the default for library callers. */
export const createSilentLogger = (): Logger =>
	createLogger({ level: 'none', transports: [] });
