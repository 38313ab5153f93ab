// ---------------------------------------------------------------------------
// Terminal IO — SessionIO over node:readline
//
// Lines are queued as they arrive, so piped input that shows up before the
// engine asks for it is not lost. Ctrl-C at a prompt and end of input both
// close the interface; a pending read then resolves undefined. While a
// command runs the terminal is back in cooked mode, so Ctrl-C reaches the
// child and the session survives it.
// ---------------------------------------------------------------------------

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { createInterface } from 'node:readline';
import { ReadStream } from 'node:tty';
import { toError } from '../src/errors/index.js';
import { createSilentLogger, type Logger } from '../src/logger.js';
import type { SessionIO } from '../src/session/types.js';
import type { Spinner } from './ui.js';

export const INPUT_HISTORY_LIMIT = 500;

export interface TerminalIOOptions {
	readonly input: NodeJS.ReadableStream;
	readonly output: NodeJS.WritableStream;
	readonly spinner?: Spinner;
	/** Where readline history is kept between sessions. */
	readonly historyPath?: string;
	/** Defaults to whether `output` is a TTY. */
	readonly terminal?: boolean;
	readonly logger?: Logger;
}

export interface TerminalIO extends SessionIO {
	readonly close: () => void;
}

// ---------------------------------------------------------------------------
// Input history file — one entry per line, newest first
// ---------------------------------------------------------------------------

const isMissing = (err: unknown): boolean =>
	err instanceof Error && 'code' in err && err.code === 'ENOENT';

export function loadInputHistory(path: string, logger: Logger): string[] {
	try {
		return readFileSync(path, 'utf-8')
			.split('\n')
			.filter((line) => line.trim() !== '')
			.slice(0, INPUT_HISTORY_LIMIT);
	} catch (err) {
		if (!isMissing(err)) {
			logger.warn(`Input history not loaded from ${path}`, {
				error: toError(err).message,
			});
		}
		return [];
	}
}

export function saveInputHistory(
	path: string,
	lines: readonly string[],
	logger: Logger,
): void {
	try {
		mkdirSync(dirname(path), { recursive: true });
		const kept = lines.slice(0, INPUT_HISTORY_LIMIT);
		writeFileSync(path, kept.length > 0 ? `${kept.join('\n')}\n` : '');
	} catch (err) {
		logger.warn(`Input history not saved to ${path}`, {
			error: toError(err).message,
		});
	}
}

// ---------------------------------------------------------------------------
// Piped input
// ---------------------------------------------------------------------------

/** How long piped input may stay silent before it is taken as complete. */
export const PIPE_IDLE_MS = 2000;

/**
 * Read piped stdin to end of input, or until it has been silent for
 * `idleMs`. A writer that never closes the pipe cannot stall a one-shot run.
 */
export function readPipedInput(
	input: NodeJS.ReadableStream,
	idleMs: number = PIPE_IDLE_MS,
	logger: Logger = createSilentLogger(),
): Promise<string> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		let timer: ReturnType<typeof setTimeout> | undefined;

		const detach = (): void => {
			clearTimeout(timer);
			input.off('data', onData);
			input.off('end', onEnd);
			input.off('error', onError);
		};
		const finish = (): void => {
			detach();
			resolve(Buffer.concat(chunks).toString('utf-8'));
		};
		const arm = (): void => {
			clearTimeout(timer);
			timer = setTimeout(() => {
				logger.debug('Piped input went quiet; using what arrived', {
					bytes: chunks.reduce((n, c) => n + c.length, 0),
				});
				input.pause();
				finish();
			}, idleMs);
		};
		function onData(chunk: Buffer | string): void {
			chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
			arm();
		}
		function onEnd(): void {
			finish();
		}
		function onError(err: Error): void {
			detach();
			reject(err);
		}

		input.on('data', onData);
		input.on('end', onEnd);
		input.on('error', onError);
		arm();
	});
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTerminalIO(options: TerminalIOOptions): TerminalIO {
	const { input, output, spinner, historyPath } = options;
	const logger = (options.logger ?? createSilentLogger()).child('terminal');
	const terminal =
		options.terminal ?? ('isTTY' in output && output.isTTY === true);

	const rl = createInterface({
		input,
		output,
		terminal,
		history: historyPath ? loadInputHistory(historyPath, logger) : [],
		historySize: INPUT_HISTORY_LIMIT,
		removeHistoryDuplicates: true,
	});

	const queued: string[] = [];
	let waiting: ((line: string | undefined) => void) | undefined;
	let closed = false;

	const settle = (line: string | undefined): boolean => {
		if (!waiting) return false;
		const resolve = waiting;
		waiting = undefined;
		resolve(line);
		return true;
	};

	rl.on('line', (line: string) => {
		if (!settle(line)) queued.push(line);
	});
	rl.on('close', () => {
		closed = true;
		settle(undefined);
	});
	rl.on('SIGINT', () => {
		output.write('\n');
		rl.close();
	});
	if (historyPath) {
		rl.on('history', (history: string[]) => {
			saveInputHistory(historyPath, history, logger);
		});
	}

	const read = (prompt: string): Promise<string | undefined> => {
		const next = queued.shift();
		if (next !== undefined) return Promise.resolve(next);
		if (closed) return Promise.resolve(undefined);

		return new Promise((resolve) => {
			waiting = resolve;
			rl.setPrompt(prompt);
			rl.prompt();
		});
	};

	const write = (text: string): void => {
		output.write(`${text}\n`);
	};

	const busy = (active: boolean, label?: string): void => {
		if (!spinner) return;
		if (active) spinner.start(label);
		else spinner.stop();
	};

	// -- Handing the terminal to a child --------------------------------------

	let suspended = false;

	const onChildInterrupt = (): void => {
		logger.debug('Interrupt left to the running command');
	};

	const setRawMode = (raw: boolean): void => {
		if (terminal && input instanceof ReadStream && input.isTTY) {
			input.setRawMode(raw);
		}
	};

	const suspend = (): void => {
		if (suspended || closed) return;
		suspended = true;
		spinner?.stop();
		rl.pause();
		setRawMode(false);
		process.on('SIGINT', onChildInterrupt);
	};

	const resume = (): void => {
		if (!suspended) return;
		suspended = false;
		process.off('SIGINT', onChildInterrupt);
		if (closed) return;
		setRawMode(true);
		rl.resume();
	};

	const close = (): void => {
		spinner?.stop();
		resume();
		if (!closed) rl.close();
	};

	return Object.freeze({ read, write, busy, suspend, resume, close });
}
