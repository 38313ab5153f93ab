// ---------------------------------------------------------------------------
// CommandRunner
//
// Runs a confirmed command string through `<shell> -c`, streams its output
// to optional sinks, and captures it up to a byte limit. A non-zero exit
// code is reported as data; only a failure to start the process is an error.
// ---------------------------------------------------------------------------

import { type ChildProcess, spawn } from 'node:child_process';
import { constants } from 'node:os';
import { createExecutionError, describeReason } from '../errors/index.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CommandResult {
	/** Null when the process was ended by a signal. */
	readonly exitCode: number | null;
	readonly signal: NodeJS.Signals | null;
	readonly stdout: string;
	readonly stderr: string;
	/** True when either stream exceeded `maxOutputBytes`. */
	readonly truncated: boolean;
	readonly durationMs: number;
}

export interface CommandRunnerOptions {
	readonly shell?: string;
	readonly cwd?: string;
	readonly env?: Readonly<Record<string, string>>;
	readonly maxOutputBytes?: number;
	/**
	 * `'inherit'` (default) lets the command read the terminal, e.g. to
	 * answer its own prompts; `'ignore'` gives it end of input.
	 */
	readonly stdin?: 'inherit' | 'ignore';
	readonly onStdout?: (chunk: string) => void;
	readonly onStderr?: (chunk: string) => void;
}

export interface CommandRunner {
	readonly run: (commandText: string) => Promise<CommandResult>;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const DEFAULT_SHELL = '/bin/sh';
const DEFAULT_MAX_OUTPUT_BYTES = 50_000;

// ---------------------------------------------------------------------------
// Output capture
// ---------------------------------------------------------------------------

interface Capture {
	readonly push: (chunk: Buffer) => void;
	readonly text: () => string;
	readonly truncated: () => boolean;
}

function createCapture(maxBytes: number): Capture {
	const chunks: Buffer[] = [];
	let size = 0;
	let total = 0;

	return {
		push(chunk: Buffer): void {
			total += chunk.length;
			if (size >= maxBytes) return;
			const room = maxBytes - size;
			const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
			chunks.push(kept);
			size += kept.length;
		},
		text: () => Buffer.concat(chunks).toString('utf-8'),
		truncated: () => total > maxBytes,
	};
}

// ---------------------------------------------------------------------------
// Exit status
// ---------------------------------------------------------------------------

const signalNumber = (signal: string): number => {
	const value: unknown = Reflect.get(constants.signals, signal);
	return typeof value === 'number' ? value : 0;
};

/** Shell convention: the exit code, or 128 + the signal number. */
export function exitStatusOf(result: CommandResult): number {
	if (result.exitCode !== null) return result.exitCode;
	return 128 + (result.signal ? signalNumber(result.signal) : 0);
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createCommandRunner(
	options: CommandRunnerOptions = {},
): CommandRunner {
	const {
		shell = DEFAULT_SHELL,
		cwd,
		env,
		maxOutputBytes = DEFAULT_MAX_OUTPUT_BYTES,
		stdin = 'inherit',
		onStdout,
		onStderr,
	} = options;

	const run = (commandText: string): Promise<CommandResult> => {
		const command = commandText.trim();
		if (command === '') {
			return Promise.reject(
				createExecutionError(commandText, 'command is empty'),
			);
		}

		return new Promise<CommandResult>((resolve, reject) => {
			const started = Date.now();
			const stdout = createCapture(maxOutputBytes);
			const stderr = createCapture(maxOutputBytes);
			let settled = false;

			let child: ChildProcess;
			try {
				child = spawn(shell, ['-c', command], {
					cwd,
					env: env ? { ...process.env, ...env } : process.env,
					stdio: [stdin, 'pipe', 'pipe'],
				});
			} catch (err) {
				reject(createExecutionError(command, describeReason(err), { cause: err }));
				return;
			}

			child.stdout?.on('data', (chunk: Buffer) => {
				stdout.push(chunk);
				onStdout?.(chunk.toString('utf-8'));
			});
			child.stderr?.on('data', (chunk: Buffer) => {
				stderr.push(chunk);
				onStderr?.(chunk.toString('utf-8'));
			});

			child.on('error', (err) => {
				if (settled) return;
				settled = true;
				reject(
					createExecutionError(
						command,
						`${shell}: ${describeReason(err)}`,
						{ cause: err },
					),
				);
			});

			child.on('close', (code, signal) => {
				if (settled) return;
				settled = true;
				resolve(
					Object.freeze({
						exitCode: code,
						signal,
						stdout: stdout.text(),
						stderr: stderr.text(),
						truncated: stdout.truncated() || stderr.truncated(),
						durationMs: Date.now() - started,
					}),
				);
			});
		});
	};

	return Object.freeze({ run });
}
