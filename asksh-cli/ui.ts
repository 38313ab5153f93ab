/**
 * Terminal UI primitives: chalk-backed colours and the busy spinner.
 */

import { Chalk } from 'chalk';
import type { TermColors } from '../src/session/types.js';

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

export interface TermColorsOptions {
	readonly enabled?: boolean;
}

export function createColors(options?: TermColorsOptions): TermColors {
	const enabled =
		options?.enabled ??
		(process.stdout.isTTY === true && !process.env.NO_COLOR);
	const chalk = new Chalk({ level: enabled ? 1 : 0 });

	return Object.freeze({
		bold: (s: string) => chalk.bold(s),
		dim: (s: string) => chalk.dim(s),
		italic: (s: string) => chalk.italic(s),
		red: (s: string) => chalk.red(s),
		green: (s: string) => chalk.green(s),
		yellow: (s: string) => chalk.yellow(s),
		blue: (s: string) => chalk.blue(s),
		magenta: (s: string) => chalk.magenta(s),
		cyan: (s: string) => chalk.cyan(s),
		gray: (s: string) => chalk.gray(s),
		enabled,
	});
}

// ---------------------------------------------------------------------------
// Spinner
// ---------------------------------------------------------------------------

export interface Spinner {
	readonly start: (message?: string) => void;
	readonly stop: () => void;
	readonly isSpinning: () => boolean;
}

/** The part of a TTY stream the spinner writes through. */
export interface SpinnerStream {
	readonly isTTY?: boolean;
	write(chunk: string): boolean;
}

export interface SpinnerOptions {
	readonly colors: TermColors;
	readonly stream?: SpinnerStream;
	readonly intervalMs?: number;
}

const SPINNER_FRAMES = ['·', '✢', '✳', '∗', '✻', '✽'];

/**
 * On a TTY, animates in place and erases itself on stop. Elsewhere it prints
 * the message once so logs still show what the session was waiting on.
 */
export function createSpinner(options: SpinnerOptions): Spinner {
	const { colors } = options;
	const stream = options.stream ?? process.stderr;
	const isTTY = stream.isTTY === true;
	const intervalMs = options.intervalMs ?? 120;

	let timer: ReturnType<typeof setInterval> | undefined;
	let frameIdx = 0;
	let currentMessage = '';
	let spinning = false;

	const clearLine = (): void => {
		if (isTTY) stream.write('\x1b[2K\r');
	};

	const render = (): void => {
		const frame = colors.yellow(
			SPINNER_FRAMES[frameIdx % SPINNER_FRAMES.length] ?? '·',
		);
		clearLine();
		stream.write(`  ${frame} ${colors.dim(currentMessage)}`);
		frameIdx++;
	};

	const stop = (): void => {
		if (timer) {
			clearInterval(timer);
			timer = undefined;
		}
		if (spinning && isTTY) {
			clearLine();
			stream.write('\x1b[?25h'); // restore cursor
		}
		spinning = false;
	};

	const start = (message?: string): void => {
		stop();
		currentMessage = message ?? '';
		frameIdx = 0;
		spinning = true;

		if (!isTTY) {
			if (currentMessage) stream.write(`  ${currentMessage}\n`);
			return;
		}

		stream.write('\x1b[?25l'); // hide cursor
		render();
		timer = setInterval(render, intervalMs);
	};

	return Object.freeze({ start, stop, isSpinning: () => spinning });
}
