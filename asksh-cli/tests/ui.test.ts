import { afterEach, describe, expect, it, vi } from 'vitest';
import { plainColors } from '../../src/session/types.js';
import { createColors, createSpinner, type SpinnerStream } from '../ui.js';

const recorder = (isTTY: boolean) => {
	const chunks: string[] = [];
	const stream: SpinnerStream = {
		isTTY,
		write: (chunk: string) => {
			chunks.push(chunk);
			return true;
		},
	};
	return { chunks, stream };
};

describe('createColors', () => {
	it('should pass text through when disabled', () => {
		const colors = createColors({ enabled: false });
		expect(colors.enabled).toBe(false);
		expect(colors.red('x')).toBe('x');
		expect(colors.bold('x')).toBe('x');
	});

	it('should emit ANSI codes when enabled', () => {
		const colors = createColors({ enabled: true });
		expect(colors.red('x')).toBe('\x1b[31mx\x1b[39m');
	});
});

describe('createSpinner', () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it('should print the message once on a non-TTY stream', () => {
		const { chunks, stream } = recorder(false);
		const spinner = createSpinner({ colors: plainColors, stream });

		spinner.start('Asking phi4:latest…');
		expect(spinner.isSpinning()).toBe(true);
		spinner.stop();

		expect(chunks).toEqual(['  Asking phi4:latest…\n']);
		expect(spinner.isSpinning()).toBe(false);
	});

	it('should animate and erase itself on a TTY', () => {
		vi.useFakeTimers();
		const { chunks, stream } = recorder(true);
		const spinner = createSpinner({ colors: plainColors, stream, intervalMs: 100 });

		spinner.start('Working');
		vi.advanceTimersByTime(100);
		spinner.stop();

		expect(chunks).toEqual([
			'\x1b[?25l',
			'\x1b[2K\r',
			'  · Working',
			'\x1b[2K\r',
			'  ✢ Working',
			'\x1b[2K\r',
			'\x1b[?25h',
		]);
	});
});
