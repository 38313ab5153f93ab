import { describe, expect, it } from 'vitest';
import { extractCommand } from '../src/inference/extract.js';

describe('extractCommand', () => {
	it('should return a single-line response verbatim', () => {
		const line = 'find / -type f -size +100M -exec ls -lh {} +';
		expect(extractCommand(line)).toBe(line);
	});

	it('should take the body of a fenced block', () => {
		expect(extractCommand('```bash\nls -la\n```')).toBe('ls -la');
	});

	it('should prefer a shell-tagged block over an earlier untagged one', () => {
		const response = [
			'Either:',
			'```',
			'du -sh *',
			'```',
			'or:',
			'```sh',
			'find . -size +100M',
			'```',
		].join('\n');
		expect(extractCommand(response)).toBe('find . -size +100M');
	});

	it('should fall back to the first block when none is shell-tagged', () => {
		expect(extractCommand('```\ndu -sh *\n```\n```python\nprint(1)\n```')).toBe(
			'du -sh *',
		);
	});

	it('should skip prose and strip a prompt marker', () => {
		expect(extractCommand('To list files, run:\n$ ls -la /tmp')).toBe(
			'ls -la /tmp',
		);
	});

	it('should unwrap inline code on its own line', () => {
		expect(extractCommand('`df -h`')).toBe('df -h');
	});

	it('should prefer a line with shell operators over a heading', () => {
		expect(extractCommand('# Processes\nps aux | grep node')).toBe(
			'ps aux | grep node',
		);
	});

	it('should let a shell operator win even on a line that reads as prose', () => {
		expect(extractCommand('Use du -sh * | sort -h for sizes\nls -la')).toBe(
			'Use du -sh * | sort -h for sizes',
		);
	});

	it('should take the first non-prose line when nothing looks like a command', () => {
		expect(extractCommand('Here is the command:\nexit 0')).toBe('exit 0');
	});

	it('should fall back to the first line when everything is prose', () => {
		expect(extractCommand('This shows the files.\nIt is safe.')).toBe(
			'This shows the files.',
		);
	});

	it('should return empty text for an empty response', () => {
		expect(extractCommand('')).toBe('');
		expect(extractCommand('\n  \n')).toBe('');
	});
});
