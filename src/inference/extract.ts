// ---------------------------------------------------------------------------
// Command extraction — pull the runnable command out of a model response
// ---------------------------------------------------------------------------

const SHELL_LANGS = new Set(['bash', 'sh', 'shell', 'zsh', 'console']);

const FENCE = /```[^\S\n]*([\w+-]*)[^\S\n]*\n?([\s\S]*?)```/g;

const EXPLANATION_PREFIXES = [
	'to ',
	'this ',
	'you ',
	'the ',
	'here',
	'use ',
	'if ',
	'note:',
	'note that',
	'it ',
] as const;

const COMMAND_INDICATORS = [' | ', ';', '>', '<', '&&', '||'] as const;

const COMMAND_PREFIXES = [
	'$',
	'sudo',
	'./',
	'apt',
	'git',
	'docker',
	'kubectl',
	'find',
	'grep',
	'ls',
	'cat',
	'cd',
	'mkdir',
	'rm',
	'cp',
	'mv',
	'df',
	'du',
	'ps',
] as const;

const MAX_COMMAND_LINE = 120;

interface FencedBlock {
	readonly lang: string;
	readonly body: string;
}

function fencedBlocks(response: string): FencedBlock[] {
	return [...response.matchAll(FENCE)].map((match) => ({
		lang: (match[1] ?? '').toLowerCase(),
		body: (match[2] ?? '').trim(),
	}));
}

const count = (line: string, ch: string): number => line.split(ch).length - 1;

function looksLikeExplanation(line: string): boolean {
	const lower = line.toLowerCase();
	if (EXPLANATION_PREFIXES.some((prefix) => lower.startsWith(prefix))) {
		return true;
	}
	if (line.startsWith('#')) return true;
	if (
		line.length > MAX_COMMAND_LINE &&
		line.includes(' ') &&
		!line.includes('&&') &&
		!line.includes('||')
	) {
		return true;
	}
	const punctuated = count(line, '.') > 2 || count(line, ',') > 2;
	return punctuated && !line.includes('find ') && !line.includes('grep ');
}

function looksLikeCommand(line: string): boolean {
	return (
		COMMAND_INDICATORS.some((indicator) => line.includes(indicator)) ||
		COMMAND_PREFIXES.some((prefix) => line.startsWith(prefix))
	);
}

const unwrapInlineCode = (line: string): string => {
	const match = /^`([^`]+)`$/.exec(line);
	return match?.[1] ?? line;
};

const stripPromptMarker = (line: string): string =>
	line.startsWith('$') ? line.slice(1).trim() : line;

/**
 * Pick the command a response is suggesting.
 *
 * A fenced block wins (shell-tagged blocks first). Otherwise the first line
 * with a strong shell indicator or a common command name, prose or not,
 * then the first line that does not read as prose, then the first non-empty
 * line.
 */
export function extractCommand(response: string): string {
	const blocks = fencedBlocks(response).filter((block) => block.body !== '');
	const preferred =
		blocks.find((block) => SHELL_LANGS.has(block.lang)) ?? blocks[0];
	if (preferred) return preferred.body;

	const lines = response
		.split('\n')
		.map((line) => unwrapInlineCode(line.trim()))
		.filter((line) => line !== '');

	// Strong indicators count even on a line that reads as prose.
	const command = lines.find(looksLikeCommand);
	if (command !== undefined) return stripPromptMarker(command);

	const candidates = lines.filter((line) => !looksLikeExplanation(line));
	if (candidates[0] !== undefined) return candidates[0];
	return lines[0] ?? '';
}
