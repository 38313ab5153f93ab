/**
 * Shared types for the session engine and its terminal front end.
 */

import type { CommandSuggestion } from '../inference/client.js';

// ---------------------------------------------------------------------------
// IO contract
// ---------------------------------------------------------------------------

/**
 * Everything the engine needs from a terminal. Implementations decide how
 * text is shown and how the busy state is drawn.
 */
export interface SessionIO {
	/** Display one block of text (a trailing newline is implied). */
	readonly write: (text: string) => void;
	/** Show or hide the busy indicator while a backend call is outstanding. */
	readonly busy: (active: boolean, label?: string) => void;
	/** Prompt for one line. Resolves undefined at end of input. */
	readonly read: (prompt: string) => Promise<string | undefined>;
	/** Hand the terminal to a child process: cooked mode, input paused. */
	readonly suspend: () => void;
	/** Take the terminal back after `suspend`. */
	readonly resume: () => void;
}

// ---------------------------------------------------------------------------
// Styling
// ---------------------------------------------------------------------------

export interface TermColors {
	readonly bold: (s: string) => string;
	readonly dim: (s: string) => string;
	readonly italic: (s: string) => string;
	readonly red: (s: string) => string;
	readonly green: (s: string) => string;
	readonly yellow: (s: string) => string;
	readonly blue: (s: string) => string;
	readonly magenta: (s: string) => string;
	readonly cyan: (s: string) => string;
	readonly gray: (s: string) => string;
	readonly enabled: boolean;
}

const identity = (s: string): string => s;

/** No styling at all; used by tests and non-TTY output. */
export const plainColors: TermColors = Object.freeze({
	bold: identity,
	dim: identity,
	italic: identity,
	red: identity,
	green: identity,
	yellow: identity,
	blue: identity,
	magenta: identity,
	cyan: identity,
	gray: identity,
	enabled: false,
});

// ---------------------------------------------------------------------------
// Session state
// ---------------------------------------------------------------------------

export type SessionMode = 'interactive' | 'one-shot';

export type SessionPhase =
	| 'idle'
	| 'awaiting-input'
	| 'executing-directive'
	| 'querying-backend'
	| 'rendering-result'
	| 'confirming'
	| 'executing'
	| 'exited';

export interface SessionSnapshot {
	readonly mode: SessionMode;
	readonly phase: SessionPhase;
	readonly busy: boolean;
	readonly lastSuggestion: CommandSuggestion | undefined;
}

/** Result of handling one line of input. */
export interface CycleOutcome {
	readonly exit: boolean;
	/** Process status if this cycle ends a one-shot run. */
	readonly status: number;
}
