// ---------------------------------------------------------------------------
// Session state — phase transitions are checked against a fixed table
// ---------------------------------------------------------------------------

import { createAskshError } from '../errors/index.js';
import type { CommandSuggestion } from '../inference/client.js';
import type { Logger } from '../logger.js';
import type { SessionMode, SessionPhase, SessionSnapshot } from './types.js';

const TRANSITIONS: Readonly<Record<SessionPhase, readonly SessionPhase[]>> =
	Object.freeze({
		idle: ['awaiting-input', 'executing-directive', 'querying-backend', 'exited'],
		'awaiting-input': ['executing-directive', 'querying-backend', 'exited'],
		'executing-directive': ['idle', 'exited'],
		'querying-backend': ['rendering-result'],
		'rendering-result': ['confirming', 'idle'],
		confirming: ['executing', 'idle'],
		executing: ['idle'],
		exited: [],
	});

export const canTransition = (from: SessionPhase, to: SessionPhase): boolean =>
	TRANSITIONS[from].includes(to);

export interface SessionState {
	readonly snapshot: () => SessionSnapshot;
	readonly phase: () => SessionPhase;
	/** Move to `to`; throws on a transition the table does not allow. */
	readonly to: (to: SessionPhase) => void;
	readonly setMode: (mode: SessionMode) => void;
	readonly setBusy: (busy: boolean) => void;
	readonly setLastSuggestion: (suggestion: CommandSuggestion) => void;
}

export function createSessionState(logger: Logger): SessionState {
	let mode: SessionMode = 'interactive';
	let phase: SessionPhase = 'idle';
	let busy = false;
	let lastSuggestion: CommandSuggestion | undefined;

	const to = (next: SessionPhase): void => {
		if (!canTransition(phase, next)) {
			throw createAskshError(`Illegal session transition ${phase} → ${next}`, {
				name: 'SessionStateError',
				code: 'SESSION_STATE',
				metadata: { from: phase, to: next },
			});
		}
		logger.debug(`${phase} → ${next}`);
		phase = next;
	};

	return Object.freeze({
		snapshot: (): SessionSnapshot =>
			Object.freeze({ mode, phase, busy, lastSuggestion }),
		phase: () => phase,
		to,
		setMode: (next: SessionMode) => {
			mode = next;
		},
		setBusy: (next: boolean) => {
			busy = next;
		},
		setLastSuggestion: (suggestion: CommandSuggestion) => {
			lastSuggestion = suggestion;
		},
	});
}
