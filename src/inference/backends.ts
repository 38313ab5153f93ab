// ---------------------------------------------------------------------------
// Backend adapters — request/response shape per `backend_type`
// ---------------------------------------------------------------------------

import { z } from 'zod';
import type { BackendType, Config } from '../config/schema.js';

export interface BackendAdapter {
	/** Name of the response field the generated text is read from. */
	readonly responseField: string;
	readonly buildBody: (config: Config, userText: string) => unknown;
	/** Returns undefined when the payload does not have the expected shape. */
	readonly parseResponse: (payload: unknown) => string | undefined;
}

/** The system instruction and the user's question, in one prompt. */
export const composePrompt = (promptPrefix: string, userText: string): string =>
	promptPrefix.trim().length > 0
		? `${promptPrefix.trim()}\n\n${userText}`
		: userText;

const ollamaGenerateResponse = z.object({ response: z.string() });

/** Ollama `/api/generate`, non-streaming. */
const ollama: BackendAdapter = Object.freeze({
	responseField: 'response',
	buildBody: (config: Config, userText: string) => ({
		model: config.model,
		prompt: composePrompt(config.prompt_prefix, userText),
		stream: false,
	}),
	parseResponse: (payload: unknown) => {
		const parsed = ollamaGenerateResponse.safeParse(payload);
		return parsed.success ? parsed.data.response : undefined;
	},
});

export const BACKENDS: Readonly<Record<BackendType, BackendAdapter>> =
	Object.freeze({ ollama });
