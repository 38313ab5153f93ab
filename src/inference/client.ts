/**
 * InferenceClient — one non-streaming request to the configured backend per
 * query, bounded by `request_timeout_ms`. Failures are thrown as
 * BACKEND_* errors and never retried.
 */

import type { Config } from '../config/schema.js';
import {
	createBackendInvalidResponseError,
	createBackendTimeoutError,
	createBackendUnreachableError,
	describeReason,
} from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';
import { BACKENDS } from './backends.js';
import { extractCommand } from './extract.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The subset of `fetch` the client uses; tests pass a stand-in. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface CommandSuggestion {
	readonly query: string;
	/** Full response text, trimmed. Empty when the model returned nothing. */
	readonly text: string;
	/** The command extracted from `text`; what gets executed on confirmation. */
	readonly command: string;
	readonly model: string;
	readonly durationMs: number;
}

export interface InferenceClientOptions {
	readonly fetch?: FetchLike;
	readonly logger?: Logger;
}

export interface InferenceClient {
	readonly query: (
		userText: string,
		config: Config,
	) => Promise<CommandSuggestion>;
}

/** Longest backend error body echoed back to the user. */
const MAX_REASON_CHARS = 200;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createInferenceClient(
	options: InferenceClientOptions = {},
): InferenceClient {
	const fetchImpl: FetchLike = options.fetch ?? globalThis.fetch;
	const logger = (options.logger ?? createSilentLogger()).child('inference');

	const query = async (
		userText: string,
		config: Config,
	): Promise<CommandSuggestion> => {
		const backend = BACKENDS[config.backend_type];
		const { url, request_timeout_ms: timeoutMs } = config;

		const started = Date.now();

		return withTimeout(async ({ signal, timedOut }) => {
			// Network errors after the abort fired are the timeout, not the network.
			const failure = (err: unknown): Error =>
				timedOut()
					? createBackendTimeoutError(url, timeoutMs, { cause: err })
					: createBackendUnreachableError(url, {
							reason: describeReason(err),
							cause: err,
						});

			logger.debug('Sending query', { url, model: config.model });

			let response: Response;
			let body: string;
			try {
				response = await fetchImpl(url, {
					method: 'POST',
					headers: { 'Content-Type': 'application/json' },
					body: JSON.stringify(backend.buildBody(config, userText)),
					signal,
				});
				body = await response.text();
			} catch (err) {
				throw failure(err);
			}

			if (!response.ok) {
				throw createBackendUnreachableError(url, {
					status: response.status,
					reason: (body.trim() || response.statusText).slice(
						0,
						MAX_REASON_CHARS,
					),
				});
			}

			let payload: unknown;
			try {
				payload = JSON.parse(body);
			} catch (err) {
				throw createBackendInvalidResponseError(url, 'body is not JSON', {
					cause: err,
				});
			}

			const generated = backend.parseResponse(payload);
			if (generated === undefined) {
				throw createBackendInvalidResponseError(
					url,
					`missing "${backend.responseField}" text`,
				);
			}

			const text = generated.trim();
			const durationMs = Date.now() - started;
			logger.debug('Received response', { durationMs, chars: text.length });

			return Object.freeze({
				query: userText,
				text,
				command: text === '' ? '' : extractCommand(text),
				model: config.model,
				durationMs,
			});
		}, timeoutMs);
	};

	return Object.freeze({ query });
}
