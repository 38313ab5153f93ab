// ---------------------------------------------------------------------------
// Timeout Utility — runs an async function with an AbortSignal that fires
// after `timeoutMs`.
// ---------------------------------------------------------------------------

export interface TimeoutScope {
	/** Pass this to `fetch` or anything else that takes a signal. */
	readonly signal: AbortSignal;
	/** True once the timer has fired. */
	readonly timedOut: () => boolean;
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs`. The caller decides
 * what a timeout means by checking `timedOut()` when its own call fails.
 *
 * The timer is cleaned up on resolution or rejection.
 */
export async function withTimeout<T>(
	fn: (scope: TimeoutScope) => Promise<T>,
	timeoutMs: number,
): Promise<T> {
	const controller = new AbortController();
	const timer = setTimeout(() => controller.abort(), timeoutMs);

	try {
		return await fn(
			Object.freeze({
				signal: controller.signal,
				timedOut: () => controller.signal.aborted,
			}),
		);
	} finally {
		clearTimeout(timer);
	}
}
