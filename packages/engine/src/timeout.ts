/**
 * Per-call deadlines for backend calls.
 *
 * The callee receives an AbortSignal that fires on the deadline or when the
 * caller's own signal aborts; the returned promise rejects at that moment even
 * if the callee ignores the signal.
 */

import { BackendTimeoutError, type BackendName, toError } from "./errors";

function rejectOnAbort(signal: AbortSignal): Promise<never> {
	return new Promise((_, reject) => {
		signal.addEventListener("abort", () => reject(toError(signal.reason)), { once: true });
	});
}

export async function withTimeout<T>(
	backend: BackendName,
	timeoutMs: number,
	run: (signal: AbortSignal) => Promise<T>,
	parent?: AbortSignal,
): Promise<T> {
	if (parent?.aborted) {
		throw toError(parent.reason);
	}

	const controller = new AbortController();
	const onParentAbort = () => controller.abort(parent?.reason);
	parent?.addEventListener("abort", onParentAbort, { once: true });

	const timer = setTimeout(
		() => controller.abort(new BackendTimeoutError(backend, timeoutMs)),
		timeoutMs,
	);

	try {
		return await Promise.race([run(controller.signal), rejectOnAbort(controller.signal)]);
	} finally {
		clearTimeout(timer);
		parent?.removeEventListener("abort", onParentAbort);
	}
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(toError(signal.reason));
			return;
		}
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		const onAbort = () => {
			clearTimeout(timer);
			reject(toError(signal?.reason));
		};
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
