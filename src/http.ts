export const PROBE_TIMEOUT_MS = 5_000;

/**
 * `fetch` bound to the caller's signal and, when `timeoutMs` is given, a
 * deadline. Without a deadline only the runtime's own client defaults apply.
 */
export async function fetchWithTimeout(
	input: string | URL,
	init: RequestInit = {},
	timeoutMs?: number,
): Promise<Response> {
	const controller = new AbortController();
	const parentSignal = init.signal;
	const onParentAbort = () => {
		controller.abort(parentSignal?.reason);
	};

	let timeoutId: ReturnType<typeof setTimeout> | undefined;
	try {
		if (parentSignal) {
			if (parentSignal.aborted) {
				controller.abort(parentSignal.reason);
			} else {
				parentSignal.addEventListener("abort", onParentAbort, { once: true });
			}
		}

		if (timeoutMs !== undefined) {
			timeoutId = setTimeout(() => {
				controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
			}, timeoutMs);
		}

		return await fetch(input, { ...init, signal: controller.signal });
	} finally {
		if (timeoutId) clearTimeout(timeoutId);
		parentSignal?.removeEventListener("abort", onParentAbort);
	}
}

export async function postJson(
	url: string | URL,
	body: string,
	options: { signal?: AbortSignal; timeoutMs?: number } = {},
): Promise<Response> {
	return await fetchWithTimeout(
		url,
		{
			method: "POST",
			headers: { "content-type": "application/json" },
			body,
			signal: options.signal,
		},
		options.timeoutMs,
	);
}
