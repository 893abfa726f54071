/**
 * Wait for `ms` milliseconds. Resolves early (never rejects) when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, Math.max(0, ms));
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Wait until `performance.now()` reaches `deadline`.
 */
export async function sleepUntil(deadline: number, signal?: AbortSignal): Promise<void> {
	const remaining = deadline - performance.now();
	if (remaining > 0) {
		await sleep(remaining, signal);
	}
}
