/**
 * Sleep for a specified number of milliseconds.
 * Resolves early, without throwing, once the signal is aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (signal?.aborted) {
		return Promise.resolve();
	}

	return new Promise(resolve => {
		const timerId = setTimeout(done, ms);
		signal?.addEventListener("abort", done, { once: true });

		function done(): void {
			clearTimeout(timerId);
			signal?.removeEventListener("abort", done);
			resolve();
		}
	});
}
