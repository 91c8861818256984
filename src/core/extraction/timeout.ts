import { ExtractionUnavailableError } from "../conversation/errors.js";

/**
 * Run an extraction with a deadline. On timeout the signal handed to `run` is
 * aborted and the returned promise rejects with ExtractionUnavailableError.
 * A timeout of 0 or less disables the deadline.
 */
export async function withTimeout<T>(
	run: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	controller: AbortController = new AbortController(),
): Promise<T> {
	if (timeoutMs <= 0) return run(controller.signal);

	let timer: ReturnType<typeof setTimeout> | undefined;
	const deadline = new Promise<never>((_resolve, reject) => {
		timer = setTimeout(() => {
			controller.abort();
			reject(new ExtractionUnavailableError(`timed out after ${timeoutMs}ms`));
		}, timeoutMs);
	});

	try {
		return await Promise.race([run(controller.signal), deadline]);
	} finally {
		clearTimeout(timer);
	}
}
