import { isAbortError } from "../core/errors.js";
import { debug } from "./log.js";

export interface RetryOptions {
	/** Maximum number of retry attempts (default: 3) */
	maxRetries?: number;
	/** Initial delay in milliseconds (default: 500) */
	initialDelay?: number;
	/** Maximum delay in milliseconds (default: 8000) */
	maxDelay?: number;
	/** Multiplier for exponential backoff (default: 2) */
	multiplier?: number;
	/** Whether to add jitter to delays (default: true) */
	jitter?: boolean;
	/** Stops waiting between attempts once aborted */
	signal?: AbortSignal;
	shouldRetry?: (error: unknown, attempt: number) => boolean | Promise<boolean>;
}

const DEFAULT_RETRY_OPTIONS = {
	maxRetries: 3,
	initialDelay: 500,
	maxDelay: 8000,
	multiplier: 2,
	jitter: true,
} satisfies RetryOptions;

function calculateDelay(attempt: number, initialDelay: number, maxDelay: number, multiplier: number, jitter: boolean): number {
	const cappedDelay = Math.min(initialDelay * multiplier ** attempt, maxDelay);

	// +/-12.5% around the capped delay
	if (jitter) {
		const jitterRange = cappedDelay * 0.25;
		return cappedDelay - jitterRange / 2 + Math.random() * jitterRange;
	}

	return cappedDelay;
}

/**
 * Transient transport failures: rate limits, gateway errors and socket-level
 * errors surfaced by fetch. Aborts are never retried.
 */
export function isRetryableError(error: unknown, _attempt: number): boolean {
	if (isAbortError(error) || !(error instanceof Error)) {
		return false;
	}

	const message = error.message.toLowerCase();
	return (
		message.includes("rate limit") ||
		message.includes("429") ||
		message.includes("502") ||
		message.includes("503") ||
		message.includes("504") ||
		message.includes("too many requests") ||
		message.includes("fetch failed") ||
		message.includes("econnreset") ||
		message.includes("etimedout") ||
		message.includes("enotfound") ||
		message.includes("econnrefused")
	);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new DOMException("Aborted", "AbortError"));
			return;
		}
		const onAbort = (): void => {
			clearTimeout(timer);
			reject(new DOMException("Aborted", "AbortError"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Retry a function with exponential backoff
 *
 * @example
 * ```typescript
 * const manifest = await retryWithBackoff(() => fetchManifest(url), { maxRetries: 2 });
 * ```
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const maxRetries = options.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries;
	const initialDelay = options.initialDelay ?? DEFAULT_RETRY_OPTIONS.initialDelay;
	const maxDelay = options.maxDelay ?? DEFAULT_RETRY_OPTIONS.maxDelay;
	const multiplier = options.multiplier ?? DEFAULT_RETRY_OPTIONS.multiplier;
	const jitter = options.jitter ?? DEFAULT_RETRY_OPTIONS.jitter;
	const shouldRetry = options.shouldRetry ?? isRetryableError;

	for (let attempt = 0; ; attempt++) {
		try {
			return await fn();
		} catch (error) {
			if (attempt >= maxRetries || !(await shouldRetry(error, attempt))) {
				throw error;
			}

			const delay = calculateDelay(attempt, initialDelay, maxDelay, multiplier, jitter);
			if (error instanceof Error) {
				debug(
					"Retry",
					`Attempt ${attempt + 1}/${maxRetries + 1} failed: ${error.message}. Retrying in ${Math.round(delay)}ms...`,
				);
			}

			await sleep(delay, options.signal);
		}
	}
}
