/**
 * Streaming helpers shared by providers that support server-sent events.
 *
 * `readSseData` turns a streamed HTTP response into a lazy, single-pass
 * sequence of `data:` payloads. The sequence ends on `[DONE]`, on a payload the
 * caller marks as terminal, on end of stream, on cancellation, or when no chunk
 * arrives within the idle timeout. Only a failure without cancellation throws.
 */

import { MissingConfigurationError, StreamingRequestError, UnsupportedAuthenticationError } from "../core/errors.js";
import { debug, errorMessage } from "../utils/log.js";
import type { FetchLike } from "./types.js";

export interface SseReadOptions {
	signal?: AbortSignal;
	/** End the sequence when no chunk arrives within this window */
	idleTimeoutMs?: number;
	/** Provider-specific end marker; the terminal payload is still yielded */
	isTerminal?: (payload: string) => boolean;
}

const DATA_PREFIX = "data:";

export function isAbsoluteUrl(endpoint: string): boolean {
	return /^[a-z][a-z0-9+.-]*:\/\//i.test(endpoint);
}

/** Absolute endpoints are used as-is; relative ones are joined to the base URL. */
export function resolveEndpoint(baseUrl: string, endpoint: string): string {
	if (!endpoint.trim()) {
		throw new Error("Endpoint cannot be null or empty");
	}
	if (isAbsoluteUrl(endpoint)) return endpoint;

	const base = baseUrl.replace(/\/+$/, "");
	const path = endpoint.startsWith("/") ? endpoint : `/${endpoint}`;
	return base + path;
}

/**
 * Authentication headers for a request. Supported schemes are `bearer`,
 * `x-api-key` and `none` (or empty); anything else is a configuration error.
 */
export function buildAuthHeaders(providerName: string, authentication: string, apiKey: string | undefined): Record<string, string> {
	const scheme = authentication.trim().toLowerCase();
	if (scheme === "" || scheme === "none") return {};

	if (scheme !== "bearer" && scheme !== "x-api-key") {
		throw new UnsupportedAuthenticationError(authentication);
	}
	if (!apiKey?.trim()) {
		throw new MissingConfigurationError(providerName, "API key");
	}

	return scheme === "bearer" ? { Authorization: `Bearer ${apiKey}` } : { "x-api-key": apiKey };
}

function parseDataLine(line: string): string | undefined {
	if (!line.startsWith(DATA_PREFIX)) return undefined;
	return line.slice(DATA_PREFIX.length).trimStart();
}

type ReadOutcome = ReadableStreamReadResult<Uint8Array> | "idle";

function readWithIdleTimeout(
	reader: ReadableStreamDefaultReader<Uint8Array>,
	idleTimeoutMs: number | undefined,
): Promise<ReadOutcome> {
	if (idleTimeoutMs === undefined || idleTimeoutMs <= 0) {
		return reader.read();
	}

	let timer: ReturnType<typeof setTimeout> | undefined;
	const idle = new Promise<"idle">((resolve) => {
		timer = setTimeout(() => resolve("idle"), idleTimeoutMs);
	});
	return Promise.race([reader.read(), idle]).finally(() => clearTimeout(timer));
}

export async function* readSseData(response: Response, options: SseReadOptions = {}): AsyncGenerator<string, void, unknown> {
	if (!response.ok) {
		throw new StreamingRequestError(response.status, await response.text());
	}

	const reader = response.body?.getReader();
	if (!reader) return;

	const { signal, idleTimeoutMs, isTerminal } = options;
	const decoder = new TextDecoder();

	// Cancelling the reader resolves a pending read, so an abort unblocks immediately.
	const onAbort = (): void => {
		reader.cancel(signal?.reason).catch((err: unknown) => debug("Streaming", `Cancel after abort failed: ${errorMessage(err)}`));
	};
	signal?.addEventListener("abort", onAbort, { once: true });

	let buffer = "";
	try {
		while (!signal?.aborted) {
			const outcome = await readWithIdleTimeout(reader, idleTimeoutMs);
			if (outcome === "idle") {
				debug("Streaming", `No data for ${idleTimeoutMs}ms, closing stream`);
				return;
			}
			if (outcome.done) break;

			buffer += decoder.decode(outcome.value, { stream: true });
			let newline = buffer.indexOf("\n");
			while (newline >= 0) {
				const line = buffer.slice(0, newline).replace(/\r$/, "");
				buffer = buffer.slice(newline + 1);
				newline = buffer.indexOf("\n");

				// blank lines are keep-alives
				const payload = parseDataLine(line);
				if (payload === undefined) continue;
				if (payload === "[DONE]") return;

				yield payload;
				if (isTerminal?.(payload)) return;
			}
		}

		if (signal?.aborted) return;

		buffer += decoder.decode();
		const trailing = parseDataLine(buffer.replace(/\r$/, ""));
		if (trailing !== undefined && trailing !== "[DONE]") {
			yield trailing;
		}
	} catch (err) {
		if (signal?.aborted) {
			debug("Streaming", `Stream ended after cancellation: ${errorMessage(err)}`);
			return;
		}
		throw err;
	} finally {
		signal?.removeEventListener("abort", onAbort);
		try {
			await reader.cancel();
		} catch (err) {
			debug("Streaming", `Releasing stream failed: ${errorMessage(err)}`);
		}
	}
}

export interface StreamingHost {
	readonly name: string;
	readonly defaultServerUrl: string;
	readonly fetch: FetchLike;
	getApiKey(): string | undefined;
}

/** HTTP setup for streamed calls: URL, headers, SSE POST and the send itself. */
export class StreamingAdapter {
	constructor(private readonly _host: StreamingHost) {}

	buildFullUrl(endpoint: string): string {
		return resolveEndpoint(this._host.defaultServerUrl, endpoint);
	}

	buildHeaders(authentication: string, extra: Record<string, string> = {}): Record<string, string> {
		return { ...buildAuthHeaders(this._host.name, authentication, this._host.getApiKey()), ...extra };
	}

	createSsePost(body: string, headers: Record<string, string>, contentType = "application/json"): RequestInit {
		return {
			method: "POST",
			headers: { ...headers, "Content-Type": contentType, Accept: "text/event-stream" },
			body,
		};
	}

	/** Resolves once headers arrive; a non-success status throws with the body as context. */
	async sendForStream(url: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
		const response = await this._host.fetch(url, { ...init, signal });
		if (!response.ok) {
			throw new StreamingRequestError(response.status, await response.text());
		}
		return response;
	}

	readSseData(response: Response, options: SseReadOptions = {}): AsyncGenerator<string, void, unknown> {
		return readSseData(response, options);
	}
}
