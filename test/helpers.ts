import { defaultSettings } from "../src/config/schema.js";
import type { HopperSettings } from "../src/config/schema.js";
import type { AIProvider, FetchLike } from "../src/providers/types.js";
import { createRuntime } from "../src/runtime.js";
import type { Runtime, RuntimeOptions } from "../src/runtime.js";

export interface RecordedCall {
	url: string;
	init: RequestInit | undefined;
}

/** Fake fetch answering each call with the next response factory; the last one repeats. */
export function fakeFetch(...responses: Array<() => Response>): { fetch: FetchLike; calls: RecordedCall[] } {
	const calls: RecordedCall[] = [];
	const fetch: FetchLike = async (input, init) => {
		calls.push({ url: String(input), init });
		const next = responses[Math.min(calls.length - 1, responses.length - 1)];
		if (!next) throw new Error("fakeFetch has no responses");
		return next();
	};
	return { fetch, calls };
}

export function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

/** A ReadableStream that emits the chunks and then closes, or stays open when `keepOpen` is set. */
export function sseStream(chunks: string[], keepOpen = false): ReadableStream<Uint8Array> {
	const encoder = new TextEncoder();
	return new ReadableStream<Uint8Array>({
		start(controller) {
			for (const chunk of chunks) {
				controller.enqueue(encoder.encode(chunk));
			}
			if (!keepOpen) controller.close();
		},
	});
}

export function sseResponse(chunks: string[], keepOpen = false): Response {
	return new Response(sseStream(chunks, keepOpen), { status: 200, headers: { "Content-Type": "text/event-stream" } });
}

export function textCompletion(content: string, usage = { prompt_tokens: 10, completion_tokens: 5 }): unknown {
	return {
		choices: [{ message: { role: "assistant", content }, finish_reason: "stop" }],
		usage,
	};
}

export function toolCallCompletion(id: string, name: string, args: Record<string, unknown>): unknown {
	return {
		choices: [
			{
				message: {
					role: "assistant",
					content: null,
					tool_calls: [{ id, type: "function", function: { name, arguments: JSON.stringify(args) } }],
				},
				finish_reason: "tool_calls",
			},
		],
		usage: { prompt_tokens: 20, completion_tokens: 8 },
	};
}

/** Request body of a recorded call, parsed as JSON. */
export function requestBody(call: RecordedCall | undefined): Record<string, unknown> {
	const body = call?.init?.body;
	if (typeof body !== "string") throw new Error("Recorded call has no string body");
	const parsed: unknown = JSON.parse(body);
	if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
		throw new Error("Recorded body is not a JSON object");
	}
	return { ...parsed };
}

export function testSettings(overrides: Partial<HopperSettings> = {}): HopperSettings {
	return {
		...defaultSettings(),
		defaultProvider: "OpenAI",
		providers: {
			OpenAI: { apiKey: "test-secret" },
			Anthropic: { apiKey: "test-secret" },
		},
		...overrides,
	};
}

export function createTestRuntime(fetch: FetchLike, options: Omit<RuntimeOptions, "fetch"> = {}): Promise<Runtime> {
	return createRuntime({ settings: testSettings(), loadPlugins: false, ...options, fetch });
}

export function requireProvider(runtime: Runtime, name: string): AIProvider {
	const provider = runtime.providers.getProvider(name);
	if (!provider) throw new Error(`Provider ${name} is not registered`);
	return provider;
}
