import { describe, expect, it } from "vitest";
import { StreamingRequestError, UnsupportedAuthenticationError, MissingConfigurationError } from "../../src/core/errors.js";
import { StreamAccumulator } from "../../src/providers/stream-accumulator.js";
import { buildAuthHeaders, readSseData, resolveEndpoint } from "../../src/providers/streaming.js";
import { sseResponse } from "../helpers.js";

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
	const out: string[] = [];
	for await (const item of stream) out.push(item);
	return out;
}

describe("readSseData", () => {
	it("yields data payloads and stops at [DONE]", async () => {
		const response = sseResponse(['data: {"a":1}\n\n', "data: [DONE]\n", 'data: {"b":2}\n']);
		expect(await collect(readSseData(response))).toEqual(['{"a":1}']);
	});

	it("skips comments, blank lines and other fields", async () => {
		const response = sseResponse([": keep-alive\n", "event: message\n", "\n", "data:tight\r\n"]);
		expect(await collect(readSseData(response))).toEqual(["tight"]);
	});

	it("joins lines split across chunks", async () => {
		const response = sseResponse(['data: {"te', 'xt":"hi"}\n']);
		expect(await collect(readSseData(response))).toEqual(['{"text":"hi"}']);
	});

	it("yields a trailing line without a newline", async () => {
		const response = sseResponse(["data: one\n", "data: two"]);
		expect(await collect(readSseData(response))).toEqual(["one", "two"]);
	});

	it("ends at a terminal payload and still yields it", async () => {
		const response = sseResponse(["data: first\n", "data: stop\n", "data: ignored\n"], true);
		const payloads = await collect(readSseData(response, { isTerminal: (p) => p === "stop" }));
		expect(payloads).toEqual(["first", "stop"]);
	});

	it("ends without an error when the stream goes idle", async () => {
		const response = sseResponse(["data: only\n"], true);
		const payloads = await collect(readSseData(response, { idleTimeoutMs: 50 }));
		expect(payloads).toEqual(["only"]);
	});

	it("ends quietly when the signal aborts", async () => {
		const controller = new AbortController();
		const response = sseResponse(["data: first\n"], true);
		const payloads: string[] = [];

		for await (const payload of readSseData(response, { signal: controller.signal })) {
			payloads.push(payload);
			setTimeout(() => controller.abort(), 10);
		}

		expect(payloads).toEqual(["first"]);
	});

	it("throws StreamingRequestError for a failed response", async () => {
		const response = new Response("rate limited", { status: 429 });
		await expect(collect(readSseData(response))).rejects.toThrow(StreamingRequestError);
	});

	it("puts status and body in the error message", async () => {
		const response = new Response("bad gateway", { status: 502 });
		await expect(collect(readSseData(response))).rejects.toThrow("Streaming request failed: 502 - bad gateway");
	});
});

describe("resolveEndpoint", () => {
	it("joins relative endpoints to the base URL", () => {
		expect(resolveEndpoint("https://api.example.test/v1/", "/chat/completions")).toBe(
			"https://api.example.test/v1/chat/completions",
		);
		expect(resolveEndpoint("https://api.example.test/v1", "messages")).toBe("https://api.example.test/v1/messages");
	});

	it("keeps absolute endpoints", () => {
		expect(resolveEndpoint("https://api.example.test", "http://localhost:8080/x")).toBe("http://localhost:8080/x");
	});

	it("rejects an empty endpoint", () => {
		expect(() => resolveEndpoint("https://api.example.test", " ")).toThrow("Endpoint cannot be null or empty");
	});
});

describe("buildAuthHeaders", () => {
	it("builds bearer and x-api-key headers", () => {
		expect(buildAuthHeaders("P", "bearer", "test-secret")).toEqual({ Authorization: "Bearer test-secret" });
		expect(buildAuthHeaders("P", "X-API-Key", "test-secret")).toEqual({ "x-api-key": "test-secret" });
	});

	it("sends nothing for none", () => {
		expect(buildAuthHeaders("P", "none", undefined)).toEqual({});
	});

	it("rejects unknown schemes and missing keys", () => {
		expect(() => buildAuthHeaders("P", "basic", "test-secret")).toThrow(UnsupportedAuthenticationError);
		expect(() => buildAuthHeaders("P", "bearer", "  ")).toThrow(MissingConfigurationError);
	});
});

describe("StreamAccumulator", () => {
	it("merges tool call fragments by index", () => {
		const acc = new StreamAccumulator();
		acc.push({ content: "Look" });
		acc.push({ content: "ing" });
		acc.push({ toolCalls: [{ index: 0, id: "call_1", name: "gh_get", argumentsDelta: '{"sel' }] });
		acc.push({ toolCalls: [{ index: 0, argumentsDelta: 'ected":true}' }] });
		acc.push({ inputTokens: 12, outputTokens: 4 });

		expect(acc.toInteractions()).toEqual([
			expect.objectContaining({ type: "text", agent: "assistant", content: "Looking" }),
			expect.objectContaining({ type: "tool_call", id: "call_1", name: "gh_get", arguments: { selected: true } }),
		]);
		expect(acc.metrics()).toEqual({ finishReason: "tool_calls", inputTokens: 12, outputTokens: 4 });
	});

	it("reports stop when there are no tool calls", () => {
		const acc = new StreamAccumulator();
		acc.push({ content: "done" });
		expect(acc.metrics().finishReason).toBe("stop");
	});
});
