import { describe, expect, it } from "vitest";
import { AIBody, userMessage } from "../../src/core/interactions.js";
import type { AIToolResultInteraction, JsonObject } from "../../src/core/interactions.js";
import type { AIRequestInit } from "../../src/core/request.js";
import type { FetchLike } from "../../src/providers/types.js";
import type { CanvasHost } from "../../src/tools/builtin/index.js";
import { toolFailure } from "../../src/tools/registry.js";
import type { AITool } from "../../src/tools/types.js";
import {
	createTestRuntime,
	fakeFetch,
	jsonResponse,
	requestBody,
	testSettings,
	textCompletion,
	toolCallCompletion,
} from "../helpers.js";

function probeTool(handler: (args: JsonObject) => JsonObject): AITool & { seen: JsonObject[] } {
	const seen: JsonObject[] = [];
	return {
		seen,
		name: "probe",
		description: "Look something up",
		category: "Knowledge",
		parameters: { type: "object", properties: { q: { type: "string" } }, required: ["q"] },
		async execute(args) {
			seen.push(args);
			return handler(args);
		},
	};
}

const chat: AIRequestInit = {
	provider: "OpenAI",
	model: "gpt-4.1",
	endpoint: "",
	toolFilter: "Knowledge",
	body: AIBody.of(userMessage("What is the answer?")),
};

async function runtimeWith(fetch: FetchLike, tool: AITool, maxToolIterations?: number) {
	return createTestRuntime(fetch, {
		settings: maxToolIterations ? testSettings({ maxToolIterations }) : testSettings(),
		toolProviders: [{ getTools: () => [tool] }],
	});
}

describe("ConversationSession", () => {
	it("runs tool calls locally and feeds the results back", async () => {
		const { fetch, calls } = fakeFetch(
			() => jsonResponse(toolCallCompletion("call-1", "probe", { q: "answer" })),
			() => jsonResponse(textCompletion("It is 42.")),
		);
		const tool = probeTool(() => ({ success: true, answer: 42 }));
		const runtime = await runtimeWith(fetch, tool);
		const results: AIToolResultInteraction[] = [];

		const session = runtime.session(chat);
		const result = await session.run({ onToolResult: (r) => results.push(r) });

		expect(result.success).toBe(true);
		expect(result.body.lastText()?.content).toBe("It is 42.");
		expect(result.messages).toEqual([]);
		expect(result.metrics).toMatchObject({
			provider: "OpenAI",
			model: "gpt-4.1",
			finishReason: "stop",
			inputTokens: 30,
			outputTokens: 13,
		});
		expect(session.status).toBe("finished");
		expect(session.history.interactions.map((i) => i.type)).toEqual(["text", "tool_call", "tool_result", "text"]);
		expect(tool.seen).toEqual([{ q: "answer", provider: "OpenAI", model: "gpt-4.1" }]);
		expect(results.map((r) => [r.id, r.result])).toEqual([["call-1", { success: true, answer: 42 }]]);

		expect(calls).toHaveLength(2);
		const first = requestBody(calls[0]);
		expect(first["tools"]).toEqual([
			{ type: "function", function: { name: "probe", description: "Look something up", parameters: tool.parameters } },
		]);
		const second = requestBody(calls[1]);
		expect(second["messages"]).toEqual([
			{ role: "user", content: "What is the answer?" },
			{
				role: "assistant",
				content: null,
				tool_calls: [{ id: "call-1", type: "function", function: { name: "probe", arguments: '{"q":"answer"}' } }],
			},
			{ role: "tool", tool_call_id: "call-1", content: '{"success":true,"answer":42}' },
		]);
	});

	it("reads the canvas through gh_get before answering", async () => {
		const { fetch, calls } = fakeFetch(
			() => jsonResponse(toolCallCompletion("call-gh", "gh_get", { typeFilter: ["+startnodes"] })),
			() => jsonResponse(textCompletion("There is one slider.")),
		);
		const document = { components: [{ name: "Number Slider" }] };
		const canvas: CanvasHost = {
			getDocument: async () => document,
			putDocument: async () => ({ placed: [] }),
			tidyUp: async () => [],
		};
		const runtime = await createTestRuntime(fetch, { canvas });

		const session = runtime.session({ ...chat, toolFilter: "Components" });
		const result = await session.run();

		expect(result.body.lastText()?.content).toBe("There is one slider.");
		expect(session.history.lastToolResult()?.result).toEqual({
			success: true,
			ghjson: JSON.stringify(document),
			componentCount: 1,
		});
		expect(calls).toHaveLength(2);
	});

	it("returns a text-only answer after one call", async () => {
		const { fetch, calls } = fakeFetch(() => jsonResponse(textCompletion("Hello")));
		const tool = probeTool(() => ({ success: true }));
		const runtime = await runtimeWith(fetch, tool);

		const result = await runtime.session(chat).run();

		expect(result.body.lastText()?.content).toBe("Hello");
		expect(calls).toHaveLength(1);
		expect(tool.seen).toEqual([]);
	});

	it("turns tool failures into warnings and keeps going", async () => {
		const { fetch } = fakeFetch(
			() => jsonResponse(toolCallCompletion("call-1", "probe", { q: "x" })),
			() => jsonResponse(textCompletion("Could not look it up.")),
		);
		const runtime = await runtimeWith(
			fetch,
			probeTool(() => toolFailure("index offline")),
		);

		const session = runtime.session(chat);
		const result = await session.run();

		expect(result.success).toBe(true);
		expect(result.messages).toEqual([{ severity: "Warning", message: "Tool 'probe': index offline", origin: "Tool" }]);
		const toolResult = session.history.lastToolResult();
		expect(toolResult?.result["error"]).toBe("index offline");
	});

	it("stops after the configured number of tool rounds", async () => {
		const { fetch, calls } = fakeFetch(() => jsonResponse(toolCallCompletion("call-1", "probe", { q: "again" })));
		const tool = probeTool(() => ({ success: true }));
		const runtime = await runtimeWith(fetch, tool, 2);

		const result = await runtime.session(chat).run();

		expect(result.success).toBe(false);
		expect(result.errorMessage).toBe("Tool-call loop stopped after 2 iterations");
		expect(result.metrics.finishReason).toBe("tool_loop_limit");
		expect(result.metrics.inputTokens).toBe(60);
		expect(result.body.pendingToolCalls().map((c) => c.id)).toEqual(["call-1"]);
		expect(calls).toHaveLength(3);
		expect(tool.seen).toHaveLength(2);
	});

	it("reports cancellation when the signal fires during a tool", async () => {
		const { fetch, calls } = fakeFetch(() => jsonResponse(toolCallCompletion("call-1", "probe", { q: "x" })));
		const controller = new AbortController();
		const runtime = await runtimeWith(
			fetch,
			probeTool(() => {
				controller.abort();
				return { success: true };
			}),
		);

		const result = await runtime.session(chat).run({ signal: controller.signal });

		expect(result.success).toBe(false);
		expect(result.errorMessage).toBe("Call cancelled or timed out");
		expect(result.metrics.finishReason).toBe("cancelled");
		expect(calls).toHaveLength(1);
	});

	it("stops promptly when cancelled while a tool ignores the signal", async () => {
		const { fetch, calls } = fakeFetch(() => jsonResponse(toolCallCompletion("call-1", "probe", { q: "x" })));
		const controller = new AbortController();
		let release = (): void => undefined;
		const stubborn: AITool = {
			...probeTool(() => ({ success: true })),
			execute: () =>
				new Promise<JsonObject>((resolve) => {
					setTimeout(() => controller.abort(), 10);
					release = () => resolve({ success: true });
				}),
		};
		const runtime = await runtimeWith(fetch, stubborn);

		const startedAt = Date.now();
		const result = await runtime.session(chat).run({ signal: controller.signal });
		const elapsed = Date.now() - startedAt;
		release();

		expect(result.success).toBe(false);
		expect(result.metrics.finishReason).toBe("cancelled");
		expect(result.metrics.inputTokens).toBe(20);
		expect(elapsed).toBeLessThan(1000);
		expect(calls).toHaveLength(1);
	});

	it("does not call the provider with an aborted signal", async () => {
		const { fetch, calls } = fakeFetch(() => jsonResponse(textCompletion("unused")));
		const runtime = await runtimeWith(fetch, probeTool(() => ({ success: true })));
		const controller = new AbortController();
		controller.abort();

		const result = await runtime.session(chat).run({ signal: controller.signal });

		expect(result.metrics.finishReason).toBe("cancelled");
		expect(calls).toHaveLength(0);
	});

	it("returns provider failures with the metrics so far", async () => {
		const { fetch } = fakeFetch(
			() => jsonResponse(toolCallCompletion("call-1", "probe", { q: "x" })),
			() => new Response("oops", { status: 500 }),
		);
		const runtime = await runtimeWith(fetch, probeTool(() => ({ success: true })));

		const result = await runtime.session(chat).run();

		expect(result.errorMessage).toBe("Provider error: OpenAI API returned 500 - oops");
		expect(result.metrics.inputTokens).toBe(20);
	});
});
