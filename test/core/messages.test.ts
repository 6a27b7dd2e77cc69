import { describe, expect, it } from "vitest";
import { AIReturn } from "../../src/core/ai-return.js";
import { AIBody, assistantMessage, toolCall, toolResult, userMessage } from "../../src/core/interactions.js";
import { hasErrors, normalizeMessages, readMessages, runtimeMessage } from "../../src/core/messages.js";
import { combineMetrics, emptyMetrics } from "../../src/core/metrics.js";
import { AIRequestCall } from "../../src/core/request.js";

describe("normalizeMessages", () => {
	it("drops repeated texts and orders by severity", () => {
		const result = normalizeMessages([
			runtimeMessage("Remark", "using default model"),
			runtimeMessage("Warning", "slow"),
			runtimeMessage("Error", "failed"),
			runtimeMessage("Warning", "failed"),
		]);

		expect(result).toEqual([
			{ severity: "Error", message: "failed" },
			{ severity: "Warning", message: "slow" },
			{ severity: "Remark", message: "using default model" },
		]);
	});

	it("reports errors", () => {
		expect(hasErrors([runtimeMessage("Warning", "w")])).toBe(false);
		expect(hasErrors([runtimeMessage("Error", "e")])).toBe(true);
	});
});

describe("readMessages", () => {
	it("keeps well-formed entries only", () => {
		const result = readMessages([
			{ severity: "Warning", message: "partial", origin: "Tool" },
			{ severity: "Fatal", message: "unknown severity" },
			{ severity: "Error" },
			"text",
			{ severity: "Remark", message: "note", origin: "Elsewhere" },
		]);

		expect(result).toEqual([
			{ severity: "Warning", message: "partial", origin: "Tool" },
			{ severity: "Remark", message: "note" },
		]);
	});

	it("returns nothing for a non-array", () => {
		expect(readMessages({ severity: "Error", message: "x" })).toEqual([]);
	});
});

describe("combineMetrics", () => {
	it("adds counters and keeps the later identity", () => {
		const first = emptyMetrics({ provider: "OpenAI", model: "a", finishReason: "tool_calls", inputTokens: 10, outputTokens: 2, completionTime: 1.5 });
		const second = emptyMetrics({ model: "b", inputTokens: 5, outputTokens: 3, completionTime: 0.5 });

		expect(combineMetrics(first, second)).toEqual({
			provider: "OpenAI",
			model: "b",
			finishReason: "tool_calls",
			inputTokens: 15,
			outputTokens: 5,
			completionTime: 2,
		});
	});
});

describe("AIBody", () => {
	it("lists tool calls without a matching result as pending", () => {
		const body = AIBody.of(
			userMessage("hi"),
			toolCall("1", "gh_get"),
			toolCall("2", "text_generate", { prompt: "x" }),
			toolResult("1", "gh_get", { success: true }),
		);

		expect(body.pendingToolCalls().map((c) => c.id)).toEqual(["2"]);
		expect(body.lastToolResult()?.id).toBe("1");
	});

	it("is immutable", () => {
		const body = AIBody.of(userMessage("hi"));
		const longer = body.add(assistantMessage("hello"));

		expect(body.length).toBe(1);
		expect(longer.length).toBe(2);
		expect(longer.lastText()?.content).toBe("hello");
		expect(longer.lastText("user")?.content).toBe("hi");
	});

	it("drops empty tool result messages", () => {
		expect(toolResult("1", "x", {}, [])).toEqual({ type: "tool_result", agent: "tool", id: "1", name: "x", result: {} });
	});
});

describe("AIRequestCall", () => {
	it("applies defaults", () => {
		const request = new AIRequestCall({ provider: "OpenAI", endpoint: "/chat/completions" });

		expect(request.toolFilter).toBe("-*");
		expect(request.httpMethod).toBe("POST");
		expect(request.authentication).toBe("bearer");
		expect(request.model).toBe("");
	});

	it("requires provider, endpoint and model", () => {
		const result = new AIRequestCall({ provider: "", endpoint: "" }).validate();

		expect(result.valid).toBe(false);
		expect(result.messages.map((m) => m.message)).toEqual([
			"Provider is required",
			"Endpoint is required",
			"No model is available for this request",
		]);
	});

	it("copies with changes", () => {
		const request = new AIRequestCall({ provider: "OpenAI", endpoint: "/x", model: "m" });
		const copy = request.with({ model: "n" });

		expect(copy.model).toBe("n");
		expect(request.model).toBe("m");
		expect(copy.validate().valid).toBe(true);
	});
});

describe("AIReturn", () => {
	const request = new AIRequestCall({ provider: "OpenAI", endpoint: "/x", model: "gpt-5-mini" });

	it("takes provider and model from the request", () => {
		const result = AIReturn.createSuccess([assistantMessage("ok")], { request, metrics: { inputTokens: 3 } });

		expect(result.success).toBe(true);
		expect(result.metrics).toEqual({
			provider: "OpenAI",
			model: "gpt-5-mini",
			inputTokens: 3,
			outputTokens: 0,
			completionTime: 0,
		});
	});

	it("marks errors with finish reason and origin", () => {
		const result = AIReturn.createProviderError("quota exceeded", request);

		expect(result.success).toBe(false);
		expect(result.errorMessage).toBe("Provider error: quota exceeded");
		expect(result.messages[0]?.origin).toBe("Provider");
		expect(result.metrics.finishReason).toBe("error");
	});

	it("reports cancellation", () => {
		const result = AIReturn.createCancelled(request);

		expect(result.errorMessage).toBe("Call cancelled or timed out");
		expect(result.metrics.finishReason).toBe("cancelled");
	});

	it("serialises to the result envelope", () => {
		const json = AIReturn.createSuccess([assistantMessage("ok")]).toJSON();

		expect(json.success).toBe(true);
		expect(json.result).toEqual([{ type: "text", agent: "assistant", content: "ok" }]);
		expect(json.messages).toEqual([]);
	});
});
