import { beforeEach, describe, expect, it } from "vitest";
import type { JsonObject } from "../../src/core/interactions.js";
import { clampTimeout, ToolManager } from "../../src/tools/registry.js";
import type { AITool, ToolRuntime } from "../../src/tools/types.js";

const echoTool: AITool = {
	name: "echo",
	description: "Echo the input",
	category: "DataProcessing",
	parameters: {
		type: "object",
		properties: { input: { type: "string" }, count: { type: "integer" }, ratio: { type: "number" } },
		required: ["input"],
	},
	async execute(args): Promise<JsonObject> {
		return { success: true, echoed: args };
	},
};

const scriptTool: AITool = {
	name: "script_probe",
	description: "Scripting stand-in",
	category: "Scripting",
	parameters: { type: "object", properties: {} },
	async execute(): Promise<JsonObject> {
		return { success: true };
	},
};

function waitForAbort(runtime: ToolRuntime): Promise<JsonObject> {
	return new Promise((_, reject) => {
		runtime.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
	});
}

const slowTool: AITool = {
	name: "slow",
	description: "Never finishes on its own",
	category: "Knowledge",
	parameters: { type: "object", properties: {} },
	execute: (_args, runtime) => waitForAbort(runtime),
};

describe("ToolManager", () => {
	let tools: ToolManager;

	beforeEach(() => {
		tools = new ToolManager();
		tools.registerMany([echoTool, scriptTool, slowTool]);
	});

	describe("registration", () => {
		it("rejects duplicate names", () => {
			expect(() => tools.register(echoTool)).toThrow('Tool "echo" is already registered');
		});

		it("discovers tools only once", () => {
			const fresh = new ToolManager();
			const provider = { getTools: () => [echoTool] };

			fresh.discoverTools([provider]);
			fresh.discoverTools([provider]);

			expect(fresh.names()).toEqual(["echo"]);
		});

		it("unregisters by name", () => {
			expect(tools.unregister("echo")).toBe(true);
			expect(tools.has("echo")).toBe(false);
			expect(tools.unregister("echo")).toBe(false);
		});
	});

	describe("getToolDefinitions", () => {
		it("filters by category", () => {
			expect(tools.getToolDefinitions("DataProcessing,Knowledge").map((t) => t.name)).toEqual(["echo", "slow"]);
			expect(tools.getToolDefinitions("-Scripting").map((t) => t.name)).toEqual(["echo", "slow"]);
			expect(tools.getToolDefinitions("-*")).toEqual([]);
		});

		it("carries the tool's schema", () => {
			expect(tools.getToolDefinitions("DataProcessing")).toEqual([
				{ name: "echo", description: "Echo the input", parameters: echoTool.parameters },
			]);
		});
	});

	describe("validateArguments", () => {
		it("accepts valid arguments", () => {
			expect(tools.validateArguments("echo", { input: "hi", count: 2, ratio: 3 })).toEqual([]);
		});

		it("reports missing and mistyped parameters", () => {
			expect(tools.validateArguments("echo", { count: 1.5 }).map((m) => m.message)).toEqual([
				"Missing required parameter 'input' for tool 'echo'",
				"Parameter 'count' of tool 'echo' must be of type integer, got number",
			]);
		});

		it("reports unknown tools", () => {
			expect(tools.validateArguments("missing", {})).toEqual([
				{ severity: "Error", message: "Tool 'missing' not found", origin: "Validation" },
			]);
		});
	});

	describe("executeTool", () => {
		it("merges context over arguments", async () => {
			const result = await tools.executeTool("echo", { input: "hi", provider: "A" }, { provider: "B" });
			expect(result).toEqual({ success: true, echoed: { input: "hi", provider: "B" } });
		});

		it("returns a failure for unknown tools", async () => {
			expect(await tools.executeTool("missing", {})).toEqual({
				success: false,
				error: 'Tool "missing" not found',
				messages: [{ severity: "Error", message: 'Tool "missing" not found', origin: "Tool" }],
			});
		});

		it("wraps handler exceptions", async () => {
			tools.register({
				...echoTool,
				name: "broken",
				execute: async () => {
					throw new Error("boom");
				},
			});

			const result = await tools.executeTool("broken", { input: "x" });
			expect(result["success"]).toBe(false);
			expect(result["error"]).toBe("Error executing tool 'broken': boom");
		});

		it("times out and aborts the handler", async () => {
			const result = await tools.executeTool("slow", {}, null, { timeoutSeconds: 1 });
			expect(result["error"]).toBe("Tool error: 'slow' timed out after 1 seconds");
		});

		it("reports cancellation by the caller", async () => {
			const controller = new AbortController();
			setTimeout(() => controller.abort(), 10);

			const result = await tools.executeTool("slow", {}, null, { signal: controller.signal });
			expect(result["error"]).toBe("Tool error: 'slow' was cancelled");
		});

		it("returns on cancellation even when the handler ignores the signal", async () => {
			let release = (): void => undefined;
			let finished = false;
			tools.register({
				...scriptTool,
				name: "stubborn",
				execute: () =>
					new Promise<JsonObject>((resolve) => {
						release = () => {
							finished = true;
							resolve({ success: true });
						};
					}),
			});
			const controller = new AbortController();
			setTimeout(() => controller.abort(), 10);

			const result = await tools.executeTool("stubborn", {}, null, { signal: controller.signal });

			expect(result["error"]).toBe("Tool error: 'stubborn' was cancelled");
			expect(finished).toBe(false);
			release();
		});

		it("does not start a handler for an already cancelled caller", async () => {
			const calls: JsonObject[] = [];
			tools.register({
				...scriptTool,
				name: "counted",
				execute: async (args) => {
					calls.push(args);
					return { success: true };
				},
			});
			const controller = new AbortController();
			controller.abort();

			const result = await tools.executeTool("counted", {}, null, { signal: controller.signal });

			expect(result["error"]).toBe("Tool error: 'counted' was cancelled");
			expect(calls).toEqual([]);
		});

		it("hands the AI caller to tools", async () => {
			const seen: Array<ToolRuntime["ai"]> = [];
			const caller = { call: async () => Promise.reject(new Error("unused")) };
			const managed = new ToolManager({ ai: caller });
			managed.register({
				...scriptTool,
				execute: async (_args, runtime) => {
					seen.push(runtime.ai);
					return { success: true };
				},
			});

			await managed.executeTool("script_probe", {});
			expect(seen).toEqual([caller]);
		});
	});

	it("clamps timeouts into range", () => {
		expect(clampTimeout(undefined)).toBe(120);
		expect(clampTimeout(0)).toBe(1);
		expect(clampTimeout(5000)).toBe(600);
		expect(clampTimeout(30)).toBe(30);
	});
});
