import { describe, expect, it } from "vitest";
import {
	AICapability,
	capabilityToString,
	findDefaultCapabilityForModel,
	hasCapability,
} from "../../src/providers/capabilities.js";

describe("hasCapability", () => {
	const samples = [
		AICapability.None,
		AICapability.TextInput,
		AICapability.Text2Text,
		AICapability.ToolChat,
		AICapability.Text2Json,
		AICapability.Text2Image,
		AICapability.ToolReasoningChat,
	];

	it("is true exactly when every required bit is present", () => {
		for (const caps of samples) {
			for (const required of samples) {
				expect(hasCapability(caps, required)).toBe((caps | required) === caps);
			}
		}
	});

	it("treats None as always satisfied", () => {
		expect(hasCapability(AICapability.None, AICapability.None)).toBe(true);
		expect(hasCapability(AICapability.TextInput, AICapability.None)).toBe(true);
	});

	it("rejects a partial overlap", () => {
		expect(hasCapability(AICapability.TextInput | AICapability.JsonOutput, AICapability.Text2Text)).toBe(false);
	});
});

describe("composites", () => {
	it("BasicChat is Text2Text", () => {
		expect(AICapability.BasicChat).toBe(AICapability.Text2Text);
	});

	it("ToolChat adds function calling to text chat", () => {
		expect(AICapability.ToolChat).toBe(AICapability.TextInput | AICapability.TextOutput | AICapability.FunctionCalling);
	});
});

describe("capabilityToString", () => {
	it("renders None", () => {
		expect(capabilityToString(AICapability.None)).toBe("None");
	});

	it("lists flags in declaration order", () => {
		expect(capabilityToString(AICapability.ToolChat)).toBe("TextInput, TextOutput, FunctionCalling");
	});
});

describe("findDefaultCapabilityForModel", () => {
	const defaults = new Map<string, AICapability>([
		["gpt-5-mini", AICapability.ToolChat],
		["gpt-4*", AICapability.Text2Text],
		["gpt-4.1*", AICapability.Text2Json],
	]);

	it("prefers an exact key", () => {
		expect(findDefaultCapabilityForModel("gpt-5-mini", defaults)).toBe(AICapability.ToolChat);
	});

	it("resolves a concrete name through a matching wildcard", () => {
		expect(findDefaultCapabilityForModel("gpt-4o", defaults)).toBe(AICapability.Text2Text);
	});

	it("takes the first matching wildcard, not the longest", () => {
		expect(findDefaultCapabilityForModel("gpt-4.1-mini", defaults)).toBe(AICapability.Text2Text);
	});

	it("resolves a pattern name against keys sharing its prefix", () => {
		expect(findDefaultCapabilityForModel("gpt-5*", defaults)).toBe(AICapability.ToolChat);
	});

	it("returns None when nothing matches", () => {
		expect(findDefaultCapabilityForModel("claude-haiku-4-5", defaults)).toBe(AICapability.None);
	});
});
