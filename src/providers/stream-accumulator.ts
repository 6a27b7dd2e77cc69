import type { AIInteraction, JsonObject } from "../core/interactions.js";
import { assistantMessage, toolCall } from "../core/interactions.js";
import type { AIMetrics } from "../core/metrics.js";
import { warn } from "../utils/log.js";

export interface ToolCallDelta {
	/** Position of the call within the message; fragments with the same index merge */
	index: number;
	id?: string;
	name?: string;
	argumentsDelta?: string;
}

/** Provider-neutral increment decoded from one streamed payload. */
export interface StreamDelta {
	content?: string;
	reasoning?: string;
	toolCalls?: ToolCallDelta[];
	finishReason?: string;
	inputTokens?: number;
	outputTokens?: number;
}

export function parseToolArguments(name: string, raw: string): JsonObject {
	if (!raw.trim()) return {};
	try {
		const parsed: unknown = JSON.parse(raw);
		if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
			return { ...parsed };
		}
		warn("Decode", `Tool arguments for ${name} are not an object`);
		return {};
	} catch (err) {
		warn("Decode", `Failed to parse tool arguments for ${name}: ${err}`);
		return {};
	}
}

/** Folds stream deltas into the interactions and metrics of a complete response. */
export class StreamAccumulator {
	private _content = "";
	private _reasoning = "";
	private _toolCalls: Map<number, { id: string; name: string; args: string }> = new Map();
	private _finishReason?: string;
	private _inputTokens = 0;
	private _outputTokens = 0;

	push(delta: StreamDelta): void {
		if (delta.content) this._content += delta.content;
		if (delta.reasoning) this._reasoning += delta.reasoning;

		for (const tc of delta.toolCalls ?? []) {
			const existing = this._toolCalls.get(tc.index) ?? { id: "", name: "", args: "" };
			if (tc.id) existing.id = tc.id;
			if (tc.name) existing.name = tc.name;
			if (tc.argumentsDelta) existing.args += tc.argumentsDelta;
			this._toolCalls.set(tc.index, existing);
		}

		if (delta.finishReason) this._finishReason = delta.finishReason;
		if (delta.inputTokens !== undefined) this._inputTokens = delta.inputTokens;
		if (delta.outputTokens !== undefined) this._outputTokens = delta.outputTokens;
	}

	get content(): string {
		return this._content;
	}

	toInteractions(): AIInteraction[] {
		const interactions: AIInteraction[] = [];
		if (this._content || this._reasoning) {
			interactions.push(assistantMessage(this._content, this._reasoning || undefined));
		}

		const ordered = Array.from(this._toolCalls.entries()).sort(([a], [b]) => a - b);
		for (const [index, tc] of ordered) {
			interactions.push(toolCall(tc.id || `call_${index}`, tc.name, parseToolArguments(tc.name, tc.args)));
		}
		return interactions;
	}

	metrics(): Partial<AIMetrics> {
		return {
			finishReason: this._finishReason ?? (this._toolCalls.size > 0 ? "tool_calls" : "stop"),
			inputTokens: this._inputTokens,
			outputTokens: this._outputTokens,
		};
	}
}
