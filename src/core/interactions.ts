import type { AIMetrics } from "./metrics.js";
import type { AIRuntimeMessage } from "./messages.js";

export type JsonObject = Record<string, unknown>;

export type TextAgent = "system" | "user" | "assistant";

export interface AITextInteraction {
	type: "text";
	agent: TextAgent;
	content: string;
	reasoning?: string;
	metrics?: AIMetrics;
}

export interface AIToolCallInteraction {
	type: "tool_call";
	agent: "assistant";
	id: string;
	name: string;
	arguments: JsonObject;
}

export interface AIToolResultInteraction {
	type: "tool_result";
	agent: "tool";
	id: string;
	name: string;
	result: JsonObject;
	messages?: AIRuntimeMessage[];
}

export interface AIErrorInteraction {
	type: "error";
	agent: "system";
	content: string;
}

/** One turn's contribution to a conversation. */
export type AIInteraction = AITextInteraction | AIToolCallInteraction | AIToolResultInteraction | AIErrorInteraction;

export function systemMessage(content: string): AITextInteraction {
	return { type: "text", agent: "system", content };
}

export function userMessage(content: string): AITextInteraction {
	return { type: "text", agent: "user", content };
}

export function assistantMessage(content: string, reasoning?: string): AITextInteraction {
	return reasoning ? { type: "text", agent: "assistant", content, reasoning } : { type: "text", agent: "assistant", content };
}

export function toolCall(id: string, name: string, args: JsonObject = {}): AIToolCallInteraction {
	return { type: "tool_call", agent: "assistant", id, name, arguments: args };
}

export function toolResult(id: string, name: string, result: JsonObject, messages?: AIRuntimeMessage[]): AIToolResultInteraction {
	return messages?.length
		? { type: "tool_result", agent: "tool", id, name, result, messages }
		: { type: "tool_result", agent: "tool", id, name, result };
}

/**
 * Ordered, immutable interaction sequence. Append order is decode order, so the
 * last tool call or tool result is authoritative for the current turn.
 */
export class AIBody {
	private constructor(readonly interactions: readonly AIInteraction[]) {}

	static empty(): AIBody {
		return new AIBody([]);
	}

	static of(...interactions: AIInteraction[]): AIBody {
		return new AIBody([...interactions]);
	}

	add(...interactions: AIInteraction[]): AIBody {
		return new AIBody([...this.interactions, ...interactions]);
	}

	concat(other: AIBody): AIBody {
		return new AIBody([...this.interactions, ...other.interactions]);
	}

	get length(): number {
		return this.interactions.length;
	}

	last(): AIInteraction | undefined {
		return this.interactions[this.interactions.length - 1];
	}

	lastText(agent: TextAgent = "assistant"): AITextInteraction | undefined {
		for (let i = this.interactions.length - 1; i >= 0; i--) {
			const interaction = this.interactions[i];
			if (interaction?.type === "text" && interaction.agent === agent) return interaction;
		}
		return undefined;
	}

	lastToolResult(): AIToolResultInteraction | undefined {
		for (let i = this.interactions.length - 1; i >= 0; i--) {
			const interaction = this.interactions[i];
			if (interaction?.type === "tool_result") return interaction;
		}
		return undefined;
	}

	toolCalls(): AIToolCallInteraction[] {
		return this.interactions.filter((i): i is AIToolCallInteraction => i.type === "tool_call");
	}

	/** Tool calls without a later tool result carrying the same id. */
	pendingToolCalls(): AIToolCallInteraction[] {
		const answered = new Set(
			this.interactions.filter((i): i is AIToolResultInteraction => i.type === "tool_result").map((i) => i.id),
		);
		return this.toolCalls().filter((call) => !answered.has(call.id));
	}
}
