import type { AIReturn } from "../core/ai-return.js";
import type { AIBody, JsonObject } from "../core/interactions.js";
import type { AICapability } from "../providers/capabilities.js";

export interface ToolParameters {
	type: "object";
	properties: Record<string, unknown>;
	required?: string[];
	[key: string]: unknown;
}

/** Provider call made on behalf of a tool, e.g. `text_generate`. */
export interface AICallOptions {
	/** Provider name or "Default" */
	provider: string;
	model?: string;
	capability?: AICapability;
	body: AIBody;
	/** Tool categories exposed to the nested call; "-*" when omitted */
	toolFilter?: string;
	jsonOutputSchema?: JsonObject;
	signal?: AbortSignal;
}

export interface AICaller {
	call(options: AICallOptions): Promise<AIReturn>;
}

export interface ToolRuntime {
	/** Aborted on caller cancellation or tool timeout */
	signal: AbortSignal;
	/** Present when the tool manager is wired to a provider executor */
	ai?: AICaller;
}

export interface AITool {
	name: string;
	description: string;
	/** Category matched by request tool filters */
	category: string;
	parameters: ToolParameters;
	/** Capabilities the calling model must have; checked before execution */
	requiredCapabilities?: AICapability;
	/** Failures are reported through a `messages` array in the result, not by throwing */
	execute(args: JsonObject, runtime: ToolRuntime): Promise<JsonObject>;
}

/** A set of related tools registered together during discovery. */
export interface AIToolProvider {
	getTools(): AITool[];
}
