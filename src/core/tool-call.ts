import { randomUUID } from "node:crypto";
import { AICapability, capabilityToString } from "../providers/capabilities.js";
import { DEFAULT_PROVIDER_ALIAS } from "../providers/manager.js";
import type { ProviderManager } from "../providers/manager.js";
import type { ModelManager } from "../providers/model-registry.js";
import type { ToolManager } from "../tools/registry.js";
import { debug, errorMessage } from "../utils/log.js";
import { AIReturn } from "./ai-return.js";
import { AIBody, toolCall, toolResult } from "./interactions.js";
import type { JsonObject } from "./interactions.js";
import type { AIRuntimeMessage } from "./messages.js";
import { readMessages, runtimeMessage } from "./messages.js";
import { AIRequestCall } from "./request.js";

export interface ToolCallServices {
	tools: ToolManager;
	models: ModelManager;
}

export interface ToolCallOptions {
	signal?: AbortSignal;
	timeoutSeconds?: number;
}

function invalid(request: AIRequestCall, messages: AIRuntimeMessage[]): AIReturn {
	const [first, ...rest] = messages;
	return AIReturn.createError(first?.message ?? "Invalid tool call", { request, origin: "Validation", messages: rest });
}

/**
 * A request whose body ends in exactly one pending tool call. `exec` runs that
 * call locally and returns a body holding the matching tool result.
 */
export class AIToolCall {
	constructor(
		readonly request: AIRequestCall,
		private readonly _services: ToolCallServices,
	) {}

	validate(): AIRuntimeMessage[] {
		const pending = this.request.body.pendingToolCalls();
		if (pending.length !== 1) {
			return [
				runtimeMessage("Error", `Expected exactly one pending tool call, found ${pending.length}`, "Validation"),
			];
		}

		const [call] = pending;
		if (!call) return [];
		const messages = this._services.tools.validateArguments(call.name, call.arguments);

		const tool = this._services.tools.get(call.name);
		const required = tool?.requiredCapabilities ?? AICapability.None;
		const { provider, model } = this.request;
		if (tool && required !== AICapability.None && provider && model) {
			if (!this._services.models.getCapabilities(provider, model)) {
				messages.push(
					runtimeMessage("Warning", `Model '${model}' of ${provider} is not registered; capabilities not checked`, "Validation"),
				);
			} else if (!this._services.models.validateCapabilities(provider, model, required)) {
				messages.push(
					runtimeMessage(
						"Error",
						`Model '${model}' of ${provider} does not support the capabilities required by tool '${call.name}': ${capabilityToString(required)}`,
						"Validation",
					),
				);
			}
		}
		return messages;
	}

	async exec(options: ToolCallOptions = {}): Promise<AIReturn> {
		const messages = this.validate();
		if (messages.some((m) => m.severity === "Error")) {
			return invalid(this.request, messages);
		}

		const [call] = this.request.body.pendingToolCalls();
		if (!call) {
			return invalid(this.request, []);
		}

		const context: JsonObject = { provider: this.request.provider };
		if (this.request.model) {
			context["model"] = this.request.model;
		}

		const startedAt = performance.now();
		const result = await this._services.tools.executeTool(call.name, call.arguments, context, {
			signal: options.signal,
			timeoutSeconds: options.timeoutSeconds,
		});
		if (options.signal?.aborted) {
			return AIReturn.createCancelled(this.request, undefined, "Tool");
		}

		const resultMessages = readMessages(result["messages"]);
		debug("AIToolCall", `${call.name} finished (success: ${String(result["success"] ?? true)})`);
		return AIReturn.createSuccess(AIBody.of(toolResult(call.id, call.name, result, resultMessages)), {
			request: this.request,
			messages: [...messages, ...resultMessages],
			metrics: { completionTime: (performance.now() - startedAt) / 1000, finishReason: "stop" },
		});
	}
}

export interface CallAiToolOptions extends ToolCallOptions {
	/** Provider name or "Default" */
	provider?: string;
	model?: string;
}

/**
 * Run one tool outside a conversation, the way host components do. Returns the
 * tool's JSON result, or `{ success: false, error, messages }`.
 */
export async function callAiTool(
	services: ToolCallServices & { providers: ProviderManager },
	toolName: string,
	parameters: JsonObject,
	options: CallAiToolOptions = {},
): Promise<JsonObject> {
	try {
		const providerName = options.provider || DEFAULT_PROVIDER_ALIAS;
		const provider = services.providers.getProvider(providerName);
		if (!provider) {
			const message = `Provider '${providerName}' is not available`;
			return { success: false, error: message, messages: [runtimeMessage("Error", message, "Validation")] };
		}
		await services.providers.whenReady(provider.name);

		const required = services.tools.get(toolName)?.requiredCapabilities ?? AICapability.BasicChat;
		const model = options.model || provider.getDefaultModel(required) || "";

		const request = new AIRequestCall({
			provider: provider.name,
			model,
			capability: required,
			endpoint: toolName,
			body: AIBody.of(toolCall(randomUUID(), toolName, parameters)),
		});

		const ret = await new AIToolCall(request, services).exec(options);
		if (!ret.success) {
			return { success: false, error: ret.errorMessage ?? `Tool '${toolName}' failed`, messages: [...ret.messages] };
		}

		const interaction = ret.body.lastToolResult();
		if (!interaction) {
			return {
				success: false,
				error: `Tool '${toolName}' returned no result`,
				messages: [...ret.messages],
			};
		}
		return interaction.result;
	} catch (err) {
		return { success: false, error: errorMessage(err) };
	}
}
