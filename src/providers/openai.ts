import type OpenAI from "openai";
import { z } from "zod";
import type { ProviderSettingValues } from "../config/schema.js";
import type { AIInteraction, AITextInteraction } from "../core/interactions.js";
import { assistantMessage, toolCall } from "../core/interactions.js";
import type { AIMetrics } from "../core/metrics.js";
import type { AIRequestCall } from "../core/request.js";
import { debug } from "../utils/log.js";
import { AIProviderBase } from "./base.js";
import { AICapability, hasCapability } from "./capabilities.js";
import { ProviderModelsBase } from "./models.js";
import { parseToolArguments } from "./stream-accumulator.js";
import type { StreamDelta } from "./stream-accumulator.js";
import { buildAuthHeaders, resolveEndpoint } from "./streaming.js";
import type {
	AIProvider,
	ModelDescriptor,
	ProviderContext,
	ProviderFactory,
	ProviderSettings,
	SettingDescriptor,
} from "./types.js";

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;
type OpenAITool = OpenAI.Chat.ChatCompletionTool;

const REASONING_EFFORTS = ["low", "medium", "high"] as const;

const usageSchema = z.object({
	prompt_tokens: z.number().optional(),
	completion_tokens: z.number().optional(),
});

const completionSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({
					content: z.string().nullish(),
					reasoning_content: z.string().nullish(),
					tool_calls: z
						.array(
							z.object({
								id: z.string(),
								function: z.object({ name: z.string(), arguments: z.string().nullish() }),
							}),
						)
						.nullish(),
				}),
				finish_reason: z.string().nullish(),
			}),
		)
		.min(1, "No message found in response"),
	usage: usageSchema.nullish(),
});

const chunkSchema = z.object({
	choices: z
		.array(
			z.object({
				delta: z
					.object({
						content: z.string().nullish(),
						reasoning_content: z.string().nullish(),
						tool_calls: z
							.array(
								z.object({
									index: z.number(),
									id: z.string().nullish(),
									function: z.object({ name: z.string().nullish(), arguments: z.string().nullish() }).nullish(),
								}),
							)
							.nullish(),
					})
					.nullish(),
				finish_reason: z.string().nullish(),
			}),
		)
		.default([]),
	usage: usageSchema.nullish(),
});

const modelListSchema = z.object({ data: z.array(z.object({ id: z.string() })) });

function parseJson(raw: string): unknown {
	return JSON.parse(raw);
}

function textMessage(interaction: AITextInteraction): OpenAIMessage {
	switch (interaction.agent) {
		case "system":
			return { role: "system", content: interaction.content };
		case "user":
			return { role: "user", content: interaction.content };
		case "assistant":
			return { role: "assistant", content: interaction.content };
	}
}

function convertMessages(interactions: readonly AIInteraction[]): OpenAIMessage[] {
	const messages: OpenAIMessage[] = [];

	for (const interaction of interactions) {
		switch (interaction.type) {
			case "text":
				messages.push(textMessage(interaction));
				break;
			case "tool_call": {
				const call: OpenAI.Chat.ChatCompletionMessageToolCall = {
					id: interaction.id,
					type: "function",
					function: { name: interaction.name, arguments: JSON.stringify(interaction.arguments) },
				};
				// consecutive calls belong to the same assistant turn
				const last = messages.at(-1);
				if (last?.role === "assistant") {
					last.tool_calls = [...(last.tool_calls ?? []), call];
				} else {
					messages.push({ role: "assistant", content: null, tool_calls: [call] });
				}
				break;
			}
			case "tool_result":
				messages.push({ role: "tool", tool_call_id: interaction.id, content: JSON.stringify(interaction.result) });
				break;
			case "error":
				break;
		}
	}

	return messages;
}

function convertTools(request: AIRequestCall): OpenAITool[] {
	return request.tools.map((tool) => ({
		type: "function" as const,
		function: {
			name: tool.name,
			description: tool.description,
			parameters: tool.parameters,
		},
	}));
}

class OpenAIProviderModels extends ProviderModelsBase {
	constructor(private readonly _provider: OpenAIProvider) {
		super(_provider.name);
	}

	protected declaredModels(): ModelDescriptor[] {
		const chat =
			AICapability.TextInput |
			AICapability.ImageInput |
			AICapability.TextOutput |
			AICapability.JsonOutput |
			AICapability.FunctionCalling;

		return [
			{
				model: "gpt-5-mini",
				capabilities: chat | AICapability.Reasoning,
				defaultFor: AICapability.ToolChat | AICapability.Text2Json | AICapability.ToolReasoningChat,
				supportsStreaming: true,
				rank: 95,
			},
			{
				model: "gpt-5-nano",
				capabilities: chat | AICapability.Reasoning,
				defaultFor: AICapability.Text2Text,
				supportsStreaming: true,
				rank: 90,
			},
			{ model: "gpt-5", capabilities: chat | AICapability.Reasoning, supportsStreaming: true, rank: 80 },
			{ model: "gpt-4.1", capabilities: chat, supportsStreaming: true, rank: 70 },
			{ model: "gpt-4.1-mini", capabilities: chat, supportsStreaming: true, rank: 65 },
			{ model: "o4-mini", capabilities: chat | AICapability.Reasoning, supportsStreaming: true, rank: 60 },
			{
				model: "dall-e-3",
				capabilities: AICapability.TextInput | AICapability.ImageOutput,
				defaultFor: AICapability.Text2Image,
				supportsStreaming: false,
				rank: 50,
			},
			{
				model: "gpt-image-1",
				capabilities: AICapability.TextInput | AICapability.ImageInput | AICapability.ImageOutput,
				defaultFor: AICapability.Image2Image,
				supportsStreaming: false,
				rank: 40,
			},
		];
	}

	protected override async fetchApiModels(signal?: AbortSignal): Promise<string[] | null> {
		const apiKey = this._provider.getApiKey();
		if (!apiKey) return null;

		const url = resolveEndpoint(this._provider.defaultServerUrl, "/models");
		const response = await this._provider.fetch(url, {
			method: "GET",
			headers: { Accept: "application/json", ...buildAuthHeaders(this.providerName, "bearer", apiKey) },
			signal,
		});
		if (!response.ok) {
			throw new Error(`Model listing returned ${response.status}`);
		}

		const parsed = modelListSchema.parse(await response.json());
		return parsed.data.map((m) => m.id).sort();
	}
}

/** OpenAI chat completions, also usable against OpenAI-compatible servers via `serverUrl`. */
export class OpenAIProvider extends AIProviderBase {
	readonly name = "OpenAI";
	readonly chatEndpoint = "/chat/completions";
	readonly models: OpenAIProviderModels;

	constructor(context: ProviderContext) {
		super(context);
		this.models = new OpenAIProviderModels(this);
	}

	get defaultServerUrl(): string {
		return this.getStringSetting("serverUrl") || "https://api.openai.com/v1";
	}

	override supportsStreaming(): boolean {
		return true;
	}

	private _isReasoningModel(model: string): boolean {
		const registered = this.context.models.getCapabilities(this.name, model);
		return registered !== null && hasCapability(registered.capabilities, AICapability.Reasoning);
	}

	encode(request: AIRequestCall): string {
		const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
			model: request.model,
			messages: convertMessages(request.body.interactions),
		};

		const maxTokens = this.getNumberSetting("maxTokens");
		if (maxTokens !== undefined) params.max_completion_tokens = maxTokens;

		if (this._isReasoningModel(request.model)) {
			const effort = this.getStringSetting("reasoningEffort");
			if (effort === "low" || effort === "medium" || effort === "high") {
				params.reasoning_effort = effort;
			}
		} else {
			const temperature = this.getNumberSetting("temperature");
			if (temperature !== undefined) params.temperature = temperature;
		}

		if (request.jsonOutputSchema) {
			params.response_format = {
				type: "json_schema",
				json_schema: { name: "response", schema: request.jsonOutputSchema, strict: true },
			};
		}

		if (request.tools.length > 0) {
			params.tools = convertTools(request);
			params.tool_choice = "auto";
		}

		if (request.stream) {
			const streaming: OpenAI.Chat.ChatCompletionCreateParamsStreaming = {
				...params,
				stream: true,
				stream_options: { include_usage: true },
			};
			return JSON.stringify(streaming);
		}
		return JSON.stringify(params);
	}

	decode(raw: string): AIInteraction[] {
		const parsed = completionSchema.parse(parseJson(raw));
		const message = parsed.choices[0]?.message;
		if (!message) return [];

		const interactions: AIInteraction[] = [];
		const content = message.content ?? "";
		const reasoning = message.reasoning_content ?? undefined;
		if (content || reasoning) {
			interactions.push(assistantMessage(content, reasoning));
		}
		for (const tc of message.tool_calls ?? []) {
			interactions.push(toolCall(tc.id, tc.function.name, parseToolArguments(tc.function.name, tc.function.arguments ?? "")));
		}
		return interactions;
	}

	decodeMetrics(raw: string): Partial<AIMetrics> {
		const parsed = completionSchema.safeParse(parseJson(raw));
		if (!parsed.success) return {};
		return {
			inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
			outputTokens: parsed.data.usage?.completion_tokens ?? 0,
			finishReason: parsed.data.choices[0]?.finish_reason ?? undefined,
		};
	}

	protected override parseStreamPayload(payload: string): StreamDelta | null {
		let json: unknown;
		try {
			json = parseJson(payload);
		} catch {
			debug(this.name, `Skipping malformed stream payload: ${payload}`);
			return null;
		}

		const parsed = chunkSchema.safeParse(json);
		if (!parsed.success) return null;

		const choice = parsed.data.choices[0];
		const delta: StreamDelta = {
			content: choice?.delta?.content ?? undefined,
			reasoning: choice?.delta?.reasoning_content ?? undefined,
			finishReason: choice?.finish_reason ?? undefined,
			toolCalls: choice?.delta?.tool_calls?.map((tc) => ({
				index: tc.index,
				id: tc.id ?? undefined,
				name: tc.function?.name ?? undefined,
				argumentsDelta: tc.function?.arguments ?? undefined,
			})),
		};
		if (parsed.data.usage) {
			delta.inputTokens = parsed.data.usage.prompt_tokens;
			delta.outputTokens = parsed.data.usage.completion_tokens;
		}
		return delta;
	}
}

export class OpenAIProviderSettings implements ProviderSettings {
	constructor(private readonly _provider: AIProvider) {}

	getSettingDescriptors(): SettingDescriptor[] {
		return [
			{ name: "apiKey", type: "string", displayName: "API Key", isSecret: true },
			{
				name: "model",
				type: "string",
				displayName: "Model",
				defaultValue: () => this._provider.getDefaultModel(AICapability.BasicChat, false) ?? undefined,
			},
			{ name: "serverUrl", type: "string", displayName: "Server URL", description: "OpenAI-compatible base URL" },
			{ name: "enableStreaming", type: "boolean", displayName: "Enable Streaming", defaultValue: true },
			{ name: "maxTokens", type: "number", displayName: "Max Tokens", defaultValue: 500, min: 1, max: 100000 },
			{
				name: "reasoningEffort",
				type: "string",
				displayName: "Reasoning Effort",
				defaultValue: "medium",
				allowedValues: REASONING_EFFORTS,
			},
			{ name: "temperature", type: "number", displayName: "Temperature", defaultValue: 0.5, min: 0, max: 2 },
		];
	}

	validateSettings(values: ProviderSettingValues): { valid: boolean; errors: string[] } {
		const errors: string[] = [];

		const maxTokens = values.maxTokens;
		if (maxTokens !== undefined && (typeof maxTokens !== "number" || maxTokens <= 0)) {
			errors.push("Max Tokens must be greater than 0.");
		}

		const effort = values.reasoningEffort;
		if (effort !== undefined && !REASONING_EFFORTS.some((e) => e === effort)) {
			errors.push("Reasoning effort must be low, medium, or high.");
		}

		const temperature = values.temperature;
		if (temperature !== undefined && (typeof temperature !== "number" || temperature < 0 || temperature > 2)) {
			errors.push("Temperature must be between 0 and 2.");
		}

		return { valid: errors.length === 0, errors };
	}

	enableStreaming(values: ProviderSettingValues): boolean | undefined {
		const value = values.enableStreaming;
		return typeof value === "boolean" ? value : undefined;
	}
}

export const openAIProviderFactory: ProviderFactory = {
	createProvider: (context) => new OpenAIProvider(context),
	createProviderSettings: (provider) => new OpenAIProviderSettings(provider),
};
