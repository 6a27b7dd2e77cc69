import type Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import type { ProviderSettingValues } from "../config/schema.js";
import type { AIInteraction } from "../core/interactions.js";
import { assistantMessage, toolCall } from "../core/interactions.js";
import type { AIMetrics } from "../core/metrics.js";
import type { AIRequestCall } from "../core/request.js";
import { debug } from "../utils/log.js";
import { AIProviderBase } from "./base.js";
import { AICapability } from "./capabilities.js";
import { ProviderModelsBase } from "./models.js";
import type { StreamDelta } from "./stream-accumulator.js";
import type {
  AIProvider,
  ModelDescriptor,
  ProviderContext,
  ProviderFactory,
  ProviderSettings,
  SettingDescriptor,
} from "./types.js";

type AnthropicMessage = Anthropic.Messages.MessageParam;
type AnthropicTool = Anthropic.Messages.Tool;

export const ANTHROPIC_VERSION = "2023-06-01";

const contentBlockSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({ type: z.literal("thinking"), thinking: z.string() }),
  z.object({ type: z.literal("tool_use"), id: z.string(), name: z.string(), input: z.record(z.string(), z.unknown()) }),
]);

const messageSchema = z.object({
  content: z.array(z.unknown()),
  stop_reason: z.string().nullish(),
  usage: z.object({ input_tokens: z.number().optional(), output_tokens: z.number().optional() }).nullish(),
});

const streamEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("message_start"),
    message: z.object({ usage: z.object({ input_tokens: z.number().optional() }).nullish() }),
  }),
  z.object({
    type: z.literal("content_block_start"),
    index: z.number(),
    content_block: z.object({ type: z.string(), id: z.string().optional(), name: z.string().optional() }),
  }),
  z.object({
    type: z.literal("content_block_delta"),
    index: z.number(),
    delta: z.object({
      type: z.string(),
      text: z.string().optional(),
      thinking: z.string().optional(),
      partial_json: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal("message_delta"),
    delta: z.object({ stop_reason: z.string().nullish() }),
    usage: z.object({ output_tokens: z.number().optional() }).nullish(),
  }),
  z.object({ type: z.literal("message_stop") }),
]);

function parseJson(raw: string): unknown {
  return JSON.parse(raw);
}

function mapStopReason(reason: string | null | undefined): string | undefined {
  switch (reason) {
    case "end_turn":
    case "stop_sequence":
      return "stop";
    case "tool_use":
      return "tool_calls";
    case "max_tokens":
      return "length";
    case null:
    case undefined:
      return undefined;
    default:
      return reason;
  }
}

function convertMessages(interactions: readonly AIInteraction[]): { system?: string; messages: AnthropicMessage[] } {
  const systemMessages: string[] = [];
  const converted: AnthropicMessage[] = [];

  for (const interaction of interactions) {
    const last = converted.at(-1);

    switch (interaction.type) {
      case "text":
        if (interaction.agent === "system") {
          systemMessages.push(interaction.content);
        } else {
          converted.push({ role: interaction.agent === "user" ? "user" : "assistant", content: interaction.content });
        }
        break;
      case "tool_call": {
        const block: Anthropic.Messages.ToolUseBlockParam = {
          type: "tool_use",
          id: interaction.id,
          name: interaction.name,
          input: interaction.arguments,
        };
        if (last?.role === "assistant") {
          const content: Anthropic.Messages.ContentBlockParam[] =
            typeof last.content !== "string" ? last.content : last.content ? [{ type: "text", text: last.content }] : [];
          last.content = [...content, block];
        } else {
          converted.push({ role: "assistant", content: [block] });
        }
        break;
      }
      case "tool_result": {
        const block: Anthropic.Messages.ToolResultBlockParam = {
          type: "tool_result",
          tool_use_id: interaction.id,
          content: JSON.stringify(interaction.result),
        };
        if (last?.role === "user" && Array.isArray(last.content)) {
          last.content.push(block);
        } else {
          converted.push({ role: "user", content: [block] });
        }
        break;
      }
      case "error":
        break;
    }
  }

  const combinedSystem = systemMessages.length > 0 ? systemMessages.join("\n\n") : undefined;
  return { system: combinedSystem, messages: converted };
}

function convertTools(request: AIRequestCall): AnthropicTool[] {
  return request.tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.parameters, type: "object" as const },
  }));
}

class AnthropicProviderModels extends ProviderModelsBase {
  protected declaredModels(): ModelDescriptor[] {
    const caps =
      AICapability.TextInput |
      AICapability.ImageInput |
      AICapability.TextOutput |
      AICapability.JsonOutput |
      AICapability.FunctionCalling;

    return [
      {
        model: "claude-haiku-4-5",
        capabilities: caps,
        defaultFor: AICapability.Text2Text | AICapability.ToolChat | AICapability.Text2Json,
        supportsStreaming: true,
        rank: 95,
      },
      { model: "claude-haiku-4-5-20251001", capabilities: caps, supportsStreaming: true, rank: 85 },
      { model: "claude-sonnet-4-5", capabilities: caps, supportsStreaming: true, rank: 80 },
      { model: "claude-sonnet-4-5-20250929", capabilities: caps, supportsStreaming: true, rank: 80 },
      { model: "claude-sonnet-4-0", capabilities: caps, supportsStreaming: true, rank: 70 },
      { model: "claude-3-5-haiku-latest", capabilities: caps, supportsStreaming: true, rank: 60, deprecated: true },
      { model: "claude-opus-4-1", capabilities: caps, supportsStreaming: true, rank: 20 },
    ];
  }
}

/** Anthropic Messages API with `x-api-key` authentication. */
export class AnthropicProvider extends AIProviderBase {
  readonly name = "Anthropic";
  readonly defaultServerUrl = "https://api.anthropic.com/v1";
  readonly chatEndpoint = "/messages";
  readonly models = new AnthropicProviderModels("Anthropic");

  constructor(context: ProviderContext) {
    super(context);
  }

  override supportsStreaming(): boolean {
    return true;
  }

  protected override extraHeaders(): Record<string, string> {
    return { "anthropic-version": ANTHROPIC_VERSION };
  }

  override preCall(request: AIRequestCall): AIRequestCall {
    const prepared = super.preCall(request);
    return prepared.authentication === "x-api-key" ? prepared : prepared.with({ authentication: "x-api-key" });
  }

  encode(request: AIRequestCall): string {
    const { system, messages } = convertMessages(request.body.interactions);
    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: this.getNumberSetting("maxTokens") ?? 1024,
      messages,
    };

    const instructions = [system];
    if (request.jsonOutputSchema) {
      instructions.push(
        `Respond only with a JSON object that follows this schema:\n${JSON.stringify(request.jsonOutputSchema)}`,
      );
    }
    const joined = instructions.filter((s): s is string => Boolean(s)).join("\n\n");
    if (joined) params.system = joined;

    const temperature = this.getNumberSetting("temperature");
    if (temperature !== undefined) params.temperature = temperature;

    if (request.tools.length > 0) {
      params.tools = convertTools(request);
      params.tool_choice = { type: "auto" };
    }

    if (request.stream) {
      const streaming: Anthropic.Messages.MessageCreateParamsStreaming = { ...params, stream: true };
      return JSON.stringify(streaming);
    }
    return JSON.stringify(params);
  }

  decode(raw: string): AIInteraction[] {
    const parsed = messageSchema.parse(parseJson(raw));

    let text = "";
    let reasoning = "";
    const calls: AIInteraction[] = [];
    for (const item of parsed.content) {
      const block = contentBlockSchema.safeParse(item);
      if (!block.success) continue;
      switch (block.data.type) {
        case "text":
          text += block.data.text;
          break;
        case "thinking":
          reasoning += block.data.thinking;
          break;
        case "tool_use":
          calls.push(toolCall(block.data.id, block.data.name, block.data.input));
          break;
      }
    }

    const interactions: AIInteraction[] = [];
    if (text || reasoning) interactions.push(assistantMessage(text, reasoning || undefined));
    return [...interactions, ...calls];
  }

  decodeMetrics(raw: string): Partial<AIMetrics> {
    const parsed = messageSchema.safeParse(parseJson(raw));
    if (!parsed.success) return {};
    return {
      inputTokens: parsed.data.usage?.input_tokens ?? 0,
      outputTokens: parsed.data.usage?.output_tokens ?? 0,
      finishReason: mapStopReason(parsed.data.stop_reason),
    };
  }

  protected override isTerminalPayload(payload: string): boolean {
    return payload.includes('"message_stop"');
  }

  protected override parseStreamPayload(payload: string): StreamDelta | null {
    let json: unknown;
    try {
      json = parseJson(payload);
    } catch {
      debug(this.name, `Skipping malformed stream payload: ${payload}`);
      return null;
    }

    const parsed = streamEventSchema.safeParse(json);
    if (!parsed.success) return null;

    const event = parsed.data;
    switch (event.type) {
      case "message_start":
        return { inputTokens: event.message.usage?.input_tokens };
      case "content_block_start":
        if (event.content_block.type !== "tool_use") return null;
        return { toolCalls: [{ index: event.index, id: event.content_block.id, name: event.content_block.name }] };
      case "content_block_delta":
        if (event.delta.type === "input_json_delta") {
          return { toolCalls: [{ index: event.index, argumentsDelta: event.delta.partial_json }] };
        }
        return { content: event.delta.text, reasoning: event.delta.thinking };
      case "message_delta":
        return { finishReason: mapStopReason(event.delta.stop_reason), outputTokens: event.usage?.output_tokens };
      case "message_stop":
        return null;
    }
  }
}

export class AnthropicProviderSettings implements ProviderSettings {
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
      { name: "enableStreaming", type: "boolean", displayName: "Enable Streaming", defaultValue: true },
      { name: "maxTokens", type: "number", displayName: "Max Tokens", defaultValue: 1024, min: 1, max: 64000 },
      { name: "temperature", type: "number", displayName: "Temperature", defaultValue: 0.5, min: 0, max: 1 },
    ];
  }

  validateSettings(values: ProviderSettingValues): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const maxTokens = values.maxTokens;
    if (maxTokens !== undefined && (typeof maxTokens !== "number" || maxTokens <= 0)) {
      errors.push("Max Tokens must be greater than 0.");
    }

    const temperature = values.temperature;
    if (temperature !== undefined && (typeof temperature !== "number" || temperature < 0 || temperature > 1)) {
      errors.push("Temperature must be between 0 and 1.");
    }

    return { valid: errors.length === 0, errors };
  }

  enableStreaming(values: ProviderSettingValues): boolean | undefined {
    const value = values.enableStreaming;
    return typeof value === "boolean" ? value : undefined;
  }
}

export const anthropicProviderFactory: ProviderFactory = {
  createProvider: (context) => new AnthropicProvider(context),
  createProviderSettings: (provider) => new AnthropicProviderSettings(provider),
};
