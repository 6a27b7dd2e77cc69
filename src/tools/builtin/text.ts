import { z } from "zod";
import { AIBody, systemMessage, userMessage } from "../../core/interactions.js";
import type { JsonObject } from "../../core/interactions.js";
import { AICapability } from "../../providers/capabilities.js";
import { toolFailure } from "../registry.js";
import type { AITool, AIToolProvider, ToolRuntime } from "../types.js";
import { failedCall, readCallTarget, stripThinkTags } from "./shared.js";

export const DEFAULT_TEXT_SYSTEM_PROMPT =
  "You are a helpful AI assistant. Generate clear, relevant, and well-structured text based on the user's prompt. " +
  "Provide thoughtful and accurate responses that directly address what the user is asking for.";

const textGenerateArgsSchema = z.object({
  prompt: z.string().nullish(),
  instructions: z.string().nullish(),
});

export const textGenerateTool: AITool = {
  name: "text_generate",
  description: "Generates text based on a prompt and optional instructions. Returns the generated text.",
  category: "DataProcessing",
  requiredCapabilities: AICapability.TextInput | AICapability.TextOutput,
  parameters: {
    type: "object",
    properties: {
      prompt: {
        type: "string",
        description: "The prompt to generate text from",
      },
      instructions: {
        type: "string",
        description: "Optional instructions that replace the default system prompt",
      },
    },
    required: ["prompt"],
  },
  async execute(args: JsonObject, runtime: ToolRuntime): Promise<JsonObject> {
    const parsed = textGenerateArgsSchema.safeParse(args);
    if (!parsed.success) {
      return toolFailure(`Invalid arguments: ${parsed.error.message}`);
    }

    const { prompt, instructions } = parsed.data;
    if (!prompt?.trim()) {
      return toolFailure("Missing required parameter: prompt");
    }
    if (!runtime.ai) {
      return toolFailure("text_generate needs an AI caller");
    }

    const { provider, model } = readCallTarget(args);
    const result = await runtime.ai.call({
      provider,
      model,
      capability: AICapability.TextInput | AICapability.TextOutput,
      body: AIBody.of(systemMessage(instructions?.trim() || DEFAULT_TEXT_SYSTEM_PROMPT), userMessage(prompt)),
      toolFilter: "-*",
      signal: runtime.signal,
    });

    if (!result.success) {
      return failedCall(result, "Text generation failed");
    }

    const text = result.body.lastText("assistant")?.content;
    if (text === undefined) {
      return toolFailure("The provider returned no text");
    }

    return {
      success: true,
      result: stripThinkTags(text),
      metrics: { ...result.metrics },
    };
  },
};

export const textTools: AIToolProvider = {
  getTools: () => [textGenerateTool],
};
