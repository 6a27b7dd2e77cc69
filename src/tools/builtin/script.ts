import { z } from "zod";
import { AIBody, systemMessage, userMessage } from "../../core/interactions.js";
import type { JsonObject } from "../../core/interactions.js";
import { AICapability } from "../../providers/capabilities.js";
import { debug, errorMessage } from "../../utils/log.js";
import { toolFailure } from "../registry.js";
import type { AITool, AIToolProvider, ToolRuntime } from "../types.js";
import { failedCall, readCallTarget, stripThinkTags } from "./shared.js";

export type ScriptLanguage = "python" | "ironpython" | "c#" | "vb";

interface ScriptComponentInfo {
  language: ScriptLanguage;
  componentName: string;
}

const LANGUAGES: Record<string, ScriptComponentInfo> = {
  python: { language: "python", componentName: "Python 3 Script" },
  python3: { language: "python", componentName: "Python 3 Script" },
  ironpython: { language: "ironpython", componentName: "IronPython 2 Script" },
  ironpython2: { language: "ironpython", componentName: "IronPython 2 Script" },
  "c#": { language: "c#", componentName: "C# Script" },
  csharp: { language: "c#", componentName: "C# Script" },
  vb: { language: "vb", componentName: "VB Script" },
  "vb.net": { language: "vb", componentName: "VB Script" },
  vbnet: { language: "vb", componentName: "VB Script" },
};

export const SUPPORTED_SCRIPT_LANGUAGES: readonly ScriptLanguage[] = ["python", "ironpython", "c#", "vb"];

/** Resolve a language name or alias, case-insensitively. */
export function resolveScriptLanguage(language: string): ScriptComponentInfo | null {
  return LANGUAGES[language.trim().toLowerCase()] ?? null;
}

const SYSTEM_PROMPT = [
  "You are a Grasshopper script component generator. Generate a complete script for a Grasshopper script component based on the user instructions.",
  "",
  'You MUST choose the scripting language and return it in the "language" field.',
  'The language MUST be one of: "python", "ironpython", "c#", "vb".',
  'Use "python" unless the user explicitly requests another language.',
  "",
  "Your response MUST be a valid JSON object with the following structure:",
  "- language: The scripting language to use (python, ironpython, c#, vb)",
  "- script: The complete script code",
  "- inputs: Array of input parameters with name, type, description, and access (item/list/tree)",
  "- outputs: Array of output parameters with name, type, and description",
  "- nickname: Optional short name for the component",
  "- summary: A brief summary (1-3 sentences) of what the component does and key design decisions made",
  "",
  "The JSON object will be parsed programmatically, so it must be valid JSON with no additional text.",
].join("\n");

export const SCRIPT_OUTPUT_SCHEMA: JsonObject = {
  type: "object",
  properties: {
    language: {
      type: "string",
      description: "Scripting language for the component. Must be one of: python, ironpython, c#, vb.",
      enum: SUPPORTED_SCRIPT_LANGUAGES,
      default: "python",
    },
    script: { type: "string", description: "The complete script code for the component" },
    inputs: {
      type: "array",
      items: {
        type: "object",
        properties: {
          name: { type: "string" },
          type: { type: "string" },
          description: { type: "string" },
          access: { type: "string", enum: ["item", "list", "tree"] },
        },
        required: ["name", "type", "description", "access"],
        additionalProperties: false,
      },
    },
    outputs: {
      type: "array",
      items: {
        type: "object",
        properties: {
          name: { type: "string" },
          type: { type: "string" },
          description: { type: "string" },
        },
        required: ["name", "type", "description"],
        additionalProperties: false,
      },
    },
    nickname: { type: "string", description: "Optional short name for the component" },
    summary: {
      type: "string",
      description: "A brief summary (1-3 sentences) of what the component does and key design decisions made",
    },
  },
  required: ["language", "script", "inputs", "outputs", "summary"],
  additionalProperties: false,
};

const scriptGenerateArgsSchema = z.object({
  instructions: z.string().nullish(),
  language: z.string().nullish(),
});

const parameterSchema = z.object({
  name: z.string(),
  type: z.string().optional(),
  description: z.string().optional(),
  access: z.enum(["item", "list", "tree"]).optional(),
});

const scriptResponseSchema = z.object({
  language: z.string().optional(),
  script: z.string().optional(),
  inputs: z.array(parameterSchema).optional(),
  outputs: z.array(parameterSchema.omit({ access: true })).optional(),
  nickname: z.string().optional(),
  summary: z.string().optional(),
});

function parseResponse(text: string): z.infer<typeof scriptResponseSchema> | string {
  let json: unknown;
  try {
    json = JSON.parse(stripThinkTags(text));
  } catch (err) {
    return `The model did not return valid JSON: ${errorMessage(err)}`;
  }
  const parsed = scriptResponseSchema.safeParse(json);
  return parsed.success ? parsed.data : `Unexpected script response: ${parsed.error.message}`;
}

export const scriptGenerateTool: AITool = {
  name: "script_generate",
  description:
    "Generate a new Grasshopper script component from natural language instructions. " +
    "Returns the script, its inputs and outputs (does not place it on canvas).",
  category: "Scripting",
  requiredCapabilities: AICapability.TextInput | AICapability.TextOutput | AICapability.JsonOutput,
  parameters: {
    type: "object",
    properties: {
      instructions: {
        type: "string",
        description: "Natural language instructions describing what the script should do.",
      },
      language: {
        type: "string",
        description: "Optional preferred scripting language (python, ironpython, c#, vb). Defaults to python if not specified.",
        enum: SUPPORTED_SCRIPT_LANGUAGES,
      },
    },
    required: ["instructions"],
  },
  async execute(args: JsonObject, runtime: ToolRuntime): Promise<JsonObject> {
    const parsed = scriptGenerateArgsSchema.safeParse(args);
    if (!parsed.success) {
      return toolFailure(`Invalid arguments: ${parsed.error.message}`);
    }

    const { instructions, language: preferred } = parsed.data;
    if (!instructions?.trim()) {
      return toolFailure("Missing required 'instructions' parameter.");
    }
    if (!runtime.ai) {
      return toolFailure("script_generate needs an AI caller");
    }

    const systemPrompt = preferred?.trim()
      ? `${SYSTEM_PROMPT}\n\nThe user prefers the '${preferred.trim()}' scripting language.`
      : SYSTEM_PROMPT;

    const { provider, model } = readCallTarget(args);
    const result = await runtime.ai.call({
      provider,
      model,
      capability: AICapability.TextInput | AICapability.TextOutput | AICapability.JsonOutput,
      body: AIBody.of(systemMessage(systemPrompt), userMessage(instructions)),
      jsonOutputSchema: SCRIPT_OUTPUT_SCHEMA,
      toolFilter: "-*",
      signal: runtime.signal,
    });

    if (!result.success) {
      return failedCall(result, "Script generation failed");
    }

    const response = parseResponse(result.body.lastText("assistant")?.content ?? "");
    if (typeof response === "string") {
      return toolFailure(response);
    }

    const language = response.language ?? "python";
    const info = resolveScriptLanguage(language);
    if (!info) {
      return toolFailure(`Unsupported language '${language}'. Supported: ${SUPPORTED_SCRIPT_LANGUAGES.join(", ")}`);
    }

    const inputs = response.inputs ?? [];
    const outputs = response.outputs ?? [];
    debug("script_generate", `Language: ${info.language}, script length: ${response.script?.length ?? 0}`);

    return {
      success: true,
      language: info.language,
      componentName: info.componentName,
      script: response.script ?? "",
      inputs,
      outputs,
      inputCount: inputs.length,
      outputCount: outputs.length,
      nickname: response.nickname ?? "AI Script",
      summary: response.summary ?? "",
      message: "Script component generated successfully. Use gh_put to place it on the canvas.",
    };
  },
};

export const scriptTools: AIToolProvider = {
  getTools: () => [scriptGenerateTool],
};
