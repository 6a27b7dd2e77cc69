import { DEFAULT_TOOL_TIMEOUT_SECONDS } from "../config/schema.js";
import type { JsonObject } from "../core/interactions.js";
import type { AIRuntimeMessage } from "../core/messages.js";
import { runtimeMessage } from "../core/messages.js";
import type { AIToolDefinition } from "../core/request.js";
import { debug, errorMessage } from "../utils/log.js";
import { Filter } from "./filter.js";
import type { AICaller, AITool, AIToolProvider } from "./types.js";

export const MIN_TOOL_TIMEOUT_SECONDS = 1;
export const MAX_TOOL_TIMEOUT_SECONDS = 600;

export interface ExecuteToolOptions {
  timeoutSeconds?: number;
  signal?: AbortSignal;
}

export interface ToolManagerOptions {
  ai?: AICaller;
  timeoutSeconds?: number;
}

export function clampTimeout(seconds: number | undefined): number {
  const value = seconds === undefined || Number.isNaN(seconds) ? DEFAULT_TOOL_TIMEOUT_SECONDS : seconds;
  return Math.min(MAX_TOOL_TIMEOUT_SECONDS, Math.max(MIN_TOOL_TIMEOUT_SECONDS, value));
}

export function toolFailure(message: string, extra: AIRuntimeMessage[] = []): JsonObject {
  return {
    success: false,
    error: message,
    messages: [runtimeMessage("Error", message, "Tool"), ...extra],
  };
}

function jsonType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "number";
  return typeof value;
}

function matchesType(value: unknown, expected: string): boolean {
  const actual = jsonType(value);
  if (expected === "number") return actual === "number" || actual === "integer";
  return actual === expected;
}

class ToolTimeoutError extends Error {
  constructor(seconds: number) {
    super(`timed out after ${seconds} seconds`);
    this.name = "ToolTimeoutError";
  }
}

class ToolCancelledError extends Error {
  constructor() {
    super("was cancelled");
    this.name = "ToolCancelledError";
  }
}

/**
 * Registry and dispatcher of named tools.
 *
 * `executeTool` never throws: unknown tools, handler exceptions and timeouts
 * come back as `{ success: false, error, messages }`.
 */
export class ToolManager {
  private _tools: Map<string, AITool> = new Map();
  private _discovered = false;
  private _ai?: AICaller;
  private readonly _timeoutSeconds: number;

  constructor(options: ToolManagerOptions = {}) {
    this._ai = options.ai;
    this._timeoutSeconds = clampTimeout(options.timeoutSeconds);
  }

  /** Wire the executor used by AI-backed tools. */
  setAiCaller(ai: AICaller | undefined): void {
    this._ai = ai;
  }

  register(tool: AITool): void {
    if (this._tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this._tools.set(tool.name, tool);
  }

  registerMany(tools: AITool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /** Register every provider's tools; later calls are no-ops. */
  discoverTools(providers: AIToolProvider[]): void {
    if (this._discovered) return;
    this._discovered = true;

    for (const provider of providers) {
      for (const tool of provider.getTools()) {
        this.register(tool);
        debug("ToolManager", `Registered tool ${tool.name} (${tool.category})`);
      }
    }
  }

  unregister(name: string): boolean {
    return this._tools.delete(name);
  }

  get(name: string): AITool | undefined {
    return this._tools.get(name);
  }

  has(name: string): boolean {
    return this._tools.has(name);
  }

  list(): AITool[] {
    return Array.from(this._tools.values());
  }

  names(): string[] {
    return Array.from(this._tools.keys());
  }

  clear(): void {
    this._tools.clear();
    this._discovered = false;
  }

  /** Tools whose category passes the filter. */
  filtered(toolFilter: string | undefined): AITool[] {
    const filter = Filter.parse(toolFilter);
    return this.list().filter((tool) => filter.shouldInclude(tool.category));
  }

  getToolDefinitions(toolFilter: string | undefined): AIToolDefinition[] {
    return this.filtered(toolFilter).map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
  }

  /** Check arguments against the tool's schema: `required` keys and primitive `type`s. */
  validateArguments(name: string, args: JsonObject): AIRuntimeMessage[] {
    const tool = this._tools.get(name);
    if (!tool) {
      return [runtimeMessage("Error", `Tool '${name}' not found`, "Validation")];
    }

    const messages: AIRuntimeMessage[] = [];
    for (const key of tool.parameters.required ?? []) {
      if (args[key] === undefined || args[key] === null) {
        messages.push(runtimeMessage("Error", `Missing required parameter '${key}' for tool '${name}'`, "Validation"));
      }
    }

    for (const [key, schema] of Object.entries(tool.parameters.properties)) {
      const value = args[key];
      if (value === undefined || schema === null || typeof schema !== "object") continue;
      const expected: unknown = Reflect.get(schema, "type");
      if (typeof expected === "string" && !matchesType(value, expected)) {
        messages.push(
          runtimeMessage(
            "Error",
            `Parameter '${key}' of tool '${name}' must be of type ${expected}, got ${jsonType(value)}`,
            "Validation",
          ),
        );
      }
    }

    return messages;
  }

  /**
   * Run a tool by exact name. `context` values are merged over `args`.
   * The result is the handler's JSON, unchanged, or a failure object.
   */
  async executeTool(
    name: string,
    args: JsonObject,
    context: JsonObject | null = null,
    options: ExecuteToolOptions = {},
  ): Promise<JsonObject> {
    const tool = this._tools.get(name);
    if (!tool) {
      debug("ToolManager", `Tool not found: ${name}`);
      return toolFailure(`Tool "${name}" not found`);
    }

    if (options.signal?.aborted) {
      return toolFailure(`Tool error: '${name}' was cancelled`);
    }

    const seconds = clampTimeout(options.timeoutSeconds ?? this._timeoutSeconds);
    const controller = new AbortController();

    // handlers that ignore the signal must not hold up a cancelled caller
    let onAbort = (): void => undefined;
    const cancelled = new Promise<never>((_, reject) => {
      onAbort = (): void => {
        reject(new ToolCancelledError());
        controller.abort(options.signal?.reason);
      };
    });
    options.signal?.addEventListener("abort", onAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new ToolTimeoutError(seconds);
        // reject first; the abort wakes the handler synchronously
        reject(err);
        controller.abort(err);
      }, seconds * 1000);
    });

    try {
      debug("ToolManager", `Executing tool: ${name}`);
      const merged: JsonObject = { ...args, ...(context ?? {}) };
      const result = await Promise.race([
        tool.execute(merged, { signal: controller.signal, ai: this._ai }),
        timeout,
        cancelled,
      ]);
      debug("ToolManager", `Tool execution complete: ${name}`);
      return result;
    } catch (err) {
      if (err instanceof ToolTimeoutError) {
        return toolFailure(`Tool error: '${name}' ${err.message}`);
      }
      if (err instanceof ToolCancelledError || options.signal?.aborted) {
        return toolFailure(`Tool error: '${name}' was cancelled`);
      }
      return toolFailure(`Error executing tool '${name}': ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}
