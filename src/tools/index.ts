export type {
  AICallOptions,
  AICaller,
  AITool,
  AIToolProvider,
  ToolParameters,
  ToolRuntime,
} from "./types.js";

export { Filter } from "./filter.js";

export {
  ToolManager,
  clampTimeout,
  toolFailure,
  MIN_TOOL_TIMEOUT_SECONDS,
  MAX_TOOL_TIMEOUT_SECONDS,
} from "./registry.js";
export type { ExecuteToolOptions, ToolManagerOptions } from "./registry.js";

export * from "./builtin/index.js";
