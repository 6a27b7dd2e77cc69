export { AIReturn } from "./ai-return.js";
export type { AICallStatus } from "./ai-return.js";
export { ConversationSession } from "./conversation.js";
export type { ConversationSessionOptions, RunOptions } from "./conversation.js";
export {
	ConfigError,
	HopperError,
	isAbortError,
	MissingConfigurationError,
	ProviderSecurityError,
	StreamingRequestError,
	ToolLoopLimitError,
	UnsupportedAuthenticationError,
	UnsupportedHttpMethodError,
} from "./errors.js";
export { AIExecutor } from "./executor.js";
export type { ExecuteOptions } from "./executor.js";
export {
	AIBody,
	assistantMessage,
	systemMessage,
	toolCall,
	toolResult,
	userMessage,
} from "./interactions.js";
export type {
	AIErrorInteraction,
	AIInteraction,
	AITextInteraction,
	AIToolCallInteraction,
	AIToolResultInteraction,
	JsonObject,
	TextAgent,
} from "./interactions.js";
export { hasErrors, normalizeMessages, readMessages, runtimeMessage } from "./messages.js";
export type { AIRuntimeMessage, AIRuntimeMessageOrigin, AIRuntimeMessageSeverity } from "./messages.js";
export { combineMetrics, emptyMetrics } from "./metrics.js";
export type { AIMetrics } from "./metrics.js";
export { AIRequestCall } from "./request.js";
export type { AIRequestInit, AIToolDefinition, HttpMethod } from "./request.js";
export { AIToolCall, callAiTool } from "./tool-call.js";
export type { CallAiToolOptions, ToolCallOptions, ToolCallServices } from "./tool-call.js";
