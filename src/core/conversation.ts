import { DEFAULT_MAX_TOOL_ITERATIONS } from "../config/schema.js";
import type { ModelManager } from "../providers/model-registry.js";
import type { ToolManager } from "../tools/registry.js";
import { toolFailure } from "../tools/registry.js";
import { debug, warn } from "../utils/log.js";
import { AIReturn } from "./ai-return.js";
import type { AICallStatus } from "./ai-return.js";
import { ToolLoopLimitError } from "./errors.js";
import type { ExecuteOptions } from "./executor.js";
import type { AIExecutor } from "./executor.js";
import { AIBody, toolResult } from "./interactions.js";
import type { AIToolCallInteraction, AIToolResultInteraction } from "./interactions.js";
import type { AIRuntimeMessage } from "./messages.js";
import { runtimeMessage } from "./messages.js";
import type { AIMetrics } from "./metrics.js";
import { combineMetrics } from "./metrics.js";
import type { AIRequestCall } from "./request.js";
import { AIToolCall } from "./tool-call.js";

export interface ConversationSessionOptions {
	executor: AIExecutor;
	tools: ToolManager;
	models: ModelManager;
	/** Tool rounds allowed before the loop is stopped */
	maxToolIterations?: number;
	toolTimeoutSeconds?: number;
}

export interface RunOptions extends ExecuteOptions {
	/** Called after every local tool execution, in call order */
	onToolResult?: (result: AIToolResultInteraction) => void;
}

/** Tool failures are fed back to the model; they only warn the caller. */
function asWarnings(messages: readonly AIRuntimeMessage[], toolName: string): AIRuntimeMessage[] {
	return messages.map((m) =>
		m.severity === "Error" ? runtimeMessage("Warning", `Tool '${toolName}': ${m.message}`, m.origin) : m,
	);
}

/**
 * Drives the tool-call loop for one request: call the provider, run every
 * pending tool call locally, append the results and call again, until a turn
 * has no tool calls, the signal fires, or the iteration limit is hit.
 */
export class ConversationSession {
	private _history: AIBody;
	private _status: AICallStatus = "idle";
	private readonly _maxToolIterations: number;

	constructor(
		readonly request: AIRequestCall,
		private readonly _options: ConversationSessionOptions,
	) {
		this._history = request.body;
		this._maxToolIterations = _options.maxToolIterations ?? DEFAULT_MAX_TOOL_ITERATIONS;
	}

	/** Every interaction so far, including tool calls and their results. */
	get history(): AIBody {
		return this._history;
	}

	get status(): AICallStatus {
		return this._status;
	}

	/** Resolves with the final turn; metrics cover every turn of the run. */
	async run(options: RunOptions = {}): Promise<AIReturn> {
		const { signal } = options;
		const messages: AIRuntimeMessage[] = [];
		let metrics: AIMetrics | undefined;
		let rounds = 0;

		for (;;) {
			if (signal?.aborted) {
				return this._finish(AIReturn.createCancelled(this.request, metrics, "Return"));
			}

			this._status = options.stream ? "streaming" : "processing";
			const turn = await this._options.executor.execute(this.request.with({ body: this._history }), options);
			metrics = metrics ? combineMetrics(metrics, turn.metrics) : turn.metrics;
			this._history = this._history.concat(turn.body);

			if (!turn.success) {
				return this._finish(turn.with({ metrics, messages: [...messages, ...turn.messages] }));
			}

			const pending = turn.body.pendingToolCalls();
			if (pending.length === 0) {
				debug("ConversationSession", `Finished after ${rounds} tool round(s)`);
				return this._finish(turn.with({ metrics, messages: [...messages, ...turn.messages] }));
			}

			if (rounds >= this._maxToolIterations) {
				const err = new ToolLoopLimitError(this._maxToolIterations);
				warn("ConversationSession", err.message);
				return this._finish(
					AIReturn.createError(err.message, {
						request: this.request,
						metrics: { ...metrics, finishReason: "tool_loop_limit" },
						body: turn.body,
						messages,
					}),
				);
			}
			rounds++;

			this._status = "calling_tools";
			for (const call of pending) {
				const result = await this._runTool(call, turn, signal);
				if (signal?.aborted) {
					return this._finish(AIReturn.createCancelled(this.request, metrics, "Return"));
				}
				this._history = this._history.add(result.interaction);
				messages.push(...asWarnings(result.messages, call.name));
				options.onToolResult?.(result.interaction);
			}
		}
	}

	private async _runTool(
		call: AIToolCallInteraction,
		turn: AIReturn,
		signal: AbortSignal | undefined,
	): Promise<{ interaction: AIToolResultInteraction; messages: readonly AIRuntimeMessage[] }> {
		const request = this.request.with({
			provider: turn.metrics.provider ?? this.request.provider,
			model: turn.metrics.model ?? this.request.model,
			body: AIBody.of(call),
		});

		debug("ConversationSession", `Executing tool call ${call.name} (${call.id})`);
		const ret = await new AIToolCall(request, this._options).exec({
			signal,
			timeoutSeconds: this._options.toolTimeoutSeconds,
		});

		const interaction =
			ret.body.lastToolResult() ??
			toolResult(call.id, call.name, toolFailure(ret.errorMessage ?? `Tool '${call.name}' failed`), [...ret.messages]);
		return { interaction, messages: ret.messages };
	}

	private _finish(result: AIReturn): AIReturn {
		this._status = "finished";
		return result;
	}
}
