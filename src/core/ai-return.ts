import { AIBody } from "./interactions.js";
import type { AIInteraction } from "./interactions.js";
import type { AIMetrics } from "./metrics.js";
import { emptyMetrics } from "./metrics.js";
import type { AIRuntimeMessage, AIRuntimeMessageOrigin } from "./messages.js";
import { hasErrors, normalizeMessages, runtimeMessage } from "./messages.js";
import type { AIRequestCall } from "./request.js";

export type AICallStatus = "idle" | "processing" | "streaming" | "calling_tools" | "finished";

interface AIReturnInit {
	body: AIBody;
	metrics: AIMetrics;
	messages: AIRuntimeMessage[];
	status: AICallStatus;
	request?: AIRequestCall;
	raw?: string;
}

/** Result of one call: body, metrics and severity-tagged messages. Immutable. */
export class AIReturn {
	readonly body: AIBody;
	readonly metrics: AIMetrics;
	readonly messages: readonly AIRuntimeMessage[];
	readonly status: AICallStatus;
	readonly request?: AIRequestCall;
	/** Undecoded provider payload */
	readonly raw?: string;

	private constructor(init: AIReturnInit) {
		this.body = init.body;
		this.metrics = init.metrics;
		this.messages = normalizeMessages(init.messages);
		this.status = init.status;
		this.request = init.request;
		this.raw = init.raw;
	}

	static createSuccess(
		body: AIBody | AIInteraction[],
		options: { request?: AIRequestCall; metrics?: Partial<AIMetrics>; messages?: AIRuntimeMessage[]; raw?: string } = {},
	): AIReturn {
		return new AIReturn({
			body: body instanceof AIBody ? body : AIBody.of(...body),
			metrics: emptyMetrics({
				provider: options.request?.provider,
				model: options.request?.model,
				...options.metrics,
			}),
			messages: options.messages ?? [],
			status: "finished",
			request: options.request,
			raw: options.raw,
		});
	}

	static createError(
		message: string,
		options: {
			request?: AIRequestCall;
			metrics?: Partial<AIMetrics>;
			origin?: AIRuntimeMessageOrigin;
			messages?: AIRuntimeMessage[];
			body?: AIBody;
		} = {},
	): AIReturn {
		return new AIReturn({
			body: options.body ?? AIBody.empty(),
			metrics: emptyMetrics({
				provider: options.request?.provider,
				model: options.request?.model,
				...options.metrics,
				finishReason: options.metrics?.finishReason ?? "error",
			}),
			messages: [runtimeMessage("Error", message, options.origin ?? "Return"), ...(options.messages ?? [])],
			status: "finished",
			request: options.request,
		});
	}

	static createProviderError(message: string, request?: AIRequestCall, metrics?: Partial<AIMetrics>): AIReturn {
		return AIReturn.createError(`Provider error: ${message}`, { request, metrics, origin: "Provider" });
	}

	static createNetworkError(message: string, request?: AIRequestCall, metrics?: Partial<AIMetrics>): AIReturn {
		return AIReturn.createError(`Network error: ${message}`, { request, metrics, origin: "Network" });
	}

	static createToolError(message: string, request?: AIRequestCall, body?: AIBody): AIReturn {
		return AIReturn.createError(`Tool error: ${message}`, { request, origin: "Tool", body });
	}

	/** Failed return for a call stopped by its abort signal or a timeout. */
	static createCancelled(
		request?: AIRequestCall,
		metrics?: Partial<AIMetrics>,
		origin: AIRuntimeMessageOrigin = "Provider",
	): AIReturn {
		return AIReturn.createError("Call cancelled or timed out", {
			request,
			origin,
			metrics: { ...metrics, finishReason: "cancelled" },
		});
	}

	get success(): boolean {
		return !hasErrors(this.messages);
	}

	get errorMessage(): string | undefined {
		return this.messages.find((m) => m.severity === "Error")?.message;
	}

	with(changes: Partial<AIReturnInit>): AIReturn {
		return new AIReturn({
			body: changes.body ?? this.body,
			metrics: changes.metrics ?? this.metrics,
			messages: changes.messages ?? [...this.messages],
			status: changes.status ?? this.status,
			request: changes.request ?? this.request,
			raw: changes.raw ?? this.raw,
		});
	}

	withMessages(...messages: AIRuntimeMessage[]): AIReturn {
		return this.with({ messages: [...this.messages, ...messages] });
	}

	toJSON(): { success: boolean; result: AIInteraction[]; messages: AIRuntimeMessage[]; metrics: AIMetrics } {
		return {
			success: this.success,
			result: [...this.body.interactions],
			messages: [...this.messages],
			metrics: this.metrics,
		};
	}
}
