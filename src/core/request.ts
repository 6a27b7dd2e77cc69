import { AICapability } from "../providers/capabilities.js";
import { AIBody } from "./interactions.js";
import type { JsonObject } from "./interactions.js";
import type { AIRuntimeMessage } from "./messages.js";
import { runtimeMessage } from "./messages.js";

export type HttpMethod = "GET" | "POST" | "DELETE" | "PATCH";

export interface AIToolDefinition {
	name: string;
	description: string;
	parameters: JsonObject;
}

export interface AIRequestInit {
	provider: string;
	model?: string;
	/** Capability the chosen model must offer */
	capability?: AICapability;
	/** Relative path against the provider's server URL, or an absolute URL */
	endpoint: string;
	httpMethod?: string;
	/** "bearer", "x-api-key" or "none" */
	authentication?: string;
	contentType?: string;
	body?: AIBody;
	/** Tool categories exposed to the model, e.g. "-*" or "Knowledge,-Scripting" */
	toolFilter?: string;
	tools?: AIToolDefinition[];
	/** JSON schema the model output must follow */
	jsonOutputSchema?: JsonObject;
	stream?: boolean;
	/** Provider-specific wire body; set by the provider during `preCall` */
	encodedBody?: string;
}

/** Provider-agnostic request descriptor. Instances are immutable; `with` returns a copy. */
export class AIRequestCall {
	readonly provider: string;
	readonly model: string;
	readonly capability: AICapability;
	readonly endpoint: string;
	readonly httpMethod: string;
	readonly authentication: string;
	readonly contentType: string;
	readonly body: AIBody;
	readonly toolFilter: string;
	readonly tools: readonly AIToolDefinition[];
	readonly jsonOutputSchema?: JsonObject;
	readonly stream: boolean;
	readonly encodedBody?: string;

	constructor(init: AIRequestInit) {
		this.provider = init.provider;
		this.model = init.model ?? "";
		this.capability = init.capability ?? AICapability.Text2Text;
		this.endpoint = init.endpoint;
		this.httpMethod = init.httpMethod ?? "POST";
		this.authentication = init.authentication ?? "bearer";
		this.contentType = init.contentType ?? "application/json";
		this.body = init.body ?? AIBody.empty();
		this.toolFilter = init.toolFilter ?? "-*";
		this.tools = init.tools ?? [];
		this.jsonOutputSchema = init.jsonOutputSchema;
		this.stream = init.stream ?? false;
		this.encodedBody = init.encodedBody;
	}

	with(changes: Partial<AIRequestInit>): AIRequestCall {
		return new AIRequestCall({ ...this.toInit(), ...changes });
	}

	toInit(): AIRequestInit {
		return {
			provider: this.provider,
			model: this.model,
			capability: this.capability,
			endpoint: this.endpoint,
			httpMethod: this.httpMethod,
			authentication: this.authentication,
			contentType: this.contentType,
			body: this.body,
			toolFilter: this.toolFilter,
			tools: [...this.tools],
			jsonOutputSchema: this.jsonOutputSchema,
			stream: this.stream,
			encodedBody: this.encodedBody,
		};
	}

	/**
	 * Structural validation run before any network call. Capability checks that
	 * need the model registry are added by the provider.
	 */
	validate(): { valid: boolean; messages: AIRuntimeMessage[] } {
		const messages: AIRuntimeMessage[] = [];

		if (!this.provider.trim()) {
			messages.push(runtimeMessage("Error", "Provider is required", "Validation"));
		}
		if (!this.endpoint.trim()) {
			messages.push(runtimeMessage("Error", "Endpoint is required", "Validation"));
		}
		if (!this.model.trim()) {
			messages.push(runtimeMessage("Error", "No model is available for this request", "Validation"));
		}

		return { valid: !messages.some((m) => m.severity === "Error"), messages };
	}
}
