import type { ProviderSettingValues } from "../config/schema.js";
import { AIReturn } from "../core/ai-return.js";
import { isAbortError, StreamingRequestError, UnsupportedHttpMethodError } from "../core/errors.js";
import type { AIInteraction } from "../core/interactions.js";
import type { AIRuntimeMessage } from "../core/messages.js";
import { runtimeMessage } from "../core/messages.js";
import type { AIMetrics } from "../core/metrics.js";
import type { AIRequestCall } from "../core/request.js";
import { debug, errorMessage, warn } from "../utils/log.js";
import { AICapability, capabilityToString, findDefaultCapabilityForModel, hasCapability } from "./capabilities.js";
import { StreamAccumulator } from "./stream-accumulator.js";
import type { StreamDelta } from "./stream-accumulator.js";
import { buildAuthHeaders, resolveEndpoint, StreamingAdapter } from "./streaming.js";
import type { StreamingHost } from "./streaming.js";
import type {
	AIProvider,
	FetchLike,
	ProviderContext,
	ProviderModels,
	SettingDescriptor,
	SettingValue,
	StreamCallOptions,
} from "./types.js";

const SUPPORTED_METHODS = new Set(["GET", "POST", "DELETE", "PATCH"]);

function resolveDefault(descriptor: SettingDescriptor): SettingValue | undefined {
	const value = descriptor.defaultValue;
	return typeof value === "function" ? value() : value;
}

function elapsedSeconds(startedAt: number): number {
	return (performance.now() - startedAt) / 1000;
}

/**
 * Shared provider pipeline: `preCall` -> validation -> `callApi` -> metrics -> `postCall`.
 *
 * Ordinary failures (validation, HTTP status, network, cancellation) come back as
 * failed `AIReturn` values. Unsupported HTTP verbs, unsupported authentication
 * schemes and a missing API key are configuration errors and throw.
 */
export abstract class AIProviderBase implements AIProvider, StreamingHost {
	abstract readonly name: string;
	abstract readonly defaultServerUrl: string;
	abstract readonly chatEndpoint: string;
	abstract readonly models: ProviderModels;
	readonly isEnabled: boolean = true;

	protected readonly streaming: StreamingAdapter;
	private _injectedSettings: ProviderSettingValues | null = null;
	private _defaultSettings: ProviderSettingValues = {};

	constructor(protected readonly context: ProviderContext) {
		this.streaming = new StreamingAdapter(this);
	}

	get fetch(): FetchLike {
		return this.context.fetch;
	}

	abstract encode(request: AIRequestCall): string;
	abstract decode(raw: string): AIInteraction[];
	abstract decodeMetrics(raw: string): Partial<AIMetrics>;

	/** Decode one SSE payload; `null` for payloads that carry nothing. */
	protected parseStreamPayload(_payload: string): StreamDelta | null {
		throw new Error(`${this.name} does not support streaming`);
	}

	/** Provider-specific end-of-stream marker besides `[DONE]`. */
	protected isTerminalPayload(_payload: string): boolean {
		return false;
	}

	/** Headers every request of this provider carries, e.g. an API version. */
	protected extraHeaders(): Record<string, string> {
		return {};
	}

	supportsStreaming(): boolean {
		return false;
	}

	async initialize(): Promise<void> {
		try {
			await this.context.models.ensureProviderRegistered(this.name, () => this.registerModels());
		} catch (err) {
			// Settings still load; model selection degrades to unvalidated names.
			warn(this.name, `Error during model registration: ${errorMessage(err)}`);
		}

		const settings = this.context.settings.getProviderSettings(this.name);
		this._defaultSettings = {};
		try {
			for (const descriptor of this.getSettingDescriptors()) {
				const value = resolveDefault(descriptor);
				if (value === undefined) continue;
				this._defaultSettings[descriptor.name] = value;
				if (!(descriptor.name in settings)) {
					settings[descriptor.name] = value;
				}
			}
		} catch (err) {
			warn(this.name, `Could not load default setting values: ${errorMessage(err)}`);
		}

		this.refreshCachedSettings(settings);
	}

	protected async registerModels(): Promise<void> {
		const capabilities = await this.models.retrieveCapabilities();
		const defaults = this.models.retrieveDefault();
		const descriptors = new Map((await this.models.retrieveModels()).map((d) => [d.model, d]));
		const manager = this.context.models;

		for (const [model, caps] of capabilities) {
			const defaultFor = findDefaultCapabilityForModel(model, defaults);
			const descriptor = descriptors.get(model);
			manager.registerCapabilities(this.name, model, caps, defaultFor, {
				supportsStreaming: descriptor?.supportsStreaming,
				contextLimit: descriptor?.contextLimit,
				rank: descriptor?.rank,
				deprecated: descriptor?.deprecated,
			});
			debug(
				this.name,
				`Registered model ${model} with capabilities ${capabilityToString(caps)} and default ${capabilityToString(defaultFor)}`,
			);
		}

		for (const [model, defaultFor] of defaults) {
			if (capabilities.has(model)) continue;
			manager.registerCapabilities(this.name, model, this.models.retrieveCapabilitiesFor(model), defaultFor);
			debug(this.name, `Registered default model ${model} for ${capabilityToString(defaultFor)}`);
		}
	}

	getSettingDescriptors(): SettingDescriptor[] {
		return this.context.getProviderSettings(this.name)?.getSettingDescriptors() ?? [];
	}

	/** Merge values into the cache; the first call replaces it. */
	refreshCachedSettings(settings: ProviderSettingValues): void {
		if (this._injectedSettings === null) {
			this._injectedSettings = { ...settings };
			return;
		}
		for (const [key, value] of Object.entries(settings)) {
			if (value === undefined) {
				delete this._injectedSettings[key];
			} else {
				this._injectedSettings[key] = value;
			}
		}
	}

	/** Injected value, then descriptor default, then `undefined`. Never throws. */
	getSetting(key: string): unknown {
		const injected = this._injectedSettings?.[key];
		if (injected !== undefined && injected !== null) return injected;
		return this._defaultSettings[key] ?? undefined;
	}

	getStringSetting(key: string): string | undefined {
		const value = this.getSetting(key);
		if (value === undefined || value === null) return undefined;
		return typeof value === "string" ? value : String(value);
	}

	getNumberSetting(key: string): number | undefined {
		const value = this.getSetting(key);
		if (typeof value === "number") return value;
		if (typeof value === "string" && value.trim() !== "") {
			const parsed = Number(value);
			return Number.isNaN(parsed) ? undefined : parsed;
		}
		return undefined;
	}

	getBooleanSetting(key: string): boolean | undefined {
		const value = this.getSetting(key);
		if (typeof value === "boolean") return value;
		if (value === "true") return true;
		if (value === "false") return false;
		return undefined;
	}

	getApiKey(): string | undefined {
		return this.getStringSetting("apiKey");
	}

	/**
	 * Configured model when it offers the capability, else the registry default.
	 * `null` means no suitable model; callers fail the request instead of guessing.
	 */
	getDefaultModel(required: AICapability = AICapability.BasicChat, useSettings = true): string | null {
		if (useSettings) {
			const configured = this.getStringSetting("model");
			if (configured?.trim() && this.context.models.validateCapabilities(this.name, configured, required)) {
				return configured;
			}
		}

		const fallback = this.context.models.getDefaultModel(this.name, required);
		return fallback?.trim() ? fallback : null;
	}

	/** Resolve the model to use. A registered model lacking the capability is swapped for the default. */
	preCall(request: AIRequestCall): AIRequestCall {
		if (!request.model) {
			return request.with({ model: this.getDefaultModel(request.capability) ?? "" });
		}

		const registered = this.context.models.getCapabilities(this.name, request.model);
		if (registered && !hasCapability(registered.capabilities, request.capability)) {
			const fallback = this.getDefaultModel(request.capability, false);
			if (fallback) return request.with({ model: fallback });
		}
		return request;
	}

	protected validateRequest(request: AIRequestCall, original: AIRequestCall): { valid: boolean; messages: AIRuntimeMessage[] } {
		const { messages } = request.validate();

		if (request.model) {
			const registered = this.context.models.getCapabilities(this.name, request.model);
			if (registered && !hasCapability(registered.capabilities, request.capability)) {
				messages.push(
					runtimeMessage(
						"Error",
						`Model '${request.model}' does not support ${capabilityToString(request.capability)}`,
						"Validation",
					),
				);
			} else if (!registered && this.context.models.hasProviderCapabilities(this.name)) {
				messages.push(
					runtimeMessage("Warning", `Model '${request.model}' is not registered for ${this.name}; capabilities were not checked`, "Validation"),
				);
			}
		}

		if (original.model && request.model && original.model !== request.model) {
			messages.push(
				runtimeMessage("Remark", `Using model '${request.model}' instead of requested '${original.model}'`, "Validation"),
			);
		} else if (!original.model && request.model) {
			messages.push(runtimeMessage("Remark", `Model is not specified, using default model '${request.model}'`, "Validation"));
		}

		return { valid: !messages.some((m) => m.severity === "Error"), messages };
	}

	private _invalid(request: AIRequestCall, messages: AIRuntimeMessage[], startedAt: number): AIReturn {
		const errors = messages.filter((m) => m.severity === "Error").map((m) => m.message);
		return AIReturn.createError(`The request is not valid: ${errors.join(", ")}`, {
			request,
			origin: "Validation",
			metrics: { finishReason: "error", completionTime: elapsedSeconds(startedAt) },
			messages: messages.filter((m) => m.severity !== "Error"),
		});
	}

	private _withBody(request: AIRequestCall): AIRequestCall {
		const method = request.httpMethod.toUpperCase();
		if (request.encodedBody !== undefined || (method !== "POST" && method !== "PATCH")) return request;
		return request.with({ encodedBody: this.encode(request) });
	}

	async call(request: AIRequestCall, signal?: AbortSignal): Promise<AIReturn> {
		const startedAt = performance.now();

		const prepared = this.preCall(request);
		const validation = this.validateRequest(prepared, request);
		if (!validation.valid) {
			return this._invalid(prepared, validation.messages, startedAt);
		}

		const encoded = this._withBody(prepared);
		const response = await this.callApi(encoded, signal);
		const completed = response.with({
			metrics: {
				...response.metrics,
				completionTime: elapsedSeconds(startedAt),
				provider: this.name,
				model: encoded.model,
			},
			messages: [...response.messages, ...validation.messages],
		});

		return this.postCall(completed);
	}

	/** Marks responses with pending tool calls as `calling_tools`. */
	postCall(response: AIReturn): AIReturn {
		if (!response.success) return response;
		return response.with({ status: response.body.pendingToolCalls().length > 0 ? "calling_tools" : "finished" });
	}

	protected async callApi(request: AIRequestCall, signal?: AbortSignal): Promise<AIReturn> {
		const method = request.httpMethod.toUpperCase();
		if (!SUPPORTED_METHODS.has(method)) {
			throw new UnsupportedHttpMethodError(request.httpMethod);
		}

		const url = resolveEndpoint(this.defaultServerUrl, request.endpoint);
		const headers: Record<string, string> = {
			Accept: "application/json",
			...buildAuthHeaders(this.name, request.authentication, this.getApiKey()),
			...this.extraHeaders(),
		};
		const init: RequestInit = { method, headers, signal };
		if ((method === "POST" || method === "PATCH") && request.encodedBody) {
			headers["Content-Type"] = request.contentType;
			init.body = request.encodedBody;
		}

		debug(this.name, `Call - Method: ${method}, URL: ${url}`);

		let status: number;
		let ok: boolean;
		let content: string;
		try {
			const response = await this.fetch(url, init);
			status = response.status;
			ok = response.ok;
			content = await response.text();
		} catch (err) {
			if (signal?.aborted || isAbortError(err)) {
				return AIReturn.createCancelled(request);
			}
			return AIReturn.createNetworkError(errorMessage(err), request);
		}

		debug(this.name, `Call - Response status: ${status}`);
		if (!ok) {
			return AIReturn.createProviderError(`${this.name} API returned ${status} - ${content}`, request);
		}

		try {
			return AIReturn.createSuccess(this.decode(content), {
				request,
				metrics: this.decodeMetrics(content),
				raw: content,
			});
		} catch (err) {
			return AIReturn.createProviderError(`Could not decode ${this.name} response: ${errorMessage(err)}`, request);
		}
	}

	/**
	 * Streamed variant of `call`: same validation and metrics, deltas reported as
	 * they arrive, then folded into one `AIReturn`.
	 */
	async callStreaming(request: AIRequestCall, options: StreamCallOptions = {}): Promise<AIReturn> {
		const startedAt = performance.now();
		const { signal, onDelta } = options;

		const prepared = this.preCall(request.with({ stream: true }));
		const validation = this.validateRequest(prepared, request);
		if (!this.supportsStreaming()) {
			validation.messages.push(runtimeMessage("Error", `Provider '${this.name}' does not support streaming`, "Validation"));
		} else if (this.context.getProviderSettings(this.name)?.enableStreaming?.(this.context.settings.getProviderSettings(this.name)) === false) {
			validation.messages.push(
				runtimeMessage("Error", `Streaming requested but provider '${this.name}' has streaming disabled in settings.`, "Validation"),
			);
		} else if (
			prepared.model &&
			this.context.models.getCapabilities(this.name, prepared.model) &&
			!this.context.models.modelSupportsStreaming(this.name, prepared.model)
		) {
			validation.messages.push(
				runtimeMessage("Error", `Streaming requested but the selected model '${prepared.model}' does not support streaming.`, "Validation"),
			);
		}
		if (validation.messages.some((m) => m.severity === "Error")) {
			return this._invalid(prepared, validation.messages, startedAt);
		}

		const encoded = this._withBody(prepared);
		const accumulator = new StreamAccumulator();
		const url = this.streaming.buildFullUrl(encoded.endpoint);
		const headers = this.streaming.buildHeaders(encoded.authentication, this.extraHeaders());
		try {
			const response = await this.streaming.sendForStream(
				url,
				this.streaming.createSsePost(encoded.encodedBody ?? "", headers, encoded.contentType),
				signal,
			);

			const payloads = this.streaming.readSseData(response, {
				signal,
				idleTimeoutMs: this.context.streamIdleTimeoutMs,
				isTerminal: (payload) => this.isTerminalPayload(payload),
			});
			for await (const payload of payloads) {
				const delta = this.parseStreamPayload(payload);
				if (!delta) continue;
				accumulator.push(delta);
				onDelta?.(delta);
			}
		} catch (err) {
			if (signal?.aborted || isAbortError(err)) {
				return AIReturn.createCancelled(encoded);
			}
			if (err instanceof StreamingRequestError) {
				return AIReturn.createProviderError(err.message, encoded);
			}
			return AIReturn.createNetworkError(errorMessage(err), encoded);
		}

		if (signal?.aborted) {
			return AIReturn.createCancelled(encoded);
		}

		const result = AIReturn.createSuccess(accumulator.toInteractions(), {
			request: encoded,
			metrics: {
				...accumulator.metrics(),
				completionTime: elapsedSeconds(startedAt),
				provider: this.name,
				model: encoded.model,
			},
			messages: validation.messages,
		});
		return this.postCall(result);
	}
}
