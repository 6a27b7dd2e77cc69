import type { SettingsStore } from "../config/loader.js";
import type { ProviderSettingValues } from "../config/schema.js";
import type { AIReturn } from "../core/ai-return.js";
import type { AIInteraction } from "../core/interactions.js";
import type { AIMetrics } from "../core/metrics.js";
import type { AIRequestCall } from "../core/request.js";
import type { AICapability } from "./capabilities.js";
import type { StreamDelta } from "./stream-accumulator.js";
import type { ModelManager } from "./model-registry.js";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type SettingType = "string" | "number" | "boolean";

export type SettingValue = string | number | boolean;

export interface SettingDescriptor {
	name: string;
	type: SettingType;
	displayName?: string;
	description?: string;
	/** Value or lazy factory; factories run after model registration */
	defaultValue?: SettingValue | (() => SettingValue | undefined);
	/** Never logged or echoed back in clear */
	isSecret?: boolean;
	allowedValues?: readonly string[];
	min?: number;
	max?: number;
}

/** Per-provider settings schema and validation, shown by the host's settings UI. */
export interface ProviderSettings {
	getSettingDescriptors(): SettingDescriptor[];
	validateSettings(values: ProviderSettingValues): { valid: boolean; errors: string[] };
	/** Whether streaming is enabled for the provider; undefined when the provider has no such toggle */
	enableStreaming?(values: ProviderSettingValues): boolean | undefined;
}

export interface StreamCallOptions {
	signal?: AbortSignal;
	/** Invoked for every decoded increment, in arrival order */
	onDelta?: (delta: StreamDelta) => void;
}

export interface ModelDescriptor {
	/** Model name or wildcard pattern (`gpt-4*`) */
	model: string;
	capabilities: AICapability;
	defaultFor?: AICapability;
	supportsStreaming?: boolean;
	contextLimit?: number;
	rank?: number;
	deprecated?: boolean;
}

/** Model catalog of one provider. */
export interface ProviderModels {
	/** Declared models with their metadata */
	retrieveModels(): Promise<ModelDescriptor[]>;
	/** Model names reported by the provider's API; declared models when the API is unreachable */
	retrieveAvailable(signal?: AbortSignal): Promise<string[]>;
	/** Capabilities of every known model, keyed by model name (patterns allowed) */
	retrieveCapabilities(): Promise<Map<string, AICapability>>;
	/** Capabilities of one model, resolving wildcard entries */
	retrieveCapabilitiesFor(model: string): AICapability;
	/** Model name (or pattern) to the capabilities it is the default for, in priority order */
	retrieveDefault(): Map<string, AICapability>;
}

export interface AIProvider {
	readonly name: string;
	readonly defaultServerUrl: string;
	/** Endpoint for chat requests, relative to `defaultServerUrl` */
	readonly chatEndpoint: string;
	readonly isEnabled: boolean;
	readonly models: ProviderModels;

	initialize(): Promise<void>;
	encode(request: AIRequestCall): string;
	decode(raw: string): AIInteraction[];
	decodeMetrics(raw: string): Partial<AIMetrics>;
	call(request: AIRequestCall, signal?: AbortSignal): Promise<AIReturn>;
	callStreaming(request: AIRequestCall, options?: StreamCallOptions): Promise<AIReturn>;
	supportsStreaming(): boolean;
	getDefaultModel(required?: AICapability, useSettings?: boolean): string | null;
	refreshCachedSettings(settings: ProviderSettingValues): void;
}

/** Services handed to every provider instance by the registry. */
export interface ProviderContext {
	models: ModelManager;
	settings: SettingsStore;
	fetch: FetchLike;
	getProviderSettings(name: string): ProviderSettings | null;
	streamIdleTimeoutMs?: number;
}

/** Entry point exported by bundled providers and provider plugins. */
export interface ProviderFactory {
	createProvider(context: ProviderContext): AIProvider;
	createProviderSettings(provider: AIProvider): ProviderSettings;
}
