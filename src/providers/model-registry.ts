/**
 * Model Registry - (provider, model) to capability mapping
 *
 * Keys are `provider.model`, lower-cased. Model names may be wildcard patterns
 * (`gpt-4*`) that stand for every concrete model sharing the prefix.
 *
 * IMPORTANT: lookups are first-match in insertion order, never best-match.
 */

import { AICapability, capabilityToString, hasCapability } from "./capabilities.js";
import { debug } from "../utils/log.js";

export interface ModelCapabilities {
	provider: string;
	model: string;
	capabilities: AICapability;
	/** Capabilities this model is the provider's default for */
	defaultFor: AICapability;
	contextLimit?: number;
	supportsStreaming?: boolean;
	deprecated?: boolean;
	/** Higher ranks sort first when listing models */
	rank?: number;
}

function registryKey(provider: string, model: string): string {
	return `${provider.toLowerCase()}.${model.toLowerCase()}`;
}

function isPattern(model: string): boolean {
	return model.includes("*");
}

export class ModelCapabilityRegistry {
	private _models: Map<string, ModelCapabilities> = new Map();

	set(entry: ModelCapabilities): void {
		this._models.set(registryKey(entry.provider, entry.model), { ...entry });
	}

	/** Exact key first, then the first stored `provider.prefix*` key whose prefix the model starts with. */
	get(provider: string, model: string): ModelCapabilities | null {
		const exact = this._models.get(registryKey(provider, model));
		if (exact) return exact;

		const providerPrefix = `${provider.toLowerCase()}.`;
		const modelLower = model.toLowerCase();
		for (const [key, entry] of this._models) {
			if (!key.startsWith(providerPrefix) || !key.endsWith("*")) continue;
			const storedPrefix = key.slice(providerPrefix.length, -1);
			if (modelLower.startsWith(storedPrefix)) {
				return entry;
			}
		}

		return null;
	}

	hasProvider(provider: string): boolean {
		const prefix = `${provider.toLowerCase()}.`;
		for (const key of this._models.keys()) {
			if (key.startsWith(prefix)) return true;
		}
		return false;
	}

	list(provider?: string): ModelCapabilities[] {
		const all = Array.from(this._models.values());
		if (provider === undefined) return all;
		const name = provider.toLowerCase();
		return all.filter((entry) => entry.provider.toLowerCase() === name);
	}
}

/**
 * Service owning the capability registry. One instance per runtime; providers
 * receive it through their context instead of reaching for a global.
 */
export class ModelManager {
	private _pendingRegistrations: Map<string, Promise<void>> = new Map();

	constructor(private readonly _registry: ModelCapabilityRegistry = new ModelCapabilityRegistry()) {}

	registerCapabilities(
		provider: string,
		model: string,
		capabilities: AICapability,
		defaultFor: AICapability = AICapability.None,
		extra: Omit<ModelCapabilities, "provider" | "model" | "capabilities" | "defaultFor"> = {},
	): void {
		if (!provider.trim() || !model.trim()) {
			debug("ModelManager", "Ignoring registration with empty provider or model name");
			return;
		}
		this._registry.set({ ...extra, provider, model, capabilities, defaultFor });
	}

	hasProviderCapabilities(provider: string): boolean {
		if (!provider.trim()) return false;
		return this._registry.hasProvider(provider);
	}

	/**
	 * Run `register` once per provider. Concurrent first-time callers share the
	 * same in-flight registration; a failed registration may be retried later.
	 */
	async ensureProviderRegistered(provider: string, register: () => Promise<void>): Promise<void> {
		const key = provider.toLowerCase();
		if (this.hasProviderCapabilities(provider)) {
			debug("ModelManager", `Capabilities for ${provider} already registered, skipping reload`);
			return;
		}

		const pending = this._pendingRegistrations.get(key);
		if (pending) return pending;

		const registration = register().finally(() => {
			this._pendingRegistrations.delete(key);
		});
		this._pendingRegistrations.set(key, registration);
		return registration;
	}

	getCapabilities(provider: string, model: string): ModelCapabilities | null {
		if (!provider || !model) return null;
		return this._registry.get(provider, model);
	}

	/** Returns false for unregistered models. */
	validateCapabilities(provider: string, model: string, required: AICapability): boolean {
		const entry = this.getCapabilities(provider, model);
		if (!entry) {
			debug("ModelManager", `Model '${model}' from '${provider}' not registered`);
			return false;
		}
		return hasCapability(entry.capabilities, required);
	}

	modelSupportsStreaming(provider: string, model: string): boolean {
		return this.getCapabilities(provider, model)?.supportsStreaming ?? false;
	}

	findModelsWithCapabilities(required: AICapability): ModelCapabilities[] {
		const all = this._registry.list();
		if (required === AICapability.None) return all;
		return all.filter((entry) => hasCapability(entry.capabilities, required));
	}

	listModels(provider: string): ModelCapabilities[] {
		return this._registry
			.list(provider)
			.sort((a, b) => (b.rank ?? 0) - (a.rank ?? 0) || a.model.localeCompare(b.model));
	}

	/**
	 * Default model for a capability, in priority order:
	 * 1. concrete model whose `defaultFor` covers the requirement
	 * 2. concrete model with any `defaultFor` whose capabilities cover it
	 * 3. wildcard entry whose `defaultFor` covers it
	 * 4. wildcard entry with any `defaultFor` whose capabilities cover it
	 * Wildcard hits resolve to the first concrete model (by name) sharing the prefix.
	 */
	getDefaultModel(provider: string, required: AICapability = AICapability.BasicChat): string | null {
		if (!provider) return null;

		const models = this._registry.list(provider);
		if (models.length === 0) return null;

		const concrete = models.filter((m) => !isPattern(m.model));
		const patterns = models.filter((m) => isPattern(m.model));
		const coversDefault = (m: ModelCapabilities): boolean => hasCapability(m.defaultFor, required);
		const compatible = (m: ModelCapabilities): boolean =>
			m.defaultFor !== AICapability.None && hasCapability(m.capabilities, required);

		const found =
			concrete.find(coversDefault)?.model ??
			concrete.find(compatible)?.model ??
			this._resolvePattern(provider, patterns.find(coversDefault)?.model) ??
			this._resolvePattern(provider, patterns.find(compatible)?.model);

		if (!found) {
			debug("ModelManager", `No default model for ${provider} with capability ${capabilityToString(required)}`);
		}
		return found ?? null;
	}

	private _resolvePattern(provider: string, pattern: string | undefined): string | undefined {
		if (pattern === undefined) return undefined;

		const prefix = pattern.replaceAll("*", "").toLowerCase();
		const matches = this._registry
			.list(provider)
			.filter((m) => !isPattern(m.model) && m.model.toLowerCase().startsWith(prefix))
			.map((m) => m.model)
			.sort();

		return matches[0] ?? pattern;
	}
}
