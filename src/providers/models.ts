import { AICapability } from "./capabilities.js";
import { debug, errorMessage, warn } from "../utils/log.js";
import type { ModelDescriptor, ProviderModels } from "./types.js";

/**
 * Catalog backed by a declared model list, optionally confirmed against the
 * provider's model-listing endpoint.
 */
export abstract class ProviderModelsBase implements ProviderModels {
	constructor(protected readonly providerName: string) {}

	protected abstract declaredModels(): ModelDescriptor[];

	/** Model names from the provider API; `null` when the provider has no listing endpoint. */
	protected async fetchApiModels(_signal?: AbortSignal): Promise<string[] | null> {
		return null;
	}

	async retrieveAvailable(signal?: AbortSignal): Promise<string[]> {
		try {
			const apiModels = await this.fetchApiModels(signal);
			if (apiModels && apiModels.length > 0) {
				return apiModels;
			}
		} catch (err) {
			warn(this.providerName, `Could not list models from API: ${errorMessage(err)}`);
		}

		return this.declaredModels()
			.map((m) => m.model)
			.filter((name) => !name.includes("*"));
	}

	async retrieveModels(): Promise<ModelDescriptor[]> {
		return this.declaredModels().map((m) => ({ ...m }));
	}

	async retrieveCapabilities(): Promise<Map<string, AICapability>> {
		const result = new Map<string, AICapability>();
		for (const descriptor of this.declaredModels()) {
			result.set(descriptor.model, descriptor.capabilities);
		}
		return result;
	}

	retrieveCapabilitiesFor(model: string): AICapability {
		const declared = this.declaredModels();
		const exact = declared.find((m) => m.model === model);
		if (exact) return exact.capabilities;

		const name = model.toLowerCase();
		for (const descriptor of declared) {
			if (!descriptor.model.includes("*")) continue;
			const prefix = descriptor.model.replaceAll("*", "").toLowerCase();
			if (name.startsWith(prefix)) {
				debug(this.providerName, `Resolved ${model} through pattern ${descriptor.model}`);
				return descriptor.capabilities;
			}
		}

		return AICapability.None;
	}

	retrieveDefault(): Map<string, AICapability> {
		const result = new Map<string, AICapability>();
		for (const descriptor of this.declaredModels()) {
			if (descriptor.defaultFor !== undefined && descriptor.defaultFor !== AICapability.None) {
				result.set(descriptor.model, descriptor.defaultFor);
			}
		}
		return result;
	}
}
