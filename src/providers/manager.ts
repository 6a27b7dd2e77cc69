import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { ProviderSecurityError } from "../core/errors.js";
import type { SettingsStore } from "../config/loader.js";
import type { ProviderSettingValues } from "../config/schema.js";
import { debug, error as logError, errorMessage, redactSecret, warn } from "../utils/log.js";
import { getVersion } from "../utils/version.js";
import { ProviderHashVerifier, ProviderVerificationStatus } from "./hash-verifier.js";
import type { ProviderVerificationResult } from "./hash-verifier.js";
import type { ModelManager } from "./model-registry.js";
import { discoverProviderPlugins, loadProviderPlugin } from "./plugin-loader.js";
import { readSignatureSidecar, verifyProviderSignature } from "./signature.js";
import type { AIProvider, FetchLike, ProviderContext, ProviderFactory, ProviderSettings } from "./types.js";

export const DEFAULT_PROVIDER_ALIAS = "Default";
export const BUILTIN_SOURCE = "builtin";

/** Asks the user whether a newly discovered plugin may load. */
export type TrustPrompt = (pluginName: string) => Promise<boolean>;

/** Host-side surface for security outcomes; `error` is the blocking dialog. */
export interface SecurityNotifier {
	error(message: string): void | Promise<void>;
	warning(message: string): void | Promise<void>;
}

export type PluginLoadStatus = "loaded" | "rejected" | "untrusted" | "failed";

export interface PluginLoadResult {
	file: string;
	status: PluginLoadStatus;
	providers: string[];
	reason?: string;
}

export interface ProviderManagerOptions {
	settings: SettingsStore;
	models: ModelManager;
	fetch?: FetchLike;
	trustPrompt?: TrustPrompt;
	notifier?: SecurityNotifier;
	hashVerifier?: ProviderHashVerifier;
}

interface ProviderEntry {
	provider: AIProvider;
	settings: ProviderSettings | null;
	/** `builtin` or the plugin name the provider came from */
	source: string;
	ready: Promise<void>;
}

const consoleNotifier: SecurityNotifier = {
	error: (message) => logError("Security", message),
	warning: (message) => warn("Security", message),
};

function pluginName(filePath: string): string {
	return basename(filePath, extname(filePath));
}

function isEmptyValue(value: unknown): boolean {
	return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

/**
 * Provider registry: bundled providers plus verified plugins.
 *
 * Trust is re-checked on every lookup, so revoking a plugin hides its
 * providers immediately even though they stay registered.
 */
export class ProviderManager {
	private _providers: Map<string, ProviderEntry> = new Map();
	private readonly _settings: SettingsStore;
	private readonly _models: ModelManager;
	private readonly _fetch: FetchLike;
	private readonly _trustPrompt?: TrustPrompt;
	private readonly _notifier: SecurityNotifier;
	private readonly _hashVerifier: ProviderHashVerifier;

	constructor(options: ProviderManagerOptions) {
		this._settings = options.settings;
		this._models = options.models;
		this._fetch = options.fetch ?? fetch;
		this._trustPrompt = options.trustPrompt;
		this._notifier = options.notifier ?? consoleNotifier;
		this._hashVerifier =
			options.hashVerifier ??
			new ProviderHashVerifier({ baseUrl: this._settings.data.hashManifestUrl, fetch: this._fetch });
	}

	/** Services handed to providers created by this registry. */
	get context(): ProviderContext {
		return {
			models: this._models,
			settings: this._settings,
			fetch: this._fetch,
			getProviderSettings: (name) => this.getProviderSettings(name),
			streamIdleTimeoutMs: this._settings.data.streamIdleTimeoutMs,
		};
	}

	private get _version(): string {
		return this._settings.data.version ?? getVersion();
	}

	private get _platform(): string {
		return this._settings.data.platform ?? `${process.platform}-${process.arch}`;
	}

	/**
	 * Register a provider and start its initialisation in the background.
	 * A later registration under the same name replaces the earlier one.
	 */
	registerProvider(provider: AIProvider, settings: ProviderSettings | null = null, source: string = BUILTIN_SOURCE): void {
		if (this._providers.has(provider.name)) {
			warn("ProviderManager", `Provider '${provider.name}' is already registered, replacing it`);
		}

		const entry: ProviderEntry = { provider, settings, source, ready: Promise.resolve() };
		this._providers.set(provider.name, entry);

		entry.ready = provider.initialize().catch((err: unknown) => {
			warn("ProviderManager", `Initialisation of ${provider.name} failed: ${errorMessage(err)}`);
		});
		debug("ProviderManager", `Registered provider ${provider.name} from ${source}`);
	}

	registerFactory(factory: ProviderFactory, source: string = BUILTIN_SOURCE): AIProvider {
		const provider = factory.createProvider(this.context);
		this.registerProvider(provider, factory.createProviderSettings(provider), source);
		return provider;
	}

	/** Resolves once the provider's background initialisation has settled. */
	async whenReady(name: string): Promise<void> {
		const entry = this._findEntry(this._resolveAlias(name));
		await entry?.ready;
	}

	async whenAllReady(): Promise<void> {
		await Promise.all(Array.from(this._providers.values(), (entry) => entry.ready));
	}

	private _resolveAlias(name: string): string {
		return name === DEFAULT_PROVIDER_ALIAS ? this.getDefaultProviderName() : name;
	}

	private _findEntry(name: string): ProviderEntry | undefined {
		const exact = this._providers.get(name);
		if (exact) return exact;

		const lower = name.toLowerCase();
		for (const [key, entry] of this._providers) {
			if (key.toLowerCase() === lower) return entry;
		}
		return undefined;
	}

	private _trustKey(entry: ProviderEntry): string {
		return entry.source === BUILTIN_SOURCE ? entry.provider.name : entry.source;
	}

	private _isAllowed(entry: ProviderEntry): boolean {
		return this._settings.isTrusted(this._trustKey(entry)) !== false;
	}

	/** `null` for unknown and for currently untrusted providers; never throws. */
	getProvider(name: string): AIProvider | null {
		if (!name) return null;

		const resolved = this._resolveAlias(name);
		const entry = this._findEntry(resolved);
		if (!entry) {
			debug("ProviderManager", `Provider '${resolved}' not found`);
			return null;
		}
		if (!this._isAllowed(entry)) {
			debug("ProviderManager", `Provider '${entry.provider.name}' is no longer trusted, returning null`);
			return null;
		}
		return entry.provider;
	}

	getProviders(includeUntrusted = false): AIProvider[] {
		return Array.from(this._providers.values())
			.filter((entry) => includeUntrusted || this._isAllowed(entry))
			.map((entry) => entry.provider);
	}

	getProviderSettings(name: string): ProviderSettings | null {
		return this._findEntry(this._resolveAlias(name))?.settings ?? null;
	}

	/** Configured default when registered, otherwise the first registered provider. */
	getDefaultProviderName(): string {
		const configured = this._settings.defaultProvider;
		if (configured && this._providers.has(configured)) {
			return configured;
		}
		return this._providers.keys().next().value ?? "";
	}

	/**
	 * Validate and persist provider settings. Empty values remove the key.
	 * Nothing is written when validation fails.
	 */
	updateProviderSettings(name: string, values: ProviderSettingValues): { success: boolean; errors: string[] } {
		const provider = this.getProvider(name);
		if (!provider) {
			return { success: false, errors: [`Provider '${name}' not found`] };
		}

		const ui = this.getProviderSettings(provider.name);
		if (ui) {
			const validation = ui.validateSettings(values);
			if (!validation.valid) {
				debug("ProviderManager", `Settings validation failed for provider ${provider.name}`);
				return { success: false, errors: validation.errors };
			}
		}

		const descriptors = ui?.getSettingDescriptors() ?? [];
		const removed: ProviderSettingValues = {};
		for (const [key, value] of Object.entries(values)) {
			const isSecret = descriptors.find((d) => d.name === key)?.isSecret ?? false;
			if (isEmptyValue(value)) {
				debug("ProviderManager", `Removing ${provider.name}.${key}`);
				this._settings.removeProviderSetting(provider.name, key);
				removed[key] = undefined;
			} else {
				const shown = isSecret ? redactSecret(String(value)) : String(value);
				debug("ProviderManager", `Updating ${provider.name}.${key} = ${shown}`);
				this._settings.setProviderSetting(provider.name, key, value);
			}
		}

		this._settings.save();
		provider.refreshCachedSettings({ ...this._settings.getProviderSettings(provider.name), ...removed });
		return { success: true, errors: [] };
	}

	/** Hash status of every plugin in the plugin directory, keyed by file name. */
	async verifyAllProviders(): Promise<Map<string, ProviderVerificationResult>> {
		const results = new Map<string, ProviderVerificationResult>();
		for (const file of discoverProviderPlugins(this._settings.data.pluginDirectory)) {
			results.set(basename(file), await this._hashVerifier.verifyProvider(file, this._version, this._platform));
		}
		return results;
	}

	/** Discover, verify and load every plugin in the plugin directory. */
	async refreshProviders(): Promise<PluginLoadResult[]> {
		const results: PluginLoadResult[] = [];
		for (const file of discoverProviderPlugins(this._settings.data.pluginDirectory)) {
			results.push(await this.loadPlugin(file));
		}
		return results;
	}

	/** Signature, then hash, then trust; only then is the plugin imported. */
	async loadPlugin(filePath: string): Promise<PluginLoadResult> {
		const file = basename(filePath);
		const name = pluginName(filePath);

		try {
			try {
				await this._checkSignature(filePath);
				await this._checkHash(filePath);
			} catch (err) {
				if (!(err instanceof ProviderSecurityError)) throw err;
				warn("ProviderManager", err.message);
				await this._notifier.error(err.reason);
				return { file, status: "rejected", providers: [], reason: err.reason };
			}

			if (!(await this._ensureTrusted(name))) {
				return { file, status: "untrusted", providers: [] };
			}

			const factories = await loadProviderPlugin(filePath);
			const providers: string[] = [];
			for (const factory of factories) {
				try {
					providers.push(this.registerFactory(factory, name).name);
				} catch (err) {
					warn("ProviderManager", `Error creating provider from ${file}: ${errorMessage(err)}`);
				}
			}
			debug("ProviderManager", `Loaded ${providers.length} provider(s) from ${file}`);
			return { file, status: "loaded", providers };
		} catch (err) {
			warn("ProviderManager", `Error loading provider plugin ${file}: ${errorMessage(err)}`);
			return { file, status: "failed", providers: [], reason: errorMessage(err) };
		}
	}

	private async _checkSignature(filePath: string): Promise<void> {
		const file = basename(filePath);
		const signature = await readSignatureSidecar(filePath);
		if (!signature) {
			throw new ProviderSecurityError(file, `Provider '${file}' is not signed. Unsigned providers are not loaded.`);
		}

		const result = verifyProviderSignature(signature, await readFile(filePath), this._settings.data.trustedKeys);
		if (!result.valid) {
			throw new ProviderSecurityError(
				file,
				`Signature verification failed for provider '${file}': ${result.reason ?? "unknown reason"}`,
			);
		}
		debug("ProviderManager", `Signature verified for ${file} (author ${result.info?.author ?? "unknown"})`);
	}

	private async _checkHash(filePath: string): Promise<void> {
		const file = basename(filePath);
		const result = await this._hashVerifier.verifyProvider(filePath, this._version, this._platform);

		switch (result.status) {
			case ProviderVerificationStatus.Match:
				debug("ProviderManager", `SHA-256 verification passed for ${file}`);
				return;
			case ProviderVerificationStatus.Mismatch:
				throw new ProviderSecurityError(
					file,
					`Provider '${file}' failed integrity verification. ` +
						`Expected: ${result.publicHash ?? "unknown"}, Actual: ${result.localHash ?? "unknown"}`,
				);
			case ProviderVerificationStatus.Unavailable:
				await this._notifier.warning(
					`Could not retrieve SHA-256 hash for '${file}'. Hash verification was skipped. ` +
						"Ensure you trust this provider's source before enabling it.",
				);
				return;
			case ProviderVerificationStatus.NotFound:
				await this._notifier.warning(
					`SHA-256 hash for '${file}' not found in the public manifest. ` +
						"Ensure you trust this provider's source before enabling it.",
				);
				return;
		}
	}

	private async _ensureTrusted(name: string): Promise<boolean> {
		const recorded = this._settings.isTrusted(name);
		if (recorded !== undefined) {
			debug("ProviderManager", `Trust already exists for: ${name} = ${recorded}`);
			return recorded;
		}

		if (!this._trustPrompt) {
			debug("ProviderManager", `No trust prompt available, skipping ${name}`);
			return false;
		}

		let allowed: boolean;
		try {
			allowed = await this._trustPrompt(name);
		} catch (err) {
			warn("ProviderManager", `Trust prompt failed for ${name}: ${errorMessage(err)}`);
			allowed = false;
		}

		this._settings.setTrusted(name, allowed);
		this._settings.save();
		return allowed;
	}
}
