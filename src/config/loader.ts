import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, extname, join } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ConfigError } from "../core/errors.js";
import { debug } from "../utils/log.js";
import type { HopperSettings, ProviderSettingValues } from "./schema.js";
import { defaultSettings, validateSettings } from "./schema.js";

export const CONFIG_DIR = join(homedir(), ".hopperkit");

export function getYamlPath(): string {
	return process.env.HOPPERKIT_SETTINGS_YAML ?? join(CONFIG_DIR, "settings.yaml");
}

export function getJsonPath(): string {
	return process.env.HOPPERKIT_SETTINGS_JSON ?? join(CONFIG_DIR, "settings.json");
}

export function getSettingsPath(): string {
	const yamlPath = getYamlPath();
	if (existsSync(yamlPath)) return yamlPath;
	const jsonPath = getJsonPath();
	return existsSync(jsonPath) ? jsonPath : yamlPath;
}

export function expandHome(path: string): string {
	return path.startsWith("~/") ? join(homedir(), path.slice(2)) : path;
}

function interpolateEnvVars(value: string, keyPath: string): string {
	return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
		const envValue = process.env[envVar];
		if (!envValue) {
			throw new ConfigError(`Environment variable ${envVar} is not set (referenced by ${keyPath || "root"})`, {
				envVar,
				keyPath,
			});
		}
		return envValue;
	});
}

function interpolateObject(value: unknown, keyPath = ""): unknown {
	if (typeof value === "string") return interpolateEnvVars(value, keyPath);
	if (value === null || typeof value !== "object") return value;
	if (Array.isArray(value)) return value.map((item, index) => interpolateObject(item, `${keyPath}[${index}]`));

	const result: Record<string, unknown> = {};
	for (const [key, child] of Object.entries(value)) {
		result[key] = interpolateObject(child, keyPath ? `${keyPath}.${key}` : key);
	}
	return result;
}

function parseSettingsFile(path: string): unknown {
	const content = readFileSync(path, "utf-8");
	return extname(path) === ".json" ? JSON.parse(content) : parseYaml(content);
}

function applyEnvOverrides(settings: HopperSettings): HopperSettings {
	let result = settings;

	const defaultProvider = process.env.HOPPERKIT_DEFAULT_PROVIDER;
	if (defaultProvider) {
		result = { ...result, defaultProvider };
	}

	const maxIterations = process.env.HOPPERKIT_MAX_TOOL_ITERATIONS;
	if (maxIterations) {
		const parsed = Number.parseInt(maxIterations, 10);
		if (!Number.isNaN(parsed) && parsed > 0) {
			result = { ...result, maxToolIterations: parsed };
		}
	}

	if (process.env.HOPPERKIT_VERBOSE === "1" || process.env.HOPPERKIT_VERBOSE === "true") {
		result = { ...result, verbose: true };
	}

	return result;
}

/**
 * Load settings from YAML or JSON. `${VAR}` references are replaced with
 * environment values; missing files yield defaults.
 */
export function loadSettings(path: string = getSettingsPath()): HopperSettings {
	const raw = existsSync(path) ? parseSettingsFile(path) : {};
	const validation = validateSettings(interpolateObject(raw));
	if (!validation.success) {
		const details = validation.errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
		throw new ConfigError(`Invalid settings at ${path}:\n${details}`, validation.errors);
	}

	const settings = applyEnvOverrides(validation.settings);
	if (settings.pluginDirectory) {
		settings.pluginDirectory = expandHome(settings.pluginDirectory);
	}
	return settings;
}

/**
 * In-memory settings with explicit persistence. Last write wins; updates are
 * not versioned.
 */
export class SettingsStore {
	private _settings: HopperSettings;

	constructor(
		settings: HopperSettings = defaultSettings(),
		private readonly _path?: string,
	) {
		this._settings = settings;
	}

	static load(path: string = getSettingsPath()): SettingsStore {
		return new SettingsStore(loadSettings(path), path);
	}

	get data(): Readonly<HopperSettings> {
		return this._settings;
	}

	get path(): string | undefined {
		return this._path;
	}

	get defaultProvider(): string | undefined {
		return this._settings.defaultProvider;
	}

	setDefaultProvider(name: string | undefined): void {
		this._settings = { ...this._settings, defaultProvider: name };
	}

	getProviderSettings(name: string): ProviderSettingValues {
		return { ...(this._settings.providers[name] ?? {}) };
	}

	setProviderSetting(name: string, key: string, value: unknown): void {
		const current = this._settings.providers[name] ?? {};
		this._settings = {
			...this._settings,
			providers: { ...this._settings.providers, [name]: { ...current, [key]: value } },
		};
	}

	removeProviderSetting(name: string, key: string): void {
		const current = this._settings.providers[name];
		if (!current || !(key in current)) return;
		const { [key]: _removed, ...rest } = current;
		this._settings = { ...this._settings, providers: { ...this._settings.providers, [name]: rest } };
	}

	/** `undefined` means no decision has been recorded yet. */
	isTrusted(pluginName: string): boolean | undefined {
		return this._settings.trustedProviders[pluginName];
	}

	setTrusted(pluginName: string, allowed: boolean): void {
		this._settings = {
			...this._settings,
			trustedProviders: { ...this._settings.trustedProviders, [pluginName]: allowed },
		};
	}

	/** Write the settings as YAML. Stores without a path stay in memory. */
	save(): void {
		if (!this._path) {
			debug("Settings", "No settings path configured, keeping changes in memory");
			return;
		}

		const dir = dirname(this._path);
		if (!existsSync(dir)) {
			mkdirSync(dir, { recursive: true });
		}
		const content = extname(this._path) === ".json" ? JSON.stringify(this._settings, null, 2) : stringifyYaml(this._settings);
		writeFileSync(this._path, content, "utf-8");
	}
}
