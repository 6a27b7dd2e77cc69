import { z } from "zod";

export const DEFAULT_MAX_TOOL_ITERATIONS = 10;
export const DEFAULT_TOOL_TIMEOUT_SECONDS = 120;

/** Values of one provider's settings, keyed by setting descriptor name. */
export type ProviderSettingValues = Record<string, unknown>;

export interface HopperSettings {
	/** Provider used for the "Default" alias; first available provider when unset */
	defaultProvider?: string;
	/** Trust decisions keyed by provider plugin name */
	trustedProviders: Record<string, boolean>;
	providers: Record<string, ProviderSettingValues>;
	/** Directory scanned for provider plugins */
	pluginDirectory?: string;
	/** Base URL of the public hash manifests */
	hashManifestUrl?: string;
	platform?: string;
	version?: string;
	/** Keys accepted for provider plugin signatures, keyed by key id */
	trustedKeys: Record<string, string>;
	maxToolIterations: number;
	toolTimeoutSeconds: number;
	streamIdleTimeoutMs?: number;
	verbose: boolean;
}

export const providerSettingValuesSchema = z.record(z.string(), z.unknown());

export const settingsSchema = z.object({
	defaultProvider: z.string().optional(),
	trustedProviders: z.record(z.string(), z.boolean()).default({}),
	providers: z.record(z.string(), providerSettingValuesSchema).default({}),
	pluginDirectory: z.string().optional(),
	hashManifestUrl: z.string().url().optional(),
	platform: z.string().optional(),
	version: z.string().optional(),
	trustedKeys: z.record(z.string(), z.string()).default({}),
	maxToolIterations: z.number().int().positive().default(DEFAULT_MAX_TOOL_ITERATIONS),
	toolTimeoutSeconds: z.number().positive().default(DEFAULT_TOOL_TIMEOUT_SECONDS),
	streamIdleTimeoutMs: z.number().int().positive().optional(),
	verbose: z.boolean().default(false),
}) satisfies z.ZodType<HopperSettings, z.ZodTypeDef, unknown>;

export interface SettingsValidationError {
	field: string;
	message: string;
}

export function validateSettings(
	raw: unknown,
): { success: true; settings: HopperSettings } | { success: false; errors: SettingsValidationError[] } {
	const parsed = settingsSchema.safeParse(raw ?? {});
	if (parsed.success) {
		return { success: true, settings: parsed.data };
	}
	return {
		success: false,
		errors: parsed.error.issues.map((issue) => ({
			field: issue.path.length > 0 ? issue.path.join(".") : "root",
			message: issue.message,
		})),
	};
}

export function defaultSettings(): HopperSettings {
	return settingsSchema.parse({});
}
