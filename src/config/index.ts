export { CONFIG_DIR, SettingsStore, expandHome, getSettingsPath, loadSettings } from "./loader.js";
export type { HopperSettings, ProviderSettingValues, SettingsValidationError } from "./schema.js";
export { DEFAULT_MAX_TOOL_ITERATIONS, DEFAULT_TOOL_TIMEOUT_SECONDS, defaultSettings, validateSettings } from "./schema.js";
