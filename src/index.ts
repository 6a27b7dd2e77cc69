export * from "./config/index.js";
export * from "./core/index.js";
export * from "./providers/index.js";
export * from "./tools/index.js";
export { BUILTIN_PROVIDER_FACTORIES, createRuntime } from "./runtime.js";
export type { Runtime, RuntimeOptions } from "./runtime.js";
export { debug, error, isVerbose, redactSecret, setVerbose, warn } from "./utils/log.js";
export { isRetryableError, retryWithBackoff } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export { getVersion, VERSION } from "./utils/version.js";
