export {
  AICapability,
  CAPABILITY_FLAGS,
  capabilityToString,
  findDefaultCapabilityForModel,
  hasCapability,
} from "./capabilities.js";
export { ModelCapabilityRegistry, ModelManager } from "./model-registry.js";
export type { ModelCapabilities } from "./model-registry.js";
export { ProviderModelsBase } from "./models.js";
export { StreamingAdapter, buildAuthHeaders, isAbsoluteUrl, readSseData, resolveEndpoint } from "./streaming.js";
export type { SseReadOptions, StreamingHost } from "./streaming.js";
export { StreamAccumulator, parseToolArguments } from "./stream-accumulator.js";
export type { StreamDelta, ToolCallDelta } from "./stream-accumulator.js";
export type {
  AIProvider,
  FetchLike,
  ModelDescriptor,
  ProviderContext,
  ProviderFactory,
  ProviderModels,
  ProviderSettings,
  SettingDescriptor,
  SettingType,
  SettingValue,
  StreamCallOptions,
} from "./types.js";

export { AIProviderBase } from "./base.js";

export { OpenAIProvider, OpenAIProviderSettings, openAIProviderFactory } from "./openai.js";
export { ANTHROPIC_VERSION, AnthropicProvider, AnthropicProviderSettings, anthropicProviderFactory } from "./anthropic.js";

export { ProviderHashVerifier, ProviderVerificationStatus, calculateFileHash } from "./hash-verifier.js";
export type { HashVerifierOptions, ProviderVerificationResult } from "./hash-verifier.js";
export {
  SIGNATURE_SUFFIX,
  calculateFingerprint,
  readSignatureSidecar,
  signProvider,
  verifyProviderSignature,
  writeSignatureSidecar,
} from "./signature.js";
export type { ProviderSignature, SignatureVerificationResult } from "./signature.js";
export {
  PROVIDER_PLUGIN_PREFIX,
  discoverProviderPlugins,
  isProviderFactory,
  isProviderPluginFile,
  loadProviderPlugin,
} from "./plugin-loader.js";
export { BUILTIN_SOURCE, DEFAULT_PROVIDER_ALIAS, ProviderManager } from "./manager.js";
export type {
  PluginLoadResult,
  PluginLoadStatus,
  ProviderManagerOptions,
  SecurityNotifier,
  TrustPrompt,
} from "./manager.js";
