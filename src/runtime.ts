import { SettingsStore } from "./config/loader.js";
import type { HopperSettings } from "./config/schema.js";
import { AIExecutor } from "./core/executor.js";
import type { ExecuteOptions } from "./core/executor.js";
import { ConversationSession } from "./core/conversation.js";
import type { AIReturn } from "./core/ai-return.js";
import type { JsonObject } from "./core/interactions.js";
import { AIRequestCall } from "./core/request.js";
import type { AIRequestInit } from "./core/request.js";
import { callAiTool } from "./core/tool-call.js";
import type { CallAiToolOptions } from "./core/tool-call.js";
import { anthropicProviderFactory } from "./providers/anthropic.js";
import type { ProviderHashVerifier } from "./providers/hash-verifier.js";
import { ProviderManager } from "./providers/manager.js";
import type { PluginLoadResult, SecurityNotifier, TrustPrompt } from "./providers/manager.js";
import { ModelManager } from "./providers/model-registry.js";
import { openAIProviderFactory } from "./providers/openai.js";
import type { FetchLike, ProviderFactory } from "./providers/types.js";
import { builtinToolProviders } from "./tools/builtin/index.js";
import type { CanvasHost } from "./tools/builtin/index.js";
import { ToolManager } from "./tools/registry.js";
import type { AIToolProvider } from "./tools/types.js";
import { debug, setVerbose } from "./utils/log.js";

export const BUILTIN_PROVIDER_FACTORIES: readonly ProviderFactory[] = [openAIProviderFactory, anthropicProviderFactory];

export interface RuntimeOptions {
	/** Settings store, a settings document kept in memory, or the default settings file when omitted */
	settings?: SettingsStore | HopperSettings;
	fetch?: FetchLike;
	trustPrompt?: TrustPrompt;
	notifier?: SecurityNotifier;
	hashVerifier?: ProviderHashVerifier;
	/** Bundled providers; OpenAI and Anthropic by default */
	providers?: readonly ProviderFactory[];
	/** Enables gh_get, gh_put and gh_tidy_up */
	canvas?: CanvasHost;
	/** Extra tool sets registered after the built-in ones */
	toolProviders?: AIToolProvider[];
	/** Scan the plugin directory; defaults to true when one is configured */
	loadPlugins?: boolean;
}

export interface Runtime {
	readonly settings: SettingsStore;
	readonly models: ModelManager;
	readonly providers: ProviderManager;
	readonly tools: ToolManager;
	readonly executor: AIExecutor;
	/** Outcome of plugin loading during startup */
	readonly plugins: readonly PluginLoadResult[];
	/** One provider call; tool calls in the answer are returned, not executed */
	call(request: AIRequestCall | AIRequestInit, options?: ExecuteOptions): Promise<AIReturn>;
	/** A tool-call loop over the request */
	session(request: AIRequestCall | AIRequestInit): ConversationSession;
	callAiTool(toolName: string, parameters: JsonObject, options?: CallAiToolOptions): Promise<JsonObject>;
}

function toRequest(request: AIRequestCall | AIRequestInit): AIRequestCall {
	return request instanceof AIRequestCall ? request : new AIRequestCall(request);
}

/**
 * Composition root. Builds the model registry, provider registry and tool
 * manager, registers bundled providers and tools, loads verified plugins and
 * waits for every provider to finish initialising.
 */
export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
	const settings =
		options.settings instanceof SettingsStore
			? options.settings
			: options.settings
				? new SettingsStore(options.settings)
				: SettingsStore.load();
	setVerbose(settings.data.verbose);

	const models = new ModelManager();
	const providers = new ProviderManager({
		settings,
		models,
		fetch: options.fetch,
		trustPrompt: options.trustPrompt,
		notifier: options.notifier,
		hashVerifier: options.hashVerifier,
	});
	const tools = new ToolManager({ timeoutSeconds: settings.data.toolTimeoutSeconds });
	const executor = new AIExecutor(providers, tools);
	tools.setAiCaller(executor);

	for (const factory of options.providers ?? BUILTIN_PROVIDER_FACTORIES) {
		providers.registerFactory(factory);
	}
	tools.discoverTools([...builtinToolProviders(options.canvas), ...(options.toolProviders ?? [])]);

	const shouldLoadPlugins = options.loadPlugins ?? Boolean(settings.data.pluginDirectory);
	const plugins = shouldLoadPlugins ? await providers.refreshProviders() : [];
	await providers.whenAllReady();
	debug("Runtime", `Ready with ${providers.getProviders().length} provider(s) and ${tools.names().length} tool(s)`);

	return {
		settings,
		models,
		providers,
		tools,
		executor,
		plugins,
		call: (request, callOptions) => executor.execute(toRequest(request), callOptions),
		session: (request) =>
			new ConversationSession(toRequest(request), {
				executor,
				tools,
				models,
				maxToolIterations: settings.data.maxToolIterations,
				toolTimeoutSeconds: settings.data.toolTimeoutSeconds,
			}),
		callAiTool: (toolName, parameters, toolOptions) =>
			callAiTool({ tools, models, providers }, toolName, parameters, toolOptions),
	};
}
