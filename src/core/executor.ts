import type { ProviderManager } from "../providers/manager.js";
import type { StreamCallOptions } from "../providers/types.js";
import type { ToolManager } from "../tools/registry.js";
import type { AICallOptions, AICaller } from "../tools/types.js";
import { AIReturn } from "./ai-return.js";
import { AIRequestCall } from "./request.js";
import { debug } from "../utils/log.js";

export interface ExecuteOptions extends StreamCallOptions {
	/** Use the provider's streaming path when the provider and model allow it */
	stream?: boolean;
}

/**
 * Resolves a request's provider through the registry, fills in the chat
 * endpoint and the tools the request's filter exposes, then runs the call.
 */
export class AIExecutor implements AICaller {
	constructor(
		private readonly _providers: ProviderManager,
		private readonly _tools: ToolManager,
	) {}

	async call(options: AICallOptions): Promise<AIReturn> {
		const request = new AIRequestCall({
			provider: options.provider,
			model: options.model,
			capability: options.capability,
			endpoint: "",
			body: options.body,
			toolFilter: options.toolFilter ?? "-*",
			jsonOutputSchema: options.jsonOutputSchema,
		});
		return this.execute(request, { signal: options.signal });
	}

	async execute(request: AIRequestCall, options: ExecuteOptions = {}): Promise<AIReturn> {
		const provider = this._providers.getProvider(request.provider);
		if (!provider) {
			return AIReturn.createError(`Provider '${request.provider}' is not available`, {
				request,
				origin: "Validation",
			});
		}
		await this._providers.whenReady(provider.name);

		const prepared = request.with({
			provider: provider.name,
			endpoint: request.endpoint || provider.chatEndpoint,
			tools: request.tools.length > 0 ? [...request.tools] : this._tools.getToolDefinitions(request.toolFilter),
		});

		if ((options.stream ?? request.stream) && provider.supportsStreaming()) {
			debug("AIExecutor", `Streaming ${provider.name} call with ${prepared.tools.length} tool(s)`);
			return provider.callStreaming(prepared, { signal: options.signal, onDelta: options.onDelta });
		}

		debug("AIExecutor", `Calling ${provider.name} with ${prepared.tools.length} tool(s)`);
		return provider.call(prepared, options.signal);
	}
}
