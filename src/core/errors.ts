/**
 * Error types for the call pipeline.
 *
 * Only misconfiguration is thrown past a provider's `call` boundary; runtime
 * failures are returned as failed `AIReturn` values instead.
 */

export class HopperError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "HopperError";
	}
}

export class UnsupportedHttpMethodError extends HopperError {
	constructor(method: string) {
		super(
			`HTTP method '${method}' is not supported. Supported methods: GET, POST, DELETE, PATCH`,
			"UNSUPPORTED_HTTP_METHOD",
			{ method },
		);
		this.name = "UnsupportedHttpMethodError";
	}
}

export class UnsupportedAuthenticationError extends HopperError {
	constructor(authentication: string) {
		super(
			`Authentication method '${authentication}' is not supported. Supported methods: bearer, x-api-key`,
			"UNSUPPORTED_AUTHENTICATION",
			{ authentication },
		);
		this.name = "UnsupportedAuthenticationError";
	}
}

export class MissingConfigurationError extends HopperError {
	constructor(provider: string, setting: string) {
		super(`${provider} ${setting} is not configured or is invalid.`, "MISSING_CONFIGURATION", { provider, setting });
		this.name = "MissingConfigurationError";
	}
}

export class StreamingRequestError extends HopperError {
	constructor(
		public readonly status: number,
		public readonly body: string,
	) {
		super(`Streaming request failed: ${status} - ${body}`, "STREAMING_REQUEST_FAILED", { status, body });
		this.name = "StreamingRequestError";
	}
}

export class ToolLoopLimitError extends HopperError {
	constructor(limit: number) {
		super(`Tool-call loop stopped after ${limit} iterations`, "TOOL_LOOP_LIMIT", { limit });
		this.name = "ToolLoopLimitError";
	}
}

export class ProviderSecurityError extends HopperError {
	constructor(
		public readonly file: string,
		public readonly reason: string,
	) {
		super(`Provider ${file} was not loaded: ${reason}`, "PROVIDER_SECURITY", { file, reason });
		this.name = "ProviderSecurityError";
	}
}

export class ConfigError extends HopperError {
	constructor(message: string, details?: unknown) {
		super(message, "CONFIG_INVALID", details);
		this.name = "ConfigError";
	}
}

export function isAbortError(err: unknown): boolean {
	if (err instanceof Error) {
		return err.name === "AbortError" || err.name === "TimeoutError";
	}
	return false;
}
