let _verbose = false;

export function setVerbose(verbose: boolean): void {
	_verbose = verbose;
}

export function isVerbose(): boolean {
	return _verbose;
}

/** Diagnostics only printed in verbose mode. */
export function debug(scope: string, message: string): void {
	if (_verbose) {
		console.warn(`[${scope}] ${message}`);
	}
}

export function warn(scope: string, message: string): void {
	console.warn(`[${scope}] ${message}`);
}

export function error(scope: string, message: string): void {
	console.error(`[${scope}] ${message}`);
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Render a secret for logs: first four characters, then a marker.
 *
 * @example
 * redactSecret("sk-test-secret") // "sk-t...REDACTED"
 */
export function redactSecret(value: string | undefined): string {
	if (!value) return "(not set)";
	if (value.length <= 8) return "****";
	return `${value.slice(0, 4)}...REDACTED`;
}
