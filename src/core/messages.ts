export type AIRuntimeMessageSeverity = "Error" | "Warning" | "Remark";

export type AIRuntimeMessageOrigin = "Validation" | "Provider" | "Network" | "Tool" | "Return" | "Security";

/** User-facing message surfaced by the host next to a call's result. */
export interface AIRuntimeMessage {
	severity: AIRuntimeMessageSeverity;
	message: string;
	origin?: AIRuntimeMessageOrigin;
}

const SEVERITY_RANK: Record<AIRuntimeMessageSeverity, number> = {
	Error: 3,
	Warning: 2,
	Remark: 1,
};

export function runtimeMessage(
	severity: AIRuntimeMessageSeverity,
	message: string,
	origin?: AIRuntimeMessageOrigin,
): AIRuntimeMessage {
	return origin ? { severity, message, origin } : { severity, message };
}

/** Drop repeated texts (first occurrence wins), then order Error > Warning > Remark. */
export function normalizeMessages(messages: readonly AIRuntimeMessage[]): AIRuntimeMessage[] {
	const seen = new Set<string>();
	const unique: AIRuntimeMessage[] = [];
	for (const message of messages) {
		if (!message.message || seen.has(message.message)) continue;
		seen.add(message.message);
		unique.push(message);
	}
	return unique.sort((a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity]);
}

export function hasErrors(messages: readonly AIRuntimeMessage[]): boolean {
	return messages.some((m) => m.severity === "Error");
}

const SEVERITIES = new Set<string>(["Error", "Warning", "Remark"]);
const ORIGINS = new Set<string>(["Validation", "Provider", "Network", "Tool", "Return", "Security"]);

function isSeverity(value: unknown): value is AIRuntimeMessageSeverity {
	return typeof value === "string" && SEVERITIES.has(value);
}

function isOrigin(value: unknown): value is AIRuntimeMessageOrigin {
	return typeof value === "string" && ORIGINS.has(value);
}

/** Read the `messages` array of a tool result JSON; malformed entries are skipped. */
export function readMessages(value: unknown): AIRuntimeMessage[] {
	if (!Array.isArray(value)) return [];

	const result: AIRuntimeMessage[] = [];
	for (const item of value) {
		if (item === null || typeof item !== "object") continue;
		const severity: unknown = Reflect.get(item, "severity");
		const message: unknown = Reflect.get(item, "message");
		const origin: unknown = Reflect.get(item, "origin");
		if (!isSeverity(severity) || typeof message !== "string") continue;
		result.push(runtimeMessage(severity, message, isOrigin(origin) ? origin : undefined));
	}
	return result;
}
