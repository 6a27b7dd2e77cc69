export interface AIMetrics {
	provider?: string;
	model?: string;
	/** "stop", "tool_calls", "length", "error", "cancelled", "tool_loop_limit", or a provider value */
	finishReason?: string;
	inputTokens: number;
	outputTokens: number;
	/** Seconds */
	completionTime: number;
}

export function emptyMetrics(overrides: Partial<AIMetrics> = {}): AIMetrics {
	return { inputTokens: 0, outputTokens: 0, completionTime: 0, ...overrides };
}

/**
 * Aggregate metrics of consecutive calls. Counters and time add up; identity
 * fields and the finish reason take the later call's value when it has one.
 */
export function combineMetrics(earlier: AIMetrics, later: AIMetrics): AIMetrics {
	return {
		provider: later.provider ?? earlier.provider,
		model: later.model ?? earlier.model,
		finishReason: later.finishReason ?? earlier.finishReason,
		inputTokens: earlier.inputTokens + later.inputTokens,
		outputTokens: earlier.outputTokens + later.outputTokens,
		completionTime: earlier.completionTime + later.completionTime,
	};
}
