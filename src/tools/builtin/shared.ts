import { z } from "zod";
import type { AIReturn } from "../../core/ai-return.js";
import type { JsonObject } from "../../core/interactions.js";
import { DEFAULT_PROVIDER_ALIAS } from "../../providers/manager.js";

/** Provider and model a nested AI call should use; injected as tool context by the caller. */
export const callTargetSchema = z.object({
  provider: z.string().nullish(),
  model: z.string().nullish(),
});

export function readCallTarget(args: JsonObject): { provider: string; model?: string } {
  const parsed = callTargetSchema.safeParse(args);
  if (!parsed.success) {
    return { provider: DEFAULT_PROVIDER_ALIAS };
  }
  return {
    provider: parsed.data.provider?.trim() || DEFAULT_PROVIDER_ALIAS,
    model: parsed.data.model?.trim() || undefined,
  };
}

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;

/** Remove `<think>…</think>` reasoning blocks some models inline in their answer. */
export function stripThinkTags(text: string): string {
  return text.replace(THINK_BLOCK, "").trim();
}

/** Failure JSON carrying the nested call's messages verbatim. */
export function failedCall(result: AIReturn, fallback: string): JsonObject {
  return {
    success: false,
    error: result.errorMessage ?? fallback,
    messages: [...result.messages],
  };
}
