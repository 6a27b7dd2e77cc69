import type { AIToolProvider } from "../types.js";
import { CanvasTools } from "./canvas.js";
import type { CanvasHost } from "./canvas.js";
import { scriptTools } from "./script.js";
import { textTools } from "./text.js";

export { CanvasTools, createGhGetTool, createGhPutTool, createGhTidyUpTool } from "./canvas.js";
export type { CanvasHost, CanvasPoint, CanvasPutResult, CanvasQuery } from "./canvas.js";
export { scriptGenerateTool, scriptTools, resolveScriptLanguage, SUPPORTED_SCRIPT_LANGUAGES } from "./script.js";
export type { ScriptLanguage } from "./script.js";
export { textGenerateTool, textTools, DEFAULT_TEXT_SYSTEM_PROMPT } from "./text.js";
export { stripThinkTags } from "./shared.js";

/** Tool sets bundled with the library; canvas tools only when a host is given. */
export function builtinToolProviders(canvas?: CanvasHost): AIToolProvider[] {
  const providers: AIToolProvider[] = [textTools, scriptTools];
  if (canvas) {
    providers.push(new CanvasTools(canvas));
  }
  return providers;
}
