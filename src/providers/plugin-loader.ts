import { existsSync, readdirSync } from "node:fs";
import { extname, join } from "node:path";
import { pathToFileURL } from "node:url";
import type { ProviderFactory } from "./types.js";

export const PROVIDER_PLUGIN_PREFIX = "hopperkit-provider-";
const PLUGIN_EXTENSIONS = new Set([".js", ".mjs"]);

export function isProviderPluginFile(fileName: string): boolean {
  return fileName.startsWith(PROVIDER_PLUGIN_PREFIX) && PLUGIN_EXTENSIONS.has(extname(fileName));
}

/** Plugin files in `directory`, sorted by name; empty when the directory is missing. */
export function discoverProviderPlugins(directory: string | undefined): string[] {
  if (!directory || !existsSync(directory)) {
    return [];
  }

  return readdirSync(directory)
    .filter(isProviderPluginFile)
    .sort()
    .map((file) => join(directory, file));
}

export function isProviderFactory(obj: unknown): obj is ProviderFactory {
  if (obj === null || typeof obj !== "object") {
    return false;
  }

  return (
    typeof Reflect.get(obj, "createProvider") === "function" &&
    typeof Reflect.get(obj, "createProviderSettings") === "function"
  );
}

/** Import a plugin and return the provider factories its default export declares. */
export async function loadProviderPlugin(filePath: string): Promise<ProviderFactory[]> {
  let module: unknown;
  try {
    module = await import(pathToFileURL(filePath).href);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to load provider plugin ${filePath}: ${message}`);
  }

  const exported: unknown = module !== null && typeof module === "object" ? Reflect.get(module, "default") : undefined;
  if (!exported) {
    return [];
  }

  if (Array.isArray(exported)) {
    return exported.filter(isProviderFactory);
  }

  return isProviderFactory(exported) ? [exported] : [];
}
