import * as readline from "node:readline";
import { getSettingsPath, SettingsStore } from "../config/loader.js";
import { AIBody, systemMessage, userMessage } from "../core/interactions.js";
import type { AIInteraction } from "../core/interactions.js";
import { AICapability, capabilityToString } from "../providers/capabilities.js";
import { DEFAULT_PROVIDER_ALIAS } from "../providers/manager.js";
import type { TrustPrompt } from "../providers/manager.js";
import { createRuntime } from "../runtime.js";
import type { Runtime } from "../runtime.js";
import { errorMessage, redactSecret, setVerbose } from "../utils/log.js";
import { getVersion } from "../utils/version.js";

export interface CliOptions {
  provider?: string;
  model?: string;
  tools?: string;
  system?: string;
  verbose?: boolean;
  noStream?: boolean;
  help?: boolean;
}

export interface ParsedArgs {
  command: string;
  args: string[];
  options: CliOptions;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = {};
  const positionalArgs: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const next = argv[i + 1];
    if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--provider" && next !== undefined) {
      options.provider = next;
      i++;
    } else if (arg === "--model" && next !== undefined) {
      options.model = next;
      i++;
    } else if (arg === "--tools" && next !== undefined) {
      options.tools = next;
      i++;
    } else if (arg === "--system" && next !== undefined) {
      options.system = next;
      i++;
    } else if (arg === "-v" || arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--no-stream") {
      options.noStream = true;
    } else if (arg && !arg.startsWith("-")) {
      positionalArgs.push(arg);
    }
  }

  return { command: positionalArgs[0] || "help", args: positionalArgs.slice(1), options };
}

function showHelp(): void {
  console.log(`
hopperkit ${getVersion()}

USAGE:
    hopperkit <command> [options]

COMMANDS:
    run <prompt>                   Ask a provider, running tool calls locally
    tool <name> [json]             Run one tool with JSON arguments
    providers                      List providers and their default models
    models <provider>              List registered models of a provider
    verify                         Check provider plugins against the hash manifest
    trust <plugin> [yes|no]        Record a trust decision for a provider plugin
    config                         Show the current settings

OPTIONS:
    --provider <name>              Provider to use (default: ${DEFAULT_PROVIDER_ALIAS})
    --model <name>                 Model to use (default: the provider's default)
    --tools <filter>               Tool categories exposed to the model, e.g. "DataProcessing,-Scripting"
    --system <prompt>              System prompt for "run"
    --no-stream                    Wait for the complete answer
    -v, --verbose                  Print diagnostics
    -h, --help                     Show this help

CONFIG:
    ${getSettingsPath()}
  `);
}

const promptForTrust: TrustPrompt = (pluginName) =>
  new Promise((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    rl.question(`Trust provider plugin '${pluginName}'? [y/N] `, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase().startsWith("y"));
    });
  });

function describeInteraction(interaction: AIInteraction): string {
  switch (interaction.type) {
    case "text":
      return interaction.content;
    case "tool_call":
      return `[${interaction.name}...]`;
    case "tool_result":
      return `[${interaction.name}${interaction.result["success"] === false ? "✗" : "✓"}]`;
    case "error":
      return `Error: ${interaction.content}`;
  }
}

export async function handleRun(runtime: Runtime, args: string[], options: CliOptions): Promise<number> {
  const prompt = args.join(" ");
  if (!prompt.trim()) {
    console.error('Error: Prompt required. Usage: hopperkit run "your prompt"');
    return 1;
  }

  const body = options.system
    ? AIBody.of(systemMessage(options.system), userMessage(prompt))
    : AIBody.of(userMessage(prompt));
  const session = runtime.session({
    provider: options.provider ?? DEFAULT_PROVIDER_ALIAS,
    model: options.model,
    capability: options.tools ? AICapability.ToolChat : AICapability.Text2Text,
    endpoint: "",
    body,
    toolFilter: options.tools ?? "-*",
  });

  const stream = !options.noStream;
  let streamed = false;
  const result = await session.run({
    stream,
    onDelta: (delta) => {
      if (delta.content) {
        process.stdout.write(delta.content);
        streamed = true;
      }
    },
    onToolResult: (interaction) => {
      process.stdout.write(`\n${describeInteraction(interaction)}\n`);
    },
  });

  if (streamed) {
    process.stdout.write("\n");
  } else {
    const answer = result.body.lastText("assistant");
    if (answer) console.log(answer.content);
  }

  for (const message of result.messages) {
    console.error(`${message.severity}: ${message.message}`);
  }
  const { inputTokens, outputTokens, completionTime } = result.metrics;
  console.error(
    `[${result.metrics.provider ?? "?"}/${result.metrics.model ?? "?"}: ${inputTokens} in, ${outputTokens} out, ${completionTime.toFixed(2)}s]`,
  );
  return result.success ? 0 : 1;
}

export async function handleTool(runtime: Runtime, args: string[], options: CliOptions): Promise<number> {
  const [name, rawArgs] = args;
  if (!name) {
    console.error("Error: Tool name required. Usage: hopperkit tool <name> [json]");
    console.error(`Available tools: ${runtime.tools.names().join(", ")}`);
    return 1;
  }

  let parameters: Record<string, unknown> = {};
  if (rawArgs) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawArgs);
    } catch (err) {
      console.error(`Error: Invalid JSON arguments: ${errorMessage(err)}`);
      return 1;
    }
    if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
      console.error("Error: Tool arguments must be a JSON object");
      return 1;
    }
    parameters = { ...parsed };
  }

  const result = await runtime.callAiTool(name, parameters, { provider: options.provider, model: options.model });
  console.log(JSON.stringify(result, null, 2));
  return result["success"] === false ? 1 : 0;
}

export function handleProviders(runtime: Runtime): number {
  const defaultName = runtime.providers.getDefaultProviderName();
  const trusted = new Set(runtime.providers.getProviders().map((p) => p.name));

  console.log("Providers:");
  for (const provider of runtime.providers.getProviders(true)) {
    const marker = provider.name === defaultName ? " (default)" : "";
    const state = trusted.has(provider.name) ? "" : " [untrusted]";
    const model = provider.getDefaultModel() ?? "no default model";
    console.log(`  ${provider.name}${marker}${state}: ${model}`);
  }
  return 0;
}

export function handleModels(runtime: Runtime, args: string[]): number {
  const provider = runtime.providers.getProvider(args[0] ?? DEFAULT_PROVIDER_ALIAS);
  if (!provider) {
    console.error(`Error: Provider '${args[0] ?? DEFAULT_PROVIDER_ALIAS}' not found`);
    return 1;
  }

  console.log(`Models of ${provider.name}:`);
  for (const model of runtime.models.listModels(provider.name)) {
    const flags = [model.deprecated ? "deprecated" : "", model.supportsStreaming ? "streaming" : ""].filter(Boolean);
    const suffix = flags.length > 0 ? ` (${flags.join(", ")})` : "";
    console.log(`  ${model.model}${suffix}`);
    console.log(`    ${capabilityToString(model.capabilities)}`);
  }
  return 0;
}

export async function handleVerify(runtime: Runtime): Promise<number> {
  const results = await runtime.providers.verifyAllProviders();
  if (results.size === 0) {
    console.log("No provider plugins found.");
    return 0;
  }

  let failed = false;
  for (const [file, result] of results) {
    const detail = result.errorMessage ? ` - ${result.errorMessage}` : "";
    console.log(`  ${file}: ${result.status}${detail}`);
    failed ||= result.status === "Mismatch";
  }
  return failed ? 1 : 0;
}

export function handleTrust(settings: SettingsStore, args: string[]): number {
  const [plugin, decision = "yes"] = args;
  if (!plugin) {
    console.error("Error: Plugin name required. Usage: hopperkit trust <plugin> [yes|no]");
    return 1;
  }

  const allowed = decision.toLowerCase() !== "no";
  settings.setTrusted(plugin, allowed);
  settings.save();
  console.log(`${plugin}: ${allowed ? "trusted" : "not trusted"}`);
  return 0;
}

export function handleConfig(settings: SettingsStore): number {
  const data = settings.data;
  console.log("Current Settings:");
  console.log(`  File: ${settings.path ?? "(in memory)"}`);
  console.log(`  Default Provider: ${data.defaultProvider ?? "(first available)"}`);
  console.log(`  Max Tool Iterations: ${data.maxToolIterations}`);
  console.log(`  Tool Timeout: ${data.toolTimeoutSeconds}s`);
  if (data.pluginDirectory) console.log(`  Plugin Directory: ${data.pluginDirectory}`);
  if (data.hashManifestUrl) console.log(`  Hash Manifest: ${data.hashManifestUrl}`);

  const providerEntries = Object.entries(data.providers);
  if (providerEntries.length > 0) {
    console.log("\n  Providers:");
    for (const [name, values] of providerEntries) {
      const apiKey = values["apiKey"];
      console.log(`    ${name}: apiKey ${redactSecret(typeof apiKey === "string" ? apiKey : undefined)}`);
    }
  }

  const trustEntries = Object.entries(data.trustedProviders);
  if (trustEntries.length > 0) {
    console.log("\n  Trust Decisions:");
    for (const [name, allowed] of trustEntries) {
      console.log(`    ${name}: ${allowed ? "trusted" : "not trusted"}`);
    }
  }
  return 0;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { command, args, options } = parseArgs(argv);

  if (options.help || command === "help") {
    showHelp();
    return 0;
  }

  const settings = SettingsStore.load();
  if (options.verbose) setVerbose(true);

  if (command === "config") return handleConfig(settings);
  if (command === "trust") return handleTrust(settings, args);

  const runtime = await createRuntime({ settings, trustPrompt: promptForTrust });
  if (options.verbose) setVerbose(true);

  switch (command) {
    case "run":
      return handleRun(runtime, args, options);
    case "tool":
      return handleTool(runtime, args, options);
    case "providers":
      return handleProviders(runtime);
    case "models":
      return handleModels(runtime, args);
    case "verify":
      return handleVerify(runtime);
    default:
      console.error(`Unknown command: ${command}`);
      console.error("Available commands: run <prompt>, tool <name> [json], providers, models, verify, trust, config");
      return 1;
  }
}
