import { readFileSync, rmSync, writeFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { HopperSettings } from "../../src/config/schema.js";
import { AICapability } from "../../src/providers/capabilities.js";
import { calculateFileHash, ProviderHashVerifier } from "../../src/providers/hash-verifier.js";
import type { SecurityNotifier } from "../../src/providers/manager.js";
import { signProvider, writeSignatureSidecar } from "../../src/providers/signature.js";
import { createTestRuntime, fakeFetch, jsonResponse, requireProvider, testSettings } from "../helpers.js";
import { createPluginDirectory, ECHO_PLUGIN_FILE, ECHO_PLUGIN_NAME } from "./plugin-fixture.js";
import type { PluginDirectory } from "./plugin-fixture.js";

const SIGNING_KEY = Buffer.from("test-secret").toString("base64");

function recordingNotifier(): SecurityNotifier & { errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];
  return {
    errors,
    warnings,
    error: (message) => {
      errors.push(message);
    },
    warning: (message) => {
      warnings.push(message);
    },
  };
}

const noNetwork = fakeFetch(() => jsonResponse({})).fetch;

describe("ProviderManager", () => {
  describe("lookup", () => {
    it("resolves the Default alias to the configured provider", async () => {
      const runtime = await createTestRuntime(noNetwork, { settings: testSettings({ defaultProvider: "Anthropic" }) });

      expect(runtime.providers.getProvider("Default")?.name).toBe("Anthropic");
    });

    it("falls back to the first registered provider", async () => {
      const runtime = await createTestRuntime(noNetwork, { settings: testSettings({ defaultProvider: "Missing" }) });

      expect(runtime.providers.getDefaultProviderName()).toBe("OpenAI");
      expect(runtime.providers.getProvider("Default")?.name).toBe("OpenAI");
    });

    it("matches names case-insensitively and returns null for unknown names", async () => {
      const runtime = await createTestRuntime(noNetwork);

      expect(runtime.providers.getProvider("openai")?.name).toBe("OpenAI");
      expect(runtime.providers.getProvider("Nope")).toBeNull();
      expect(runtime.providers.getProvider("")).toBeNull();
    });

    it("hides a bundled provider once it is distrusted", async () => {
      const runtime = await createTestRuntime(noNetwork);

      runtime.settings.setTrusted("OpenAI", false);

      expect(runtime.providers.getProvider("OpenAI")).toBeNull();
      expect(runtime.providers.getProviders().map((p) => p.name)).toEqual(["Anthropic"]);
      expect(runtime.providers.getProviders(true).map((p) => p.name)).toEqual(["OpenAI", "Anthropic"]);
    });
  });

  describe("updateProviderSettings", () => {
    it("persists values and refreshes the provider", async () => {
      const runtime = await createTestRuntime(noNetwork);
      const provider = requireProvider(runtime, "OpenAI");

      expect(runtime.providers.updateProviderSettings("OpenAI", { model: "gpt-4.1" })).toEqual({ success: true, errors: [] });
      expect(runtime.settings.getProviderSettings("OpenAI")).toEqual({ apiKey: "test-secret", model: "gpt-4.1" });
      expect(provider.getDefaultModel()).toBe("gpt-4.1");
    });

    it("removes empty values and falls back to the defaults", async () => {
      const runtime = await createTestRuntime(noNetwork);
      const provider = requireProvider(runtime, "OpenAI");
      runtime.providers.updateProviderSettings("OpenAI", { model: "gpt-4.1" });

      runtime.providers.updateProviderSettings("OpenAI", { model: "" });

      expect(runtime.settings.getProviderSettings("OpenAI")).toEqual({ apiKey: "test-secret" });
      expect(provider.getDefaultModel()).toBe("gpt-5-mini");
    });

    it("reports unknown providers", async () => {
      const runtime = await createTestRuntime(noNetwork);

      expect(runtime.providers.updateProviderSettings("Nope", { model: "x" })).toEqual({
        success: false,
        errors: ["Provider 'Nope' not found"],
      });
    });
  });

  describe("plugins", () => {
    let plugins: PluginDirectory;

    function signPlugin(): Promise<void> {
      const content = readFileSync(plugins.pluginPath);
      return writeSignatureSidecar(
        plugins.pluginPath,
        signProvider(ECHO_PLUGIN_FILE, "1.0.0", "dev@example.com", content, SIGNING_KEY, "release"),
      );
    }

    function pluginSettings(overrides: Partial<HopperSettings> = {}): HopperSettings {
      return testSettings({ pluginDirectory: plugins.dir, trustedKeys: { release: SIGNING_KEY }, ...overrides });
    }

    beforeEach(async () => {
      plugins = createPluginDirectory();
      await signPlugin();
    });

    afterEach(() => {
      plugins.cleanup();
    });

    it("loads a signed, trusted plugin and warns when hashes are unavailable", async () => {
      const notifier = recordingNotifier();
      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings({ trustedProviders: { [ECHO_PLUGIN_NAME]: true } }),
        loadPlugins: true,
        notifier,
      });

      expect(runtime.plugins).toEqual([{ file: ECHO_PLUGIN_FILE, status: "loaded", providers: ["Echo"] }]);
      expect(runtime.providers.getProvider("Echo")?.getDefaultModel()).toBe("echo-1");
      expect(runtime.models.validateCapabilities("Echo", "echo-1", AICapability.Text2Text)).toBe(true);
      expect(notifier.errors).toEqual([]);
      expect(notifier.warnings).toEqual([
        `Could not retrieve SHA-256 hash for '${ECHO_PLUGIN_FILE}'. Hash verification was skipped. Ensure you trust this provider's source before enabling it.`,
      ]);
    });

    it("refuses a trusted plugin without a signature", async () => {
      rmSync(`${plugins.pluginPath}.sig.json`);
      const notifier = recordingNotifier();
      const asked: string[] = [];

      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings({ trustedProviders: { [ECHO_PLUGIN_NAME]: true } }),
        loadPlugins: true,
        notifier,
        trustPrompt: async (name) => {
          asked.push(name);
          return true;
        },
      });

      const reason = `Provider '${ECHO_PLUGIN_FILE}' is not signed. Unsigned providers are not loaded.`;
      expect(runtime.plugins).toEqual([{ file: ECHO_PLUGIN_FILE, status: "rejected", providers: [], reason }]);
      expect(notifier.errors).toEqual([reason]);
      expect(runtime.providers.getProvider("Echo")).toBeNull();
      expect(runtime.providers.getProviders(true).map((p) => p.name)).not.toContain("Echo");
      expect(asked).toEqual([]);
    });

    it("does not import a plugin without a trust decision or prompt", async () => {
      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings(),
        loadPlugins: true,
        notifier: recordingNotifier(),
      });

      expect(runtime.plugins).toEqual([{ file: ECHO_PLUGIN_FILE, status: "untrusted", providers: [] }]);
      expect(runtime.providers.getProvider("Echo")).toBeNull();
      expect(runtime.settings.isTrusted(ECHO_PLUGIN_NAME)).toBeUndefined();
    });

    it("asks once and records the answer", async () => {
      const asked: string[] = [];
      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings(),
        loadPlugins: true,
        notifier: recordingNotifier(),
        trustPrompt: async (name) => {
          asked.push(name);
          return false;
        },
      });

      expect(asked).toEqual([ECHO_PLUGIN_NAME]);
      expect(runtime.plugins[0]?.status).toBe("untrusted");
      expect(runtime.settings.isTrusted(ECHO_PLUGIN_NAME)).toBe(false);

      const again = await runtime.providers.loadPlugin(plugins.pluginPath);
      expect(again.status).toBe("untrusted");
      expect(asked).toHaveLength(1);
    });

    it("hides plugin providers after trust is revoked", async () => {
      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings(),
        loadPlugins: true,
        notifier: recordingNotifier(),
        trustPrompt: async () => true,
      });
      expect(runtime.providers.getProvider("Echo")).not.toBeNull();

      runtime.settings.setTrusted(ECHO_PLUGIN_NAME, false);

      expect(runtime.providers.getProvider("Echo")).toBeNull();
      expect(runtime.providers.getProviders(true).map((p) => p.name)).toContain("Echo");
    });

    it("rejects a plugin whose hash does not match the manifest", async () => {
      const notifier = recordingNotifier();
      const manifest = fakeFetch(() => jsonResponse({ providers: { [ECHO_PLUGIN_FILE]: "00ff" } }));
      const localHash = await calculateFileHash(plugins.pluginPath);

      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings({ trustedProviders: { [ECHO_PLUGIN_NAME]: true } }),
        loadPlugins: true,
        notifier,
        hashVerifier: new ProviderHashVerifier({ baseUrl: "https://hashes.example.test", fetch: manifest.fetch }),
      });

      const reason = `Provider '${ECHO_PLUGIN_FILE}' failed integrity verification. Expected: 00ff, Actual: ${localHash}`;
      expect(runtime.plugins).toEqual([{ file: ECHO_PLUGIN_FILE, status: "rejected", providers: [], reason }]);
      expect(notifier.errors).toEqual([reason]);
      expect(runtime.providers.getProvider("Echo")).toBeNull();
    });

    it("loads a plugin whose hash matches the manifest", async () => {
      const notifier = recordingNotifier();
      const localHash = await calculateFileHash(plugins.pluginPath);
      const manifest = fakeFetch(() => jsonResponse({ providers: { [ECHO_PLUGIN_FILE]: localHash } }));

      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings({ trustedProviders: { [ECHO_PLUGIN_NAME]: true } }),
        loadPlugins: true,
        notifier,
        hashVerifier: new ProviderHashVerifier({ baseUrl: "https://hashes.example.test", fetch: manifest.fetch }),
      });

      expect(runtime.plugins[0]?.status).toBe("loaded");
      expect(notifier.warnings).toEqual([]);
    });

    it("rejects a plugin with an invalid signature", async () => {
      const notifier = recordingNotifier();
      const signature = signProvider(ECHO_PLUGIN_FILE, "1.0.0", "dev@example.com", "other content", SIGNING_KEY, "release");
      await writeSignatureSidecar(plugins.pluginPath, signature);

      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings({ trustedProviders: { [ECHO_PLUGIN_NAME]: true } }),
        loadPlugins: true,
        notifier,
      });

      expect(runtime.plugins[0]?.status).toBe("rejected");
      expect(notifier.errors).toEqual([
        `Signature verification failed for provider '${ECHO_PLUGIN_FILE}': Content fingerprint mismatch - plugin has been modified`,
      ]);
    });

    it("reports plugins that fail to import", async () => {
      writeFileSync(plugins.pluginPath, "export default {;\n");
      await signPlugin();

      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings({ trustedProviders: { [ECHO_PLUGIN_NAME]: true } }),
        loadPlugins: true,
        notifier: recordingNotifier(),
      });

      expect(runtime.plugins[0]?.status).toBe("failed");
      expect(runtime.plugins[0]?.reason).toContain("Failed to load provider plugin");
    });

    it("verifies every plugin against the manifest", async () => {
      const manifest = fakeFetch(() => jsonResponse({ providers: {} }));
      const runtime = await createTestRuntime(noNetwork, {
        settings: pluginSettings(),
        hashVerifier: new ProviderHashVerifier({ baseUrl: "https://hashes.example.test", fetch: manifest.fetch }),
      });

      const results = await runtime.providers.verifyAllProviders();

      expect(Array.from(results.keys())).toEqual([ECHO_PLUGIN_FILE]);
      expect(results.get(ECHO_PLUGIN_FILE)?.status).toBe("NotFound");
    });
  });
});
