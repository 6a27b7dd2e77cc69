import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  calculateFingerprint,
  readSignatureSidecar,
  signProvider,
  verifyProviderSignature,
  writeSignatureSidecar,
} from "../../src/providers/signature.js";

const KEY = Buffer.from("test-secret").toString("base64");
const OTHER_KEY = Buffer.from("other-test-secret").toString("base64");
const CONTENT = "export default [];\n";
const SIGNED_AT = new Date("2026-03-01T00:00:00.000Z");
const VERIFIED_AT = new Date("2026-04-01T00:00:00.000Z").getTime();

describe("verifyProviderSignature", () => {
  it("accepts a signature from the named key", () => {
    const signature = signProvider("acme.js", "1.0.0", "dev@example.com", CONTENT, KEY, "release", SIGNED_AT);

    expect(verifyProviderSignature(signature, CONTENT, { release: KEY }, VERIFIED_AT)).toEqual({
      valid: true,
      info: { plugin: "acme.js", version: "1.0.0", author: "dev@example.com", timestamp: "2026-03-01T00:00:00.000Z" },
    });
  });

  it("tries every trusted key when no key id is given", () => {
    const signature = signProvider("acme.js", "1.0.0", "dev@example.com", CONTENT, KEY, undefined, SIGNED_AT);

    expect(verifyProviderSignature(signature, CONTENT, { other: OTHER_KEY, release: KEY }, VERIFIED_AT).valid).toBe(true);
    expect(verifyProviderSignature(signature, CONTENT, { other: OTHER_KEY }, VERIFIED_AT)).toEqual({
      valid: false,
      reason: "No valid signature found from trusted keys",
    });
  });

  it("rejects modified content", () => {
    const signature = signProvider("acme.js", "1.0.0", "dev@example.com", CONTENT, KEY, "release", SIGNED_AT);

    expect(verifyProviderSignature(signature, `${CONTENT}// extra\n`, { release: KEY }, VERIFIED_AT)).toEqual({
      valid: false,
      reason: "Content fingerprint mismatch - plugin has been modified",
    });
  });

  it("rejects a signature made with another key", () => {
    const signature = signProvider("acme.js", "1.0.0", "dev@example.com", CONTENT, OTHER_KEY, "release", SIGNED_AT);

    expect(verifyProviderSignature(signature, CONTENT, { release: KEY }, VERIFIED_AT).reason).toBe("Invalid signature");
  });

  it("rejects tampered metadata", () => {
    const signature = signProvider("acme.js", "1.0.0", "dev@example.com", CONTENT, KEY, "release", SIGNED_AT);

    const result = verifyProviderSignature({ ...signature, author: "someone@example.com" }, CONTENT, { release: KEY }, VERIFIED_AT);

    expect(result.reason).toBe("Invalid signature");
  });

  it("rejects unknown key ids", () => {
    const signature = signProvider("acme.js", "1.0.0", "dev@example.com", CONTENT, KEY, "nightly", SIGNED_AT);

    expect(verifyProviderSignature(signature, CONTENT, { release: KEY }, VERIFIED_AT).reason).toBe("Public key not found: nightly");
  });

  it("rejects signatures older than a year", () => {
    const signature = signProvider("acme.js", "1.0.0", "dev@example.com", CONTENT, KEY, "release", new Date("2024-01-01T00:00:00.000Z"));

    expect(verifyProviderSignature(signature, CONTENT, { release: KEY }, VERIFIED_AT).reason).toBe(
      "Signature is too old (may be expired)",
    );
  });

  it("prefixes fingerprints with the algorithm", () => {
    expect(calculateFingerprint(CONTENT)).toMatch(/^sha256:[0-9a-f]{64}$/);
  });
});

describe("signature sidecar", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "hopperkit-sig-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("round-trips through the .sig.json file", async () => {
    const pluginPath = join(dir, "hopperkit-provider-acme.js");
    const signature = signProvider("hopperkit-provider-acme.js", "1.0.0", "dev@example.com", CONTENT, KEY, "release", SIGNED_AT);

    await writeSignatureSidecar(pluginPath, signature);

    expect(await readSignatureSidecar(pluginPath)).toEqual(signature);
  });

  it("returns null when the sidecar is missing or malformed", async () => {
    const pluginPath = join(dir, "hopperkit-provider-acme.js");
    expect(await readSignatureSidecar(pluginPath)).toBeNull();

    writeFileSync(`${pluginPath}.sig.json`, "{ not json", "utf-8");
    expect(await readSignatureSidecar(pluginPath)).toBeNull();

    writeFileSync(`${pluginPath}.sig.json`, JSON.stringify({ plugin: "x" }), "utf-8");
    expect(await readSignatureSidecar(pluginPath)).toBeNull();
  });
});
