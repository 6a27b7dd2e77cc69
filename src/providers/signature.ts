/**
 * Provider Plugin Signatures
 *
 * HMAC-SHA256 signing and verification for provider plugin files. The
 * signature lives in a sidecar file next to the plugin:
 * ```json
 * {
 *   "plugin": "hopperkit-provider-acme.js",
 *   "version": "1.0.0",
 *   "author": "dev@example.com",
 *   "timestamp": "2026-01-25T00:00:00.000Z",
 *   "fingerprint": "sha256:abc123...",
 *   "signature": "hex-encoded-hmac",
 *   "keyId": "release"
 * }
 * ```
 *
 * Keys are base64 strings, looked up by `keyId` in the `trustedKeys` setting.
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import { z } from "zod";
import { debug, errorMessage } from "../utils/log.js";

export const SIGNATURE_SUFFIX = ".sig.json";

/** Signatures older than this are rejected */
const MAX_SIGNATURE_AGE_MS = 365 * 24 * 60 * 60 * 1000;

const providerSignatureSchema = z.object({
  plugin: z.string(),
  version: z.string(),
  author: z.string(),
  timestamp: z.string(),
  fingerprint: z.string(),
  signature: z.string(),
  keyId: z.string().optional(),
});

export type ProviderSignature = z.infer<typeof providerSignatureSchema>;

export interface SignatureVerificationResult {
  valid: boolean;
  reason?: string;
  info?: {
    plugin: string;
    version: string;
    author: string;
    timestamp: string;
  };
}

export function calculateFingerprint(content: string | Buffer): string {
  return `sha256:${crypto.createHash("sha256").update(content).digest("hex")}`;
}

function signaturePayload(signature: Omit<ProviderSignature, "signature" | "keyId">): string {
  return `${signature.plugin}:${signature.version}:${signature.author}:${signature.timestamp}:${signature.fingerprint}`;
}

function hmac(key: string, payload: string): string {
  return crypto.createHmac("sha256", Buffer.from(key, "base64")).update(payload).digest("hex");
}

export function signProvider(
  pluginName: string,
  version: string,
  author: string,
  content: string | Buffer,
  key: string,
  keyId?: string,
  now: Date = new Date(),
): ProviderSignature {
  const unsigned = {
    plugin: pluginName,
    version,
    author,
    timestamp: now.toISOString(),
    fingerprint: calculateFingerprint(content),
  };

  return { ...unsigned, signature: hmac(key, signaturePayload(unsigned)), keyId };
}

function verifyWithKey(signature: ProviderSignature, key: string, now: number): SignatureVerificationResult {
  const expected = hmac(key, signaturePayload(signature));
  const actual = Buffer.from(signature.signature, "hex");
  if (actual.length !== expected.length / 2 || !crypto.timingSafeEqual(actual, Buffer.from(expected, "hex"))) {
    return { valid: false, reason: "Invalid signature" };
  }

  const signedAt = new Date(signature.timestamp).getTime();
  if (Number.isNaN(signedAt) || now - signedAt > MAX_SIGNATURE_AGE_MS) {
    return { valid: false, reason: "Signature is too old (may be expired)" };
  }

  return {
    valid: true,
    info: {
      plugin: signature.plugin,
      version: signature.version,
      author: signature.author,
      timestamp: signature.timestamp,
    },
  };
}

/**
 * Verify a signature against the plugin content and the trusted keys.
 * Without a `keyId`, every trusted key is tried.
 */
export function verifyProviderSignature(
  signature: ProviderSignature,
  content: string | Buffer,
  trustedKeys: Readonly<Record<string, string>>,
  now: number = Date.now(),
): SignatureVerificationResult {
  if (signature.fingerprint !== calculateFingerprint(content)) {
    return { valid: false, reason: "Content fingerprint mismatch - plugin has been modified" };
  }

  if (signature.keyId) {
    const key = trustedKeys[signature.keyId];
    if (!key) {
      return { valid: false, reason: `Public key not found: ${signature.keyId}` };
    }
    return verifyWithKey(signature, key, now);
  }

  for (const key of Object.values(trustedKeys)) {
    const result = verifyWithKey(signature, key, now);
    if (result.valid) return result;
  }
  return { valid: false, reason: "No valid signature found from trusted keys" };
}

/** Read `<file>.sig.json`; `null` when absent or malformed. */
export async function readSignatureSidecar(filePath: string): Promise<ProviderSignature | null> {
  let raw: string;
  try {
    raw = await fs.readFile(`${filePath}${SIGNATURE_SUFFIX}`, "utf-8");
  } catch (err) {
    debug("Signature", `No signature for ${filePath}: ${errorMessage(err)}`);
    return null;
  }

  try {
    const parsed = providerSignatureSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch (err) {
    debug("Signature", `Malformed signature for ${filePath}: ${errorMessage(err)}`);
    return null;
  }
}

export async function writeSignatureSidecar(filePath: string, signature: ProviderSignature): Promise<void> {
  await fs.writeFile(`${filePath}${SIGNATURE_SUFFIX}`, `${JSON.stringify(signature, null, 2)}\n`, "utf-8");
}
