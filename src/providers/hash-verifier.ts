import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { debug, errorMessage } from "../utils/log.js";
import { isRetryableError, retryWithBackoff } from "../utils/retry.js";
import type { RetryOptions } from "../utils/retry.js";
import type { FetchLike } from "./types.js";

export enum ProviderVerificationStatus {
	Match = "Match",
	Mismatch = "Mismatch",
	Unavailable = "Unavailable",
	NotFound = "NotFound",
}

export interface ProviderVerificationResult {
	success: boolean;
	status: ProviderVerificationStatus;
	localHash?: string;
	publicHash?: string;
	errorMessage?: string;
}

export interface HashVerifierOptions {
	/** Base URL holding `<version>.json` and `latest.json` manifests */
	baseUrl?: string;
	fetch: FetchLike;
	retry?: RetryOptions;
}

const manifestSchema = z.object({
	providers: z.record(z.string(), z.string()),
});

type HashManifest = Record<string, string>;

export async function calculateFileHash(filePath: string): Promise<string> {
	const content = await fs.readFile(filePath);
	return crypto.createHash("sha256").update(content).digest("hex");
}

/**
 * Compares plugin file hashes against a published manifest of the form
 * `{ "providers": { "<file>-<platform>": "<sha256>" } }`.
 *
 * Manifests are fetched once per version and cached for the verifier's lifetime.
 */
export class ProviderHashVerifier {
	private _manifests: Map<string, Promise<HashManifest | null>> = new Map();

	constructor(private readonly _options: HashVerifierOptions) {}

	fetchPublicHashes(version: string): Promise<HashManifest | null> {
		const cached = this._manifests.get(version);
		if (cached) return cached;

		const pending = this._fetchManifest(version);
		this._manifests.set(version, pending);
		return pending;
	}

	clearCache(): void {
		this._manifests.clear();
	}

	private async _fetchManifest(version: string): Promise<HashManifest | null> {
		const baseUrl = this._options.baseUrl?.replace(/\/+$/, "");
		if (!baseUrl) {
			debug("HashVerifier", "No hash manifest URL configured");
			return null;
		}

		const urls = [`${baseUrl}/${version}.json`, `${baseUrl}/latest.json`];
		for (const url of urls) {
			try {
				debug("HashVerifier", `Fetching hashes from: ${url}`);
				const response = await retryWithBackoff(() => this._options.fetch(url, { method: "GET" }), {
					...this._options.retry,
					shouldRetry: isRetryableError,
				});

				if (response.status === 404) {
					debug("HashVerifier", `Hash manifest not found at ${url} (404)`);
					continue;
				}
				if (!response.ok) {
					debug("HashVerifier", `Failed to fetch from ${url}: ${response.status} ${response.statusText}`);
					continue;
				}

				const parsed = manifestSchema.safeParse(await response.json());
				if (parsed.success) {
					return parsed.data.providers;
				}
				debug("HashVerifier", `Manifest at ${url} has no providers section`);
			} catch (err) {
				debug("HashVerifier", `Failed to fetch from ${url}: ${errorMessage(err)}`);
			}
		}

		return null;
	}

	async verifyProvider(filePath: string, version: string, platform: string): Promise<ProviderVerificationResult> {
		const fileName = path.basename(filePath);

		try {
			const localHash = await calculateFileHash(filePath);
			debug("HashVerifier", `Local hash for ${fileName}: ${localHash}`);

			const publicHashes = await this.fetchPublicHashes(version);
			if (!publicHashes) {
				return {
					success: false,
					status: ProviderVerificationStatus.Unavailable,
					localHash,
					errorMessage:
						"Failed to retrieve public hash manifest. This may be due to network connectivity issues or source unavailability.",
				};
			}

			const publicHash = publicHashes[`${fileName}-${platform}`] ?? publicHashes[fileName];
			if (publicHash === undefined) {
				return {
					success: false,
					status: ProviderVerificationStatus.NotFound,
					localHash,
					errorMessage: `Hash not found in public manifest for ${fileName} (${platform})`,
				};
			}

			if (localHash.toLowerCase() === publicHash.toLowerCase()) {
				debug("HashVerifier", `Hash match for ${fileName}`);
				return { success: true, status: ProviderVerificationStatus.Match, localHash, publicHash };
			}

			return {
				success: false,
				status: ProviderVerificationStatus.Mismatch,
				localHash,
				publicHash,
				errorMessage: `SHA-256 hash mismatch detected for ${fileName}. Expected: ${publicHash}, Actual: ${localHash}`,
			};
		} catch (err) {
			return {
				success: false,
				status: ProviderVerificationStatus.Unavailable,
				errorMessage: `Error during hash verification: ${errorMessage(err)}`,
			};
		}
	}
}
