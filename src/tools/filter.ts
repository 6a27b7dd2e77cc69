import { debug } from "../utils/log.js";

/**
 * Include/exclude filter over keys such as tool categories.
 *
 * Grammar: comma- or space-separated tokens. `-*` excludes everything and wins
 * over any other token; `*` (or no include token) includes everything; `-key`
 * excludes a key; `key` or `+key` includes it. Keys compare case-insensitively.
 */
export class Filter {
	private constructor(
		readonly excludeAll: boolean,
		readonly includeAll: boolean,
		readonly includeSet: ReadonlySet<string>,
		readonly excludeSet: ReadonlySet<string>,
	) {}

	static parse(raw: string | undefined | null): Filter {
		if (!raw?.trim()) {
			return new Filter(false, true, new Set(), new Set());
		}

		const parts = raw
			.split(/[,\s]+/)
			.map((p) => p.trim())
			.filter(Boolean);

		if (parts.includes("-*")) {
			return new Filter(true, false, new Set(), new Set());
		}

		const includes = parts.filter((p) => !p.startsWith("-")).map((p) => (p.startsWith("+") ? p.slice(1) : p));
		const excludes = parts.filter((p) => p.startsWith("-")).map((p) => p.slice(1));

		const includeAll = includes.length === 0 || includes.includes("*");
		const includeSet = new Set(includes.filter((p) => p !== "*").map((p) => p.toLowerCase()));
		const excludeSet = new Set(excludes.map((p) => p.toLowerCase()));

		debug(
			"Filter",
			`raw='${raw}', includeAll=${includeAll}, include=[${[...includeSet].join(",")}], exclude=[${[...excludeSet].join(",")}]`,
		);
		return new Filter(false, includeAll, includeSet, excludeSet);
	}

	shouldInclude(key: string): boolean {
		if (this.excludeAll) return false;

		const normalized = key.toLowerCase();
		if (this.excludeSet.has(normalized)) return false;
		if (this.includeAll) return true;
		return this.includeSet.has(normalized);
	}
}
