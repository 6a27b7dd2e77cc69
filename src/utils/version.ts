/** Kept in sync with package.json by the release script */
export const VERSION = "0.1.0";

export function getVersion(): string {
	return VERSION;
}
