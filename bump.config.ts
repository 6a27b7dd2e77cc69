import { defineConfig } from "bumpp";

export default defineConfig({
	files: ["package.json", "src/utils/version.ts"],
	commit: "release: v{newVersion}",
	tag: "v{newVersion}",
	push: false,
	confirm: true,
});
