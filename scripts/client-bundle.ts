import { fileURLToPath } from "node:url";
import { build, type BuildResult } from "esbuild";

export const CLIENT_ENTRY = fileURLToPath(new URL("../client/main.ts", import.meta.url));
export const CLIENT_BUNDLE = fileURLToPath(new URL("../public/main.js", import.meta.url));

/** Bundles the tab client into the module `public/index.html` imports. */
export function bundleClient(options: { write: boolean }): Promise<BuildResult> {
	return build({
		entryPoints: [CLIENT_ENTRY],
		outfile: CLIENT_BUNDLE,
		bundle: true,
		format: "esm",
		platform: "browser",
		target: "es2022",
		sourcemap: options.write,
		write: options.write,
		logLevel: "warning",
	});
}
