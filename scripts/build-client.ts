import { bundleClient, CLIENT_BUNDLE } from "./client-bundle";

try {
	await bundleClient({ write: true });
	// stdout belongs to the MCP protocol under start:mcp.
	console.error(`[build] Wrote ${CLIENT_BUNDLE}`);
} catch (error) {
	console.error("[build] Client bundle failed:", error);
	process.exitCode = 1;
}
