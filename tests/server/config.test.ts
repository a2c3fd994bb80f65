import { describe, expect, it } from "vitest";
import { loadConfig, serverUrl } from "../../server/config";

describe("loadConfig", () => {
	it("falls back to defaults", () => {
		const config = loadConfig({ FEEDBACK_DATA_DIR: "/tmp/relay" });

		expect(config).toEqual({
			host: "127.0.0.1",
			port: 8765,
			defaultTimeoutSeconds: 600,
			heartbeatIntervalSeconds: 60,
			sendTimeoutMs: 5_000,
			historyLimit: 10,
			maxImageBytes: 1024 * 1024,
			dataDir: "/tmp/relay",
			mcpStdio: false,
			logLevel: "info",
		});
		expect(serverUrl(config)).toBe("http://127.0.0.1:8765");
	});

	it("reads overrides from the environment", () => {
		const config = loadConfig({
			FEEDBACK_PORT: "9000",
			FEEDBACK_TIMEOUT_SECONDS: "120",
			FEEDBACK_MCP_STDIO: "yes",
		});

		expect(config.port).toBe(9000);
		expect(config.defaultTimeoutSeconds).toBe(120);
		expect(config.mcpStdio).toBe(true);
	});

	it("rejects a default timeout outside 30 to 7200 seconds", () => {
		expect(() => loadConfig({ FEEDBACK_TIMEOUT_SECONDS: "10" })).toThrow();
		expect(() => loadConfig({ FEEDBACK_TIMEOUT_SECONDS: "7201" })).toThrow();
	});
});
