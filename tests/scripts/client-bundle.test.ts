import { describe, expect, it } from "vitest";
import { bundleClient, CLIENT_BUNDLE } from "../../scripts/client-bundle";

describe("client bundle", () => {
	it("emits public/main.js exporting the page entry point", async () => {
		const result = await bundleClient({ write: false });

		expect(result.errors).toEqual([]);
		const files = result.outputFiles ?? [];
		expect(files.map((file) => file.path)).toEqual([CLIENT_BUNDLE]);
		expect(CLIENT_BUNDLE.endsWith("/public/main.js")).toBe(true);
		expect(files[0]?.text).toMatch(/export\s*\{[^}]*startFeedbackPage/);
	}, 30_000);
});
