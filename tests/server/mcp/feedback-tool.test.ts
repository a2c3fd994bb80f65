import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { describe, expect, it, vi } from "vitest";
import { TimeoutError } from "../../../shared/errors";
import type {
	FeedbackOutcome,
	FeedbackRequest,
} from "../../../server/feedback/feedback-service";
import {
	createFeedbackMcpServer,
	formatByteSize,
	formatFeedback,
	handleFeedbackToolCall,
	NO_FEEDBACK_TEXT,
	resolveProjectDirectory,
} from "../../../server/mcp/feedback-tool";
import type { SystemInfo } from "../../../server/mcp/system-info";

function serviceReturning(outcome: FeedbackOutcome) {
	const requestFeedback = vi.fn<(request: FeedbackRequest) => Promise<FeedbackOutcome>>(
		async () => outcome,
	);
	return { requestFeedback };
}

describe("interactive_feedback tool", () => {
	it("applies defaults to missing arguments", async () => {
		const service = serviceReturning({
			ok: true,
			value: { feedbackText: "ok", images: [] },
		});

		await handleFeedbackToolCall(service, undefined);

		expect(service.requestFeedback).toHaveBeenCalledWith({
			summary: "I have completed the task you requested.",
			projectDirectory: process.cwd(),
			timeoutSeconds: 600,
		});
	});

	it("returns the feedback text followed by one part per image", async () => {
		const service = serviceReturning({
			ok: true,
			value: {
				feedbackText: "Button is misaligned",
				images: [
					{ name: "before.png", data: "aGk=", size: 2048, type: "image/png" },
				],
			},
		});

		const response = await handleFeedbackToolCall(service, {
			project_directory: "/work/ui",
			summary: "Restyled the toolbar",
			timeout: 120,
		});

		expect(response).toEqual({
			content: [
				{
					type: "text",
					text: [
						"=== User Feedback ===",
						"Button is misaligned",
						"",
						"=== Image Summary ===",
						"User provided 1 image(s):",
						"1. before.png (image/png, 2.0 KB)",
					].join("\n"),
				},
				{ type: "image", data: "aGk=", mimeType: "image/png" },
			],
		});
	});

	it("reports a timeout as a tool error", async () => {
		const service = serviceReturning({
			ok: false,
			error: new TimeoutError("s1", 120),
		});

		const response = await handleFeedbackToolCall(service, { timeout: 120 });

		expect(response).toEqual({
			content: [
				{
					type: "text",
					text: "Error: Timed out after 120s waiting for feedback on session s1",
				},
			],
			isError: true,
		});
	});

	it("rejects a timeout outside the allowed range", async () => {
		const service = serviceReturning({
			ok: true,
			value: { feedbackText: "", images: [] },
		});

		const response = await handleFeedbackToolCall(service, { timeout: 5 });

		expect(response.isError).toBe(true);
		expect(service.requestFeedback).not.toHaveBeenCalled();
	});

	it("formats byte sizes", () => {
		expect(formatByteSize(512)).toBe("512 B");
		expect(formatByteSize(1536)).toBe("1.5 KB");
		expect(formatByteSize(3 * 1024 * 1024)).toBe("3.0 MB");
	});

	it("says so when the user sent neither text nor images", () => {
		expect(formatFeedback({ feedbackText: "  ", images: [] })).toEqual({
			content: [{ type: "text", text: NO_FEEDBACK_TEXT }],
		});
	});

	it("returns only the image summary when the text is empty", () => {
		const response = formatFeedback({
			feedbackText: "",
			images: [{ name: "a.jpg", data: "eA==", size: 100, type: "image/jpeg" }],
		});

		expect(response.content[0]).toEqual({
			type: "text",
			text: [
				"=== Image Summary ===",
				"User provided 1 image(s):",
				"1. a.jpg (image/jpeg, 100 B)",
			].join("\n"),
		});
	});
});

describe("resolveProjectDirectory", () => {
	const fs = {
		cwd: () => "/work",
		exists: (path: string) => path === "/work" || path === "/work/app",
	};

	it("resolves a relative directory against the cwd", () => {
		expect(resolveProjectDirectory("app", fs)).toBe("/work/app");
		expect(resolveProjectDirectory(".", fs)).toBe("/work");
	});

	it("keeps an absolute directory that exists", () => {
		expect(resolveProjectDirectory("/work/app", fs)).toBe("/work/app");
	});

	it("falls back to the cwd for a directory that does not exist", () => {
		expect(resolveProjectDirectory("/nowhere", fs)).toBe("/work");
		expect(resolveProjectDirectory("missing", fs)).toBe("/work");
	});

	it("passes the resolved directory on to the feedback request", async () => {
		const service = serviceReturning({
			ok: true,
			value: { feedbackText: "ok", images: [] },
		});

		await handleFeedbackToolCall(service, { project_directory: "gone" }, fs);

		expect(service.requestFeedback).toHaveBeenCalledWith(
			expect.objectContaining({ projectDirectory: "/work" }),
		);
	});
});

describe("feedback MCP server", () => {
	const info: SystemInfo = {
		platform: "linux",
		architecture: "x64",
		node_version: "v20.11.0",
		remote_environment: true,
		gui_available: false,
		recommended_interface: "remote browser",
		feedback_url: "http://127.0.0.1:8765",
		environment: {
			SSH_CONNECTION: null,
			SSH_CLIENT: null,
			DISPLAY: null,
			VSCODE_INJECTION: null,
			SESSIONNAME: null,
		},
	};

	async function connectedClient() {
		const service = serviceReturning({
			ok: true,
			value: { feedbackText: "ok", images: [] },
		});
		const server = createFeedbackMcpServer(service, "1.0.0", () => info);
		const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
		await server.connect(serverTransport);
		const client = new Client({ name: "test-agent", version: "1.0.0" });
		await client.connect(clientTransport);
		return { client, server };
	}

	it("lists both tools", async () => {
		const { client, server } = await connectedClient();

		const { tools } = await client.listTools();

		expect(tools.map((tool) => tool.name)).toEqual([
			"interactive_feedback",
			"get_system_info",
		]);
		await client.close();
		await server.close();
	});

	it("answers get_system_info with the host details as JSON", async () => {
		const { client, server } = await connectedClient();

		const result = await client.callTool({ name: "get_system_info", arguments: {} });

		expect(result.content).toEqual([
			{ type: "text", text: JSON.stringify(info, null, 2) },
		]);
		await client.close();
		await server.close();
	});

	it("rejects an unknown tool", async () => {
		const { client, server } = await connectedClient();

		const result = await client.callTool({ name: "open_browser", arguments: {} });

		expect(result).toEqual({
			content: [{ type: "text", text: "Error: Unknown tool: open_browser" }],
			isError: true,
		});
		await client.close();
		await server.close();
	});
});
