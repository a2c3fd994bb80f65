import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
	CallToolRequestSchema,
	ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { toErrorMessage } from "../../shared/errors";
import type { FeedbackImage, FeedbackResult } from "../../shared/types";
import {
	DEFAULT_TIMEOUT_SECONDS,
	MAX_TIMEOUT_SECONDS,
	MIN_TIMEOUT_SECONDS,
} from "../config";
import type { FeedbackService } from "../feedback/feedback-service";
import type { SystemInfo } from "./system-info";

export const FEEDBACK_TOOL_NAME = "interactive_feedback";
export const SYSTEM_INFO_TOOL_NAME = "get_system_info";

export const NO_FEEDBACK_TEXT = "The user provided no feedback.";

const DEFAULT_SUMMARY = "I have completed the task you requested.";

export const feedbackToolArgsSchema = z.object({
	project_directory: z.string().min(1).default("."),
	summary: z.string().min(1).default(DEFAULT_SUMMARY),
	timeout: z
		.number()
		.int()
		.min(MIN_TIMEOUT_SECONDS)
		.max(MAX_TIMEOUT_SECONDS)
		.default(DEFAULT_TIMEOUT_SECONDS),
});

export const FEEDBACK_TOOL_DEFINITION = {
	name: FEEDBACK_TOOL_NAME,
	description:
		"Show a work summary to the human operator and wait for their feedback (text and images).",
	inputSchema: {
		type: "object",
		properties: {
			project_directory: {
				type: "string",
				description: "Project directory the work happened in",
				default: ".",
			},
			summary: {
				type: "string",
				description: "Summary of the work done so far",
				default: DEFAULT_SUMMARY,
			},
			timeout: {
				type: "integer",
				description: "Seconds to wait for feedback",
				minimum: MIN_TIMEOUT_SECONDS,
				maximum: MAX_TIMEOUT_SECONDS,
				default: DEFAULT_TIMEOUT_SECONDS,
			},
		},
	},
} as const;

export const SYSTEM_INFO_TOOL_DEFINITION = {
	name: SYSTEM_INFO_TOOL_NAME,
	description:
		"Report the host platform, Node.js version, remote-session detection and the feedback page URL as JSON.",
	inputSchema: { type: "object", properties: {} },
} as const;

type ToolContent =
	| { type: "text"; text: string }
	| { type: "image"; data: string; mimeType: string };

export type ToolResponse = {
	content: ToolContent[];
	isError?: boolean;
};

export function formatByteSize(bytes: number): string {
	if (bytes < 1024) {
		return `${bytes} B`;
	}
	if (bytes < 1024 * 1024) {
		return `${(bytes / 1024).toFixed(1)} KB`;
	}
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function describeImages(images: FeedbackImage[]): string {
	const lines = images.map(
		(image, index) =>
			`${index + 1}. ${image.name} (${image.type}, ${formatByteSize(image.size)})`,
	);
	return [
		"=== Image Summary ===",
		`User provided ${images.length} image(s):`,
		...lines,
	].join("\n");
}

export function formatFeedback(result: FeedbackResult): ToolResponse {
	const sections: string[] = [];
	if (result.feedbackText.trim() !== "") {
		sections.push(`=== User Feedback ===\n${result.feedbackText}`);
	}
	if (result.images.length > 0) {
		sections.push(describeImages(result.images));
	}
	return {
		content: [
			{
				type: "text",
				text: sections.length > 0 ? sections.join("\n\n") : NO_FEEDBACK_TEXT,
			},
			...result.images.map(
				(image): ToolContent => ({
					type: "image",
					data: image.data,
					mimeType: image.type,
				}),
			),
		],
	};
}

function errorResponse(message: string): ToolResponse {
	return { content: [{ type: "text", text: `Error: ${message}` }], isError: true };
}

export interface WorkingDirectory {
	cwd: () => string;
	exists: (path: string) => boolean;
}

const processDirectory: WorkingDirectory = {
	cwd: () => process.cwd(),
	exists: existsSync,
};

/** Absolute path; a directory that does not exist falls back to the cwd. */
export function resolveProjectDirectory(
	directory: string,
	fs: WorkingDirectory = processDirectory,
): string {
	const cwd = fs.cwd();
	const absolute = resolve(cwd, directory);
	return fs.exists(absolute) ? absolute : cwd;
}

export async function handleFeedbackToolCall(
	service: Pick<FeedbackService, "requestFeedback">,
	rawArgs: unknown,
	fs: WorkingDirectory = processDirectory,
): Promise<ToolResponse> {
	const args = feedbackToolArgsSchema.safeParse(rawArgs ?? {});
	if (!args.success) {
		return errorResponse(
			args.error.issues
				.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
				.join("; "),
		);
	}

	const outcome = await service.requestFeedback({
		summary: args.data.summary,
		projectDirectory: resolveProjectDirectory(args.data.project_directory, fs),
		timeoutSeconds: args.data.timeout,
	});
	if (!outcome.ok) {
		return errorResponse(outcome.error.message);
	}
	return formatFeedback(outcome.value);
}

export function createFeedbackMcpServer(
	service: Pick<FeedbackService, "requestFeedback">,
	version: string,
	systemInfo: () => SystemInfo,
): Server {
	const server = new Server(
		{ name: "feedback-relay", version },
		{ capabilities: { tools: {} } },
	);

	server.setRequestHandler(ListToolsRequestSchema, async () => ({
		tools: [FEEDBACK_TOOL_DEFINITION, SYSTEM_INFO_TOOL_DEFINITION],
	}));

	server.setRequestHandler(CallToolRequestSchema, async (request) => {
		const { name, arguments: args } = request.params;
		if (name === SYSTEM_INFO_TOOL_NAME) {
			return {
				content: [{ type: "text", text: JSON.stringify(systemInfo(), null, 2) }],
			};
		}
		if (name !== FEEDBACK_TOOL_NAME) {
			return errorResponse(`Unknown tool: ${name}`);
		}
		try {
			return await handleFeedbackToolCall(service, args);
		} catch (error) {
			console.error("[mcp] Tool call failed:", error);
			return errorResponse(toErrorMessage(error));
		}
	});

	return server;
}

/** Serves the tool over stdio. stdout then belongs to the protocol. */
export async function startFeedbackMcpServer(
	service: Pick<FeedbackService, "requestFeedback">,
	version: string,
	systemInfo: () => SystemInfo,
): Promise<Server> {
	const server = createFeedbackMcpServer(service, version, systemInfo);
	await server.connect(new StdioServerTransport());
	console.error("[mcp] interactive_feedback tool listening on stdio");
	return server;
}
