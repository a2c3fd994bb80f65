import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

const BoolEnv = z.preprocess((value) => {
	if (typeof value !== "string") return value;
	const normalized = value.trim().toLowerCase();
	if (["1", "true", "yes", "on"].includes(normalized)) return true;
	if (["0", "false", "no", "off"].includes(normalized)) return false;
	return value;
}, z.boolean());

/** Bounds for any timeout a user or agent configures. */
export const MIN_TIMEOUT_SECONDS = 30;
export const MAX_TIMEOUT_SECONDS = 7200;
export const DEFAULT_TIMEOUT_SECONDS = 600;

const ConfigSchema = z.object({
	host: z.string().default("127.0.0.1"),
	port: z.coerce.number().int().min(0).max(65535).default(8765),
	defaultTimeoutSeconds: z.coerce
		.number()
		.int()
		.min(MIN_TIMEOUT_SECONDS)
		.max(MAX_TIMEOUT_SECONDS)
		.default(DEFAULT_TIMEOUT_SECONDS),
	heartbeatIntervalSeconds: z.coerce.number().int().min(1).default(60),
	sendTimeoutMs: z.coerce.number().int().min(100).default(5_000),
	historyLimit: z.coerce.number().int().min(1).max(100).default(10),
	maxImageBytes: z.coerce
		.number()
		.int()
		.min(0)
		.default(1024 * 1024),
	dataDir: z.string().default(join(homedir(), ".config", "feedback-relay")),
	mcpStdio: BoolEnv.default(false),
	logLevel: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace"])
		.default("info"),
});

export type RelayConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
	return ConfigSchema.parse({
		host: env.FEEDBACK_HOST,
		port: env.FEEDBACK_PORT,
		defaultTimeoutSeconds: env.FEEDBACK_TIMEOUT_SECONDS,
		heartbeatIntervalSeconds: env.FEEDBACK_HEARTBEAT_SECONDS,
		sendTimeoutMs: env.FEEDBACK_SEND_TIMEOUT_MS,
		historyLimit: env.FEEDBACK_HISTORY_LIMIT,
		maxImageBytes: env.FEEDBACK_MAX_IMAGE_BYTES,
		dataDir: env.FEEDBACK_DATA_DIR,
		mcpStdio: env.FEEDBACK_MCP_STDIO,
		logLevel: env.FEEDBACK_LOG_LEVEL,
	});
}

export function serverUrl(config: Pick<RelayConfig, "host" | "port">): string {
	return `http://${config.host}:${config.port}`;
}
