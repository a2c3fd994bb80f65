import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import {
	persistedHistorySchema,
	type PersistedHistory,
} from "../shared/history";
import { buildApp } from "./app";
import { loadConfig, serverUrl } from "./config";
import { FeedbackService } from "./feedback/feedback-service";
import { LoggingSurfaceLauncher } from "./feedback/surface-launcher";
import { startFeedbackMcpServer } from "./mcp/feedback-tool";
import { collectSystemInfo } from "./mcp/system-info";
import { SessionArchive } from "./sessions/session-archive";
import { SessionStore } from "./sessions/session-store";
import {
	createSubmissionValidator,
	DEFAULT_SUBMISSION_LIMITS,
} from "./sessions/submission-validator";
import {
	SettingsStore,
	settingsSchema,
	type Settings,
} from "./settings/settings-store";
import { JsonStore } from "./store/json-store";
import { ConnectionRegistry } from "./websocket/connection-registry";

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
	const raw = readFileSync(
		new URL("../package.json", import.meta.url),
		"utf-8",
	);
	return packageJsonSchema.parse(JSON.parse(raw)).version;
}

async function main() {
	const config = loadConfig();
	if (config.mcpStdio) {
		// stdout carries the MCP protocol
		console.log = console.error;
	}

	const registry = new ConnectionRegistry({
		sendTimeoutMs: config.sendTimeoutMs,
		heartbeatIntervalSeconds: config.heartbeatIntervalSeconds,
	});
	const sessionStore = new SessionStore({
		registry,
		archive: new SessionArchive(config.historyLimit),
		validateSubmission: createSubmissionValidator({
			...DEFAULT_SUBMISSION_LIMITS,
			maxImageBytes: config.maxImageBytes,
		}),
		releaseResources: (session, reason) => {
			console.log(`[server] Released resources for ${session.id} (${reason})`);
		},
	});
	const settingsStore = new SettingsStore(
		new JsonStore<Settings>(
			{
				filePath: join(config.dataDir, "ui_settings.json"),
				writeDebounceMs: 500,
			},
			{},
			settingsSchema,
		),
	);
	const historyStore = new JsonStore<PersistedHistory>(
		{
			filePath: join(config.dataDir, "session_history.json"),
			writeDebounceMs: 500,
		},
		{ sessions: [], lastCleanup: 0 },
		persistedHistorySchema,
	);

	const app = await buildApp({
		sessionStore,
		registry,
		settingsStore,
		historyStore,
		logger: config.mcpStdio
			? { level: config.logLevel, stream: process.stderr }
			: { level: config.logLevel },
	});

	await app.listen({ port: config.port, host: config.host });
	registry.start();
	const url = serverUrl(config);
	console.log(`[server] Feedback relay running at ${url}`);

	const feedbackService = new FeedbackService({
		sessionStore,
		registry,
		launcher: new LoggingSurfaceLauncher(),
		url,
	});
	if (config.mcpStdio) {
		await startFeedbackMcpServer(feedbackService, readVersion(), () =>
			collectSystemInfo(url),
		);
	}

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		console.log(`\n[server] Received ${signal}, shutting down...`);
		try {
			await sessionStore.close();
			registry.closeAll();
			await Promise.all([settingsStore.store.flush(), historyStore.flush()]);
			await app.close();
			process.exit(0);
		} catch (error) {
			console.error("[server] Shutdown failed:", error);
			process.exit(1);
		}
	};

	process.on("SIGINT", () => {
		void shutdown("SIGINT");
	});
	process.on("SIGTERM", () => {
		void shutdown("SIGTERM");
	});
}

main().catch((err) => {
	console.error("Failed to start server:", err);
	process.exit(1);
});
