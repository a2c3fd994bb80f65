import fastifyStatic from "@fastify/static";
import fastifyWebsocket from "@fastify/websocket";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { fileURLToPath } from "node:url";
import type { PersistedHistory } from "../shared/history";
import { registerSessionRoutes } from "./api/session/routes";
import { createSessionService } from "./api/session/session-service";
import type { SessionStore } from "./sessions/session-store";
import type { SettingsStore } from "./settings/settings-store";
import type { JsonStore } from "./store/json-store";
import { handleWebSocket } from "./websocket";
import type { ConnectionRegistry } from "./websocket/connection-registry";
import { adaptWebSocket } from "./websocket/socket-adapter";

const PUBLIC_DIR = fileURLToPath(new URL("../public", import.meta.url));

export interface AppDeps {
	sessionStore: SessionStore;
	registry: ConnectionRegistry;
	settingsStore: SettingsStore;
	historyStore: JsonStore<PersistedHistory>;
	logger?: FastifyServerOptions["logger"];
	/** Serve the page shell from public/. Off in tests. */
	serveStatic?: boolean;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
	const app = Fastify({ logger: deps.logger ?? false });

	if (deps.serveStatic ?? true) {
		await app.register(fastifyStatic, { root: PUBLIC_DIR, prefix: "/" });
	}

	await app.register(fastifyWebsocket);

	app.get("/ws", { websocket: true }, (socket) => {
		handleWebSocket(adaptWebSocket(socket), {
			registry: deps.registry,
			sessionStore: deps.sessionStore,
			settingsStore: deps.settingsStore,
		});
	});

	await registerSessionRoutes(app, {
		sessionService: createSessionService({ sessionStore: deps.sessionStore }),
		settingsStore: deps.settingsStore,
		historyStore: deps.historyStore,
	});

	return app;
}
