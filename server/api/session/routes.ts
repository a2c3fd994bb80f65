import type { FastifyError, FastifyInstance } from "fastify";
import type { z } from "zod";
import { AppError, ValidationError } from "../../../shared/errors";
import {
	persistedHistorySchema,
	type PersistedHistory,
} from "../../../shared/history";
import { settingsSchema, type SettingsStore } from "../../settings/settings-store";
import type { JsonStore } from "../../store/json-store";
import type { SessionService } from "./session-service";

export interface SessionRoutesDeps {
	sessionService: SessionService;
	settingsStore: SettingsStore;
	historyStore: JsonStore<PersistedHistory>;
}

const HTTP_STATUS_BY_CODE: Readonly<Record<string, number>> = {
	validation_error: 400,
	stale_session: 409,
	already_submitted: 409,
	not_found: 404,
};

function parseBody<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	body: unknown,
): T {
	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		throw new ValidationError(
			"Invalid request body",
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".") || "body"}: ${issue.message}`,
			),
		);
	}
	return parsed.data;
}

export async function registerSessionRoutes(
	app: FastifyInstance,
	deps: SessionRoutesDeps,
): Promise<void> {
	app.setErrorHandler<FastifyError>((error, request, reply) => {
		if (error instanceof AppError) {
			const status = HTTP_STATUS_BY_CODE[error.code] ?? 500;
			request.log.warn({ code: error.code }, error.message);
			return reply.status(status).send({
				status: "error",
				code: error.code,
				message: error.message,
				...(error instanceof ValidationError ? { issues: error.issues } : {}),
			});
		}
		request.log.error(error);
		return reply
			.status(error.statusCode ?? 500)
			.send({ status: "error", message: error.message });
	});

	app.get("/api/current-session", async (_request, reply) => {
		const session = deps.sessionService.getCurrentSession();
		if (!session) {
			return reply.status(404).send({ error: "No active session" });
		}
		return session;
	});

	app.get("/api/session-status", async () =>
		deps.sessionService.getSessionStatus(),
	);

	app.get("/api/sessions/archive", async () => ({
		sessions: deps.sessionService.listArchived(),
	}));

	app.get("/api/load-settings", async () => deps.settingsStore.load());

	app.post("/api/save-settings", async (request) => {
		const settings = parseBody(settingsSchema, request.body);
		await deps.settingsStore.save(settings);
		return { status: "success", message: "Settings saved" };
	});

	app.post("/api/clear-settings", async () => {
		await deps.settingsStore.clear();
		return { status: "success", message: "Settings cleared" };
	});

	app.get("/api/load-session-history", async () => deps.historyStore.read());

	app.post("/api/save-session-history", async (request) => {
		const history = parseBody(persistedHistorySchema, request.body);
		await deps.historyStore.write(history);
		return {
			status: "success",
			message: `Session history saved (${history.sessions.length} sessions)`,
		};
	});
}
