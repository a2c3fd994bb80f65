import {
	INACTIVE_REQUEST_MESSAGE,
	ValidationError,
	toErrorMessage,
} from "../shared/errors";
import {
	decodeClientMessage,
	serverMessage,
	type ClientMessage,
	type ServerMessage,
} from "../shared/protocol";
import type { SessionStore } from "./sessions/session-store";
import { describeStatus } from "./sessions/session-types";
import type { SettingsStore } from "./settings/settings-store";
import type { ConnectionRegistry } from "./websocket/connection-registry";
import type { RelaySocket } from "./websocket/socket-adapter";

export interface WebSocketDeps {
	registry: Pick<
		ConnectionRegistry,
		"register" | "unregister" | "touch" | "sendTo"
	>;
	sessionStore: Pick<SessionStore, "getCurrent" | "submitFeedback" | "expire">;
	settingsStore?: Pick<SettingsStore, "update">;
}

function currentStatusMessage(
	sessionStore: WebSocketDeps["sessionStore"],
): ServerMessage {
	const session = sessionStore.getCurrent();
	if (!session) {
		return serverMessage("status_update", {
			status: "no_session",
			message: "No active feedback request",
		});
	}
	return serverMessage("status_update", {
		status: session.status,
		message: describeStatus(session.status),
		session_id: session.id,
		...(session.errorReason ? { reason: session.errorReason } : {}),
	});
}

/**
 * WebSocket connection handler.
 * Registers the tab with the hub, greets it with the current session and
 * routes its messages to the session store.
 *
 * Returns the connection id.
 */
export function handleWebSocket(
	socket: RelaySocket,
	deps: WebSocketDeps,
): string {
	const { id: connectionId } = deps.registry.register(socket);
	console.log(`[ws] Client connected (${connectionId})`);

	const reply = (message: ServerMessage) => {
		void deps.registry.sendTo(connectionId, message);
	};

	const current = deps.sessionStore.getCurrent();
	const now = new Date();
	reply(
		serverMessage(
			"connection_established",
			{ session_id: current?.id ?? null, server_time: now.toISOString() },
			now,
		),
	);
	if (current) {
		reply(currentStatusMessage(deps.sessionStore));
	}

	socket.onMessage((text) => {
		void handleIncomingMessage(text, deps, connectionId, reply);
	});

	socket.onClose(() => {
		deps.registry.unregister(connectionId);
		console.log(`[ws] Client disconnected (${connectionId})`);
	});

	socket.onError((error) => {
		console.error(`[ws] Socket error (${connectionId}):`, error.message);
	});

	return connectionId;
}

async function handleIncomingMessage(
	text: string,
	deps: WebSocketDeps,
	connectionId: string,
	reply: (message: ServerMessage) => void,
): Promise<void> {
	const decoded = decodeClientMessage(text);
	if (decoded.kind === "unknown") {
		console.log(`[ws] Ignoring unknown message type: ${decoded.type}`);
		return;
	}
	if (decoded.kind === "invalid") {
		reply(
			serverMessage("error", {
				error_code: "invalid_message",
				message: decoded.reason,
			}),
		);
		return;
	}

	try {
		await routeMessage(decoded.message, deps, connectionId, reply);
	} catch (error) {
		console.error("[ws] Failed to handle message:", error);
		reply(
			serverMessage("error", {
				error_code: "internal_error",
				message: toErrorMessage(error),
			}),
		);
	}
}

async function routeMessage(
	message: ClientMessage,
	deps: WebSocketDeps,
	connectionId: string,
	reply: (message: ServerMessage) => void,
): Promise<void> {
	switch (message.type) {
		case "submit_feedback": {
			const sessionId =
				message.data.session_id ?? deps.sessionStore.getCurrent()?.id;
			if (!sessionId) {
				reply(
					serverMessage("error", {
						error_code: "no_session",
						message: INACTIVE_REQUEST_MESSAGE,
					}),
				);
				return;
			}

			const result = await deps.sessionStore.submitFeedback(
				sessionId,
				message.data.feedback,
				message.data.images,
				message.data.settings,
			);
			if (result.ok) {
				return;
			}
			const { error } = result;
			if (error instanceof ValidationError) {
				reply(
					serverMessage("error", {
						error_code: error.code,
						message: error.message,
						details: { issues: error.issues },
					}),
				);
				return;
			}
			console.warn(`[ws] Rejected submission for ${sessionId}: ${error.code}`);
			reply(
				serverMessage("error", {
					error_code: error.code,
					message: INACTIVE_REQUEST_MESSAGE,
					details: { session_id: sessionId },
				}),
			);
			return;
		}

		case "heartbeat": {
			deps.registry.touch(connectionId);
			reply(
				serverMessage("heartbeat_response", {
					timestamp: message.data.timestamp,
				}),
			);
			return;
		}

		case "language_switch": {
			if (deps.settingsStore) {
				await deps.settingsStore.update({ language: message.data.language });
			}
			console.log(`[ws] Language switched to ${message.data.language}`);
			return;
		}

		case "get_status": {
			reply(currentStatusMessage(deps.sessionStore));
			return;
		}

		case "user_timeout": {
			const sessionId =
				message.data.session_id ?? deps.sessionStore.getCurrent()?.id;
			if (!sessionId) {
				return;
			}
			const expired = await deps.sessionStore.expire(sessionId);
			console.log(
				`[ws] Client reported timeout for ${sessionId}${expired ? "" : " (ignored)"}`,
			);
			return;
		}
	}
}
