import type { HistoryEntry } from "../../../shared/history";
import {
	isAwaitingFeedback,
	isFinalStatus,
	type CurrentSessionResponse,
	type SessionStatusResponse,
} from "../../../shared/types";
import type { SessionStore } from "../../sessions/session-store";
import type { SessionSnapshot } from "../../sessions/session-types";

export interface SessionService {
	/** null when no request has been made since start-up */
	getCurrentSession(): CurrentSessionResponse | null;
	getSessionStatus(): SessionStatusResponse;
	listArchived(): HistoryEntry[];
}

export interface SessionServiceDeps {
	sessionStore: Pick<SessionStore, "getCurrent" | "listArchived">;
}

export function toHistoryEntry(snapshot: SessionSnapshot): HistoryEntry | null {
	if (!isFinalStatus(snapshot.status) || snapshot.completedAt === null) {
		return null;
	}
	return {
		session_id: snapshot.id,
		status: snapshot.status,
		summary: snapshot.summary,
		project_directory: snapshot.projectDirectory,
		created_at: snapshot.createdAt,
		completed_at: snapshot.completedAt,
		duration: Math.max(0, snapshot.completedAt - snapshot.createdAt),
		...(snapshot.errorReason ? { error_reason: snapshot.errorReason } : {}),
	};
}

class StoreSessionService implements SessionService {
	constructor(private readonly deps: SessionServiceDeps) {}

	getCurrentSession(): CurrentSessionResponse | null {
		const session = this.deps.sessionStore.getCurrent();
		if (!session) {
			return null;
		}
		return {
			session_id: session.id,
			status: session.status,
			summary: session.summary,
			project_directory: session.projectDirectory,
			created_at: new Date(session.createdAt).toISOString(),
			timeout_seconds: session.timeoutSeconds,
		};
	}

	getSessionStatus(): SessionStatusResponse {
		const session = this.deps.sessionStore.getCurrent();
		if (!session) {
			return {
				has_session: false,
				status: "no_session",
				message: "No active feedback request",
			};
		}
		return {
			has_session: true,
			status: session.status,
			session_info: {
				session_id: session.id,
				project_directory: session.projectDirectory,
				summary: session.summary,
				feedback_completed: !isAwaitingFeedback(session.status),
				connection_count: session.connectionIds.length,
			},
		};
	}

	listArchived(): HistoryEntry[] {
		const entries: HistoryEntry[] = [];
		for (const snapshot of this.deps.sessionStore.listArchived()) {
			const entry = toHistoryEntry(snapshot);
			if (entry) {
				entries.push(entry);
			}
		}
		return entries;
	}
}

export function createSessionService(deps: SessionServiceDeps): SessionService {
	return new StoreSessionService(deps);
}
