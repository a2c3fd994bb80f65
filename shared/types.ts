import type { FeedbackImage } from "./protocol";

export type { FeedbackImage } from "./protocol";

export const SESSION_STATUSES = [
	"waiting",
	"processing",
	"submitted",
	"error",
	"completed",
] as const;

/** waiting -> processing -> submitted -> completed, or waiting|processing -> error */
export type SessionStatus = (typeof SESSION_STATUSES)[number];

/** Statuses that make a session "the active session". At most one exists. */
export type ActiveSessionStatus = Extract<
	SessionStatus,
	"waiting" | "processing" | "submitted"
>;

export type FinalSessionStatus = Extract<SessionStatus, "error" | "completed">;

export function isActiveStatus(
	status: SessionStatus,
): status is ActiveSessionStatus {
	return (
		status === "waiting" || status === "processing" || status === "submitted"
	);
}

/** A submission is still accepted in these statuses. */
export function isAwaitingFeedback(status: SessionStatus): boolean {
	return status === "waiting" || status === "processing";
}

export function isFinalStatus(
	status: SessionStatus,
): status is FinalSessionStatus {
	return status === "error" || status === "completed";
}

/** What the agent's blocked call receives once the human answers. */
export interface FeedbackResult {
	feedbackText: string;
	images: FeedbackImage[];
}

/** Body of `GET /api/current-session`, also the poll transport's payload. */
export interface CurrentSessionResponse {
	session_id: string;
	status: SessionStatus;
	summary: string;
	project_directory: string;
	/** ISO 8601 UTC */
	created_at: string;
	timeout_seconds: number;
}

/** Body of `GET /api/session-status`. */
export type SessionStatusResponse =
	| { has_session: false; status: "no_session"; message: string }
	| {
			has_session: true;
			status: SessionStatus;
			session_info: {
				session_id: string;
				project_directory: string;
				summary: string;
				feedback_completed: boolean;
				connection_count: number;
			};
	  };
