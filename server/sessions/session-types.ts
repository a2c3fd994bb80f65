import type { FeedbackImage, SessionStatus } from "../../shared/types";

/** Why a session ended in `error`. */
export type SessionErrorReason = "timeout";

/**
 * Read-only view of a session handed to everything outside the store.
 * The store is the only writer; readers never see a mutable handle.
 */
export interface SessionSnapshot {
	readonly id: string;
	readonly status: SessionStatus;
	readonly summary: string;
	readonly projectDirectory: string;
	readonly timeoutSeconds: number;
	/** epoch ms */
	readonly createdAt: number;
	/** epoch ms, set when the session reaches `completed` or `error` */
	readonly completedAt: number | null;
	readonly feedbackText: string | null;
	readonly images: readonly FeedbackImage[];
	readonly settings: Readonly<Record<string, unknown>>;
	readonly errorReason: SessionErrorReason | null;
	/** Connections attached when the snapshot was taken. */
	readonly connectionIds: readonly string[];
}

export interface CreateSessionInput {
	summary: string;
	projectDirectory: string;
	timeoutSeconds: number;
}

export interface SubmissionInput {
	feedbackText: string;
	images: FeedbackImage[];
	settings: Record<string, unknown>;
}

/**
 * Forward-only transitions. A waiting or processing session that is replaced
 * before anyone answers goes straight to `completed`.
 */
const ALLOWED_TRANSITIONS: Readonly<
	Record<SessionStatus, readonly SessionStatus[]>
> = {
	waiting: ["processing", "error", "completed"],
	processing: ["submitted", "error", "completed"],
	submitted: ["completed"],
	error: [],
	completed: [],
};

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
	return ALLOWED_TRANSITIONS[from].includes(to);
}

/** Called when a session times out so collaborators can free what they hold. */
export type ResourceReleaser = (
	session: SessionSnapshot,
	reason: SessionErrorReason,
) => void | Promise<void>;

const STATUS_MESSAGES: Readonly<Record<SessionStatus, string>> = {
	waiting: "Waiting for feedback",
	processing: "Processing feedback...",
	submitted: "Feedback submitted",
	error: "Feedback request timed out",
	completed: "Feedback request completed",
};

export function describeStatus(status: SessionStatus): string {
	return STATUS_MESSAGES[status];
}
