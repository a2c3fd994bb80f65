/**
 * Application-level error with a machine-readable code.
 * The code is what crosses the wire as `error_code`.
 */
export class AppError extends Error {
	public readonly code: string;

	constructor(code: string, message: string) {
		super(message);
		this.name = "AppError";
		this.code = code;
	}
}

/** Malformed submission, rejected before any state mutation. */
export class ValidationError extends AppError {
	public readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super("validation_error", message);
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Submission against a session the agent has since replaced. */
export class StaleSessionError extends AppError {
	public readonly sessionId: string;

	constructor(sessionId: string) {
		super("stale_session", `Session ${sessionId} is no longer active`);
		this.name = "StaleSessionError";
		this.sessionId = sessionId;
	}
}

export class AlreadySubmittedError extends AppError {
	public readonly sessionId: string;

	constructor(sessionId: string) {
		super(
			"already_submitted",
			`Feedback for session ${sessionId} was already submitted`,
		);
		this.name = "AlreadySubmittedError";
		this.sessionId = sessionId;
	}
}

/** A pending wait cancelled because a newer request replaced its session. */
export class SupersededError extends AppError {
	public readonly sessionId: string;
	public readonly replacedBy: string | null;

	constructor(sessionId: string, replacedBy: string | null) {
		super(
			"superseded",
			replacedBy
				? `Session ${sessionId} was replaced by ${replacedBy}`
				: `Session ${sessionId} was closed`,
		);
		this.name = "SupersededError";
		this.sessionId = sessionId;
		this.replacedBy = replacedBy;
	}
}

export class TimeoutError extends AppError {
	public readonly sessionId: string;
	public readonly timeoutSeconds: number;

	constructor(sessionId: string, timeoutSeconds: number) {
		super(
			"timeout",
			`Timed out after ${timeoutSeconds}s waiting for feedback on session ${sessionId}`,
		);
		this.name = "TimeoutError";
		this.sessionId = sessionId;
		this.timeoutSeconds = timeoutSeconds;
	}
}

/** Transport-level failure. Recovered by the client, never surfaced to the agent. */
export class ConnectionError extends AppError {
	constructor(message: string) {
		super("connection_error", message);
		this.name = "ConnectionError";
	}
}

export type SubmitError =
	| ValidationError
	| StaleSessionError
	| AlreadySubmittedError;

export type WaitError = StaleSessionError | SupersededError | TimeoutError;

/** Shown to the human when a submission targets a request that is gone. */
export const INACTIVE_REQUEST_MESSAGE =
	"This feedback request is no longer active.";

export function toErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}

	return "Internal error";
}
