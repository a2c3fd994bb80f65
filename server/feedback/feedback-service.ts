import {
	ValidationError,
	toErrorMessage,
	type WaitError,
} from "../../shared/errors";
import { err, type Result } from "../../shared/result";
import type { FeedbackResult } from "../../shared/types";
import { DEFAULT_TIMEOUT_SECONDS } from "../config";
import type { SessionStore } from "../sessions/session-store";
import type { ConnectionRegistry } from "../websocket/connection-registry";
import type { SurfaceLauncher } from "./surface-launcher";

export interface FeedbackRequest {
	summary: string;
	projectDirectory: string;
	timeoutSeconds?: number;
}

export type FeedbackOutcome = Result<
	FeedbackResult,
	WaitError | ValidationError
>;

export interface FeedbackServiceDeps {
	sessionStore: Pick<SessionStore, "createOrReplace" | "waitForSubmission">;
	registry: Pick<ConnectionRegistry, "size">;
	launcher: SurfaceLauncher;
	url: string;
}

/**
 * The agent's entry point: publish a request, make sure someone can see it,
 * then block until it is answered, replaced or expires.
 */
export class FeedbackService {
	constructor(private readonly deps: FeedbackServiceDeps) {}

	async requestFeedback(request: FeedbackRequest): Promise<FeedbackOutcome> {
		const timeoutSeconds = request.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;

		let sessionId: string;
		try {
			sessionId = await this.deps.sessionStore.createOrReplace({
				summary: request.summary,
				projectDirectory: request.projectDirectory,
				timeoutSeconds,
			});
		} catch (error) {
			if (error instanceof ValidationError) {
				return err(error);
			}
			throw error;
		}

		if (this.deps.registry.size === 0) {
			try {
				await this.deps.launcher.open(this.deps.url);
			} catch (error) {
				console.warn(
					"[feedback] Could not open the feedback page:",
					toErrorMessage(error),
				);
			}
		}

		return this.deps.sessionStore.waitForSubmission(sessionId, timeoutSeconds);
	}
}
