import type { ImageMetadata, SubmissionMethod } from "../shared/history";
import {
	clientMessage,
	type ClientMessage,
	type ServerMessage,
} from "../shared/protocol";
import {
	isAwaitingFeedback,
	type CurrentSessionResponse,
	type FeedbackImage,
	type SessionStatus,
} from "../shared/types";
import type { AutoSubmitPlan } from "./auto-submit";
import type { EventChannel } from "./channel";
import type { SessionHistory } from "./history/session-history";
import { browserTimers, type Timers } from "./timers";
import type {
	ConnectionState,
	SessionChangeNotifier,
	TransportEvent,
} from "./transport/session-notifier";

/** What happens to an unsent draft when a new request replaces the old one. */
export type DraftPolicy = "discard" | "preserve";

export type ViewStatus = SessionStatus | "no_session";

export interface SessionView {
	sessionId: string;
	summary: string;
	projectDirectory: string;
}

/** Rendering surface the reconciler drives. */
export interface FeedbackView {
	showSession(session: SessionView): void;
	resetForm(options: { preserveDraft: boolean }): void;
	setStatus(status: ViewStatus, message: string): void;
	setSubmitEnabled(enabled: boolean): void;
	setConnectionState(state: ConnectionState): void;
	showError(message: string): void;
}

export interface ReconcilerOptions {
	channel: EventChannel<TransportEvent>;
	view: FeedbackView;
	draftPolicy?: DraftPolicy;
	/** Outbound path; absent or returning false means the message was not sent. */
	send?: (message: ClientMessage) => boolean;
	/** Started once the socket transport gives up. */
	fallback?: SessionChangeNotifier;
	/** Fetches the current session when only its id is known. */
	fetchCurrent?: () => Promise<CurrentSessionResponse | null>;
	history?: Pick<SessionHistory, "append" | "recordUserMessage">;
	/** Read each time a session starts waiting. */
	autoSubmit?: () => AutoSubmitPlan | null;
	timers?: Timers;
	now?: () => number;
}

interface TrackedSession {
	id: string;
	summary: string;
	projectDirectory: string;
	status: SessionStatus;
	createdAt: number;
	timeoutSeconds: number;
	recorded: boolean;
}

/**
 * The tab's state machine. Every transport writes into one channel; this is
 * its only consumer, so session changes apply in arrival order.
 */
export class Reconciler {
	private connection: ConnectionState = "disconnected";
	private session: TrackedSession | null = null;
	private detach: (() => void) | null = null;
	private cancelDeadline: (() => void) | null = null;
	private cancelAutoSubmit: (() => void) | null = null;
	private readonly draftPolicy: DraftPolicy;
	private readonly timers: Timers;
	private readonly now: () => number;

	constructor(private readonly options: ReconcilerOptions) {
		this.draftPolicy = options.draftPolicy ?? "discard";
		this.timers = options.timers ?? browserTimers;
		this.now = options.now ?? Date.now;
	}

	start(): void {
		if (this.detach) {
			return;
		}
		this.detach = this.options.channel.consume((event) => this.handle(event));
	}

	stop(): void {
		this.detach?.();
		this.detach = null;
		this.clearCountdowns();
		this.options.fallback?.stop();
	}

	get connectionState(): ConnectionState {
		return this.connection;
	}

	get sessionId(): string | null {
		return this.session?.id ?? null;
	}

	get sessionStatus(): SessionStatus | null {
		return this.session?.status ?? null;
	}

	/** Sends the human's answer for the session on screen. */
	submit(
		feedback: string,
		images: FeedbackImage[] = [],
		settings: Record<string, unknown> = {},
	): boolean {
		return this.sendFeedback(feedback, images, settings, "manual");
	}

	private sendFeedback(
		feedback: string,
		images: FeedbackImage[],
		settings: Record<string, unknown>,
		method: SubmissionMethod,
	): boolean {
		const session = this.session;
		if (!session || !isAwaitingFeedback(session.status)) {
			this.options.view.showError("There is no feedback request to answer.");
			return false;
		}
		const sent =
			this.options.send?.(
				clientMessage("submit_feedback", {
					session_id: session.id,
					feedback,
					images,
					settings,
				}),
			) ?? false;
		if (!sent) {
			this.options.view.showError("Not connected; feedback was not sent.");
			return false;
		}

		this.options.history?.recordUserMessage(session.id, {
			content: feedback,
			images: images.map(
				(image): ImageMetadata => ({
					name: image.name,
					size: image.size,
					type: image.type,
				}),
			),
			method,
		});
		this.cancelAutoSubmit?.();
		this.cancelAutoSubmit = null;
		this.options.view.setSubmitEnabled(false);
		return true;
	}

	/** The tab's own countdown ran out. */
	reportTimeout(): boolean {
		const session = this.session;
		if (!session || !isAwaitingFeedback(session.status)) {
			return false;
		}
		return (
			this.options.send?.(
				clientMessage("user_timeout", { session_id: session.id }),
			) ?? false
		);
	}

	handle(event: TransportEvent): void {
		switch (event.kind) {
			case "state":
				this.setConnection(event.state);
				return;
			case "exhausted":
				console.warn("[reconciler] Socket unavailable, switching to polling");
				this.options.fallback?.start();
				return;
			case "session":
				this.applyPolledSession(event.session);
				return;
			case "no_session":
				this.options.view.setStatus("no_session", "No active feedback request");
				return;
			case "message":
				this.applyMessage(event.message);
				return;
		}
	}

	private setConnection(state: ConnectionState): void {
		if (this.connection === "polling" && state !== "polling") {
			return;
		}
		this.connection = state;
		this.options.view.setConnectionState(state);
	}

	private applyMessage(message: ServerMessage): void {
		switch (message.type) {
			case "connection_established": {
				const sessionId = message.data.session_id;
				if (sessionId && sessionId !== this.session?.id) {
					void this.refresh();
				}
				return;
			}
			case "session_updated":
				this.adoptSession({
					id: message.data.session_id,
					summary: message.data.summary,
					projectDirectory: message.data.project_directory,
					status: "waiting",
					createdAt: Date.parse(message.data.timestamp),
					timeoutSeconds: message.data.timeout_seconds,
				});
				return;
			case "status_update": {
				const { status, session_id: sessionId } = message.data;
				if (status === "no_session") {
					this.options.view.setStatus("no_session", message.data.message);
					return;
				}
				if (sessionId && sessionId !== this.session?.id) {
					void this.refresh();
					return;
				}
				this.updateStatus(status, message.data.message);
				return;
			}
			case "feedback_received":
				if (message.data.session_id !== this.session?.id) {
					return;
				}
				this.updateStatus(message.data.status, message.data.message);
				return;
			case "error":
				this.options.view.showError(message.data.message);
				if (
					message.data.error_code === "validation_error" &&
					this.session &&
					isAwaitingFeedback(this.session.status)
				) {
					this.options.view.setSubmitEnabled(true);
				}
				return;
			case "heartbeat_response":
				return;
		}
	}

	private applyPolledSession(polled: CurrentSessionResponse): void {
		const session = this.session;
		const createdAt = Date.parse(polled.created_at);
		if (!session || polled.session_id !== session.id) {
			// A fetch that started before the last announcement can land after it.
			if (session && createdAt < session.createdAt) {
				console.warn(
					`[reconciler] Ignoring ${polled.session_id}, older than ${session.id}`,
				);
				return;
			}
			this.adoptSession({
				id: polled.session_id,
				summary: polled.summary,
				projectDirectory: polled.project_directory,
				status: polled.status,
				createdAt,
				timeoutSeconds: polled.timeout_seconds,
			});
			return;
		}
		if (polled.status !== session.status) {
			this.updateStatus(polled.status, `Request is ${polled.status}`);
		}
	}

	private adoptSession(next: Omit<TrackedSession, "recorded">): void {
		if (this.session?.id === next.id) {
			return;
		}
		const previous = this.session;
		if (previous) {
			this.record(previous, "completed");
		}
		this.clearCountdowns();

		this.session = { ...next, recorded: false };
		this.options.view.showSession({
			sessionId: next.id,
			summary: next.summary,
			projectDirectory: next.projectDirectory,
		});
		this.options.view.resetForm({
			preserveDraft: this.draftPolicy === "preserve",
		});
		this.updateStatus(next.status, statusLabel(next.status));
		if (next.status === "waiting") {
			this.startCountdowns(next.id);
		}
	}

	private updateStatus(status: SessionStatus, message: string): void {
		const session = this.session;
		if (!session) {
			return;
		}
		session.status = status;
		this.options.view.setStatus(status, message);
		this.options.view.setSubmitEnabled(status === "waiting");
		if (status !== "waiting") {
			this.clearCountdowns();
		}
		if (status === "error") {
			this.record(session, "error");
		}
	}

	private record(session: TrackedSession, status: "completed" | "error"): void {
		if (session.recorded || !this.options.history) {
			return;
		}
		session.recorded = true;
		const completedAt = this.now();
		this.options.history.append({
			session_id: session.id,
			status,
			summary: session.summary,
			project_directory: session.projectDirectory,
			created_at: session.createdAt,
			completed_at: completedAt,
			duration: Math.max(0, completedAt - session.createdAt),
			...(status === "error" ? { error_reason: "timeout" } : {}),
		});
	}

	/**
	 * The tab's own deadline reports `user_timeout`; auto-submit, when
	 * configured, answers with the saved prompt before that.
	 */
	private startCountdowns(sessionId: string): void {
		const session = this.session;
		if (!session || session.id !== sessionId) {
			return;
		}
		const deadline = session.createdAt + session.timeoutSeconds * 1000;
		this.cancelDeadline = this.timers.schedule(() => {
			this.cancelDeadline = null;
			if (this.session?.id === sessionId) {
				this.reportTimeout();
			}
		}, Math.max(0, deadline - this.now()));

		const plan = this.options.autoSubmit?.() ?? null;
		if (!plan) {
			return;
		}
		this.cancelAutoSubmit = this.timers.schedule(() => {
			this.cancelAutoSubmit = null;
			if (this.session?.id !== sessionId) {
				return;
			}
			console.log(`[reconciler] Auto-submitting prompt ${plan.promptId}`);
			this.sendFeedback(plan.message, [], {}, "auto");
		}, plan.delaySeconds * 1000);
	}

	private clearCountdowns(): void {
		this.cancelDeadline?.();
		this.cancelDeadline = null;
		this.cancelAutoSubmit?.();
		this.cancelAutoSubmit = null;
	}

	private async refresh(): Promise<void> {
		if (!this.options.fetchCurrent) {
			return;
		}
		try {
			const current = await this.options.fetchCurrent();
			if (current) {
				this.options.channel.push({ kind: "session", session: current });
			}
		} catch (error) {
			console.warn("[reconciler] Could not fetch the current session:", error);
		}
	}
}

function statusLabel(status: SessionStatus): string {
	switch (status) {
		case "waiting":
			return "Waiting for your feedback";
		case "processing":
			return "Processing feedback...";
		case "submitted":
			return "Feedback submitted";
		case "error":
			return "Feedback request timed out";
		case "completed":
			return "Feedback request completed";
	}
}
