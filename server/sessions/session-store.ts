import { randomUUID } from "node:crypto";
import {
	AlreadySubmittedError,
	AppError,
	StaleSessionError,
	SupersededError,
	TimeoutError,
	ValidationError,
	toErrorMessage,
	type SubmitError,
	type WaitError,
} from "../../shared/errors";
import { serverMessage } from "../../shared/protocol";
import { err, ok, type Result } from "../../shared/result";
import {
	isActiveStatus,
	isAwaitingFeedback,
	type FeedbackImage,
	type FeedbackResult,
	type SessionStatus,
} from "../../shared/types";
import type { ConnectionRegistry } from "../websocket/connection-registry";
import { Mutex } from "./mutex";
import { SessionArchive } from "./session-archive";
import {
	canTransition,
	describeStatus,
	type CreateSessionInput,
	type ResourceReleaser,
	type SessionErrorReason,
	type SessionSnapshot,
	type SubmissionInput,
} from "./session-types";
import {
	createSubmissionValidator,
	type SubmissionValidator,
} from "./submission-validator";
import { realScheduler, type TimerScheduler } from "./timer-scheduler";
import { TimeoutSupervisor } from "./timeout-supervisor";

export type WaitOutcome = Result<FeedbackResult, WaitError>;
export type SubmitOutcome = Result<SessionSnapshot, SubmitError>;

export interface SessionStoreDeps {
	registry: Pick<ConnectionRegistry, "broadcast" | "migrate" | "attachedTo">;
	archive?: SessionArchive;
	validateSubmission?: SubmissionValidator;
	releaseResources?: ResourceReleaser;
	scheduler?: TimerScheduler;
	createId?: () => string;
	now?: () => number;
}

interface LiveSession {
	id: string;
	status: SessionStatus;
	summary: string;
	projectDirectory: string;
	timeoutSeconds: number;
	createdAt: number;
	completedAt: number | null;
	feedbackText: string | null;
	images: FeedbackImage[];
	settings: Record<string, unknown>;
	errorReason: SessionErrorReason | null;
	archived: boolean;
}

interface WakeSignal {
	sessionId: string;
	outcome: WaitOutcome;
}

interface PendingWait {
	sessionId: string;
	deliver(signal: WakeSignal): void;
}

type WaitRegistration =
	| { kind: "settled"; outcome: WaitOutcome }
	| { kind: "pending"; promise: Promise<WaitOutcome> };

/** Outcomes kept for waits that arrive after their session was finalized. */
const OUTCOME_MEMORY = 32;

/**
 * Owns the one current session. Every mutation runs under a single mutex;
 * waits register under the lock and then suspend outside it until a wake
 * signal carrying their session id arrives.
 */
export class SessionStore {
	private readonly mutex = new Mutex();
	private readonly waiters = new Map<string, Set<PendingWait>>();
	private readonly outcomes = new Map<string, WaitOutcome>();
	private readonly supervisor: TimeoutSupervisor;
	private readonly archive: SessionArchive;
	private readonly validateSubmission: SubmissionValidator;
	private readonly scheduler: TimerScheduler;
	private readonly createId: () => string;
	private readonly now: () => number;
	private current: LiveSession | null = null;
	private closed = false;

	constructor(private readonly deps: SessionStoreDeps) {
		this.scheduler = deps.scheduler ?? realScheduler;
		this.now = deps.now ?? Date.now;
		this.createId = deps.createId ?? randomUUID;
		this.archive = deps.archive ?? new SessionArchive();
		this.validateSubmission =
			deps.validateSubmission ?? createSubmissionValidator();
		this.supervisor = new TimeoutSupervisor(
			(sessionId, generation) => {
				this.mutex
					.withLock(() => this.expireLocked(sessionId, generation))
					.catch((error: unknown) => {
						console.error(
							`[sessions] Failed to expire session ${sessionId}:`,
							toErrorMessage(error),
						);
					});
			},
			this.scheduler,
			this.now,
		);
	}

	async createOrReplace(input: CreateSessionInput): Promise<string> {
		if (!Number.isFinite(input.timeoutSeconds) || input.timeoutSeconds <= 0) {
			throw new ValidationError("Invalid feedback request", [
				`timeoutSeconds: must be a positive number (${input.timeoutSeconds})`,
			]);
		}

		return this.mutex.withLock(() => {
			if (this.closed) {
				throw new AppError("store_closed", "Session store is closed");
			}

			const id = this.createId();
			const previous = this.current;
			if (previous && isActiveStatus(previous.status)) {
				const wasAwaiting = isAwaitingFeedback(previous.status);
				this.supervisor.cancel(previous.id);
				this.finalize(previous, "completed");
				if (wasAwaiting) {
					this.settle(previous.id, err(new SupersededError(previous.id, id)));
				}
				console.log(`[sessions] Session ${previous.id} replaced by ${id}`);
			}

			const session: LiveSession = {
				id,
				status: "waiting",
				summary: input.summary,
				projectDirectory: input.projectDirectory,
				timeoutSeconds: input.timeoutSeconds,
				createdAt: this.now(),
				completedAt: null,
				feedbackText: null,
				images: [],
				settings: {},
				errorReason: null,
				archived: false,
			};
			this.current = session;
			this.deps.registry.migrate(previous?.id ?? null, id);
			this.supervisor.arm(id, input.timeoutSeconds);

			const at = new Date(session.createdAt);
			void this.deps.registry.broadcast(
				serverMessage(
					"session_updated",
					{
						session_id: id,
						summary: session.summary,
						project_directory: session.projectDirectory,
						timestamp: at.toISOString(),
						timeout_seconds: session.timeoutSeconds,
					},
					at,
				),
			);
			console.log(
				`[sessions] Session ${id} waiting (timeout ${input.timeoutSeconds}s)`,
			);
			return id;
		});
	}

	/** The most recently created session, whatever its status. */
	getCurrent(): SessionSnapshot | null {
		return this.current ? this.snapshot(this.current) : null;
	}

	/** The current session while it is waiting, processing or submitted. */
	getActive(): SessionSnapshot | null {
		if (!this.current || !isActiveStatus(this.current.status)) {
			return null;
		}
		return this.snapshot(this.current);
	}

	listArchived(): readonly SessionSnapshot[] {
		return this.archive.list();
	}

	async submitFeedback(
		sessionId: string,
		feedbackText: string,
		images: FeedbackImage[] = [],
		settings: Record<string, unknown> = {},
	): Promise<SubmitOutcome> {
		const submission: SubmissionInput = { feedbackText, images, settings };
		const invalid = this.validateSubmission(submission);
		if (invalid) {
			return err(invalid);
		}

		return this.mutex.withLock((): SubmitOutcome => {
			const session = this.current;
			if (!session || session.id !== sessionId) {
				return err(new StaleSessionError(sessionId));
			}
			if (!isAwaitingFeedback(session.status)) {
				return err(new AlreadySubmittedError(sessionId));
			}

			if (session.status === "waiting") {
				this.transition(session, "processing");
				void this.deps.registry.broadcast(
					serverMessage("status_update", {
						status: "processing",
						message: describeStatus("processing"),
						progress: 50,
						session_id: session.id,
					}),
				);
			}

			session.feedbackText = feedbackText;
			session.images = images.map((image) => ({ ...image }));
			session.settings = { ...settings };
			this.transition(session, "submitted");
			this.supervisor.cancel(session.id);

			void this.deps.registry.broadcast(
				serverMessage("feedback_received", {
					session_id: session.id,
					status: "submitted",
					message: "Feedback submitted successfully",
				}),
			);
			this.settle(
				session.id,
				ok({
					feedbackText,
					images: session.images.map((image) => ({ ...image })),
				}),
			);
			console.log(
				`[sessions] Session ${session.id} submitted (${images.length} image(s))`,
			);
			return ok(this.snapshot(session));
		});
	}

	/**
	 * Suspends until the session is submitted, expires or is replaced, or until
	 * this wait's own deadline passes.
	 */
	async waitForSubmission(
		sessionId: string,
		timeoutSeconds?: number,
	): Promise<WaitOutcome> {
		const registration = await this.mutex.withLock(() =>
			this.registerWait(sessionId, timeoutSeconds),
		);
		if (registration.kind === "settled") {
			return registration.outcome;
		}
		return registration.promise;
	}

	/** The tab's countdown ran out. Same path as a timer fire. */
	async expire(sessionId: string): Promise<boolean> {
		return this.mutex.withLock(() => this.expireLocked(sessionId, null));
	}

	/** Cancels every timer and releases every pending wait. */
	async close(): Promise<void> {
		await this.mutex.withLock(() => {
			this.closed = true;
			this.supervisor.cancelAll();
			for (const sessionId of [...this.waiters.keys()]) {
				this.wake({
					sessionId,
					outcome: err(new SupersededError(sessionId, null)),
				});
			}
		});
	}

	pendingWaitCount(sessionId: string): number {
		return this.waiters.get(sessionId)?.size ?? 0;
	}

	private expireLocked(sessionId: string, generation: number | null): boolean {
		if (
			generation !== null &&
			!this.supervisor.isCurrent(sessionId, generation)
		) {
			console.log(`[sessions] Stale expiry for session ${sessionId} ignored`);
			return false;
		}
		const session = this.current;
		if (
			!session ||
			session.id !== sessionId ||
			!isAwaitingFeedback(session.status)
		) {
			return false;
		}

		this.supervisor.cancel(session.id);
		session.errorReason = "timeout";
		this.finalize(session, "error");
		void this.deps.registry.broadcast(
			serverMessage("status_update", {
				status: "error",
				message: describeStatus("error"),
				session_id: session.id,
				reason: "timeout",
			}),
		);

		const snapshot = this.snapshot(session);
		const release = this.deps.releaseResources;
		if (release) {
			void Promise.resolve()
				.then(() => release(snapshot, "timeout"))
				.catch((error: unknown) => {
					console.error(
						`[sessions] Failed to release resources for ${session.id}:`,
						toErrorMessage(error),
					);
				});
		}

		this.settle(
			session.id,
			err(new TimeoutError(session.id, session.timeoutSeconds)),
		);
		console.warn(
			`[sessions] Session ${session.id} timed out after ${session.timeoutSeconds}s`,
		);
		return true;
	}

	private registerWait(
		sessionId: string,
		timeoutSeconds: number | undefined,
	): WaitRegistration {
		const recorded = this.outcomes.get(sessionId);
		if (recorded) {
			return { kind: "settled", outcome: recorded };
		}

		const session = this.current;
		if (
			!session ||
			session.id !== sessionId ||
			!isAwaitingFeedback(session.status)
		) {
			return {
				kind: "settled",
				outcome: err(new StaleSessionError(sessionId)),
			};
		}

		const seconds = timeoutSeconds ?? session.timeoutSeconds;
		const promise = new Promise<WaitOutcome>((resolve) => {
			let settled = false;
			const waiter: PendingWait = {
				sessionId,
				deliver: (signal) => {
					if (settled || signal.sessionId !== sessionId) {
						return;
					}
					settled = true;
					cancelDeadline();
					this.removeWaiter(waiter);
					resolve(signal.outcome);
				},
			};
			const cancelDeadline = this.scheduler.schedule(() => {
				waiter.deliver({
					sessionId,
					outcome: err(new TimeoutError(sessionId, seconds)),
				});
			}, seconds * 1000);

			const waiting = this.waiters.get(sessionId) ?? new Set<PendingWait>();
			waiting.add(waiter);
			this.waiters.set(sessionId, waiting);
		});
		return { kind: "pending", promise };
	}

	private removeWaiter(waiter: PendingWait): void {
		const waiting = this.waiters.get(waiter.sessionId);
		if (!waiting) {
			return;
		}
		waiting.delete(waiter);
		if (waiting.size === 0) {
			this.waiters.delete(waiter.sessionId);
		}
	}

	/** Records the outcome for late waits and wakes the current ones. */
	private settle(sessionId: string, outcome: WaitOutcome): void {
		this.outcomes.set(sessionId, outcome);
		while (this.outcomes.size > OUTCOME_MEMORY) {
			const oldest = this.outcomes.keys().next();
			if (oldest.done) {
				break;
			}
			this.outcomes.delete(oldest.value);
		}
		this.wake({ sessionId, outcome });
	}

	private wake(signal: WakeSignal): void {
		const waiting = this.waiters.get(signal.sessionId);
		if (!waiting) {
			return;
		}
		for (const waiter of [...waiting]) {
			waiter.deliver(signal);
		}
	}

	private transition(session: LiveSession, to: SessionStatus): void {
		if (!canTransition(session.status, to)) {
			throw new AppError(
				"invalid_transition",
				`Session ${session.id} cannot move from ${session.status} to ${to}`,
			);
		}
		session.status = to;
	}

	private finalize(session: LiveSession, status: "completed" | "error"): void {
		this.transition(session, status);
		session.completedAt = this.now();
		if (!session.archived) {
			session.archived = true;
			this.archive.append(this.snapshot(session));
		}
	}

	private snapshot(session: LiveSession): SessionSnapshot {
		return Object.freeze({
			id: session.id,
			status: session.status,
			summary: session.summary,
			projectDirectory: session.projectDirectory,
			timeoutSeconds: session.timeoutSeconds,
			createdAt: session.createdAt,
			completedAt: session.completedAt,
			feedbackText: session.feedbackText,
			images: Object.freeze(
				session.images.map((image) => Object.freeze({ ...image })),
			),
			settings: Object.freeze({ ...session.settings }),
			errorReason: session.errorReason,
			connectionIds: Object.freeze(this.deps.registry.attachedTo(session.id)),
		});
	}
}
