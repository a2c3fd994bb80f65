// @vitest-environment jsdom
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { AutoSubmitPlan } from "../../client/auto-submit";
import { EventChannel } from "../../client/channel";
import { SessionHistory } from "../../client/history/session-history";
import {
	Reconciler,
	type DraftPolicy,
	type FeedbackView,
} from "../../client/reconciler";
import type { TransportEvent } from "../../client/transport/session-notifier";
import {
	serverMessage,
	type ClientMessage,
	type ServerMessage,
} from "../../shared/protocol";
import type { CurrentSessionResponse } from "../../shared/types";
import { capturingScheduler } from "../helpers/fake-sockets";

const NOW = Date.parse("2026-03-01T10:05:00.000Z");

function createView() {
	return {
		showSession: vi.fn<FeedbackView["showSession"]>(),
		resetForm: vi.fn<FeedbackView["resetForm"]>(),
		setStatus: vi.fn<FeedbackView["setStatus"]>(),
		setSubmitEnabled: vi.fn<FeedbackView["setSubmitEnabled"]>(),
		setConnectionState: vi.fn<FeedbackView["setConnectionState"]>(),
		showError: vi.fn<FeedbackView["showError"]>(),
	} satisfies FeedbackView;
}

interface HarnessOptions {
	draftPolicy?: DraftPolicy;
	sendResult?: boolean;
	fetchCurrent?: () => Promise<CurrentSessionResponse | null>;
	autoSubmit?: AutoSubmitPlan;
}

function createHarness(options: HarnessOptions = {}) {
	const channel = new EventChannel<TransportEvent>();
	const view = createView();
	const sent: ClientMessage[] = [];
	const fallback = { start: vi.fn(), stop: vi.fn() };
	const history = new SessionHistory({ now: () => NOW });
	const { scheduler, timers } = capturingScheduler();
	const reconciler = new Reconciler({
		channel,
		view,
		draftPolicy: options.draftPolicy,
		send: (message) => {
			sent.push(message);
			return options.sendResult ?? true;
		},
		fallback,
		fetchCurrent: options.fetchCurrent,
		history,
		autoSubmit: () => options.autoSubmit ?? null,
		timers: scheduler,
		now: () => NOW,
	});
	reconciler.start();
	const deliver = (message: ServerMessage) =>
		channel.push({ kind: "message", message });
	return { channel, view, sent, fallback, history, reconciler, deliver, timers };
}

function announce(sessionId: string, createdAt: string) {
	return serverMessage("session_updated", {
		session_id: sessionId,
		summary: `Summary for ${sessionId}`,
		project_directory: "/work/app",
		timestamp: createdAt,
		timeout_seconds: 600,
	});
}

describe("Reconciler", () => {
	beforeEach(() => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	it("renders a newly announced session with a fresh form", () => {
		const { view, reconciler, deliver } = createHarness();

		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));

		expect(view.showSession).toHaveBeenCalledWith({
			sessionId: "s1",
			summary: "Summary for s1",
			projectDirectory: "/work/app",
		});
		expect(view.resetForm).toHaveBeenCalledWith({ preserveDraft: false });
		expect(view.setStatus).toHaveBeenLastCalledWith(
			"waiting",
			"Waiting for your feedback",
		);
		expect(view.setSubmitEnabled).toHaveBeenLastCalledWith(true);
		expect(reconciler.sessionId).toBe("s1");
	});

	it("keeps the draft when configured to preserve it", () => {
		const { view, deliver } = createHarness({ draftPolicy: "preserve" });

		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));

		expect(view.resetForm).toHaveBeenCalledWith({ preserveDraft: true });
	});

	it("ignores a repeated announcement of the session already shown", () => {
		const { view, deliver } = createHarness();

		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));
		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));

		expect(view.showSession).toHaveBeenCalledTimes(1);
	});

	it("records the replaced session as completed", () => {
		const { history, deliver, reconciler } = createHarness();

		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));
		deliver(announce("s2", "2026-03-01T10:04:00.000Z"));

		expect(reconciler.sessionId).toBe("s2");
		expect(history.list()).toEqual([
			{
				session_id: "s1",
				status: "completed",
				summary: "Summary for s1",
				project_directory: "/work/app",
				created_at: Date.parse("2026-03-01T10:00:00.000Z"),
				completed_at: NOW,
				duration: 5 * 60 * 1000,
			},
		]);
	});

	it("records a timeout once and locks the form", () => {
		const { view, history, deliver, reconciler } = createHarness();
		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));

		const timedOut = serverMessage("status_update", {
			status: "error",
			message: "Feedback request timed out",
			session_id: "s1",
			reason: "timeout",
		});
		deliver(timedOut);
		deliver(timedOut);

		expect(reconciler.sessionStatus).toBe("error");
		expect(view.setStatus).toHaveBeenLastCalledWith(
			"error",
			"Feedback request timed out",
		);
		expect(view.setSubmitEnabled).toHaveBeenLastCalledWith(false);
		expect(history.list()).toHaveLength(1);
		expect(history.list()[0]).toMatchObject({
			session_id: "s1",
			status: "error",
			error_reason: "timeout",
		});

		deliver(announce("s2", "2026-03-01T10:04:30.000Z"));
		expect(history.list().map((entry) => entry.session_id)).toEqual(["s1"]);
	});

	it("submits for the session on screen and keeps the message for history", () => {
		const { view, sent, history, deliver, reconciler } = createHarness();
		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));

		const accepted = reconciler.submit(
			"Rename the flag",
			[{ name: "a.png", data: "aGk=", size: 2, type: "image/png" }],
			{ theme: "dark" },
		);

		expect(accepted).toBe(true);
		expect(sent).toHaveLength(1);
		expect(sent[0]).toMatchObject({
			type: "submit_feedback",
			data: {
				session_id: "s1",
				feedback: "Rename the flag",
				settings: { theme: "dark" },
			},
		});
		expect(view.setSubmitEnabled).toHaveBeenLastCalledWith(false);

		deliver(
			serverMessage("feedback_received", {
				session_id: "s1",
				status: "submitted",
				message: "Feedback submitted successfully",
			}),
		);
		deliver(announce("s2", "2026-03-01T10:04:00.000Z"));

		expect(history.get("s1")?.userMessages).toEqual([
			{
				privacyLevel: "full",
				timestamp: NOW,
				submissionMethod: "manual",
				content: "Rename the flag",
				images: [{ name: "a.png", size: 2, type: "image/png" }],
			},
		]);
	});

	it("refuses to submit without a waiting session or a connection", () => {
		const noSession = createHarness();
		expect(noSession.reconciler.submit("hello")).toBe(false);
		expect(noSession.view.showError).toHaveBeenCalledWith(
			"There is no feedback request to answer.",
		);
		expect(noSession.sent).toEqual([]);

		const offline = createHarness({ sendResult: false });
		offline.deliver(announce("s1", "2026-03-01T10:00:00.000Z"));
		expect(offline.reconciler.submit("hello")).toBe(false);
		expect(offline.view.showError).toHaveBeenCalledWith(
			"Not connected; feedback was not sent.",
		);
	});

	it("re-enables the form after a rejected submission", () => {
		const { view, reconciler, deliver } = createHarness();
		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));
		reconciler.submit("see screenshot");

		deliver(
			serverMessage("error", {
				error_code: "validation_error",
				message: "Submission rejected",
				details: { issues: ["images.0 (a.tiff): unsupported type image/tiff"] },
			}),
		);

		expect(view.showError).toHaveBeenCalledWith("Submission rejected");
		expect(view.setSubmitEnabled).toHaveBeenLastCalledWith(true);
	});

	it("switches to the fallback when the socket gives up and stays in polling", () => {
		const { channel, view, fallback, reconciler } = createHarness();

		channel.push({ kind: "state", state: "connecting" });
		channel.push({ kind: "exhausted" });
		channel.push({ kind: "state", state: "polling" });
		channel.push({ kind: "state", state: "disconnected" });

		expect(fallback.start).toHaveBeenCalledTimes(1);
		expect(reconciler.connectionState).toBe("polling");
		expect(view.setConnectionState.mock.calls).toEqual([
			["connecting"],
			["polling"],
		]);
	});

	it("follows polled sessions", () => {
		const { channel, view, reconciler } = createHarness();
		const polled: CurrentSessionResponse = {
			session_id: "s3",
			status: "waiting",
			summary: "Polled",
			project_directory: "/work/app",
			created_at: "2026-03-01T10:03:00.000Z",
			timeout_seconds: 600,
		};

		channel.push({ kind: "session", session: polled });
		channel.push({ kind: "session", session: polled });
		channel.push({ kind: "session", session: { ...polled, status: "submitted" } });
		channel.push({ kind: "no_session" });

		expect(reconciler.sessionId).toBe("s3");
		expect(reconciler.sessionStatus).toBe("submitted");
		expect(view.showSession).toHaveBeenCalledTimes(1);
		expect(view.setStatus.mock.calls).toEqual([
			["waiting", "Waiting for your feedback"],
			["submitted", "Request is submitted"],
			["no_session", "No active feedback request"],
		]);
	});

	it("fetches the session when the greeting names one it has not seen", async () => {
		const fetchCurrent = vi.fn(
			async (): Promise<CurrentSessionResponse | null> => ({
				session_id: "s7",
				status: "waiting",
				summary: "Late join",
				project_directory: "/work/app",
				created_at: "2026-03-01T10:01:00.000Z",
				timeout_seconds: 600,
			}),
		);
		const { reconciler, deliver } = createHarness({ fetchCurrent });

		deliver(
			serverMessage("connection_established", {
				session_id: "s7",
				server_time: "2026-03-01T10:05:00.000Z",
			}),
		);

		await vi.waitFor(() => {
			expect(reconciler.sessionId).toBe("s7");
		});
		expect(fetchCurrent).toHaveBeenCalledTimes(1);
	});

	it("asks the hub to expire the session when the local countdown runs out", () => {
		const { sent, reconciler, deliver } = createHarness();
		expect(reconciler.reportTimeout()).toBe(false);

		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));

		expect(reconciler.reportTimeout()).toBe(true);
		expect(sent[0]).toMatchObject({
			type: "user_timeout",
			data: { session_id: "s1" },
		});
	});

	it("keeps a newer announced session when an older fetch lands late", async () => {
		let resolveFetch: (session: CurrentSessionResponse | null) => void = () => {};
		const fetchCurrent = vi.fn(
			() =>
				new Promise<CurrentSessionResponse | null>((resolve) => {
					resolveFetch = resolve;
				}),
		);
		const { reconciler, history, deliver, view } = createHarness({ fetchCurrent });

		deliver(
			serverMessage("connection_established", {
				session_id: "s1",
				server_time: "2026-03-01T10:00:30.000Z",
			}),
		);
		deliver(announce("s2", "2026-03-01T10:04:00.000Z"));
		resolveFetch({
			session_id: "s1",
			status: "waiting",
			summary: "Summary for s1",
			project_directory: "/work/app",
			created_at: "2026-03-01T10:00:00.000Z",
			timeout_seconds: 600,
		});

		await vi.waitFor(() => {
			expect(console.warn).toHaveBeenCalledWith(
				"[reconciler] Ignoring s1, older than s2",
			);
		});
		expect(reconciler.sessionId).toBe("s2");
		expect(view.showSession).toHaveBeenCalledTimes(1);
		expect(history.list()).toEqual([]);
	});

	it("reports the timeout itself when the session deadline passes", () => {
		const { sent, timers, deliver } = createHarness();

		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));

		expect(timers.map((timer) => timer.delayMs)).toEqual([5 * 60 * 1000]);
		timers[0]?.callback();
		expect(sent).toHaveLength(1);
		expect(sent[0]).toMatchObject({
			type: "user_timeout",
			data: { session_id: "s1" },
		});
	});

	it("stops the deadline once the session is no longer waiting", () => {
		const { timers, deliver, reconciler } = createHarness();
		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));

		reconciler.submit("done");
		deliver(
			serverMessage("status_update", {
				status: "processing",
				message: "Processing feedback...",
				progress: 50,
				session_id: "s1",
			}),
		);

		expect(timers).toHaveLength(1);
		expect(timers[0]?.cancelled).toBe(true);
	});

	it("auto-submits the saved prompt and records it as automatic", () => {
		const { sent, timers, history, deliver } = createHarness({
			autoSubmit: { delaySeconds: 30, promptId: "p1", message: "Continue" },
		});
		deliver(announce("s1", "2026-03-01T10:00:00.000Z"));

		const autoTimer = timers.find((timer) => timer.delayMs === 30_000);
		autoTimer?.callback();

		expect(sent).toHaveLength(1);
		expect(sent[0]).toMatchObject({
			type: "submit_feedback",
			data: { session_id: "s1", feedback: "Continue" },
		});

		deliver(announce("s2", "2026-03-01T10:04:00.000Z"));
		expect(history.get("s1")?.userMessages).toEqual([
			{
				privacyLevel: "full",
				timestamp: NOW,
				submissionMethod: "auto",
				content: "Continue",
				images: [],
			},
		]);
	});

	it("cancels auto-submit when the human answers or the session is replaced", () => {
		const plan = { delaySeconds: 30, promptId: "p1", message: "Continue" };
		const answered = createHarness({ autoSubmit: plan });
		answered.deliver(announce("s1", "2026-03-01T10:00:00.000Z"));
		answered.reconciler.submit("manual answer");
		expect(
			answered.timers.find((timer) => timer.delayMs === 30_000)?.cancelled,
		).toBe(true);

		const replaced = createHarness({ autoSubmit: plan });
		replaced.deliver(announce("s1", "2026-03-01T10:00:00.000Z"));
		replaced.deliver(announce("s2", "2026-03-01T10:04:00.000Z"));
		expect(replaced.timers.map((timer) => timer.cancelled)).toEqual([
			true,
			true,
			false,
			false,
		]);
	});
});
