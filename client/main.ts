import { ConnectionError } from "../shared/errors";
import type { CurrentSessionResponse } from "../shared/types";
import { resolveAutoSubmitPlan, type AutoSubmitPlan } from "./auto-submit";
import { EventChannel } from "./channel";
import { DomFeedbackView } from "./feedback-view";
import { HttpHistoryPersistence } from "./history/history-persistence";
import { SessionHistory } from "./history/session-history";
import { Reconciler, type DraftPolicy } from "./reconciler";
import {
	currentSessionSchema,
	PollTransport,
} from "./transport/poll-transport";
import type { TransportEvent } from "./transport/session-notifier";
import { SocketTransport } from "./transport/socket-transport";

export interface FeedbackPage {
	reconciler: Reconciler;
	socket: SocketTransport;
	poll: PollTransport;
	history: SessionHistory;
	stop(): void;
}

async function fetchCurrentSession(
	origin: string,
): Promise<CurrentSessionResponse | null> {
	const response = await fetch(`${origin}/api/current-session`);
	if (response.status === 404) {
		return null;
	}
	if (!response.ok) {
		throw new ConnectionError(
			`Current session request failed with status ${response.status}`,
		);
	}
	return currentSessionSchema.parse(await response.json());
}

async function fetchSettings(origin: string): Promise<unknown> {
	const response = await fetch(`${origin}/api/load-settings`);
	if (!response.ok) {
		throw new ConnectionError(
			`Settings request failed with status ${response.status}`,
		);
	}
	return response.json();
}

/** Wires the transports, reconciler, view and history for one tab. */
export function startFeedbackPage(
	origin: string,
	options: { draftPolicy?: DraftPolicy } = {},
): FeedbackPage {
	const channel = new EventChannel<TransportEvent>();
	const view = new DomFeedbackView(document);
	const history = new SessionHistory({
		persistence: new HttpHistoryPersistence(origin),
	});
	const socket = new SocketTransport({
		url: `${origin.replace(/^http/, "ws")}/ws`,
		channel,
	});
	const poll = new PollTransport({ baseUrl: origin, channel });

	let autoSubmitPlan: AutoSubmitPlan | null = null;
	const reconciler = new Reconciler({
		channel,
		view,
		draftPolicy: options.draftPolicy,
		send: (message) => socket.send(message),
		fallback: poll,
		fetchCurrent: () => fetchCurrentSession(origin),
		autoSubmit: () => autoSubmitPlan,
		history: {
			append: (entry) => {
				const stored = history.append(entry);
				history.save().catch((error: unknown) => {
					console.warn("[history] Save failed:", error);
				});
				return stored;
			},
			recordUserMessage: (sessionId, input) =>
				history.recordUserMessage(sessionId, input),
		},
	});

	view.onSubmit((feedback) => {
		reconciler.submit(feedback);
	});

	fetchSettings(origin)
		.then((settings) => {
			autoSubmitPlan = resolveAutoSubmitPlan(settings);
		})
		.catch((error: unknown) => {
			console.warn("[settings] Load failed:", error);
		});
	history.load().catch((error: unknown) => {
		console.warn("[history] Load failed:", error);
	});
	reconciler.start();
	socket.start();

	return {
		reconciler,
		socket,
		poll,
		history,
		stop() {
			socket.stop();
			reconciler.stop();
		},
	};
}
