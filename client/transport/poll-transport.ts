import { z } from "zod";
import { SESSION_STATUSES, type CurrentSessionResponse } from "../../shared/types";
import type { EventChannel } from "../channel";
import type { SessionChangeNotifier, TransportEvent } from "./session-notifier";

export const POLL_INTERVAL_MS = 5_000;

export const currentSessionSchema = z.object({
	session_id: z.string(),
	status: z.enum(SESSION_STATUSES),
	summary: z.string(),
	project_directory: z.string(),
	created_at: z.string(),
	timeout_seconds: z.number().positive(),
}) satisfies z.ZodType<CurrentSessionResponse>;

export interface PollResponse {
	status: number;
	ok: boolean;
	json(): Promise<unknown>;
}

export interface PollTransportOptions {
	/** Origin of the hub, e.g. http://127.0.0.1:8765 */
	baseUrl: string;
	channel: EventChannel<TransportEvent>;
	fetch?: (url: string) => Promise<PollResponse>;
	intervalMs?: number;
}

/**
 * Fallback after the socket gives up. The next request is scheduled only
 * once the previous one has settled, so two are never in flight.
 */
export class PollTransport implements SessionChangeNotifier {
	private timer: ReturnType<typeof setTimeout> | null = null;
	private running = false;
	private inFlight = false;
	private readonly fetchSession: (url: string) => Promise<PollResponse>;

	constructor(private readonly options: PollTransportOptions) {
		this.fetchSession = options.fetch ?? ((url) => fetch(url));
	}

	start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		this.options.channel.push({ kind: "state", state: "polling" });
		void this.tick();
	}

	stop(): void {
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}

	get isPolling(): boolean {
		return this.running;
	}

	/** One poll. Resolves after the outcome has been pushed. */
	async tick(): Promise<void> {
		if (this.inFlight) {
			return;
		}
		this.inFlight = true;
		try {
			await this.poll();
		} finally {
			this.inFlight = false;
			this.scheduleNext();
		}
	}

	private async poll(): Promise<void> {
		let response: PollResponse;
		try {
			response = await this.fetchSession(
				`${this.options.baseUrl}/api/current-session`,
			);
		} catch (error) {
			console.warn("[poll] Request failed:", error);
			return;
		}

		if (response.status === 404) {
			this.options.channel.push({ kind: "no_session" });
			return;
		}
		if (!response.ok) {
			console.warn(`[poll] Unexpected status ${response.status}`);
			return;
		}

		let body: unknown;
		try {
			body = await response.json();
		} catch (error) {
			console.warn("[poll] Malformed response body:", error);
			return;
		}
		const parsed = currentSessionSchema.safeParse(body);
		if (!parsed.success) {
			console.warn("[poll] Unexpected response shape");
			return;
		}
		this.options.channel.push({ kind: "session", session: parsed.data });
	}

	private scheduleNext(): void {
		if (!this.running) {
			return;
		}
		if (this.timer) {
			clearTimeout(this.timer);
		}
		this.timer = setTimeout(() => {
			this.timer = null;
			void this.tick();
		}, this.options.intervalMs ?? POLL_INTERVAL_MS);
	}
}
