import { decodeServerMessage, type ServerMessage } from "../../shared/protocol";
import type { TimerScheduler } from "../../server/sessions/timer-scheduler";
import type {
	ClientSocket,
	RelaySocket,
} from "../../server/websocket/socket-adapter";

export type SendMode = "ok" | "error" | "hang" | "throw";

/** Registry-side socket that records payloads and can be told to fail. */
export class FakeClientSocket implements ClientSocket {
	readonly sent: string[] = [];
	readonly closed: Array<{ code?: number; reason?: string }> = [];
	mode: SendMode = "ok";

	send(payload: string, callback: (error?: Error) => void): void {
		if (this.mode === "throw") {
			throw new Error("socket gone");
		}
		this.sent.push(payload);
		if (this.mode === "ok") {
			callback();
		} else if (this.mode === "error") {
			callback(new Error("write EPIPE"));
		}
	}

	close(code?: number, reason?: string): void {
		this.closed.push({ code, reason });
	}

	messages(): ServerMessage[] {
		return this.sent.map((payload) => {
			const decoded = decodeServerMessage(payload);
			if (decoded.kind !== "message") {
				throw new Error(`Unexpected payload: ${payload}`);
			}
			return decoded.message;
		});
	}

	types(): string[] {
		return this.messages().map((message) => message.type);
	}
}

/** Handler-side socket: the test plays the browser tab. */
export class MockRelaySocket extends FakeClientSocket implements RelaySocket {
	private messageListeners: Array<(text: string) => void> = [];
	private closeListeners: Array<() => void> = [];
	private errorListeners: Array<(error: Error) => void> = [];

	onMessage(listener: (text: string) => void): void {
		this.messageListeners.push(listener);
	}

	onClose(listener: () => void): void {
		this.closeListeners.push(listener);
	}

	onError(listener: (error: Error) => void): void {
		this.errorListeners.push(listener);
	}

	receive(payload: unknown): void {
		const text = typeof payload === "string" ? payload : JSON.stringify(payload);
		for (const listener of this.messageListeners) {
			listener(text);
		}
	}

	emitClose(): void {
		for (const listener of this.closeListeners) {
			listener();
		}
	}

	emitError(error: Error): void {
		for (const listener of this.errorListeners) {
			listener(error);
		}
	}
}

export interface CapturedTimer {
	callback: () => void;
	delayMs: number;
	cancelled: boolean;
}

/** Scheduler whose timers only run when the test fires them, cancelled or not. */
export function capturingScheduler(): {
	scheduler: TimerScheduler;
	timers: CapturedTimer[];
} {
	const timers: CapturedTimer[] = [];
	return {
		timers,
		scheduler: {
			schedule(callback, delayMs) {
				const timer: CapturedTimer = { callback, delayMs, cancelled: false };
				timers.push(timer);
				return () => {
					timer.cancelled = true;
				};
			},
		},
	};
}
