import {
	clientMessage,
	decodeServerMessage,
	encodeMessage,
	type ClientMessage,
} from "../../shared/protocol";
import type { EventChannel } from "../channel";
import type { SessionChangeNotifier, TransportEvent } from "./session-notifier";

/** Callback-style socket; the browser WebSocket is wrapped into this. */
export interface BrowserSocket {
	isOpen(): boolean;
	send(data: string): void;
	close(): void;
	onOpen(listener: () => void): void;
	onMessage(listener: (data: string) => void): void;
	onClose(listener: () => void): void;
	onError(listener: () => void): void;
}

export function wrapBrowserSocket(socket: WebSocket): BrowserSocket {
	return {
		isOpen: () => socket.readyState === WebSocket.OPEN,
		send: (data) => socket.send(data),
		close: () => socket.close(),
		onOpen: (listener) => socket.addEventListener("open", () => listener()),
		onMessage: (listener) =>
			socket.addEventListener("message", (event) => {
				if (typeof event.data === "string") {
					listener(event.data);
				}
			}),
		onClose: (listener) => socket.addEventListener("close", () => listener()),
		onError: (listener) => socket.addEventListener("error", () => listener()),
	};
}

export interface SocketTransportOptions {
	url: string;
	channel: EventChannel<TransportEvent>;
	createSocket?: (url: string) => BrowserSocket;
	heartbeatIntervalMs?: number;
	reconnectBaseMs?: number;
	reconnectCapMs?: number;
	maxReconnectAttempts?: number;
}

export const RECONNECT_BASE_MS = 1_000;
export const RECONNECT_CAP_MS = 30_000;
export const MAX_RECONNECT_ATTEMPTS = 5;
export const HEARTBEAT_INTERVAL_MS = 60_000;

/** Delay before reconnect attempt `attempt` (1-based). */
export function backoffDelay(
	attempt: number,
	baseMs: number = RECONNECT_BASE_MS,
	capMs: number = RECONNECT_CAP_MS,
): number {
	return Math.min(capMs, baseMs * 2 ** (attempt - 1));
}

/**
 * Long-lived WebSocket to the hub. Reconnects with exponential backoff and
 * reports `exhausted` once the attempts run out.
 */
export class SocketTransport implements SessionChangeNotifier {
	private socket: BrowserSocket | null = null;
	private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private attempts = 0;
	private running = false;
	private readonly createSocket: (url: string) => BrowserSocket;

	constructor(private readonly options: SocketTransportOptions) {
		this.createSocket =
			options.createSocket ?? ((url) => wrapBrowserSocket(new WebSocket(url)));
	}

	start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		this.attempts = 0;
		this.connect();
	}

	stop(): void {
		this.running = false;
		this.stopHeartbeat();
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		const socket = this.socket;
		this.socket = null;
		socket?.close();
	}

	/** False when there is no open socket to send on. */
	send(message: ClientMessage): boolean {
		if (!this.socket || !this.socket.isOpen()) {
			return false;
		}
		this.socket.send(encodeMessage(message));
		return true;
	}

	get reconnectAttempts(): number {
		return this.attempts;
	}

	private connect(): void {
		this.options.channel.push({ kind: "state", state: "connecting" });
		const socket = this.createSocket(this.options.url);
		this.socket = socket;

		socket.onOpen(() => {
			if (this.socket !== socket) {
				return;
			}
			this.attempts = 0;
			this.options.channel.push({ kind: "state", state: "connected" });
			this.startHeartbeat();
		});

		socket.onMessage((data) => {
			if (this.socket !== socket) {
				return;
			}
			const decoded = decodeServerMessage(data);
			if (decoded.kind === "message") {
				this.options.channel.push({ kind: "message", message: decoded.message });
			} else if (decoded.kind === "invalid") {
				console.warn("[ws] Dropping invalid server message:", decoded.reason);
			}
		});

		socket.onClose(() => {
			if (this.socket !== socket) {
				return;
			}
			this.socket = null;
			this.stopHeartbeat();
			this.options.channel.push({ kind: "state", state: "disconnected" });
			if (this.running) {
				this.scheduleReconnect();
			}
		});

		socket.onError(() => {
			console.warn("[ws] Socket error");
		});
	}

	private scheduleReconnect(): void {
		const maxAttempts =
			this.options.maxReconnectAttempts ?? MAX_RECONNECT_ATTEMPTS;
		if (this.attempts >= maxAttempts) {
			this.running = false;
			console.warn(
				`[ws] Giving up after ${this.attempts} reconnect attempts`,
			);
			this.options.channel.push({ kind: "exhausted" });
			return;
		}
		this.attempts += 1;
		const delay = backoffDelay(
			this.attempts,
			this.options.reconnectBaseMs,
			this.options.reconnectCapMs,
		);
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			if (this.running) {
				this.connect();
			}
		}, delay);
	}

	private startHeartbeat(): void {
		this.stopHeartbeat();
		this.heartbeatTimer = setInterval(() => {
			this.send(clientMessage("heartbeat", { timestamp: Date.now() }));
		}, this.options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS);
	}

	private stopHeartbeat(): void {
		if (this.heartbeatTimer) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = null;
		}
	}
}
