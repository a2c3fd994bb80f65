import { randomUUID } from "node:crypto";
import { toErrorMessage } from "../../shared/errors";
import { encodeMessage, type ServerMessage } from "../../shared/protocol";
import { realScheduler, type TimerScheduler } from "../sessions/timer-scheduler";
import type { ClientSocket } from "./socket-adapter";

export interface ConnectionRegistryOptions {
	sendTimeoutMs: number;
	heartbeatIntervalSeconds: number;
	scheduler?: TimerScheduler;
	now?: () => number;
}

export interface ConnectionInfo {
	readonly id: string;
	/** null while the connection waits in the pending pool */
	readonly sessionId: string | null;
	readonly lastHeartbeatAt: number;
}

export interface BroadcastReport {
	delivered: string[];
	pruned: string[];
}

interface ConnectionEntry {
	id: string;
	socket: ClientSocket;
	sessionId: string | null;
	lastHeartbeatAt: number;
}

/**
 * Every open tab, keyed by connection id. A connection is attached to the
 * active session or waits in the pending pool until the next session is
 * created. Membership only changes through register, prune and migrate.
 */
export class ConnectionRegistry {
	private readonly connections = new Map<string, ConnectionEntry>();
	private activeSessionId: string | null = null;
	private sweepTimer: ReturnType<typeof setInterval> | null = null;
	private readonly scheduler: TimerScheduler;
	private readonly now: () => number;

	constructor(private readonly options: ConnectionRegistryOptions) {
		this.scheduler = options.scheduler ?? realScheduler;
		this.now = options.now ?? Date.now;
	}

	register(socket: ClientSocket, id: string = randomUUID()): ConnectionInfo {
		const entry: ConnectionEntry = {
			id,
			socket,
			sessionId: this.activeSessionId,
			lastHeartbeatAt: this.now(),
		};
		this.connections.set(id, entry);
		console.log(
			entry.sessionId
				? `[ws] Connection ${id} attached to session ${entry.sessionId}`
				: `[ws] Connection ${id} pending (no session yet)`,
		);
		return toInfo(entry);
	}

	/** Normal close from the tab's side. */
	unregister(connectionId: string): boolean {
		return this.connections.delete(connectionId);
	}

	get(connectionId: string): ConnectionInfo | undefined {
		const entry = this.connections.get(connectionId);
		return entry ? toInfo(entry) : undefined;
	}

	get size(): number {
		return this.connections.size;
	}

	getActiveSessionId(): string | null {
		return this.activeSessionId;
	}

	attachedTo(sessionId: string): string[] {
		const ids: string[] = [];
		for (const entry of this.connections.values()) {
			if (entry.sessionId === sessionId) {
				ids.push(entry.id);
			}
		}
		return ids;
	}

	pendingIds(): string[] {
		const ids: string[] = [];
		for (const entry of this.connections.values()) {
			if (entry.sessionId === null) {
				ids.push(entry.id);
			}
		}
		return ids;
	}

	/** Moves attached and pending connections onto the new session. */
	migrate(fromSessionId: string | null, toSessionId: string): number {
		let moved = 0;
		for (const entry of this.connections.values()) {
			if (entry.sessionId === null || entry.sessionId === fromSessionId) {
				entry.sessionId = toSessionId;
				moved += 1;
			}
		}
		this.activeSessionId = toSessionId;
		console.log(
			`[ws] Migrated ${moved} connection(s) ${fromSessionId ?? "(pending)"} -> ${toSessionId}`,
		);
		return moved;
	}

	touch(connectionId: string): boolean {
		const entry = this.connections.get(connectionId);
		if (!entry) {
			return false;
		}
		entry.lastHeartbeatAt = this.now();
		return true;
	}

	/** Prunes connections silent for more than two heartbeat intervals. */
	sweep(now: number = this.now()): string[] {
		const graceMs = this.options.heartbeatIntervalSeconds * 2 * 1000;
		const stale: string[] = [];
		for (const entry of this.connections.values()) {
			if (now - entry.lastHeartbeatAt > graceMs) {
				stale.push(entry.id);
			}
		}
		for (const id of stale) {
			this.prune(id, "heartbeat missed");
		}
		return stale;
	}

	/**
	 * Fans out to every connection attached to the active session (or every
	 * connection before the first session exists). Never rejects.
	 */
	async broadcast(message: ServerMessage): Promise<BroadcastReport> {
		const payload = encodeMessage(message);
		const targets = [...this.connections.values()].filter(
			(entry) => entry.sessionId === this.activeSessionId,
		);
		const results = await Promise.all(
			targets.map(async (entry) => ({
				id: entry.id,
				delivered: await this.deliver(entry, payload),
			})),
		);
		return {
			delivered: results.filter((result) => result.delivered).map((r) => r.id),
			pruned: results.filter((result) => !result.delivered).map((r) => r.id),
		};
	}

	async sendTo(connectionId: string, message: ServerMessage): Promise<boolean> {
		const entry = this.connections.get(connectionId);
		if (!entry) {
			return false;
		}
		return this.deliver(entry, encodeMessage(message));
	}

	start(): void {
		if (this.sweepTimer) {
			return;
		}
		this.sweepTimer = setInterval(() => {
			this.sweep();
		}, this.options.heartbeatIntervalSeconds * 1000);
	}

	stop(): void {
		if (this.sweepTimer) {
			clearInterval(this.sweepTimer);
			this.sweepTimer = null;
		}
	}

	closeAll(): void {
		this.stop();
		for (const id of [...this.connections.keys()]) {
			this.prune(id, "server shutting down");
		}
	}

	private deliver(entry: ConnectionEntry, payload: string): Promise<boolean> {
		return new Promise((resolve) => {
			let settled = false;
			const finish = (failure: string | null) => {
				if (settled) {
					return;
				}
				settled = true;
				cancelTimer();
				if (failure !== null) {
					this.prune(entry.id, failure);
				}
				resolve(failure === null);
			};
			const cancelTimer = this.scheduler.schedule(() => {
				finish(`send timed out after ${this.options.sendTimeoutMs}ms`);
			}, this.options.sendTimeoutMs);

			try {
				entry.socket.send(payload, (error) => {
					finish(error ? error.message : null);
				});
			} catch (error) {
				finish(toErrorMessage(error));
			}
		});
	}

	private prune(connectionId: string, reason: string): void {
		const entry = this.connections.get(connectionId);
		if (!entry) {
			return;
		}
		this.connections.delete(connectionId);
		console.warn(`[ws] Pruning connection ${connectionId}: ${reason}`);
		try {
			entry.socket.close(1001, reason.slice(0, 120));
		} catch (error) {
			console.warn(
				`[ws] Failed to close connection ${connectionId}:`,
				toErrorMessage(error),
			);
		}
	}
}

function toInfo(entry: ConnectionEntry): ConnectionInfo {
	return {
		id: entry.id,
		sessionId: entry.sessionId,
		lastHeartbeatAt: entry.lastHeartbeatAt,
	};
}
