import { realScheduler, type TimerScheduler } from "./timer-scheduler";

export type ExpiryHandler = (sessionId: string, generation: number) => void;

interface ArmedTimer {
	generation: number;
	deadline: number;
	cancel: () => void;
}

/**
 * One timer per session. Every arm or cancel bumps the generation, so a timer
 * that fires after being cancelled or re-armed is recognized as stale.
 */
export class TimeoutSupervisor {
	private readonly timers = new Map<string, ArmedTimer>();
	private nextGeneration = 1;

	constructor(
		private readonly onExpire: ExpiryHandler,
		private readonly scheduler: TimerScheduler = realScheduler,
		private readonly now: () => number = Date.now,
	) {}

	arm(sessionId: string, timeoutSeconds: number): number {
		this.cancel(sessionId);
		const generation = this.nextGeneration++;
		const delayMs = timeoutSeconds * 1000;
		const cancel = this.scheduler.schedule(() => {
			if (!this.isCurrent(sessionId, generation)) {
				console.log(
					`[timeout] Ignoring stale timer for session ${sessionId} (generation ${generation})`,
				);
				return;
			}
			this.onExpire(sessionId, generation);
		}, delayMs);
		this.timers.set(sessionId, {
			generation,
			deadline: this.now() + delayMs,
			cancel,
		});
		return generation;
	}

	cancel(sessionId: string): void {
		const timer = this.timers.get(sessionId);
		if (!timer) {
			return;
		}
		this.timers.delete(sessionId);
		timer.cancel();
	}

	isCurrent(sessionId: string, generation: number): boolean {
		return this.timers.get(sessionId)?.generation === generation;
	}

	isArmed(sessionId: string): boolean {
		return this.timers.has(sessionId);
	}

	remainingMs(sessionId: string): number | null {
		const timer = this.timers.get(sessionId);
		if (!timer) {
			return null;
		}
		return Math.max(0, timer.deadline - this.now());
	}

	cancelAll(): void {
		for (const sessionId of [...this.timers.keys()]) {
			this.cancel(sessionId);
		}
	}
}
