/** Schedules a callback; the returned function cancels it. */
export interface TimerScheduler {
	schedule(callback: () => void, delayMs: number): () => void;
}

export const realScheduler: TimerScheduler = {
	schedule(callback, delayMs) {
		const timer = setTimeout(callback, delayMs);
		return () => clearTimeout(timer);
	},
};
