/** One-shot timers behind a seam so tests can drive them. */
export interface Timers {
	/** Returns a function that cancels the timer. */
	schedule(callback: () => void, delayMs: number): () => void;
}

export const browserTimers: Timers = {
	schedule(callback, delayMs) {
		const handle = setTimeout(callback, delayMs);
		return () => clearTimeout(handle);
	},
};
