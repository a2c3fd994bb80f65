/**
 * Single-consumer inbound queue. Events pushed while the consumer is running
 * are queued and delivered after it returns, in push order.
 */
export class EventChannel<T> {
	private readonly queue: Array<{ event: T }> = [];
	private consumer: ((event: T) => void) | null = null;
	private draining = false;

	push(event: T): void {
		this.queue.push({ event });
		this.drain();
	}

	/** Returns a function that detaches the consumer. */
	consume(consumer: (event: T) => void): () => void {
		if (this.consumer) {
			throw new Error("EventChannel already has a consumer");
		}
		this.consumer = consumer;
		this.drain();
		return () => {
			if (this.consumer === consumer) {
				this.consumer = null;
			}
		};
	}

	get pending(): number {
		return this.queue.length;
	}

	private drain(): void {
		if (this.draining) {
			return;
		}
		this.draining = true;
		try {
			while (this.consumer) {
				const next = this.queue.shift();
				if (!next) {
					break;
				}
				try {
					this.consumer(next.event);
				} catch (error) {
					console.error("[channel] Consumer failed:", error);
				}
			}
		} finally {
			this.draining = false;
		}
	}
}
