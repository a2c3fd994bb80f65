import type { SessionSnapshot } from "./session-types";

export const DEFAULT_ARCHIVE_LIMIT = 10;

/**
 * Finalized sessions, newest first. Each session id is recorded once.
 */
export class SessionArchive {
	private readonly entries: SessionSnapshot[] = [];

	constructor(private readonly limit: number = DEFAULT_ARCHIVE_LIMIT) {}

	append(snapshot: SessionSnapshot): boolean {
		if (this.entries.some((entry) => entry.id === snapshot.id)) {
			return false;
		}
		this.entries.unshift(snapshot);
		if (this.entries.length > this.limit) {
			this.entries.length = this.limit;
		}
		return true;
	}

	get(sessionId: string): SessionSnapshot | undefined {
		return this.entries.find((entry) => entry.id === sessionId);
	}

	list(): readonly SessionSnapshot[] {
		return [...this.entries];
	}

	get size(): number {
		return this.entries.length;
	}
}
