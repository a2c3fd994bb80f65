import { ConnectionError } from "../../shared/errors";
import {
	persistedHistorySchema,
	type PersistedHistory,
} from "../../shared/history";

export interface HistoryPersistence {
	load(): Promise<PersistedHistory>;
	save(history: PersistedHistory): Promise<void>;
}

interface HttpResponse {
	ok: boolean;
	status: number;
	json(): Promise<unknown>;
}

type HttpFetch = (
	url: string,
	init?: { method: string; headers: Record<string, string>; body: string },
) => Promise<HttpResponse>;

/** Reads and writes through the hub's session-history endpoints. */
export class HttpHistoryPersistence implements HistoryPersistence {
	private readonly fetchJson: HttpFetch;

	constructor(
		private readonly baseUrl: string,
		fetchImpl?: HttpFetch,
	) {
		this.fetchJson = fetchImpl ?? ((url, init) => fetch(url, init));
	}

	async load(): Promise<PersistedHistory> {
		const response = await this.fetchJson(
			`${this.baseUrl}/api/load-session-history`,
		);
		if (!response.ok) {
			throw new ConnectionError(`Loading history failed with status ${response.status}`);
		}
		return persistedHistorySchema.parse(await response.json());
	}

	async save(history: PersistedHistory): Promise<void> {
		const response = await this.fetchJson(
			`${this.baseUrl}/api/save-session-history`,
			{
				method: "POST",
				headers: { "content-type": "application/json" },
				body: JSON.stringify(history),
			},
		);
		if (!response.ok) {
			throw new ConnectionError(`Saving history failed with status ${response.status}`);
		}
	}
}

export class MemoryHistoryPersistence implements HistoryPersistence {
	private stored: PersistedHistory = { sessions: [], lastCleanup: 0 };

	async load(): Promise<PersistedHistory> {
		return { sessions: [...this.stored.sessions], lastCleanup: this.stored.lastCleanup };
	}

	async save(history: PersistedHistory): Promise<void> {
		this.stored = { sessions: [...history.sessions], lastCleanup: history.lastCleanup };
	}
}
