import { z } from "zod";
import {
	historyEntrySchema,
	type HistoryEntry,
	type ImageMetadata,
	type PersistedHistory,
	type PrivacyLevel,
	type SubmissionMethod,
	type UserMessageRecord,
} from "../../shared/history";
import type { HistoryPersistence } from "./history-persistence";

export const DEFAULT_HISTORY_LIMIT = 10;
export const DEFAULT_RETENTION_HOURS = 72;

const HOUR_MS = 60 * 60 * 1000;

const historyExportSchema = z.object({
	version: z.literal(1),
	exportedAt: z.number(),
	sessions: z.array(historyEntrySchema),
});

export type HistoryExport = z.infer<typeof historyExportSchema>;

export interface UserMessageInput {
	content: string;
	images: ImageMetadata[];
	method: SubmissionMethod;
	timestamp?: number;
}

export interface HistoryStats {
	todayCount: number;
	/** ms; 0 when no session finished today */
	averageDuration: number;
	totalCount: number;
}

export interface SessionHistoryOptions {
	limit?: number;
	retentionHours?: number;
	privacyLevel?: PrivacyLevel;
	persistence?: HistoryPersistence;
	now?: () => number;
}

function mergeMessages(
	existing: readonly UserMessageRecord[],
	incoming: readonly UserMessageRecord[],
): UserMessageRecord[] {
	const byTimestamp = new Map<number, UserMessageRecord>();
	for (const message of [...existing, ...incoming]) {
		if (!byTimestamp.has(message.timestamp)) {
			byTimestamp.set(message.timestamp, message);
		}
	}
	return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
}

function isSameLocalDay(a: number, b: number): boolean {
	return new Date(a).toDateString() === new Date(b).toDateString();
}

/**
 * Finalized sessions seen by this tab, newest first. Entries are replaced,
 * never edited; user messages recorded before a session finalizes are held
 * until it does.
 */
export class SessionHistory {
	private entries: HistoryEntry[] = [];
	private readonly pendingMessages = new Map<string, UserMessageRecord[]>();
	private privacyLevel: PrivacyLevel;
	private lastCleanup = 0;
	private readonly limit: number;
	private readonly retentionMs: number;
	private readonly now: () => number;

	constructor(private readonly options: SessionHistoryOptions = {}) {
		this.limit = options.limit ?? DEFAULT_HISTORY_LIMIT;
		this.retentionMs = (options.retentionHours ?? DEFAULT_RETENTION_HOURS) * HOUR_MS;
		this.privacyLevel = options.privacyLevel ?? "full";
		this.now = options.now ?? Date.now;
	}

	getPrivacyLevel(): PrivacyLevel {
		return this.privacyLevel;
	}

	/** Applies to messages recorded from now on. */
	setPrivacyLevel(level: PrivacyLevel): void {
		this.privacyLevel = level;
	}

	recordUserMessage(
		sessionId: string,
		input: UserMessageInput,
	): UserMessageRecord {
		const record = this.toRecord(input);
		const existing = this.entries.find((entry) => entry.session_id === sessionId);
		if (existing) {
			this.replace({
				...existing,
				userMessages: mergeMessages(existing.userMessages ?? [], [record]),
			});
		} else {
			const pending = this.pendingMessages.get(sessionId) ?? [];
			this.pendingMessages.set(sessionId, mergeMessages(pending, [record]));
		}
		return record;
	}

	/**
	 * Adds a finalized session. A second append for the same id merges its
	 * user messages into the stored entry.
	 */
	append(entry: HistoryEntry): HistoryEntry {
		const pending = this.pendingMessages.get(entry.session_id) ?? [];
		this.pendingMessages.delete(entry.session_id);

		const existing = this.entries.find(
			(candidate) => candidate.session_id === entry.session_id,
		);
		const messages = mergeMessages(
			existing?.userMessages ?? [],
			mergeMessages(entry.userMessages ?? [], pending),
		);
		const stored: HistoryEntry = {
			...(existing ?? entry),
			...(messages.length > 0 ? { userMessages: messages } : {}),
		};

		if (existing) {
			this.replace(stored);
		} else {
			this.entries = [stored, ...this.entries];
		}
		this.prune();
		return stored;
	}

	/** Drops entries past retention, then trims to the size cap. */
	prune(now: number = this.now()): number {
		const before = this.entries.length;
		this.entries = this.entries
			.filter((entry) => now - entry.completed_at <= this.retentionMs)
			.slice(0, this.limit);
		this.lastCleanup = now;
		return before - this.entries.length;
	}

	list(): readonly HistoryEntry[] {
		return [...this.entries];
	}

	get(sessionId: string): HistoryEntry | undefined {
		return this.entries.find((entry) => entry.session_id === sessionId);
	}

	stats(now: number = this.now()): HistoryStats {
		const today = this.entries.filter((entry) =>
			isSameLocalDay(entry.created_at, now),
		);
		const finished = today.filter((entry) => entry.status === "completed");
		const total = finished.reduce((sum, entry) => sum + entry.duration, 0);
		return {
			todayCount: today.length,
			averageDuration:
				finished.length === 0 ? 0 : Math.round(total / finished.length),
			totalCount: this.entries.length,
		};
	}

	exportAll(): string {
		return this.serialize(this.entries);
	}

	exportOne(sessionId: string): string | null {
		const entry = this.get(sessionId);
		return entry ? this.serialize([entry]) : null;
	}

	/** Merges exported sessions in; returns how many were read. */
	importJson(json: string): number {
		let raw: unknown;
		try {
			raw = JSON.parse(json);
		} catch {
			throw new Error("History import is not valid JSON");
		}
		const parsed = historyExportSchema.safeParse(raw);
		if (!parsed.success) {
			throw new Error(
				`History import rejected: ${parsed.error.issues[0]?.message ?? "invalid contents"}`,
			);
		}
		const oldestFirst = [...parsed.data.sessions].sort(
			(a, b) => a.completed_at - b.completed_at,
		);
		for (const entry of oldestFirst) {
			this.insertByCompletion(entry);
		}
		this.prune();
		return parsed.data.sessions.length;
	}

	clear(): void {
		this.entries = [];
		this.pendingMessages.clear();
	}

	remove(sessionId: string): boolean {
		const before = this.entries.length;
		this.entries = this.entries.filter((entry) => entry.session_id !== sessionId);
		return this.entries.length !== before;
	}

	toPersisted(): PersistedHistory {
		return { sessions: [...this.entries], lastCleanup: this.lastCleanup };
	}

	async load(): Promise<void> {
		if (!this.options.persistence) {
			return;
		}
		const persisted = await this.options.persistence.load();
		this.entries = [...persisted.sessions].sort(
			(a, b) => b.completed_at - a.completed_at,
		);
		this.lastCleanup = persisted.lastCleanup;
		this.prune();
	}

	async save(): Promise<void> {
		if (!this.options.persistence) {
			return;
		}
		await this.options.persistence.save(this.toPersisted());
	}

	private insertByCompletion(entry: HistoryEntry): void {
		const existing = this.get(entry.session_id);
		if (existing) {
			this.replace({
				...existing,
				userMessages: mergeMessages(
					existing.userMessages ?? [],
					entry.userMessages ?? [],
				),
			});
			return;
		}
		this.entries = [...this.entries, entry].sort(
			(a, b) => b.completed_at - a.completed_at,
		);
	}

	private replace(entry: HistoryEntry): void {
		this.entries = this.entries.map((candidate) =>
			candidate.session_id === entry.session_id ? entry : candidate,
		);
	}

	private toRecord(input: UserMessageInput): UserMessageRecord {
		const timestamp = input.timestamp ?? this.now();
		switch (this.privacyLevel) {
			case "full":
				return {
					privacyLevel: "full",
					timestamp,
					submissionMethod: input.method,
					content: input.content,
					images: input.images.map((image) => ({ ...image })),
				};
			case "basic":
				return {
					privacyLevel: "basic",
					timestamp,
					submissionMethod: input.method,
					contentLength: input.content.length,
					imageCount: input.images.length,
				};
			case "disabled":
				return { privacyLevel: "disabled", timestamp };
		}
	}

	private serialize(sessions: HistoryEntry[]): string {
		const payload: HistoryExport = {
			version: 1,
			exportedAt: this.now(),
			sessions,
		};
		return JSON.stringify(payload, null, 2);
	}
}
