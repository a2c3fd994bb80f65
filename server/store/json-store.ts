import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

const STORE_VERSION = 1;

export interface JsonStoreConfig {
	filePath: string;
	/** 0 writes through immediately. */
	writeDebounceMs: number;
}

const versionedFileSchema = z.object({
	version: z.number(),
	data: z.unknown(),
});

function errorCode(err: unknown): string | undefined {
	if (typeof err === "object" && err !== null && "code" in err) {
		return typeof err.code === "string" ? err.code : undefined;
	}
	return undefined;
}

/**
 * One JSON document on disk, wrapped in `{ version, data }`.
 * Reads are validated against the schema; an unreadable or invalid file
 * yields the default data rather than an error.
 */
export class JsonStore<T> {
	private pendingData: T | null = null;
	private debounceTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(
		private readonly config: JsonStoreConfig,
		private readonly defaultData: T,
		private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	) {}

	get filePath(): string {
		return this.config.filePath;
	}

	async read(): Promise<T> {
		if (this.pendingData !== null) {
			return this.pendingData;
		}

		let raw: string;
		try {
			raw = await readFile(this.config.filePath, "utf-8");
		} catch (err: unknown) {
			if (errorCode(err) !== "ENOENT") {
				console.warn(
					`[store] Failed to read ${this.config.filePath}:`,
					err instanceof Error ? err.message : err,
				);
			}
			return this.defaultData;
		}

		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch {
			console.warn(`[store] Ignoring malformed JSON in ${this.config.filePath}`);
			return this.defaultData;
		}

		const envelope = versionedFileSchema.safeParse(json);
		const parsed = this.schema.safeParse(
			envelope.success ? envelope.data.data : undefined,
		);
		if (!parsed.success) {
			console.warn(
				`[store] Ignoring ${this.config.filePath}: ${parsed.error.issues[0]?.message ?? "invalid contents"}`,
			);
			return this.defaultData;
		}
		return parsed.data;
	}

	/**
	 * Persist data to the JSON store.
	 *
	 * - When `writeDebounceMs <= 0`, writes are immediate (no debouncing).
	 *   Tests use this mode.
	 * - When `writeDebounceMs > 0`, writes are debounced with the configured
	 *   delay. Subsequent calls within the debounce window replace the pending
	 *   data and reset the timer, so only the last write in a burst is flushed.
	 */
	async write(data: T): Promise<void> {
		if (this.config.writeDebounceMs <= 0) {
			await this.writeSync(data);
			return;
		}

		this.pendingData = data;
		if (this.debounceTimer) {
			clearTimeout(this.debounceTimer);
		}
		this.debounceTimer = setTimeout(() => {
			this.flush().catch((error: unknown) => {
				console.error(`[store] Debounced write to ${this.config.filePath} failed:`, error);
			});
		}, this.config.writeDebounceMs);
	}

	/** Write now, discarding any pending debounced write. */
	async writeSync(data: T): Promise<void> {
		this.cancelPending();
		await this.atomicWrite(data);
	}

	/** Write out a pending debounced value, if any. */
	async flush(): Promise<void> {
		if (this.pendingData === null) return;
		const data = this.pendingData;
		this.pendingData = null;
		if (this.debounceTimer) {
			clearTimeout(this.debounceTimer);
			this.debounceTimer = null;
		}
		await this.atomicWrite(data);
	}

	async clear(): Promise<void> {
		this.cancelPending();
		await rm(this.config.filePath, { force: true });
	}

	private cancelPending(): void {
		if (this.debounceTimer) {
			clearTimeout(this.debounceTimer);
			this.debounceTimer = null;
		}
		this.pendingData = null;
	}

	private async atomicWrite(data: T): Promise<void> {
		await mkdir(dirname(this.config.filePath), { recursive: true });
		const tmpPath = `${this.config.filePath}.tmp`;
		const versioned: z.infer<typeof versionedFileSchema> = {
			version: STORE_VERSION,
			data,
		};
		await writeFile(tmpPath, JSON.stringify(versioned, null, 2), "utf-8");
		await rename(tmpPath, this.config.filePath);
	}
}
