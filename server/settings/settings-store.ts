import { z } from "zod";
import type { JsonStore } from "../store/json-store";

/** Opaque settings blob owned by the page; only `language` is read here. */
export const settingsSchema = z.record(z.unknown());

export type Settings = z.infer<typeof settingsSchema>;

/**
 * Load, merge and clear the settings blob persisted for the feedback page.
 */
export class SettingsStore {
	constructor(public store: JsonStore<Settings>) {}

	async load(): Promise<Settings> {
		return this.store.read();
	}

	/** Replace the whole blob. */
	async save(settings: Settings): Promise<void> {
		await this.store.write({ ...settings });
	}

	/** Shallow-merge into the stored blob. */
	async update(patch: Settings): Promise<Settings> {
		const next = { ...(await this.store.read()), ...patch };
		await this.store.write(next);
		return next;
	}

	async clear(): Promise<void> {
		await this.store.clear();
	}
}
