import { z } from "zod";

export const AUTO_SUBMIT_MIN_SECONDS = 1;
export const AUTO_SUBMIT_MAX_SECONDS = 24 * 60 * 60;
export const DEFAULT_AUTO_SUBMIT_SECONDS = 30;

export const promptSchema = z.object({
	id: z.string().min(1),
	name: z.string(),
	content: z.string(),
});

export type SavedPrompt = z.infer<typeof promptSchema>;

/** The auto-submit keys of the page's settings blob. */
export const autoSubmitSettingsSchema = z.object({
	autoSubmitEnabled: z.boolean().default(false),
	autoSubmitTimeout: z.number().default(DEFAULT_AUTO_SUBMIT_SECONDS),
	autoSubmitPromptId: z.string().nullable().default(null),
	prompts: z.array(promptSchema).default([]),
});

export type AutoSubmitSettings = z.infer<typeof autoSubmitSettingsSchema>;

/** What the tab sends on the human's behalf once the delay passes. */
export interface AutoSubmitPlan {
	delaySeconds: number;
	promptId: string;
	message: string;
}

export function validateAutoSubmitSettings(
	settings: AutoSubmitSettings,
): string[] {
	const errors: string[] = [];
	const timeout = settings.autoSubmitTimeout;
	if (!Number.isInteger(timeout) || timeout < AUTO_SUBMIT_MIN_SECONDS) {
		errors.push(
			`autoSubmitTimeout: must be a whole number of at least ${AUTO_SUBMIT_MIN_SECONDS} second`,
		);
	} else if (timeout > AUTO_SUBMIT_MAX_SECONDS) {
		errors.push(
			`autoSubmitTimeout: must not exceed ${AUTO_SUBMIT_MAX_SECONDS} seconds`,
		);
	}
	if (settings.autoSubmitEnabled && !settings.autoSubmitPromptId) {
		errors.push("autoSubmitPromptId: a prompt is required when auto-submit is on");
	}
	return errors;
}

/**
 * Reads the settings blob. Null when auto-submit is off, misconfigured, or
 * points at a prompt that no longer exists.
 */
export function resolveAutoSubmitPlan(settings: unknown): AutoSubmitPlan | null {
	const parsed = autoSubmitSettingsSchema.safeParse(settings);
	if (!parsed.success || !parsed.data.autoSubmitEnabled) {
		return null;
	}
	const errors = validateAutoSubmitSettings(parsed.data);
	if (errors.length > 0) {
		console.warn("[auto-submit] Ignoring settings:", errors.join("; "));
		return null;
	}
	const prompt = parsed.data.prompts.find(
		(candidate) => candidate.id === parsed.data.autoSubmitPromptId,
	);
	if (!prompt) {
		console.warn(
			`[auto-submit] Prompt ${parsed.data.autoSubmitPromptId ?? ""} not found`,
		);
		return null;
	}
	return {
		delaySeconds: parsed.data.autoSubmitTimeout,
		promptId: prompt.id,
		message: prompt.content,
	};
}
