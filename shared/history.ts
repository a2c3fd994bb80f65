import { z } from "zod";

// Durable record of finalized sessions, shared by the tab-side aggregator
// and the server endpoints that persist it. Times are epoch milliseconds.

export const PRIVACY_LEVELS = ["full", "basic", "disabled"] as const;

export const privacyLevelSchema = z.enum(PRIVACY_LEVELS);

export type PrivacyLevel = z.infer<typeof privacyLevelSchema>;

export const submissionMethodSchema = z.enum(["manual", "auto"]);

export type SubmissionMethod = z.infer<typeof submissionMethodSchema>;

export const imageMetadataSchema = z.object({
	name: z.string(),
	size: z.number().int().nonnegative(),
	type: z.string(),
});

export type ImageMetadata = z.infer<typeof imageMetadataSchema>;

export const userMessageRecordSchema = z.discriminatedUnion("privacyLevel", [
	z.object({
		privacyLevel: z.literal("full"),
		timestamp: z.number(),
		submissionMethod: submissionMethodSchema,
		content: z.string(),
		images: z.array(imageMetadataSchema),
	}),
	z.object({
		privacyLevel: z.literal("basic"),
		timestamp: z.number(),
		submissionMethod: submissionMethodSchema,
		contentLength: z.number().int().nonnegative(),
		imageCount: z.number().int().nonnegative(),
	}),
	z.object({
		privacyLevel: z.literal("disabled"),
		timestamp: z.number(),
	}),
]);

export type UserMessageRecord = z.infer<typeof userMessageRecordSchema>;

export const historyEntrySchema = z.object({
	session_id: z.string().min(1),
	status: z.enum(["completed", "error"]),
	summary: z.string(),
	project_directory: z.string(),
	created_at: z.number(),
	completed_at: z.number(),
	duration: z.number().nonnegative(),
	error_reason: z.string().optional(),
	userMessages: z.array(userMessageRecordSchema).optional(),
});

export type HistoryEntry = z.infer<typeof historyEntrySchema>;

export const persistedHistorySchema = z.object({
	sessions: z.array(historyEntrySchema),
	lastCleanup: z.number().default(0),
});

export type PersistedHistory = z.infer<typeof persistedHistorySchema>;
