import { z } from "zod";
import { SESSION_STATUSES } from "./types";

// Wire protocol between the session hub and browser tabs.
// Every message is `{ type, data, timestamp }`. Fields are only ever added,
// never removed; a type neither end recognizes is ignored.

const sessionStatusSchema = z.enum(SESSION_STATUSES);

const timestampSchema = z.string();

/** Heartbeats carry whatever clock value the tab sent (epoch ms or ISO). */
const clockValueSchema = z.union([z.number(), z.string()]);

export const feedbackImageSchema = z.object({
	name: z.string().min(1),
	/** base64, no data: prefix */
	data: z.string(),
	size: z.number().int().nonnegative(),
	type: z.string().default("image/png"),
});

export type FeedbackImage = z.infer<typeof feedbackImageSchema>;

// -- Client -> Server --

export const submitFeedbackMessageSchema = z.object({
	type: z.literal("submit_feedback"),
	data: z.object({
		/** Session the tab is answering. Absent means "whatever is current". */
		session_id: z.string().optional(),
		feedback: z.string(),
		images: z.array(feedbackImageSchema).default([]),
		settings: z.record(z.unknown()).default({}),
	}),
	timestamp: timestampSchema.default(() => new Date().toISOString()),
});

export const heartbeatMessageSchema = z.object({
	type: z.literal("heartbeat"),
	data: z.object({ timestamp: clockValueSchema }),
	timestamp: timestampSchema.default(() => new Date().toISOString()),
});

export const languageSwitchMessageSchema = z.object({
	type: z.literal("language_switch"),
	data: z.object({ language: z.string().min(1) }),
	timestamp: timestampSchema.default(() => new Date().toISOString()),
});

export const getStatusMessageSchema = z.object({
	type: z.literal("get_status"),
	data: z.object({}).default({}),
	timestamp: timestampSchema.default(() => new Date().toISOString()),
});

/** The tab's own countdown ran out before the server's timer. */
export const userTimeoutMessageSchema = z.object({
	type: z.literal("user_timeout"),
	data: z.object({ session_id: z.string().optional() }).default({}),
	timestamp: timestampSchema.default(() => new Date().toISOString()),
});

export const clientMessageSchema = z.discriminatedUnion("type", [
	submitFeedbackMessageSchema,
	heartbeatMessageSchema,
	languageSwitchMessageSchema,
	getStatusMessageSchema,
	userTimeoutMessageSchema,
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;
export type ClientMessageType = ClientMessage["type"];

// -- Server -> Client --

export const connectionEstablishedMessageSchema = z.object({
	type: z.literal("connection_established"),
	data: z.object({
		session_id: z.string().nullable(),
		server_time: timestampSchema,
	}),
	timestamp: timestampSchema,
});

export const sessionUpdatedMessageSchema = z.object({
	type: z.literal("session_updated"),
	data: z.object({
		session_id: z.string(),
		summary: z.string(),
		project_directory: z.string(),
		timestamp: timestampSchema,
		timeout_seconds: z.number().positive(),
	}),
	timestamp: timestampSchema,
});

export const feedbackReceivedMessageSchema = z.object({
	type: z.literal("feedback_received"),
	data: z.object({
		session_id: z.string(),
		status: sessionStatusSchema,
		message: z.string(),
	}),
	timestamp: timestampSchema,
});

export const statusUpdateMessageSchema = z.object({
	type: z.literal("status_update"),
	data: z.object({
		status: z.union([sessionStatusSchema, z.literal("no_session")]),
		message: z.string(),
		progress: z.number().min(0).max(100).optional(),
		session_id: z.string().optional(),
		/** Set when the status change has a cause worth naming, e.g. "timeout". */
		reason: z.string().optional(),
	}),
	timestamp: timestampSchema,
});

export const errorMessageSchema = z.object({
	type: z.literal("error"),
	data: z.object({
		error_code: z.string(),
		message: z.string(),
		details: z.record(z.unknown()).optional(),
	}),
	timestamp: timestampSchema,
});

export const heartbeatResponseMessageSchema = z.object({
	type: z.literal("heartbeat_response"),
	data: z.object({ timestamp: clockValueSchema }),
	timestamp: timestampSchema,
});

export const serverMessageSchema = z.discriminatedUnion("type", [
	connectionEstablishedMessageSchema,
	sessionUpdatedMessageSchema,
	feedbackReceivedMessageSchema,
	statusUpdateMessageSchema,
	errorMessageSchema,
	heartbeatResponseMessageSchema,
]);

export type ServerMessage = z.infer<typeof serverMessageSchema>;
export type ServerMessageType = ServerMessage["type"];

type ServerDataByType = { [M in ServerMessage as M["type"]]: M["data"] };
type ClientDataByType = { [M in ClientMessage as M["type"]]: M["data"] };

export type ServerEnvelope<TType extends ServerMessageType> = {
	type: TType;
	data: ServerDataByType[TType];
	timestamp: string;
};

export type ClientEnvelope<TType extends ClientMessageType> = {
	type: TType;
	data: ClientDataByType[TType];
	timestamp: string;
};

export function serverMessage<TType extends ServerMessageType>(
	type: TType,
	data: ServerDataByType[TType],
	at: Date = new Date(),
): ServerEnvelope<TType> {
	return { type, data, timestamp: at.toISOString() };
}

export function clientMessage<TType extends ClientMessageType>(
	type: TType,
	data: ClientDataByType[TType],
	at: Date = new Date(),
): ClientEnvelope<TType> {
	return { type, data, timestamp: at.toISOString() };
}

export function encodeMessage(message: ServerMessage | ClientMessage): string {
	return JSON.stringify(message);
}

export type DecodeResult<TMessage> =
	| { kind: "message"; message: TMessage }
	| { kind: "unknown"; type: string }
	| { kind: "invalid"; reason: string };

const CLIENT_MESSAGE_TYPES: ReadonlySet<string> = new Set(
	clientMessageSchema.options.map((option) => option.shape.type.value),
);

const SERVER_MESSAGE_TYPES: ReadonlySet<string> = new Set(
	serverMessageSchema.options.map((option) => option.shape.type.value),
);

function decodeWith<TMessage>(
	raw: string,
	knownTypes: ReadonlySet<string>,
	parse: (
		value: unknown,
	) => { success: true; data: TMessage } | { success: false; error: z.ZodError },
): DecodeResult<TMessage> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		return { kind: "invalid", reason: "Malformed JSON" };
	}

	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		return { kind: "invalid", reason: "Message must be a JSON object" };
	}
	const type = "type" in parsed ? parsed.type : undefined;
	if (typeof type !== "string") {
		return { kind: "invalid", reason: "Message type must be a string" };
	}
	if (!knownTypes.has(type)) {
		return { kind: "unknown", type };
	}

	const result = parse(parsed);
	if (!result.success) {
		return {
			kind: "invalid",
			reason: result.error.issues
				.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
				.join("; "),
		};
	}
	return { kind: "message", message: result.data };
}

/** Server side: decode what a tab sent. */
export function decodeClientMessage(raw: string): DecodeResult<ClientMessage> {
	return decodeWith(raw, CLIENT_MESSAGE_TYPES, (value) =>
		clientMessageSchema.safeParse(value),
	);
}

/** Client side: decode what the hub sent. */
export function decodeServerMessage(raw: string): DecodeResult<ServerMessage> {
	return decodeWith(raw, SERVER_MESSAGE_TYPES, (value) =>
		serverMessageSchema.safeParse(value),
	);
}
