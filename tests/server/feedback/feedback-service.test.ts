import { beforeEach, describe, expect, it, vi } from "vitest";
import { ValidationError } from "../../../shared/errors";
import { FeedbackService } from "../../../server/feedback/feedback-service";
import { SessionStore } from "../../../server/sessions/session-store";
import { ConnectionRegistry } from "../../../server/websocket/connection-registry";
import { FakeClientSocket } from "../../helpers/fake-sockets";

function createService() {
	const registry = new ConnectionRegistry({
		sendTimeoutMs: 5_000,
		heartbeatIntervalSeconds: 60,
	});
	let counter = 0;
	const store = new SessionStore({ registry, createId: () => `s${++counter}` });
	const open = vi.fn<(url: string) => Promise<void>>(async () => {});
	const service = new FeedbackService({
		sessionStore: store,
		registry,
		launcher: { open },
		url: "http://127.0.0.1:8765",
	});
	return { registry, store, open, service };
}

describe("FeedbackService", () => {
	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	it("opens the page when no tab is connected and returns the answer", async () => {
		const { store, open, service } = createService();

		const pending = service.requestFeedback({
			summary: "Migrated the schema",
			projectDirectory: "/work/db",
		});
		await vi.waitFor(() => {
			expect(store.pendingWaitCount("s1")).toBe(1);
		});
		await store.submitFeedback("s1", "Approved");

		await expect(pending).resolves.toEqual({
			ok: true,
			value: { feedbackText: "Approved", images: [] },
		});
		expect(open).toHaveBeenCalledWith("http://127.0.0.1:8765");
		expect(store.getCurrent()?.timeoutSeconds).toBe(600);
	});

	it("reuses an open tab instead of opening another", async () => {
		const { registry, store, open, service } = createService();
		registry.register(new FakeClientSocket(), "tab-1");

		const pending = service.requestFeedback({
			summary: "Second pass",
			projectDirectory: "/work/db",
			timeoutSeconds: 120,
		});
		await vi.waitFor(() => {
			expect(store.pendingWaitCount("s1")).toBe(1);
		});
		await store.submitFeedback("s1", "ok");
		await pending;

		expect(open).not.toHaveBeenCalled();
		expect(registry.attachedTo("s1")).toEqual(["tab-1"]);
	});

	it("hands the superseded outcome to the caller whose request was replaced", async () => {
		const { store, service } = createService();

		const first = service.requestFeedback({
			summary: "First",
			projectDirectory: "/work/db",
		});
		await vi.waitFor(() => {
			expect(store.pendingWaitCount("s1")).toBe(1);
		});
		const second = service.requestFeedback({
			summary: "Second",
			projectDirectory: "/work/db",
		});

		const outcome = await first;
		expect(outcome.ok).toBe(false);
		if (!outcome.ok) {
			expect(outcome.error.code).toBe("superseded");
		}

		await vi.waitFor(() => {
			expect(store.pendingWaitCount("s2")).toBe(1);
		});
		await store.submitFeedback("s2", "done");
		await expect(second).resolves.toMatchObject({ ok: true });
	});

	it("returns a validation failure for an unusable timeout", async () => {
		const { service } = createService();

		const outcome = await service.requestFeedback({
			summary: "x",
			projectDirectory: "/work",
			timeoutSeconds: -1,
		});

		expect(outcome.ok).toBe(false);
		if (!outcome.ok) {
			expect(outcome.error).toBeInstanceOf(ValidationError);
		}
	});
});
