// @vitest-environment jsdom
import { beforeEach, describe, expect, it, vi } from "vitest";
import { DomFeedbackView } from "../../client/feedback-view";

function renderShell(): HTMLElement {
	const root = document.createElement("main");
	root.innerHTML = `
		<h1 id="summary"></h1>
		<p id="project-directory"></p>
		<textarea id="feedback-text"></textarea>
		<button id="submit-button" type="button">Send</button>
		<p id="status-message"></p>
		<span id="connection-state"></span>
		<p id="error-message" hidden></p>
	`;
	document.body.replaceChildren(root);
	return root;
}

function byId<T extends HTMLElement>(id: string, type: new () => T): T {
	const element = document.getElementById(id);
	if (!(element instanceof type)) {
		throw new Error(`missing #${id}`);
	}
	return element;
}

describe("DomFeedbackView", () => {
	let view: DomFeedbackView;

	beforeEach(() => {
		view = new DomFeedbackView(renderShell());
	});

	it("shows the session and clears an earlier error", () => {
		view.showError("Submission rejected");

		view.showSession({
			sessionId: "s1",
			summary: "Split the router",
			projectDirectory: "/work/api",
		});

		const summary = byId("summary", HTMLElement);
		expect(summary.textContent).toBe("Split the router");
		expect(summary.dataset.sessionId).toBe("s1");
		expect(byId("project-directory", HTMLElement).textContent).toBe("/work/api");
		expect(byId("error-message", HTMLElement).hidden).toBe(true);
	});

	it("clears or keeps the draft on reset", () => {
		const textarea = byId("feedback-text", HTMLTextAreaElement);
		textarea.value = "half written";

		view.resetForm({ preserveDraft: true });
		expect(view.getDraft()).toBe("half written");

		view.resetForm({ preserveDraft: false });
		expect(view.getDraft()).toBe("");
	});

	it("locks the form while submission is disabled", () => {
		view.setSubmitEnabled(false);

		expect(byId("submit-button", HTMLButtonElement).disabled).toBe(true);
		expect(byId("feedback-text", HTMLTextAreaElement).readOnly).toBe(true);

		view.setSubmitEnabled(true);
		expect(byId("submit-button", HTMLButtonElement).disabled).toBe(false);
	});

	it("reflects status and connection state", () => {
		view.setStatus("submitted", "Feedback submitted");
		view.setConnectionState("polling");

		const status = byId("status-message", HTMLElement);
		expect(status.textContent).toBe("Feedback submitted");
		expect(status.dataset.status).toBe("submitted");
		expect(byId("connection-state", HTMLElement).dataset.state).toBe("polling");
	});

	it("passes the draft to the submit listener", () => {
		const listener = vi.fn();
		view.onSubmit(listener);
		byId("feedback-text", HTMLTextAreaElement).value = "ship it";

		byId("submit-button", HTMLButtonElement).click();

		expect(listener).toHaveBeenCalledWith("ship it");
	});

	it("fails fast when the shell is missing an element", () => {
		const root = document.createElement("div");

		expect(() => new DomFeedbackView(root)).toThrow("Missing #summary");
	});
});
