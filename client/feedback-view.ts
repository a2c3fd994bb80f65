import type { FeedbackView, SessionView, ViewStatus } from "./reconciler";
import type { ConnectionState } from "./transport/session-notifier";

function requireElement<T extends HTMLElement>(
	root: ParentNode,
	selector: string,
	type: new () => T,
): T {
	const element = root.querySelector(selector);
	if (!(element instanceof type)) {
		throw new Error(`Missing ${selector}`);
	}
	return element;
}

/** Binds the reconciler to the page shell in public/index.html. */
export class DomFeedbackView implements FeedbackView {
	private readonly summary: HTMLElement;
	private readonly projectDirectory: HTMLElement;
	private readonly feedbackText: HTMLTextAreaElement;
	private readonly submitButton: HTMLButtonElement;
	private readonly statusMessage: HTMLElement;
	private readonly connectionIndicator: HTMLElement;
	private readonly errorMessage: HTMLElement;

	constructor(root: ParentNode = document) {
		this.summary = requireElement(root, "#summary", HTMLElement);
		this.projectDirectory = requireElement(
			root,
			"#project-directory",
			HTMLElement,
		);
		this.feedbackText = requireElement(
			root,
			"#feedback-text",
			HTMLTextAreaElement,
		);
		this.submitButton = requireElement(root, "#submit-button", HTMLButtonElement);
		this.statusMessage = requireElement(root, "#status-message", HTMLElement);
		this.connectionIndicator = requireElement(
			root,
			"#connection-state",
			HTMLElement,
		);
		this.errorMessage = requireElement(root, "#error-message", HTMLElement);
	}

	showSession(session: SessionView): void {
		this.summary.textContent = session.summary;
		this.projectDirectory.textContent = session.projectDirectory;
		this.summary.dataset.sessionId = session.sessionId;
		this.errorMessage.textContent = "";
		this.errorMessage.hidden = true;
	}

	resetForm(options: { preserveDraft: boolean }): void {
		if (!options.preserveDraft) {
			this.feedbackText.value = "";
		}
		this.feedbackText.readOnly = false;
	}

	setStatus(status: ViewStatus, message: string): void {
		this.statusMessage.textContent = message;
		this.statusMessage.dataset.status = status;
	}

	setSubmitEnabled(enabled: boolean): void {
		this.submitButton.disabled = !enabled;
		this.feedbackText.readOnly = !enabled;
	}

	setConnectionState(state: ConnectionState): void {
		this.connectionIndicator.textContent = state;
		this.connectionIndicator.dataset.state = state;
	}

	showError(message: string): void {
		this.errorMessage.textContent = message;
		this.errorMessage.hidden = false;
	}

	getDraft(): string {
		return this.feedbackText.value;
	}

	onSubmit(listener: (feedback: string) => void): void {
		this.submitButton.addEventListener("click", () => {
			listener(this.feedbackText.value);
		});
	}
}
