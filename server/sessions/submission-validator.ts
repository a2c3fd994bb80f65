import { ValidationError } from "../../shared/errors";
import type { SubmissionInput } from "./session-types";

export const SUPPORTED_IMAGE_TYPES: ReadonlySet<string> = new Set([
	"image/png",
	"image/jpeg",
	"image/jpg",
	"image/gif",
	"image/bmp",
	"image/webp",
]);

export interface SubmissionLimits {
	maxFeedbackChars: number;
	maxImages: number;
	maxImageBytes: number;
	allowedImageTypes: ReadonlySet<string>;
}

export const DEFAULT_SUBMISSION_LIMITS: SubmissionLimits = {
	maxFeedbackChars: 100_000,
	maxImages: 10,
	maxImageBytes: 1024 * 1024,
	allowedImageTypes: SUPPORTED_IMAGE_TYPES,
};

/** Returns null when the submission is acceptable. */
export type SubmissionValidator = (
	input: SubmissionInput,
) => ValidationError | null;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodedBase64Size(data: string): number {
	const padding = data.endsWith("==") ? 2 : data.endsWith("=") ? 1 : 0;
	return Math.floor((data.length * 3) / 4) - padding;
}

export function createSubmissionValidator(
	limits: SubmissionLimits = DEFAULT_SUBMISSION_LIMITS,
): SubmissionValidator {
	return (input) => {
		const issues: string[] = [];

		if (input.feedbackText.length > limits.maxFeedbackChars) {
			issues.push(
				`feedback: exceeds ${limits.maxFeedbackChars} characters (${input.feedbackText.length})`,
			);
		}
		if (input.images.length > limits.maxImages) {
			issues.push(
				`images: at most ${limits.maxImages} allowed (${input.images.length})`,
			);
		}

		input.images.forEach((image, index) => {
			const label = `images.${index} (${image.name})`;
			if (!limits.allowedImageTypes.has(image.type.toLowerCase())) {
				issues.push(`${label}: unsupported type ${image.type}`);
			}
			if (image.data.length === 0 || image.data.length % 4 !== 0) {
				issues.push(`${label}: data is not base64`);
				return;
			}
			if (!BASE64_PATTERN.test(image.data)) {
				issues.push(`${label}: data is not base64`);
				return;
			}
			const bytes = decodedBase64Size(image.data);
			if (bytes > limits.maxImageBytes) {
				issues.push(
					`${label}: ${bytes} bytes exceeds limit of ${limits.maxImageBytes}`,
				);
			}
		});

		if (issues.length === 0) {
			return null;
		}
		return new ValidationError("Submission rejected", issues);
	};
}
