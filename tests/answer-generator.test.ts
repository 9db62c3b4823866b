import { describe, expect, it, vi } from "vitest";
import {
	classifyCompletionError,
	type CompleteFn,
	createAnswerGenerator,
} from "../src/lib/answers/generator.js";
import { ExternalCallFailure } from "../src/lib/errors.js";
import { createTestLogger } from "./helpers/fakes.js";

const FAQ = "## Enrollment\nEnrollment opens in May.";

function setup(options: { text?: string; faq?: string; withModel?: boolean } = {}) {
	const complete = vi.fn<CompleteFn>(async () => ({
		text: options.text ?? "Enrollment opens in May.",
		usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
	}));
	const logger = createTestLogger();
	const generator = createAnswerGenerator({
		model: options.withModel === false ? null : "test-model",
		faq: options.faq ?? FAQ,
		logger,
		complete,
	});
	return { complete, logger, generator };
}

describe("answer generator", () => {
	it("answers from the FAQ prompt", async () => {
		const { generator, complete } = setup({ text: "  Enrollment opens in May.  " });

		const result = await generator.generateAnswer({
			question: "When does enrollment open?",
			userId: 333,
			chatId: -100,
		});

		expect(result).toEqual({ kind: "answer", text: "Enrollment opens in May." });
		expect(complete).toHaveBeenCalledWith(
			expect.objectContaining({
				model: "test-model",
				prompt: "When does enrollment open?",
				temperature: 0.2,
				maxOutputTokens: 1000,
			}),
		);
		const request = complete.mock.calls[0]?.[0];
		expect(request?.system).toContain(`--- BEGIN FAQ ---\n${FAQ}\n--- END FAQ ---`);
		expect(request?.system).toContain("[NOT_A_QUESTION]");
		expect(request?.system).toContain("[CANNOT_ANSWER]");
	});

	it("maps the markers to result kinds", async () => {
		expect(
			await setup({ text: "[NOT_A_QUESTION]" }).generator.generateAnswer({
				question: "hello everyone",
			}),
		).toEqual({ kind: "not_a_question" });
		expect(
			await setup({ text: "[CANNOT_ANSWER]" }).generator.generateAnswer({
				question: "What is the wifi password?",
			}),
		).toEqual({ kind: "cannot_answer" });
		expect(
			await setup({ text: "   " }).generator.generateAnswer({
				question: "What is the wifi password?",
			}),
		).toEqual({ kind: "cannot_answer" });
	});

	it("skips the model call without a model, FAQ or question", async () => {
		const noModel = setup({ withModel: false });
		expect(await noModel.generator.generateAnswer({ question: "When?" })).toEqual({
			kind: "cannot_answer",
		});
		expect(noModel.complete).not.toHaveBeenCalled();
		expect(noModel.generator.configured).toBe(false);

		const noFaq = setup({ faq: "  " });
		expect(await noFaq.generator.generateAnswer({ question: "When?" })).toEqual({
			kind: "cannot_answer",
		});
		expect(noFaq.complete).not.toHaveBeenCalled();

		const empty = setup();
		expect(await empty.generator.generateAnswer({ question: "  " })).toEqual({
			kind: "not_a_question",
		});
		expect(empty.complete).not.toHaveBeenCalled();
	});

	it("turns SDK failures into cannot_answer with a classified error", async () => {
		const { generator, complete, logger } = setup();
		complete.mockRejectedValueOnce(new Error("Rate limit reached for requests"));

		const result = await generator.generateAnswer({ question: "When?" });

		expect(result.kind).toBe("cannot_answer");
		const error = result.kind === "cannot_answer" ? result.error : undefined;
		expect(error).toBeInstanceOf(ExternalCallFailure);
		expect(error?.kind).toBe("rate_limit");
		expect(error?.message).toBe("Error: Rate limit reached for requests");
		expect(logger.error).toHaveBeenCalledWith(
			expect.objectContaining({
				event: "llm_request_failed",
				error_kind: "rate_limit",
			}),
		);
	});
});

describe("classifyCompletionError", () => {
	it("recognises common failure kinds", () => {
		expect(classifyCompletionError(new Error("Request timed out."))).toBe("timeout");
		expect(
			classifyCompletionError(new Error("Incorrect API key provided: test-key")),
		).toBe("authentication");
		expect(
			classifyCompletionError(new Error("You exceeded your current quota")),
		).toBe("quota");
		expect(classifyCompletionError("something else")).toBe("unknown");
	});
});
