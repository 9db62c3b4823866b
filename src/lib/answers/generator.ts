import { regex } from "arkregex";
import { generateText, type LanguageModel } from "ai";
import {
	type ExternalCallKind,
	ExternalCallFailure,
	formatError,
} from "../errors.js";
import type { Logger } from "../logger.js";
import {
	buildFaqSystemPrompt,
	CANNOT_ANSWER_MARKER,
	NOT_A_QUESTION_MARKER,
} from "../prompts/faq-prompt.js";
import { truncate } from "../telegram/markdown.js";

export type AnswerResult =
	| { kind: "answer"; text: string }
	| { kind: "not_a_question" }
	| { kind: "cannot_answer"; error?: ExternalCallFailure };

export type AnswerRequest = {
	question: string;
	userId?: number;
	chatId?: number;
};

export type AnswerGenerator = {
	generateAnswer: (request: AnswerRequest) => Promise<AnswerResult>;
	readonly configured: boolean;
};

export type CompletionRequest = {
	model: LanguageModel;
	system: string;
	prompt: string;
	temperature: number;
	maxOutputTokens: number;
	abortSignal: AbortSignal;
};

export type CompletionUsage = {
	inputTokens?: number;
	outputTokens?: number;
	totalTokens?: number;
};

export type CompleteFn = (
	request: CompletionRequest,
) => Promise<{ text: string; usage?: CompletionUsage }>;

type AnswerGeneratorOptions = {
	model: LanguageModel | null;
	faq: string;
	logger: Logger;
	temperature?: number;
	maxOutputTokens?: number;
	timeoutMs?: number;
	complete?: CompleteFn;
};

const ERROR_KIND_PATTERNS = [
	["timeout", regex.as("timeout|timed out|aborted", "i")],
	["rate_limit", regex.as("rate limit|429", "i")],
	["authentication", regex.as("authentication|api key|401", "i")],
	["quota", regex.as("quota|insufficient", "i")],
] as const;

export function classifyCompletionError(error: unknown): ExternalCallKind {
	const text = formatError(error);
	for (const [kind, pattern] of ERROR_KIND_PATTERNS) {
		if (pattern.test(text)) return kind;
	}
	return "unknown";
}

export function classifyAnswer(text: string): AnswerResult {
	const trimmed = text.trim();
	if (!trimmed) return { kind: "cannot_answer" };
	if (trimmed === NOT_A_QUESTION_MARKER) return { kind: "not_a_question" };
	if (trimmed === CANNOT_ANSWER_MARKER) return { kind: "cannot_answer" };
	return { kind: "answer", text: trimmed };
}

const defaultComplete: CompleteFn = (request) => generateText(request);

export function createAnswerGenerator(
	options: AnswerGeneratorOptions,
): AnswerGenerator {
	const {
		model,
		faq,
		logger,
		temperature = 0.2,
		maxOutputTokens = 1000,
		timeoutMs = 30_000,
		complete = defaultComplete,
	} = options;
	const system = buildFaqSystemPrompt(faq);

	async function generateAnswer(request: AnswerRequest): Promise<AnswerResult> {
		const startedAt = Date.now();
		const context = {
			user_id: request.userId,
			chat_id: request.chatId,
			message_length: request.question.length,
		};

		if (!model) {
			logger.error({ event: "llm_model_unconfigured", ...context });
			return { kind: "cannot_answer" };
		}
		if (!faq.trim()) {
			logger.warn({ event: "llm_faq_unavailable", ...context });
			return { kind: "cannot_answer" };
		}
		if (!request.question.trim()) {
			return { kind: "not_a_question" };
		}

		try {
			const result = await complete({
				model,
				system,
				prompt: request.question,
				temperature,
				maxOutputTokens,
				abortSignal: AbortSignal.timeout(timeoutMs),
			});
			const answer = classifyAnswer(result.text);
			logger.info({
				event: "llm_response",
				...context,
				response_type: answer.kind,
				response_length: result.text.trim().length,
				response_preview: truncate(result.text.trim(), 200),
				duration_ms: Date.now() - startedAt,
				prompt_tokens: result.usage?.inputTokens,
				completion_tokens: result.usage?.outputTokens,
				total_tokens: result.usage?.totalTokens,
			});
			return answer;
		} catch (error) {
			const kind = classifyCompletionError(error);
			const failure = new ExternalCallFailure("openai", kind, formatError(error), {
				cause: error,
			});
			logger.error({
				event: "llm_request_failed",
				...context,
				error_kind: kind,
				error: failure.message,
				duration_ms: Date.now() - startedAt,
			});
			return { kind: "cannot_answer", error: failure };
		}
	}

	return { generateAnswer, configured: model !== null };
}
