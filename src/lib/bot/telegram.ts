import { regex } from "arkregex";
import { GrammyError } from "grammy";
import { formatError } from "../errors.js";
import { sanitizeMarkdown } from "../telegram/markdown.js";
import type { DeliveryAttempt } from "./notices.js";
import type { SentMessageRef } from "./transport.js";

export type SendFn = (
	text: string,
	parseMode?: "Markdown",
) => Promise<SentMessageRef>;

export type DeliveryResult = {
	delivered: boolean;
	attempts: DeliveryAttempt[];
	messages: SentMessageRef[];
};

type TelegramHelpersOptions = {
	textChunkLimit: number;
	logDebug: (message: string, data?: unknown) => void;
};

type RetryConfig = {
	attempts: number;
	minDelayMs: number;
	maxDelayMs: number;
	jitter: number;
};

type DeliveryStrategy = {
	method: DeliveryAttempt["method"];
	parseMode?: "Markdown";
	prepare: (text: string) => string;
};

const TELEGRAM_RETRY_DEFAULTS: RetryConfig = {
	attempts: 3,
	minDelayMs: 400,
	maxDelayMs: 30_000,
	jitter: 0.1,
};

const TELEGRAM_RETRY_RE = regex.as(
	"429|timeout|connect|reset|closed|unavailable|temporarily|network request",
	"i",
);
const TELEGRAM_PARSE_ERR_RE = regex.as(
	"can't parse entities|parse entities|find end of the entity",
	"i",
);

const DELIVERY_STRATEGIES: DeliveryStrategy[] = [
	{ method: "markdown", parseMode: "Markdown", prepare: (text) => text },
	{
		method: "sanitized_markdown",
		parseMode: "Markdown",
		prepare: sanitizeMarkdown,
	},
	{ method: "plain_text", prepare: (text) => text },
];

/** Splits on code points so surrogate pairs stay together. */
export function splitChunks(text: string, limit: number): string[] {
	const codePoints = Array.from(text);
	if (codePoints.length <= limit) return [text];
	const chunks: string[] = [];
	for (let i = 0; i < codePoints.length; i += limit) {
		chunks.push(codePoints.slice(i, i + limit).join(""));
	}
	return chunks;
}

export function createTelegramHelpers(options: TelegramHelpersOptions) {
	const { logDebug } = options;
	const limit =
		Number.isFinite(options.textChunkLimit) && options.textChunkLimit > 0
			? options.textChunkLimit
			: 4000;

	function getRetryAfterMs(error: unknown) {
		if (!(error instanceof GrammyError)) return null;
		const candidate = error.parameters.retry_after;
		return typeof candidate === "number" && Number.isFinite(candidate)
			? candidate * 1000
			: null;
	}

	async function sleep(ms: number) {
		await new Promise((resolve) => setTimeout(resolve, ms));
	}

	async function retryTelegram<T>(
		fn: () => Promise<T>,
		label: string,
	): Promise<T> {
		let lastError: unknown = null;
		for (
			let attempt = 1;
			attempt <= TELEGRAM_RETRY_DEFAULTS.attempts;
			attempt += 1
		) {
			try {
				return await fn();
			} catch (error) {
				lastError = error;
				const errorText = formatError(error);
				if (TELEGRAM_PARSE_ERR_RE.test(errorText)) {
					throw error;
				}
				const shouldRetry = TELEGRAM_RETRY_RE.test(errorText);
				if (!shouldRetry || attempt >= TELEGRAM_RETRY_DEFAULTS.attempts) {
					throw error;
				}
				const retryAfterMs = getRetryAfterMs(error);
				const baseDelay =
					retryAfterMs ??
					Math.min(
						TELEGRAM_RETRY_DEFAULTS.minDelayMs * 2 ** (attempt - 1),
						TELEGRAM_RETRY_DEFAULTS.maxDelayMs,
					);
				const jitter = TELEGRAM_RETRY_DEFAULTS.jitter;
				const delayMs = Math.max(
					0,
					Math.round(baseDelay * (1 + (Math.random() * 2 - 1) * jitter)),
				);
				logDebug("telegram send retry", {
					label,
					attempt,
					delayMs,
					error: errorText,
				});
				await sleep(delayMs);
			}
		}
		throw lastError ?? new Error("telegram send failed");
	}

	async function sendChunks(
		send: SendFn,
		text: string,
		parseMode: "Markdown" | undefined,
		label: string,
	) {
		const sent: SentMessageRef[] = [];
		for (const chunk of splitChunks(text, limit)) {
			sent.push(await retryTelegram(() => send(chunk, parseMode), label));
		}
		return sent;
	}

	/**
	 * Sends an LLM answer chunk by chunk. Each chunk falls back from raw
	 * Markdown to sanitised Markdown to plain text on its own, so parts already
	 * delivered are never sent again. Delivery stops at the first chunk that no
	 * strategy can send.
	 */
	async function deliverAnswer(
		send: SendFn,
		text: string,
	): Promise<DeliveryResult> {
		const attempts: DeliveryAttempt[] = [];
		const messages: SentMessageRef[] = [];
		const chunks = splitChunks(text, limit);
		for (const [index, chunk] of chunks.entries()) {
			const part = chunks.length > 1 ? { chunk: index + 1 } : {};
			let sent: SentMessageRef | null = null;
			for (const strategy of DELIVERY_STRATEGIES) {
				try {
					const prepared = strategy.prepare(chunk);
					sent = await retryTelegram(
						() => send(prepared, strategy.parseMode),
						"sendMessage",
					);
					attempts.push({ method: strategy.method, success: true, ...part });
					break;
				} catch (error) {
					const errorText = formatError(error);
					attempts.push({
						method: strategy.method,
						success: false,
						error: errorText,
						...part,
					});
					logDebug("telegram answer delivery failed", {
						method: strategy.method,
						chunk: index + 1,
						error: errorText,
					});
				}
			}
			if (!sent) return { delivered: false, attempts, messages };
			messages.push(sent);
		}
		return { delivered: true, attempts, messages };
	}

	async function sendText(
		send: SendFn,
		text: string,
		parseMode?: "Markdown",
	): Promise<SentMessageRef[]> {
		if (!parseMode) {
			return sendChunks(send, text, undefined, "sendMessage_plain");
		}
		try {
			return await sendChunks(send, text, parseMode, "sendMessage");
		} catch (error) {
			logDebug("telegram markdown reply failed, retrying as plain text", {
				error: formatError(error),
			});
		}
		return sendChunks(send, text, undefined, "sendMessage_plain");
	}

	return {
		deliverAnswer,
		sendText,
		retryTelegram,
	};
}

export type TelegramHelpers = ReturnType<typeof createTelegramHelpers>;
