import type { ActivationGate } from "../access/activation.js";
import type { AdvisorPolicy } from "../access/advisors.js";
import type { AnswerGenerator, AnswerResult } from "../answers/generator.js";
import { ExternalCallFailure, formatError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { SentMessageRegistry } from "../moderation/sent-messages.js";
import { buildMessageLink, truncate } from "../telegram/markdown.js";
import {
	buildDeliveryFailureReport,
	buildQuestionAlert,
	type NoticeUser,
} from "./notices.js";
import type { SendFn, TelegramHelpers } from "./telegram.js";
import type { ChatTransport } from "./transport.js";

export const TRY_AGAIN_LATER_REPLY =
	"Sorry, I can't answer right now. Please try again later.";

export type IncomingText = {
	chatId: number;
	chatTitle?: string;
	messageId: number;
	text: string;
	user: NoticeUser;
};

export type MessageOutcome =
	| "ignored_group"
	| "ignored_advisor"
	| "ignored_inactive"
	| "ignored_command"
	| "not_a_question"
	| "cannot_answer"
	| "answered"
	| "delivery_failed";

type MessageHandlerDeps = {
	gate: ActivationGate;
	policy: AdvisorPolicy;
	groupChatIds: ReadonlySet<number>;
	answers: AnswerGenerator;
	transport: ChatTransport;
	registry: SentMessageRegistry;
	telegram: Pick<TelegramHelpers, "deliverAnswer">;
	moderatorChatId: string;
	logger: Logger;
	logDebug: (message: string, data?: unknown) => void;
};

export function createMessageHandler(deps: MessageHandlerDeps) {
	const {
		gate,
		policy,
		groupChatIds,
		answers,
		transport,
		registry,
		telegram,
		moderatorChatId,
		logger,
		logDebug,
	} = deps;

	// Every check here is synchronous and runs before any external call.
	function resolveSkip(
		message: IncomingText,
		text: string,
	): MessageOutcome | null {
		if (groupChatIds.size > 0 && !groupChatIds.has(message.chatId)) {
			return "ignored_group";
		}
		if (policy.isAdvisor(message.user.id)) return "ignored_advisor";
		if (!gate.shouldRespond()) return "ignored_inactive";
		if (!text || text.startsWith("/")) return "ignored_command";
		return null;
	}

	function createReplySender(message: IncomingText): SendFn {
		return async (chunk, parseMode) => {
			const sent = await transport.sendMessage(message.chatId, chunk, {
				parseMode,
				replyToMessageId: message.messageId,
			});
			registry.record({
				chatId: message.chatId,
				messageId: sent.messageId,
				text: chunk,
				replyToMessageId: message.messageId,
			});
			return sent;
		};
	}

	async function notifyModerator(text: string, event: string, message: IncomingText) {
		if (!moderatorChatId) {
			logger.warn({
				event: `${event}_unreported`,
				reason: "moderator_chat_unset",
				chat_id: message.chatId,
				message_id: message.messageId,
			});
			return;
		}
		try {
			await transport.sendMessage(moderatorChatId, text);
			logger.info({
				event,
				moderator_chat_id: moderatorChatId,
				chat_id: message.chatId,
				message_id: message.messageId,
			});
		} catch (error) {
			logger.error({
				event: `${event}_failed`,
				moderator_chat_id: moderatorChatId,
				chat_id: message.chatId,
				error: formatError(error),
			});
		}
	}

	async function handleCannotAnswer(
		message: IncomingText,
		text: string,
		error?: ExternalCallFailure,
	) {
		if (error) {
			try {
				await createReplySender(message)(TRY_AGAIN_LATER_REPLY);
			} catch (replyError) {
				logger.error({
					event: "apology_send_failed",
					chat_id: message.chatId,
					error: formatError(replyError),
				});
			}
		}
		await notifyModerator(
			buildQuestionAlert({
				chatId: message.chatId,
				chatTitle: message.chatTitle,
				user: message.user,
				question: text,
				link: buildMessageLink(message.chatId, message.messageId),
				error: error?.message,
			}),
			"moderator_question_alert",
			message,
		);
	}

	async function handleAnswer(
		message: IncomingText,
		text: string,
		answer: string,
	): Promise<MessageOutcome> {
		const result = await telegram.deliverAnswer(
			createReplySender(message),
			answer,
		);
		logger[result.delivered ? "info" : "warn"]({
			event: "answer_delivery",
			chat_id: message.chatId,
			message_id: message.messageId,
			delivered: result.delivered,
			attempts: result.attempts,
			sent_messages: result.messages.length,
		});
		if (result.delivered) return "answered";
		await notifyModerator(
			buildDeliveryFailureReport({
				chatId: message.chatId,
				chatTitle: message.chatTitle,
				user: message.user,
				question: text,
				answer,
				attempts: result.attempts,
			}),
			"moderator_delivery_failure",
			message,
		);
		return "delivery_failed";
	}

	async function handleIncomingText(
		message: IncomingText,
	): Promise<MessageOutcome> {
		const text = message.text.trim();
		const skip = resolveSkip(message, text);
		if (skip) {
			logDebug("message ignored", {
				reason: skip,
				chat_id: message.chatId,
				user_id: message.user.id,
			});
			return skip;
		}

		logDebug("processing message", {
			chat_id: message.chatId,
			message_length: text.length,
			message_preview: truncate(text, 100),
		});

		try {
			await transport.sendTyping(message.chatId);
		} catch (error) {
			logDebug("typing indicator failed", { error: formatError(error) });
		}

		let result: AnswerResult;
		try {
			result = await answers.generateAnswer({
				question: text,
				userId: message.user.id,
				chatId: message.chatId,
			});
		} catch (error) {
			result = {
				kind: "cannot_answer",
				error: new ExternalCallFailure("openai", "unknown", formatError(error), {
					cause: error,
				}),
			};
		}

		try {
			switch (result.kind) {
				case "not_a_question":
					return "not_a_question";
				case "cannot_answer":
					await handleCannotAnswer(message, text, result.error);
					return "cannot_answer";
				case "answer":
					return await handleAnswer(message, text, result.text);
			}
		} catch (error) {
			logger.error({
				event: "message_processing_failed",
				chat_id: message.chatId,
				message_id: message.messageId,
				error: formatError(error),
			});
			await handleCannotAnswer(
				message,
				text,
				new ExternalCallFailure("telegram", "unknown", formatError(error), {
					cause: error,
				}),
			);
			return "cannot_answer";
		}
	}

	return { handleIncomingText };
}

export type MessageHandler = ReturnType<typeof createMessageHandler>;
