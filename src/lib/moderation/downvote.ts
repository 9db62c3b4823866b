import type { AdvisorPolicy } from "../access/advisors.js";
import type { ChatTransport } from "../bot/transport.js";
import { buildModerationAuditNotice } from "../bot/notices.js";
import { formatError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { SentMessageRegistry } from "./sent-messages.js";

export type ReactionEvent = {
	chatId: number;
	messageId: number;
	userId?: number;
	/** Emoji reactions newly added by this update. */
	emojis: string[];
};

export type ModerationIgnoreReason =
	| "not_advisor"
	| "not_downvote"
	| "moderator_chat"
	| "not_bot_message";

export type ModerationOutcome =
	| { status: "ignored"; reason: ModerationIgnoreReason }
	| { status: "deleted"; audited: boolean }
	| { status: "delete_failed"; error: string };

type ModerationRuleOptions = {
	policy: AdvisorPolicy;
	registry: SentMessageRegistry;
	transport: ChatTransport;
	downvoteEmoji: string;
	moderatorChatId?: string;
	logger: Logger;
};

export function createModerationRule(options: ModerationRuleOptions) {
	const { policy, registry, transport, downvoteEmoji, logger } = options;
	const moderatorChatId = options.moderatorChatId?.trim() ?? "";

	async function sendAudit(
		event: ReactionEvent,
		text: string | undefined,
	): Promise<boolean> {
		if (!moderatorChatId) return false;
		try {
			await transport.sendMessage(
				moderatorChatId,
				buildModerationAuditNotice({
					chatId: event.chatId,
					messageId: event.messageId,
					advisorId: event.userId,
					text,
				}),
			);
			return true;
		} catch (error) {
			logger.error({
				event: "moderation_audit_failed",
				chat_id: event.chatId,
				message_id: event.messageId,
				moderator_chat_id: moderatorChatId,
				error: formatError(error),
			});
			return false;
		}
	}

	async function onReaction(event: ReactionEvent): Promise<ModerationOutcome> {
		if (!policy.isAdvisor(event.userId)) {
			return { status: "ignored", reason: "not_advisor" };
		}
		if (!event.emojis.includes(downvoteEmoji)) {
			return { status: "ignored", reason: "not_downvote" };
		}
		if (moderatorChatId && String(event.chatId) === moderatorChatId) {
			return { status: "ignored", reason: "moderator_chat" };
		}
		const target = registry.get(event.chatId, event.messageId);
		if (!target) {
			return { status: "ignored", reason: "not_bot_message" };
		}

		try {
			await transport.deleteMessage(event.chatId, event.messageId);
		} catch (error) {
			const message = formatError(error);
			logger.error({
				event: "moderation_delete_failed",
				chat_id: event.chatId,
				message_id: event.messageId,
				advisor_id: event.userId,
				error: message,
			});
			return { status: "delete_failed", error: message };
		}

		registry.forget(event.chatId, event.messageId);
		logger.info({
			event: "moderation_message_deleted",
			chat_id: event.chatId,
			message_id: event.messageId,
			advisor_id: event.userId,
			reply_to_message_id: target.replyToMessageId,
		});
		const audited = await sendAudit(event, target.text);
		return { status: "deleted", audited };
	}

	return { onReaction };
}

export type ModerationRule = ReturnType<typeof createModerationRule>;
