import type { Bot } from "grammy";
import type {
	MessageReactionUpdated,
	ReactionType,
	ReactionTypeEmoji,
} from "grammy/types";
import type { Logger } from "../logger.js";
import type { ModerationRule, ReactionEvent } from "../moderation/downvote.js";
import type { BotContext, LogContext } from "./types.js";

function emojisOf(reactions: ReactionType[]): string[] {
	return reactions
		.filter((reaction): reaction is ReactionTypeEmoji => reaction.type === "emoji")
		.map((reaction) => reaction.emoji);
}

/** Only emoji reactions the user has just added count. */
export function toReactionEvent(update: MessageReactionUpdated): ReactionEvent {
	const previous = new Set(emojisOf(update.old_reaction));
	return {
		chatId: update.chat.id,
		messageId: update.message_id,
		userId: update.user?.id,
		emojis: emojisOf(update.new_reaction).filter((emoji) => !previous.has(emoji)),
	};
}

export function registerReactionHandler(options: {
	bot: Bot<BotContext>;
	moderation: ModerationRule;
	logger: Logger;
	setLogContext: (ctx: BotContext, update: Partial<LogContext>) => void;
}) {
	const { bot, moderation, logger, setLogContext } = options;

	bot.on("message_reaction", async (ctx) => {
		setLogContext(ctx, { message_type: "reaction" });
		const event = toReactionEvent(ctx.messageReaction);
		const outcome = await moderation.onReaction(event);
		if (outcome.status === "ignored") {
			setLogContext(ctx, {
				outcome: "ignored",
				moderation: outcome.reason,
			});
			return;
		}
		setLogContext(ctx, { moderation: outcome.status });
		if (outcome.status === "delete_failed") {
			logger.warn({
				event: "moderation_reaction_unresolved",
				chat_id: event.chatId,
				message_id: event.messageId,
				error: outcome.error,
			});
		}
	});
}
