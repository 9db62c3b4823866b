import type { Api } from "grammy";

export type SendMessageOptions = {
	parseMode?: "Markdown";
	replyToMessageId?: number;
};

export type SentMessageRef = { messageId: number };

/** The slice of the Telegram API the handlers need. */
export type ChatTransport = {
	sendMessage: (
		chatId: number | string,
		text: string,
		options?: SendMessageOptions,
	) => Promise<SentMessageRef>;
	deleteMessage: (chatId: number, messageId: number) => Promise<void>;
	sendTyping: (chatId: number) => Promise<void>;
};

export function createTelegramTransport(api: Api): ChatTransport {
	return {
		sendMessage: async (chatId, text, options) => {
			const message = await api.sendMessage(chatId, text, {
				parse_mode: options?.parseMode,
				reply_parameters:
					options?.replyToMessageId === undefined
						? undefined
						: {
								message_id: options.replyToMessageId,
								allow_sending_without_reply: true,
							},
			});
			return { messageId: message.message_id };
		},
		deleteMessage: async (chatId, messageId) => {
			await api.deleteMessage(chatId, messageId);
		},
		sendTyping: async (chatId) => {
			await api.sendChatAction(chatId, "typing");
		},
	};
}
