export type SentMessage = {
	chatId: number;
	messageId: number;
	text: string;
	replyToMessageId?: number;
	sentAt: number;
};

export type SentMessageRegistry = {
	record: (message: Omit<SentMessage, "sentAt">) => void;
	get: (chatId: number, messageId: number) => SentMessage | undefined;
	isBotMessage: (chatId: number, messageId: number) => boolean;
	forget: (chatId: number, messageId: number) => boolean;
	size: () => number;
};

function messageKey(chatId: number, messageId: number) {
	return `${chatId}:${messageId}`;
}

// Reaction updates carry no author, so provenance is what we remember sending.
export function createSentMessageRegistry(
	options: { maxEntries?: number } = {},
): SentMessageRegistry {
	const maxEntries =
		options.maxEntries !== undefined && options.maxEntries > 0
			? options.maxEntries
			: 1000;
	const messages = new Map<string, SentMessage>();

	const evict = () => {
		while (messages.size > maxEntries) {
			const oldest = messages.keys().next();
			if (oldest.done) return;
			messages.delete(oldest.value);
		}
	};

	return {
		record: (message) => {
			const key = messageKey(message.chatId, message.messageId);
			messages.delete(key);
			messages.set(key, { ...message, sentAt: Date.now() });
			evict();
		},
		get: (chatId, messageId) => messages.get(messageKey(chatId, messageId)),
		isBotMessage: (chatId, messageId) =>
			messages.has(messageKey(chatId, messageId)),
		forget: (chatId, messageId) =>
			messages.delete(messageKey(chatId, messageId)),
		size: () => messages.size,
	};
}
