import { describe, expect, it } from "vitest";
import { createSentMessageRegistry } from "../src/lib/moderation/sent-messages.js";

describe("sent message registry", () => {
	it("remembers messages per chat", () => {
		const registry = createSentMessageRegistry();
		registry.record({ chatId: 7, messageId: 42, text: "hi", replyToMessageId: 41 });

		expect(registry.isBotMessage(7, 42)).toBe(true);
		expect(registry.isBotMessage(8, 42)).toBe(false);
		expect(registry.get(7, 42)).toMatchObject({
			text: "hi",
			replyToMessageId: 41,
		});
	});

	it("evicts the oldest entries beyond the bound", () => {
		const registry = createSentMessageRegistry({ maxEntries: 2 });
		registry.record({ chatId: 1, messageId: 1, text: "a" });
		registry.record({ chatId: 1, messageId: 2, text: "b" });
		registry.record({ chatId: 1, messageId: 1, text: "a again" });
		registry.record({ chatId: 1, messageId: 3, text: "c" });

		expect(registry.size()).toBe(2);
		expect(registry.isBotMessage(1, 2)).toBe(false);
		expect(registry.get(1, 1)?.text).toBe("a again");
		expect(registry.isBotMessage(1, 3)).toBe(true);
	});

	it("forgets deleted messages", () => {
		const registry = createSentMessageRegistry();
		registry.record({ chatId: 1, messageId: 5, text: "x" });
		expect(registry.forget(1, 5)).toBe(true);
		expect(registry.forget(1, 5)).toBe(false);
		expect(registry.isBotMessage(1, 5)).toBe(false);
	});
});
