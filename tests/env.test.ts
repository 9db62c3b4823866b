import { describe, expect, it } from "vitest";
import { loadBotEnv } from "../src/lib/config/env.js";
import { ConfigurationError } from "../src/lib/errors.js";

describe("loadBotEnv", () => {
	it("requires a bot token", () => {
		expect(() => loadBotEnv({})).toThrow(ConfigurationError);
		expect(() => loadBotEnv({ TELEGRAM_BOT_TOKEN: "  " })).toThrow(
			"TELEGRAM_BOT_TOKEN: is unset",
		);
	});

	it("fills in defaults", () => {
		const config = loadBotEnv({ TELEGRAM_BOT_TOKEN: "test-token" });

		expect(config.advisorIds.size).toBe(0);
		expect(config.groupChatIds.size).toBe(0);
		expect(config.openaiModel).toBe("gpt-4o-mini");
		expect(config.downvoteEmoji).toBe("👎");
		expect(config.activeOnStart).toBe(true);
		expect(config.faqPath).toBe("faq.md");
		expect(config.sentMessagesMax).toBe(1000);
		expect(config.answerTimeoutMs).toBe(30_000);
		expect(config.webhook).toBeNull();
		expect(config.debugLogs).toBe(false);
	});

	it("parses ids, flags and the webhook", () => {
		const config = loadBotEnv({
			TELEGRAM_BOT_TOKEN: "test-token",
			ADVISOR_USER_IDS: "111, 222",
			GROUP_CHAT_IDS: "-1001234",
			BOT_ACTIVE_ON_START: "0",
			WEBHOOK_DOMAIN: "bot.example.com/",
			WEBHOOK_URL_PATH: "/telegram",
			WEBHOOK_PORT: "9000",
			PORT: "8080",
			WEBHOOK_SECRET_TOKEN: "test-secret",
		});

		expect([...config.advisorIds]).toEqual([111, 222]);
		expect([...config.groupChatIds]).toEqual([-1001234]);
		expect(config.activeOnStart).toBe(false);
		expect(config.webhook).toEqual({
			domain: "bot.example.com",
			path: "telegram",
			listenIp: "0.0.0.0",
			port: 8080,
			secretToken: "test-secret",
		});
	});

	it("rejects unknown flag values", () => {
		expect(() =>
			loadBotEnv({ TELEGRAM_BOT_TOKEN: "test-token", BOT_ACTIVE_ON_START: "ture" }),
		).toThrow('BOT_ACTIVE_ON_START: expected a boolean flag, got "ture"');
		expect(() =>
			loadBotEnv({ TELEGRAM_BOT_TOKEN: "test-token", DEBUG_LOGS: "verbose" }),
		).toThrow(ConfigurationError);
	});

	it("accepts the usual spellings of flags", () => {
		const config = loadBotEnv({
			TELEGRAM_BOT_TOKEN: "test-token",
			BOT_ACTIVE_ON_START: "Off",
			DEBUG_LOGS: "true",
		});
		expect(config.activeOnStart).toBe(false);
		expect(config.debugLogs).toBe(true);
	});

	it("keeps negative ids for group chats only", () => {
		const config = loadBotEnv({
			TELEGRAM_BOT_TOKEN: "test-token",
			GROUP_CHAT_IDS: "-1001234,-42",
		});
		expect([...config.groupChatIds]).toEqual([-1001234, -42]);
		expect(() =>
			loadBotEnv({ TELEGRAM_BOT_TOKEN: "test-token", ADVISOR_USER_IDS: "-42" }),
		).toThrow('ADVISOR_USER_IDS: invalid entry "-42" (expected a positive user id)');
	});

	it("rejects malformed numbers and ids", () => {
		expect(() =>
			loadBotEnv({ TELEGRAM_BOT_TOKEN: "test-token", SENT_MESSAGES_MAX: "abc" }),
		).toThrow('SENT_MESSAGES_MAX: expected a positive integer, got "abc"');
		expect(() =>
			loadBotEnv({ TELEGRAM_BOT_TOKEN: "test-token", ADVISOR_USER_IDS: "111;222" }),
		).toThrow(ConfigurationError);
	});
});
