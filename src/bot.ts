import { createOpenAI } from "@ai-sdk/openai";
import { sequentialize } from "@grammyjs/runner";
import { apiThrottler } from "@grammyjs/transformer-throttler";
import { Bot } from "grammy";
import { createActivationGate } from "./lib/access/activation.js";
import { createAdvisorPolicy } from "./lib/access/advisors.js";
import { loadFaq } from "./lib/answers/faq.js";
import { createAnswerGenerator } from "./lib/answers/generator.js";
import { createCommandExecutor, registerCommands } from "./lib/bot/commands.js";
import {
	createLogHelpers,
	createRequestLoggerMiddleware,
} from "./lib/bot/log-context.js";
import { createMessageHandler } from "./lib/bot/messages.js";
import { buildRestartNotice } from "./lib/bot/notices.js";
import { registerReactionHandler } from "./lib/bot/reactions.js";
import { createTelegramHelpers } from "./lib/bot/telegram.js";
import { createTelegramTransport } from "./lib/bot/transport.js";
import type { BotContext } from "./lib/bot/types.js";
import { type BotEnv, loadBotEnv } from "./lib/config/env.js";
import { formatError } from "./lib/errors.js";
import { createLogger, type Logger } from "./lib/logger.js";
import { createModerationRule } from "./lib/moderation/downvote.js";
import { createSentMessageRegistry } from "./lib/moderation/sent-messages.js";
import type { HealthStatus } from "./lib/server/webhook.js";

export type CreateBotOptions = {
	env: BotEnv;
	logger?: Logger;
};

export async function createBot(options: CreateBotOptions) {
	const config = loadBotEnv(options.env);
	const logger =
		options.logger ??
		createLogger({
			service: config.serviceName,
			version: config.releaseVersion,
			commit_hash: config.commitHash,
		});

	if (!config.openaiApiKey) {
		logger.warn({
			event: "config_warning",
			key: "OPENAI_API_KEY",
			message: "unset, questions will be forwarded to moderators only",
		});
	}

	const faq = await loadFaq(config.faqPath, logger);

	const bot = new Bot<BotContext>(config.telegramToken, {
		client: { timeoutSeconds: config.telegramTimeoutSeconds },
	});
	const transport = createTelegramTransport(bot.api);

	const policy = createAdvisorPolicy(config.advisorIds);
	const gate = createActivationGate({
		policy,
		initialActive: config.activeOnStart,
	});
	const registry = createSentMessageRegistry({
		maxEntries: config.sentMessagesMax,
	});
	const answers = createAnswerGenerator({
		model: config.openaiApiKey
			? createOpenAI({ apiKey: config.openaiApiKey }).chat(config.openaiModel)
			: null,
		faq: faq.content,
		logger,
		timeoutMs: config.answerTimeoutMs,
	});

	const logHelpers = createLogHelpers({
		debugEnabled: config.debugLogs,
		logger,
	});
	const { setLogContext, setLogError, logDebug, getLogContext } = logHelpers;
	const telegram = createTelegramHelpers({
		textChunkLimit: config.telegramTextChunkLimit,
		logDebug,
	});

	bot.api.config.use(apiThrottler());
	bot.use(
		sequentialize((ctx) => {
			if (ctx.chat?.id) return `telegram:${ctx.chat.id}`;
			if (ctx.from?.id) return `telegram:user:${ctx.from.id}`;
			return "telegram:unknown";
		}),
	);
	bot.use(createRequestLoggerMiddleware({ logger, helpers: logHelpers }));

	registerCommands({
		bot,
		executor: createCommandExecutor({
			gate,
			policy,
			logger,
			getStatusDetails: () => ({
				faqLength: faq.content.length,
				modelConfigured: answers.configured,
				advisorsCount: policy.size,
				moderatorConfigured: Boolean(config.moderatorChatId),
				groupChatsCount: config.groupChatIds.size,
			}),
		}),
		sendText: telegram.sendText,
		setLogContext,
	});

	registerReactionHandler({
		bot,
		logger,
		setLogContext,
		moderation: createModerationRule({
			policy,
			registry,
			transport,
			downvoteEmoji: config.downvoteEmoji,
			moderatorChatId: config.moderatorChatId,
			logger,
		}),
	});

	const { handleIncomingText } = createMessageHandler({
		gate,
		policy,
		groupChatIds: config.groupChatIds,
		answers,
		transport,
		registry,
		telegram,
		moderatorChatId: config.moderatorChatId,
		logger,
		logDebug,
	});

	bot.on("message:text", async (ctx) => {
		if (!ctx.from) return;
		setLogContext(ctx, {
			message_type: "text",
			is_advisor: policy.isAdvisor(ctx.from.id),
		});
		const outcome = await handleIncomingText({
			chatId: ctx.chat.id,
			chatTitle: "title" in ctx.chat ? ctx.chat.title : undefined,
			messageId: ctx.message.message_id,
			text: ctx.message.text,
			user: {
				id: ctx.from.id,
				firstName: ctx.from.first_name,
				lastName: ctx.from.last_name,
				username: ctx.from.username,
			},
		});
		setLogContext(ctx, {
			answer_kind: outcome,
			outcome: outcome.startsWith("ignored") ? "ignored" : undefined,
		});
	});

	bot.catch((err) => {
		const ctx = err.ctx;
		setLogError(ctx, err.error);
		logger.error({
			event: "telegram_update_failed",
			...getLogContext(ctx),
			error: formatError(err.error),
		});
	});

	async function notifyAdvisorsOfRestart() {
		let successful = 0;
		for (const advisorId of policy.ids) {
			try {
				await transport.sendMessage(
					advisorId,
					buildRestartNotice(gate.shouldRespond()),
				);
				successful += 1;
			} catch (error) {
				logger.error({
					event: "restart_notification_failed",
					advisor_id: advisorId,
					error: formatError(error),
				});
			}
		}
		logger.info({
			event: "restart_notifications",
			successful,
			total: policy.size,
		});
		return successful;
	}

	function getHealth(): HealthStatus {
		return {
			status: "healthy",
			bot_active: gate.shouldRespond(),
			faq_loaded: faq.content.length > 0,
			model_configured: answers.configured,
			timestamp: new Date().toISOString(),
		};
	}

	const allowedUpdates: Array<"message" | "message_reaction"> = [
		"message",
		"message_reaction",
	];

	return {
		bot,
		allowedUpdates,
		config,
		gate,
		registry,
		logger,
		notifyAdvisorsOfRestart,
		getHealth,
	};
}
