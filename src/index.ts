import { run } from "@grammyjs/runner";
import dotenv from "dotenv";
import { webhookCallback } from "grammy";
import { createBot } from "./bot.js";
import { ConfigurationError, formatError } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import {
	buildWebhookCallbackOptions,
	createWebhookApp,
} from "./lib/server/webhook.js";

dotenv.config();

const logger = createLogger({
	service: process.env.SERVICE_NAME ?? "faq-advisor-bot",
	version: process.env.RELEASE_VERSION,
	commit_hash: process.env.COMMIT_HASH,
});

async function main() {
	const runtime = await createBot({ env: process.env, logger });
	const { bot, allowedUpdates, config, notifyAdvisorsOfRestart, getHealth } =
		runtime;

	await bot.init();
	logger.info({ event: "bot_initialized", username: bot.botInfo.username });
	await notifyAdvisorsOfRestart();

	if (config.webhook) {
		const webhook = config.webhook;
		const url = `https://${webhook.domain}/${webhook.path}`;
		await bot.api.setWebhook(url, {
			allowed_updates: allowedUpdates,
			secret_token: webhook.secretToken,
		});
		logger.info({ event: "webhook_set", url });

		const app = createWebhookApp({
			path: webhook.path,
			handleUpdate: webhookCallback(
				bot,
				"express",
				buildWebhookCallbackOptions({
					secretToken: webhook.secretToken,
					answerTimeoutMs: config.answerTimeoutMs,
				}),
			),
			getHealth,
			logger,
		});
		const server = app.listen(webhook.port, webhook.listenIp, () => {
			logger.info({
				event: "webhook_server_started",
				ip: webhook.listenIp,
				port: webhook.port,
			});
		});

		const shutdown = () => {
			logger.info({ event: "shutdown", mode: "webhook" });
			server.close();
		};
		process.once("SIGINT", shutdown);
		process.once("SIGTERM", shutdown);
		return;
	}

	await bot.api.deleteWebhook();
	const runner = run(bot, {
		runner: { fetch: { allowed_updates: allowedUpdates } },
	});
	logger.info({ event: "polling_started" });

	const shutdown = () => {
		logger.info({ event: "shutdown", mode: "polling" });
		if (runner.isRunning()) {
			runner.stop().catch((error: unknown) => {
				logger.error({ event: "shutdown_failed", error: formatError(error) });
			});
		}
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}

try {
	await main();
} catch (error) {
	logger.error({
		event: error instanceof ConfigurationError ? "config_invalid" : "fatal",
		error: formatError(error),
	});
	process.exitCode = 1;
}
