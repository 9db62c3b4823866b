import type { Update } from "grammy/types";
import type { Logger } from "../logger.js";
import type { BotContext, LogContext } from "./types.js";

type LogHelpersOptions = {
	debugEnabled: boolean;
	logger: Logger;
};

export function getUpdateType(update?: Update) {
	if (!update) return "unknown";
	const keys = Object.keys(update).filter((key) => key !== "update_id");
	return keys[0] ?? "unknown";
}

export function createLogHelpers(options: LogHelpersOptions) {
	const { debugEnabled, logger } = options;

	function getLogContext(ctx: BotContext): LogContext {
		return ctx.state?.logContext ?? {};
	}

	function setLogContext(ctx: BotContext, update: Partial<LogContext>) {
		ctx.state ??= {};
		ctx.state.logContext = { ...ctx.state.logContext, ...update };
	}

	function setLogError(ctx: BotContext, error: unknown) {
		const message = error instanceof Error ? error.message : String(error);
		const type = error instanceof Error ? error.name : undefined;
		setLogContext(ctx, {
			outcome: "error",
			status_code: 500,
			error: { message, type },
		});
	}

	function logDebug(message: string, data?: unknown) {
		if (!debugEnabled) return;
		const payload = {
			event: "debug",
			message,
			data,
		};
		logger.info(payload);
	}

	return { getLogContext, setLogContext, setLogError, logDebug };
}

export type LogHelpers = ReturnType<typeof createLogHelpers>;

export function createRequestLoggerMiddleware(options: {
	logger: Logger;
	helpers: LogHelpers;
}) {
	const { logger, helpers } = options;
	const { getLogContext, setLogContext, setLogError } = helpers;

	return async (ctx: BotContext, next: () => Promise<void>) => {
		const startedAt = Date.now();
		const updateId = ctx.update?.update_id;
		const chatId = ctx.chat?.id;
		const userId = ctx.from?.id;
		const requestId = `tg:${updateId ?? "unknown"}:${chatId ?? userId ?? "unknown"}`;
		setLogContext(ctx, {
			request_id: requestId,
			update_id: updateId,
			chat_id: chatId,
			user_id: userId,
			username: ctx.from?.username,
			update_type: getUpdateType(ctx.update),
		});

		try {
			await next();
			if (!getLogContext(ctx).outcome) {
				setLogContext(ctx, { outcome: "success" });
			}
		} catch (error) {
			setLogError(ctx, error);
			throw error;
		} finally {
			const context = getLogContext(ctx);
			const statusCode =
				context.status_code ??
				(context.outcome === "blocked"
					? 403
					: context.outcome === "error"
						? 500
						: 200);
			const level = context.outcome === "error" ? "error" : "info";
			logger[level]({
				event: "telegram_update",
				...context,
				status_code: statusCode,
				duration_ms: Date.now() - startedAt,
			});
		}
	};
}
