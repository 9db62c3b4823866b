import { regex } from "arkregex";
import express, {
	type NextFunction,
	type Request,
	type Response,
} from "express";
import { formatError } from "../errors.js";
import type { Logger } from "../logger.js";

export type HealthStatus = {
	status: "healthy";
	bot_active: boolean;
	faq_loaded: boolean;
	model_configured: boolean;
	timestamp: string;
};

export type WebhookCallbackOptions = {
	secretToken?: string;
	onTimeout: "return";
	timeoutMilliseconds: number;
};

/** Time allowed for sending the answer once the LLM has replied. */
export const WEBHOOK_DELIVERY_BUDGET_MS = 30_000;

const LEADING_SLASH_RE = regex("^/+");

/**
 * Options for grammY's `webhookCallback`. The request must outlive the LLM
 * call; if it still runs over, Telegram gets its 200 and handling carries on,
 * so the update is never redelivered while it is being answered.
 */
export function buildWebhookCallbackOptions(options: {
	secretToken?: string;
	answerTimeoutMs: number;
}): WebhookCallbackOptions {
	return {
		secretToken: options.secretToken,
		onTimeout: "return",
		timeoutMilliseconds: options.answerTimeoutMs + WEBHOOK_DELIVERY_BUDGET_MS,
	};
}

type WebhookAppOptions = {
	path: string;
	handleUpdate: (req: Request, res: Response) => Promise<unknown>;
	getHealth: () => HealthStatus;
	logger: Logger;
};

export function createWebhookApp(options: WebhookAppOptions) {
	const { handleUpdate, getHealth, logger } = options;
	const webhookPath = `/${options.path.replace(LEADING_SLASH_RE, "")}`;
	const app = express();

	app.get("/health", (_req, res) => {
		res.json(getHealth());
	});

	app.post(webhookPath, express.json(), (req, res, next) => {
		const startedAt = Date.now();
		handleUpdate(req, res)
			.then(() => {
				logger.info({
					event: "webhook_processed",
					duration_ms: Date.now() - startedAt,
				});
			})
			.catch(next);
	});

	app.all(webhookPath, (_req, res) => {
		res.status(405).type("text/plain").send("Method Not Allowed");
	});

	app.use((_req, res) => {
		res.status(404).type("text/plain").send("Not found");
	});

	app.use(
		(error: unknown, _req: Request, res: Response, next: NextFunction) => {
			logger.error({ event: "webhook_error", error: formatError(error) });
			if (res.headersSent) {
				next(error);
				return;
			}
			res.status(500).type("text/plain").send("Internal Server Error");
		},
	);

	return app;
}
