import type { Server } from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadBotEnv } from "../src/lib/config/env.js";
import {
	buildWebhookCallbackOptions,
	createWebhookApp,
	type HealthStatus,
} from "../src/lib/server/webhook.js";
import { createTestLogger } from "./helpers/fakes.js";

const health: HealthStatus = {
	status: "healthy",
	bot_active: true,
	faq_loaded: true,
	model_configured: false,
	timestamp: "2026-01-01T00:00:00.000Z",
};

type HandleUpdate = Parameters<typeof createWebhookApp>[0]["handleUpdate"];

let server: Server | undefined;

async function start(handleUpdate = vi.fn<HandleUpdate>(async () => {})) {
	const logger = createTestLogger();
	const app = createWebhookApp({
		path: "/telegram",
		handleUpdate,
		getHealth: () => health,
		logger,
	});
	const listening = await new Promise<Server>((resolve) => {
		const created = app.listen(0, "127.0.0.1", () => resolve(created));
	});
	server = listening;
	const address = listening.address();
	if (!address || typeof address === "string") throw new Error("server not listening");
	return { base: `http://127.0.0.1:${address.port}`, handleUpdate, logger };
}

afterEach(async () => {
	const current = server;
	server = undefined;
	if (!current) return;
	await new Promise<void>((resolve, reject) =>
		current.close((error) => (error ? reject(error) : resolve())),
	);
});

describe("webhook app", () => {
	it("reports health", async () => {
		const { base } = await start();

		const response = await fetch(`${base}/health`);

		expect(response.status).toBe(200);
		expect(await response.json()).toEqual(health);
	});

	it("returns 404 for unknown routes", async () => {
		const { base } = await start();

		const response = await fetch(`${base}/other`);

		expect(response.status).toBe(404);
		expect(await response.text()).toBe("Not found");
	});

	it("only accepts POST on the webhook path", async () => {
		const { base, handleUpdate } = await start();

		const response = await fetch(`${base}/telegram`);

		expect(response.status).toBe(405);
		expect(handleUpdate).not.toHaveBeenCalled();
	});

	it("hands parsed updates to the bot", async () => {
		const handleUpdate = vi.fn<HandleUpdate>(async (_req, res) => {
			res.sendStatus(200);
		});
		const { base, logger } = await start(handleUpdate);

		const response = await fetch(`${base}/telegram`, {
			method: "POST",
			headers: { "Content-Type": "application/json" },
			body: JSON.stringify({ update_id: 1 }),
		});

		expect(response.status).toBe(200);
		expect(handleUpdate).toHaveBeenCalledTimes(1);
		expect(handleUpdate.mock.calls[0]?.[0].body).toEqual({ update_id: 1 });
		expect(logger.info).toHaveBeenCalledWith(
			expect.objectContaining({ event: "webhook_processed" }),
		);
	});

	it("answers 500 when the update handler fails", async () => {
		const { base, logger } = await start(
			vi.fn<HandleUpdate>(async () => {
				throw new Error("boom");
			}),
		);

		const response = await fetch(`${base}/telegram`, { method: "POST", body: "{}" });

		expect(response.status).toBe(500);
		expect(logger.error).toHaveBeenCalledWith({
			event: "webhook_error",
			error: "Error: boom",
		});
	});
});

describe("buildWebhookCallbackOptions", () => {
	it("outlasts the answer timeout and never fails the request on overrun", () => {
		const config = loadBotEnv({ TELEGRAM_BOT_TOKEN: "test-token" });

		const options = buildWebhookCallbackOptions({
			secretToken: "test-secret",
			answerTimeoutMs: config.answerTimeoutMs,
		});

		expect(options).toEqual({
			secretToken: "test-secret",
			onTimeout: "return",
			timeoutMilliseconds: 60_000,
		});
		expect(options.timeoutMilliseconds).toBeGreaterThan(config.answerTimeoutMs);
	});

	it("follows a longer answer timeout", () => {
		expect(
			buildWebhookCallbackOptions({ answerTimeoutMs: 90_000 }).timeoutMilliseconds,
		).toBe(120_000);
	});
});
