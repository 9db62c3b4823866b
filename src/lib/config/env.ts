import { regex } from "arkregex";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";

export type BotEnv = Record<string, string | undefined>;

/** Chat ids may be negative (groups); user ids never are. */
export type IdKind = "chat" | "user";

const CHAT_ID_RE = regex("^-?\\d+$");
const USER_ID_RE = regex("^\\d+$");
const LEADING_SLASH_RE = regex("^/+");
const TRAILING_SLASH_RE = regex("/+$");

const TRUE_FLAGS = new Set(["1", "true", "yes", "on"]);
const FALSE_FLAGS = new Set(["0", "false", "no", "off"]);

const idSchemas = {
	chat: z
		.string()
		.refine((value) => CHAT_ID_RE.test(value), "expected an integer id")
		.transform((value) => Number(value))
		.refine((value) => Number.isSafeInteger(value), "id out of range"),
	user: z
		.string()
		.refine((value) => USER_ID_RE.test(value), "expected a positive user id")
		.transform((value) => Number(value))
		.refine(
			(value) => Number.isSafeInteger(value) && value > 0,
			"expected a positive user id",
		),
} satisfies Record<IdKind, unknown>;

const positiveIntSchema = z.coerce.number().int().positive();

export function parseIdList(
	key: string,
	raw: string | undefined,
	kind: IdKind = "chat",
) {
	const idSchema = idSchemas[kind];
	const ids = new Set<number>();
	if (!raw) return ids;
	const entries = raw
		.split(",")
		.map((entry) => entry.trim())
		.filter(Boolean);
	for (const entry of entries) {
		const parsed = idSchema.safeParse(entry);
		if (!parsed.success) {
			throw new ConfigurationError(
				key,
				`invalid entry "${entry}" (${parsed.error.issues[0]?.message ?? "invalid"})`,
			);
		}
		ids.add(parsed.data);
	}
	return ids;
}

function parsePositiveInt(key: string, raw: string | undefined, fallback: number) {
	if (raw === undefined || raw.trim() === "") return fallback;
	const parsed = positiveIntSchema.safeParse(raw.trim());
	if (!parsed.success) {
		throw new ConfigurationError(key, `expected a positive integer, got "${raw}"`);
	}
	return parsed.data;
}

export function parseFlag(
	key: string,
	raw: string | undefined,
	fallback: boolean,
) {
	if (raw === undefined || raw.trim() === "") return fallback;
	const value = raw.trim().toLowerCase();
	if (TRUE_FLAGS.has(value)) return true;
	if (FALSE_FLAGS.has(value)) return false;
	throw new ConfigurationError(key, `expected a boolean flag, got "${raw}"`);
}

export type WebhookConfig = {
	domain: string;
	path: string;
	listenIp: string;
	port: number;
	secretToken?: string;
};

export type BotConfig = {
	telegramToken: string;
	openaiApiKey: string;
	openaiModel: string;
	advisorIds: Set<number>;
	moderatorChatId: string;
	groupChatIds: Set<number>;
	downvoteEmoji: string;
	activeOnStart: boolean;
	faqPath: string;
	sentMessagesMax: number;
	telegramTimeoutSeconds: number;
	telegramTextChunkLimit: number;
	answerTimeoutMs: number;
	webhook: WebhookConfig | null;
	debugLogs: boolean;
	serviceName: string;
	releaseVersion?: string;
	commitHash?: string;
};

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
export const DEFAULT_DOWNVOTE_EMOJI = "👎";

export function loadBotEnv(env: BotEnv): BotConfig {
	const TELEGRAM_BOT_TOKEN = env.TELEGRAM_BOT_TOKEN?.trim() ?? "";
	if (!TELEGRAM_BOT_TOKEN) {
		throw new ConfigurationError("TELEGRAM_BOT_TOKEN", "is unset");
	}

	const WEBHOOK_DOMAIN = env.WEBHOOK_DOMAIN?.trim() ?? "";
	const WEBHOOK_URL_PATH = env.WEBHOOK_URL_PATH?.trim() ?? "";
	const webhookPortKey = env.PORT?.trim() ? "PORT" : "WEBHOOK_PORT";
	const webhook: WebhookConfig | null =
		WEBHOOK_DOMAIN && WEBHOOK_URL_PATH
			? {
					domain: WEBHOOK_DOMAIN.replace(TRAILING_SLASH_RE, ""),
					path: WEBHOOK_URL_PATH.replace(LEADING_SLASH_RE, ""),
					listenIp: env.WEBHOOK_LISTEN_IP?.trim() || "0.0.0.0",
					port: parsePositiveInt(webhookPortKey, env[webhookPortKey], 8443),
					secretToken: env.WEBHOOK_SECRET_TOKEN?.trim() || undefined,
				}
			: null;

	return {
		telegramToken: TELEGRAM_BOT_TOKEN,
		openaiApiKey: env.OPENAI_API_KEY?.trim() ?? "",
		openaiModel: env.OPENAI_MODEL?.trim() || DEFAULT_OPENAI_MODEL,
		advisorIds: parseIdList(
			"ADVISOR_USER_IDS",
			env.ADVISOR_USER_IDS,
			"user",
		),
		moderatorChatId: env.MODERATOR_CHAT_ID?.trim() ?? "",
		groupChatIds: parseIdList("GROUP_CHAT_IDS", env.GROUP_CHAT_IDS),
		downvoteEmoji: env.DOWNVOTE_EMOJI?.trim() || DEFAULT_DOWNVOTE_EMOJI,
		activeOnStart: parseFlag(
			"BOT_ACTIVE_ON_START",
			env.BOT_ACTIVE_ON_START,
			true,
		),
		faqPath: env.FAQ_PATH?.trim() || "faq.md",
		sentMessagesMax: parsePositiveInt(
			"SENT_MESSAGES_MAX",
			env.SENT_MESSAGES_MAX,
			1000,
		),
		telegramTimeoutSeconds: parsePositiveInt(
			"TELEGRAM_TIMEOUT_SECONDS",
			env.TELEGRAM_TIMEOUT_SECONDS,
			60,
		),
		telegramTextChunkLimit: parsePositiveInt(
			"TELEGRAM_TEXT_CHUNK_LIMIT",
			env.TELEGRAM_TEXT_CHUNK_LIMIT,
			4000,
		),
		answerTimeoutMs: parsePositiveInt(
			"ANSWER_TIMEOUT_MS",
			env.ANSWER_TIMEOUT_MS,
			30_000,
		),
		webhook,
		debugLogs: parseFlag("DEBUG_LOGS", env.DEBUG_LOGS, false),
		serviceName: env.SERVICE_NAME ?? "faq-advisor-bot",
		releaseVersion: env.RELEASE_VERSION ?? env.APP_VERSION ?? undefined,
		commitHash: env.COMMIT_HASH ?? env.GIT_COMMIT ?? undefined,
	};
}
