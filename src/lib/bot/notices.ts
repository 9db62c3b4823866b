import { truncate } from "../telegram/markdown.js";

export type NoticeUser = {
	id: number;
	firstName: string;
	lastName?: string;
	username?: string;
};

export type DeliveryAttempt = {
	method: "markdown" | "sanitized_markdown" | "plain_text";
	success: boolean;
	error?: string;
	/** 1-based part number when the answer was split. */
	chunk?: number;
};

export type StatusReport = {
	active: boolean;
	faqLength: number;
	modelConfigured: boolean;
	advisorsCount: number;
	moderatorConfigured: boolean;
	groupChatsCount: number;
};

export const ADVISOR_ONLY_REPLY =
	"Sorry, this command is only available to advisors.";
export const ACTIVATED_REPLY =
	"✅ Bot is now active and will respond to student questions.";
export const DEACTIVATED_REPLY =
	"⏹️ Bot is now inactive and will not respond to student questions.";

function formatUser(user: NoticeUser) {
	const name = [user.firstName, user.lastName].filter(Boolean).join(" ");
	return `${name} (@${user.username || "no_username"}) (ID: ${user.id})`;
}

export function buildQuestionAlert(options: {
	chatId: number;
	chatTitle?: string;
	user: NoticeUser;
	question: string;
	link: string;
	error?: string;
}): string {
	const lines = [
		"❓ Student Question Alert",
		`Chat: ${options.chatTitle || `Chat ${options.chatId}`} (ID: ${options.chatId})`,
		`User: ${formatUser(options.user)}`,
		`Question: ${truncate(options.question, 500)}`,
		`Link: ${options.link}`,
	];
	if (options.error) lines.push(`Error: ${options.error}`);
	return lines.join("\n");
}

export function buildDeliveryFailureReport(options: {
	chatId: number;
	chatTitle?: string;
	user: NoticeUser;
	question: string;
	answer: string;
	attempts: DeliveryAttempt[];
}): string {
	const attempts = options.attempts.map(
		(attempt) =>
			`- ${attempt.method}${attempt.chunk ? ` (part ${attempt.chunk})` : ""}: ${attempt.success ? "✅" : "❌"}${attempt.error ? ` ${attempt.error}` : ""}`,
	);
	return [
		"🚨 Failed to deliver answer",
		`User: ${formatUser(options.user)}`,
		`Chat: ${options.chatTitle || "Unknown"} (ID: ${options.chatId})`,
		`Query: ${truncate(options.question, 300)}`,
		"",
		"Delivery Attempts:",
		...attempts,
		"",
		"LLM Answer:",
		truncate(options.answer, 1000),
	].join("\n");
}

export function buildModerationAuditNotice(options: {
	chatId: number;
	messageId: number;
	advisorId?: number;
	text?: string;
}): string {
	return [
		"🗑️ Bot message removed by advisor",
		`Advisor ID: ${options.advisorId ?? "unknown"}`,
		`Chat ID: ${options.chatId}`,
		`Message ID: ${options.messageId}`,
		`Content: ${truncate(options.text ?? "", 1000)}`,
	].join("\n");
}

export function buildRestartNotice(active: boolean): string {
	return active ? "✅ Bot restarted and active" : "⏸️ Bot restarted and inactive";
}

export function buildStatusReport(report: StatusReport): string {
	return [
		"📊 *Bot Status Report*",
		"",
		"🤖 *Core Status:*",
		`• Bot: ${report.active ? "🟢 Active" : "🔴 Inactive"}`,
		`• FAQ: ${report.faqLength > 0 ? "✅ Loaded" : "❌ Not loaded"} (${report.faqLength} chars)`,
		`• OpenAI: ${report.modelConfigured ? "✅ Configured" : "❌ Not configured"}`,
		"",
		"👥 *Configuration:*",
		`• Advisors: ${report.advisorsCount} configured`,
		`• Moderator: ${report.moderatorConfigured ? "✅ Configured" : "❌ Not configured"}`,
		`• Group Chats: ${report.groupChatsCount} configured`,
	].join("\n");
}
