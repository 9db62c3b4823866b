import type { Context } from "grammy";

export type LogContext = {
	request_id?: string;
	update_id?: number;
	chat_id?: number;
	user_id?: number;
	username?: string;
	update_type?: string;
	message_type?: string;
	command?: string;
	is_advisor?: boolean;
	moderation?: string;
	answer_kind?: string;
	outcome?: "success" | "error" | "blocked" | "ignored";
	status_code?: number;
	error?: { message: string; type?: string };
};

export type BotContext = Context & { state: { logContext?: LogContext } };
