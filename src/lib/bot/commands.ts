import type { Bot } from "grammy";
import type { ActivationGate } from "../access/activation.js";
import type { AdvisorPolicy } from "../access/advisors.js";
import { AuthorizationError } from "../errors.js";
import type { Logger } from "../logger.js";
import {
	ACTIVATED_REPLY,
	ADVISOR_ONLY_REPLY,
	buildStatusReport,
	DEACTIVATED_REPLY,
	type StatusReport,
} from "./notices.js";
import type { SendFn, TelegramHelpers } from "./telegram.js";
import type { BotContext, LogContext } from "./types.js";

export type GateCommand = "activate" | "deactivate" | "status";

export type CommandReply = {
	text: string;
	parseMode?: "Markdown";
	outcome: "success" | "blocked";
};

export const GATE_COMMANDS: Record<GateCommand, string[]> = {
	activate: ["start", "activate"],
	deactivate: ["stop", "deactivate"],
	status: ["status"],
};

type CommandDeps = {
	gate: ActivationGate;
	policy: AdvisorPolicy;
	getStatusDetails: () => Omit<StatusReport, "active">;
	logger: Logger;
};

export function createCommandExecutor(deps: CommandDeps) {
	const { gate, policy, getStatusDetails, logger } = deps;

	function run(command: GateCommand, requester: number | undefined): CommandReply {
		switch (command) {
			case "activate": {
				const change = gate.activate(requester);
				logger.info({
					event: "activation_changed",
					advisor_id: requester,
					old_status: change.previous,
					new_status: change.active,
				});
				return { text: ACTIVATED_REPLY, outcome: "success" };
			}
			case "deactivate": {
				const change = gate.deactivate(requester);
				logger.info({
					event: "activation_changed",
					advisor_id: requester,
					old_status: change.previous,
					new_status: change.active,
				});
				return { text: DEACTIVATED_REPLY, outcome: "success" };
			}
			case "status":
				return {
					text: buildStatusReport({
						active: gate.status(requester),
						...getStatusDetails(),
					}),
					parseMode: "Markdown",
					outcome: "success",
				};
		}
	}

	function execute(command: GateCommand, requester: number | undefined): CommandReply {
		try {
			return run(command, requester);
		} catch (error) {
			if (!(error instanceof AuthorizationError)) throw error;
			logger.warn({
				event: "command_denied",
				command,
				user_id: requester,
				advisor_list_size: policy.size,
			});
			return { text: ADVISOR_ONLY_REPLY, outcome: "blocked" };
		}
	}

	return { execute };
}

export type CommandExecutor = ReturnType<typeof createCommandExecutor>;

export function registerCommands(options: {
	bot: Bot<BotContext>;
	executor: CommandExecutor;
	sendText: TelegramHelpers["sendText"];
	setLogContext: (ctx: BotContext, update: Partial<LogContext>) => void;
}) {
	const { bot, executor, sendText, setLogContext } = options;

	const commands: GateCommand[] = ["activate", "deactivate", "status"];
	for (const command of commands) {
		bot.command(GATE_COMMANDS[command], async (ctx) => {
			setLogContext(ctx, { command, message_type: "command" });
			const reply = executor.execute(command, ctx.from?.id);
			if (reply.outcome === "blocked") {
				setLogContext(ctx, { outcome: "blocked", status_code: 403 });
			}
			const send: SendFn = async (text, parseMode) => {
				const message = await ctx.reply(text, { parse_mode: parseMode });
				return { messageId: message.message_id };
			};
			await sendText(send, reply.text, reply.parseMode);
		});
	}
}
