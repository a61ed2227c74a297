/**
 * Telegram bot commands for UNO.
 *
 * This module wires the grammy command handlers to the dispatcher and delivers
 * its replies: chat replies go to the group, private replies (hands, drawn
 * cards) go to the player's own chat with the bot.
 */
import { GrammyError } from "grammy";
import type { BotCommand, User } from "grammy/types";
import { UNO_COMMANDS } from "./dispatcher.js";
import type { CommandRequest, Reply, UnoCommand, UnoDispatcher } from "./dispatcher.js";

export interface CommandOptions {
	/** Delete the user's command message after handling to reduce clutter. */
	deleteCommandMessages: boolean;
}

/**
 * The parts of a grammy command context the handlers use. `CommandContext`
 * satisfies it.
 */
export interface CommandCtx {
	chat?: { id: number; type: string };
	from?: User;
	match: unknown;
	msg?: { message_id: number };
	reply(text: string): Promise<unknown>;
	api: {
		sendMessage(chatId: number, text: string): Promise<unknown>;
		deleteMessage(chatId: number, messageId: number): Promise<unknown>;
	};
}

/** Where handlers are registered; a grammy `Bot` satisfies it. */
export interface CommandRegistrar {
	command(command: UnoCommand, handler: (ctx: CommandCtx) => Promise<void>): unknown;
}

export const PRIVATE_CHAT_HINT = "📬 I couldn't message you privately. Open a chat with me, press Start, then try again.";

export const BOT_COMMANDS: BotCommand[] = [
	{ command: "uno", description: "List UNO commands" },
	{ command: "uno_start", description: "Start a new UNO game" },
	{ command: "uno_join", description: "Join the UNO game" },
	{ command: "uno_begin", description: "Deal cards and begin" },
	{ command: "uno_hand", description: "Get your cards privately" },
	{ command: "uno_play", description: "Play a card" },
	{ command: "uno_draw", description: "Draw a card and end your turn" },
	{ command: "uno_status", description: "Show the game state" },
	{ command: "uno_top10", description: "Top 10 winners in this chat" },
	{ command: "uno_reset", description: "Reset the game" }
];

export function displayNameOf(from: Pick<User, "id" | "username" | "first_name" | "last_name">): string {
	if (from.username) return `@${from.username}`;
	return [from.first_name, from.last_name].filter(Boolean).join(" ") || `User${from.id}`;
}

export function toRequest(ctx: CommandCtx): CommandRequest | undefined {
	const chat = ctx.chat;
	const from = ctx.from;
	if (!chat || !from) return undefined;
	const match = typeof ctx.match === "string" ? ctx.match : "";
	return {
		chatId: String(chat.id),
		user: { id: from.id, displayName: displayNameOf(from) },
		args: match.trim().split(/\s+/).filter(Boolean)
	};
}

async function deliver(ctx: CommandCtx, reply: Reply): Promise<void> {
	if (reply.to === "chat") {
		await ctx.reply(reply.text);
		return;
	}
	try {
		await ctx.api.sendMessage(reply.userId, reply.text);
	} catch (err) {
		// 403: the user never opened a private chat with the bot
		if (err instanceof GrammyError && (err.error_code === 403 || err.error_code === 400)) {
			await ctx.reply(PRIVATE_CHAT_HINT);
			return;
		}
		throw err;
	}
}

export function registerCommands(bot: CommandRegistrar, dispatcher: UnoDispatcher, options: CommandOptions): void {
	async function handle(ctx: CommandCtx, command: UnoCommand): Promise<void> {
		const req = toRequest(ctx);
		if (!req) return;
		const replies = await dispatcher.dispatch(command, req);
		for (const reply of replies) await deliver(ctx, reply);

		const messageId = ctx.msg?.message_id;
		if (options.deleteCommandMessages && ctx.chat && messageId !== undefined && ctx.chat.type !== "private") {
			await ctx.api.deleteMessage(ctx.chat.id, messageId).catch((err: unknown) => {
				console.warn(`[uno] Could not delete /${command} message in chat ${req.chatId}:`, err instanceof Error ? err.message : err);
			});
		}
	}

	for (const command of UNO_COMMANDS) {
		bot.command(command, (ctx) => handle(ctx, command));
	}
}
