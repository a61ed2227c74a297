/**
 * Bot bootstrap: restores saved games, starts the idle sweeper and runs the
 * Telegram bot over long polling.
 */
import { Bot, InlineKeyboard } from "grammy";
import type { Context } from "grammy";
import { StatsLedger } from "../game/stats.js";
import { ConfigError, loadConfig } from "./config.js";
import type { BotConfig } from "./config.js";
import { BOT_COMMANDS, registerCommands } from "./commands.js";
import { UnoDispatcher } from "./dispatcher.js";
import { getHelpText } from "./format.js";
import { SessionStore } from "./session.js";
import { FileStorage } from "./storage.js";
import { recoverSessions, startExpirySweeper } from "./sweeper.js";

function readConfig(): BotConfig {
	try {
		return loadConfig();
	} catch (err) {
		if (err instanceof ConfigError) {
			console.error(err.message);
			process.exit(1);
		}
		throw err;
	}
}

async function main(): Promise<void> {
	const config = readConfig();

	const storage = new FileStorage(config.dataDir);
	const store = new SessionStore(storage, new StatsLedger());
	await recoverSessions(store, storage, Date.now(), config.idleTimeoutMs);
	const stopSweeper = config.sweepIntervalMs > 0 ? startExpirySweeper(store, config.sweepIntervalMs, config.idleTimeoutMs) : undefined;

	const bot: Bot<Context> = new Bot(config.botToken);

	bot.command("start", (ctx) => {
		const inline = new InlineKeyboard().url("➕ Add to a group", `https://t.me/${ctx.me.username}?startgroup=uno`);
		return ctx.reply(`UNO bot is alive. Add me to a group and send /uno_start.\n\n${getHelpText()}`, { reply_markup: inline });
	});

	bot.command("ping", (ctx) => ctx.reply("pong 🏓"));

	registerCommands(bot, new UnoDispatcher(store), { deleteCommandMessages: config.deleteCommandMessages });

	bot.catch((err) => {
		console.error(`[uno] Bot error while handling update ${err.ctx.update.update_id}:`, err.error);
	});

	const shutdown = (signal: string) => {
		console.log(`[uno] ${signal} received, stopping bot.`);
		stopSweeper?.();
		bot.stop().catch((err: unknown) => console.error("[uno] Failed to stop bot:", err));
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));

	await bot.api.setMyCommands(BOT_COMMANDS);
	await bot.start({ onStart: (me) => console.log(`[uno] Bot @${me.username} started with long polling.`) });
}

main().catch((err: unknown) => {
	console.error("[uno] Fatal error:", err);
	process.exit(1);
});
