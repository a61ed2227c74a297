/**
 * Transport-neutral command handling.
 *
 * Turns a chat command into store calls and a list of replies. Engine errors
 * become chat messages here; anything else propagates to the bot's error
 * handler after being logged by `withRequestLogging`.
 */
import { EngineError } from "../game/types.js";
import type { EngineErrorCode, GameState } from "../game/types.js";
import { currentPlayer, getHand, summarize, topCard } from "../game/engine.js";
import type { MutationResult, SessionStore } from "./session.js";
import { getHelpText, parsePlayArgs, PLAY_USAGE, renderCard, renderHand, renderLeaderboard, renderStatus } from "./format.js";

export const UNO_COMMANDS = [
	"uno",
	"uno_start",
	"uno_join",
	"uno_begin",
	"uno_hand",
	"uno_play",
	"uno_draw",
	"uno_status",
	"uno_top10",
	"uno_reset"
] as const;

export type UnoCommand = (typeof UNO_COMMANDS)[number];

export interface CommandRequest {
	/** Session id: the chat the command was sent in. */
	chatId: string;
	user: { id: number; displayName: string };
	args: string[];
}

export type Reply = { to: "chat"; text: string } | { to: "private"; userId: number; text: string };

export const TOP_N = 10;

const ERROR_MESSAGES: Record<EngineErrorCode, string> = {
	no_such_session: "❗ No active game in this chat. Start one with /uno_start.",
	already_in_progress: "❗ A game already exists in this chat. Use /uno_reset to clear it.",
	already_started: "❗ Game already started!",
	already_joined: "You are already in the game.",
	not_enough_players: "❗ Need at least 2 players.",
	not_started: "❗ The game is not running.",
	not_your_turn: "❗ It's not your turn.",
	card_not_held: "❗ You don't have that card.",
	illegal_play: "❗ Invalid card: does not match color or value.",
	color_required: "🎨 Choose a color: red/green/blue/yellow",
	deck_exhausted: "❗ No cards left to draw.",
	empty_session_no_op: "❗ You have no cards."
};

export const NOT_SAVED_WARNING = "⚠️ The game could not be saved. Progress may be lost if the bot restarts.";

function chat(text: string): Reply {
	return { to: "chat", text };
}

/**
 * Log each command once with its outcome and duration. Errors are logged and
 * rethrown.
 */
export async function withRequestLogging<T>(command: string, req: CommandRequest, handler: () => Promise<T>): Promise<T> {
	const started = Date.now();
	const who = `user=${req.user.id} chat=${req.chatId}`;
	try {
		const result = await handler();
		console.info(`[uno] /${command} ${who} ok in ${Date.now() - started}ms`);
		return result;
	} catch (err) {
		console.error(`[uno] /${command} ${who} failed in ${Date.now() - started}ms:`, err);
		throw err;
	}
}

function nameOf(state: GameState, tgUserId: number): string {
	return state.players.find((p) => p.tgUserId === tgUserId)?.displayName ?? String(tgUserId);
}

function nextTurnLine(state: GameState): string {
	const next = currentPlayer(state);
	return `➡️ Next turn: ${next ? next.displayName : "?"}`;
}

export class UnoDispatcher {
	constructor(private readonly store: SessionStore) {}

	dispatch(command: UnoCommand, req: CommandRequest): Promise<Reply[]> {
		return withRequestLogging(command, req, async () => {
			try {
				return await this.handle(command, req);
			} catch (err) {
				if (err instanceof EngineError) return [chat(ERROR_MESSAGES[err.code])];
				throw err;
			}
		});
	}

	private async handle(command: UnoCommand, req: CommandRequest): Promise<Reply[]> {
		switch (command) {
			case "uno":
				return [chat(getHelpText())];
			case "uno_start":
				return this.withSaveWarning(await this.store.create(req.chatId), [
					chat("🃏 New UNO game started!\nSend /uno_join to join the game.")
				]);
			case "uno_join": {
				const result = await this.store.apply(req.chatId, { type: "joinGame", tgUserId: req.user.id, displayName: req.user.displayName });
				return this.withSaveWarning(result, [chat(`✅ ${req.user.displayName} joined! Total: ${result.state.players.length}`)]);
			}
			case "uno_begin":
				return this.begin(req);
			case "uno_hand":
				return this.hand(req);
			case "uno_play":
				return this.play(req);
			case "uno_draw":
				return this.draw(req);
			case "uno_status":
				return [chat(renderStatus(summarize(this.store.get(req.chatId))))];
			case "uno_top10":
				return [chat(renderLeaderboard(this.store.stats.topN(req.chatId, TOP_N)))];
			case "uno_reset": {
				const result = await this.store.remove(req.chatId);
				console.log(`[uno] Game reset in chat ${req.chatId}`);
				return this.withSaveWarning(result, [chat("🔄 UNO game reset. Start a new one with /uno_start.")]);
			}
		}
	}

	private async begin(req: CommandRequest): Promise<Reply[]> {
		const result = await this.store.apply(req.chatId, { type: "beginGame" });
		const { state } = result;
		const top = topCard(state);
		const first = currentPlayer(state);
		return this.withSaveWarning(result, [
			chat(
				[
					"🃏 Game started!",
					`Top card: ${top ? renderCard(top) : "?"}`,
					`Current color: ${state.currentColor ?? "not set"}`,
					`First player: ${first ? first.displayName : "?"}`
				].join("\n")
			)
		]);
	}

	private hand(req: CommandRequest): Reply[] {
		const cards = getHand(this.store.get(req.chatId), req.user.id);
		if (cards.length === 0) return [chat(ERROR_MESSAGES.empty_session_no_op)];
		return [{ to: "private", userId: req.user.id, text: renderHand(cards) }, chat("📬 Sent your cards in a private message.")];
	}

	private async play(req: CommandRequest): Promise<Reply[]> {
		const parsed = parsePlayArgs(req.args);
		if (!parsed.ok) {
			if (parsed.reason === "bad_color") return [chat(ERROR_MESSAGES.color_required)];
			return [chat(PLAY_USAGE)];
		}
		const result = await this.store.apply(req.chatId, {
			type: "playCard",
			tgUserId: req.user.id,
			card: parsed.card,
			declaredColor: parsed.declaredColor
		});
		const { state, winner } = result;
		const lines = [`${req.user.displayName} played ${renderCard(parsed.card)}`, `▶️ Current color: ${state.currentColor ?? "not set"}`];
		const penalty = state.lastTurn?.kind === "play" ? state.lastTurn.penalty : undefined;
		if (penalty) {
			const victim = nameOf(state, penalty.playerId);
			lines.push(
				parsed.card.kind === "wild"
					? `🎴 Wild Draw Four: ${victim} draws ${penalty.cards} cards and skips turn`
					: `➕2: ${victim} draws ${penalty.cards} cards and skips turn`
			);
		}
		if (winner) {
			lines.push(`🏆 ${winner.displayName} has won the UNO game! Wins in this chat: ${winner.wins}`);
		} else {
			lines.push(nextTurnLine(state));
		}
		return this.withSaveWarning(result, [chat(lines.join("\n"))]);
	}

	private async draw(req: CommandRequest): Promise<Reply[]> {
		const result = await this.store.apply(req.chatId, { type: "draw", tgUserId: req.user.id });
		const { state } = result;
		const replies: Reply[] = [];
		if (state.lastTurn?.kind === "draw") {
			replies.push({ to: "private", userId: req.user.id, text: `🃏 You drew: ${renderCard(state.lastTurn.card)}` });
		}
		replies.push(chat(`${req.user.displayName} drew a card. ⏭️ Turn skipped.\n${nextTurnLine(state)}`));
		return this.withSaveWarning(result, replies);
	}

	private withSaveWarning(result: MutationResult, replies: Reply[]): Reply[] {
		return result.persisted ? replies : [...replies, chat(NOT_SAVED_WARNING)];
	}
}
