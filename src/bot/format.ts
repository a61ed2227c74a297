/**
 * Chat rendering helpers and `/uno_play` argument parsing.
 */
import { ActionCard, Color } from "../game/types.js";
import type { Card, NumericValue, PlayColor } from "../game/types.js";
import { isPlayColor } from "../game/deck.js";
import type { GameSummary } from "../game/engine.js";
import type { StatsEntry } from "../game/stats.js";

/**
 * Map colors to emoji for fast visual recognition.
 */
export function colorEmoji(c: Color): string {
	switch (c) {
		case Color.Red:
			return "🔴";
		case Color.Yellow:
			return "🟡";
		case Color.Green:
			return "🟢";
		case Color.Blue:
			return "🔵";
		default:
			return "⬛";
	}
}

/**
 * Map engine action names to compact labels for chat.
 */
function actionLabel(a: ActionCard): string {
	switch (a) {
		case ActionCard.Skip:
			return "Skip";
		case ActionCard.Reverse:
			return "Reverse";
		case ActionCard.Draw2:
			return "+2";
		case ActionCard.Wild:
			return "Wild";
		case ActionCard.Wild4:
			return "Wild+4";
	}
}

/**
 * Render a short single-line representation of a card for chat.
 */
export function renderCard(card: Card): string {
	if (card.kind === "number") return `${colorEmoji(card.color)}${card.value}`;
	if (card.kind === "action") return `${colorEmoji(card.color)}${actionLabel(card.action)}`;
	return `${colorEmoji(Color.Wild)}${actionLabel(card.action)}`;
}

export function renderHand(cards: readonly Card[]): string {
	return `Your cards:\n${cards.map(renderCard).join(" | ")}`;
}

/**
 * Render the public view of a game. Never includes hand contents.
 */
export function renderStatus(s: GameSummary): string {
	const lines = [
		"🎮 UNO game status:",
		`📊 Players: ${s.playerCount}`,
		`🎯 Started: ${s.started ? "Yes" : "No"}`
	];
	if (s.started) {
		if (s.currentPlayer) lines.push(`🔄 Current turn: ${s.currentPlayer.displayName}`);
		lines.push(`🎨 Current color: ${s.currentColor ?? "not set"}`);
		if (s.topCard) lines.push(`🃏 Top card: ${renderCard(s.topCard)}`);
		lines.push(`🂠 Cards: ${s.handSizes.map((h) => `${h.displayName} (${h.cards})`).join(", ")}`);
	}
	return lines.join("\n");
}

export function renderLeaderboard(entries: readonly StatsEntry[]): string {
	if (entries.length === 0) return "No wins yet.";
	const rows = entries.map((e, i) => `${i + 1}. ${e.displayName} — ${e.wins} ${e.wins === 1 ? "win" : "wins"}`);
	return [`🏆 Top ${entries.length} UNO Winners:`, ...rows].join("\n");
}

export function getHelpText(): string {
	return [
		"UNO Commands:",
		"",
		"/uno_start — Start a new UNO game",
		"/uno_join — Join the UNO game",
		"/uno_begin — Begin the game (2+ players)",
		"/uno_hand — Send your cards via private message",
		"/uno_play <color> <number|skip|reverse|+2> — Play a card",
		"or /uno_play wild <color> or /uno_play wild4 <color>",
		"/uno_draw — Draw a card and end your turn",
		"/uno_top10 — Show top 10 UNO winners",
		"/uno_status — Check the current game state",
		"/uno_reset — Reset the current game"
	].join("\n");
}

export const PLAY_USAGE = [
	"Usage:",
	"/uno_play <color> <number|skip|reverse|+2>",
	"or /uno_play wild <color>",
	"or /uno_play wild4 <color>"
].join("\n");

export type PlayArgs =
	| { ok: true; card: Card; declaredColor?: PlayColor }
	| { ok: false; reason: "usage" | "bad_color" | "bad_card" };

const RANK_ALIASES: Record<string, ActionCard.Skip | ActionCard.Reverse | ActionCard.Draw2> = {
	skip: ActionCard.Skip,
	reverse: ActionCard.Reverse,
	draw2: ActionCard.Draw2,
	"+2": ActionCard.Draw2
};

const NUMERALS: Record<string, NumericValue> = { 0: 0, 1: 1, 2: 2, 3: 3, 4: 4, 5: 5, 6: 6, 7: 7, 8: 8, 9: 9 };

/**
 * Parse `/uno_play` arguments. A wild without a color parses; the engine
 * decides whether that is an error.
 */
export function parsePlayArgs(rawArgs: readonly string[]): PlayArgs {
	const args = rawArgs.map((a) => a.toLowerCase());
	const [first, second] = args;
	if (first === undefined) return { ok: false, reason: "usage" };

	if (first === ActionCard.Wild || first === ActionCard.Wild4) {
		const card: Card = { kind: "wild", action: first === ActionCard.Wild ? ActionCard.Wild : ActionCard.Wild4 };
		if (second === undefined) return { ok: true, card };
		if (!isPlayColor(second)) return { ok: false, reason: "bad_color" };
		return { ok: true, card, declaredColor: second };
	}

	if (second === undefined) return { ok: false, reason: "usage" };
	if (!isPlayColor(first)) return { ok: false, reason: "bad_color" };
	const action = Object.hasOwn(RANK_ALIASES, second) ? RANK_ALIASES[second] : undefined;
	if (action !== undefined) return { ok: true, card: { kind: "action", color: first, action } };
	const value = Object.hasOwn(NUMERALS, second) ? NUMERALS[second] : undefined;
	if (value !== undefined) return { ok: true, card: { kind: "number", color: first, value } };
	return { ok: false, reason: "bad_card" };
}
