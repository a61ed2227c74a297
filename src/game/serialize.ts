/**
 * On-disk record shapes and conversion to and from engine types.
 *
 * Cards are stored as `[color, rank]` string pairs, e.g. `["red", "7"]`,
 * `["blue", "draw2"]`, `["wild", "wild4"]`. Records read back from storage are
 * untrusted JSON and are validated field by field.
 */
import { ActionCard, Color } from "./types.js";
import type { Card, Direction, GameState, NumericValue, PlayColor, PlayerState } from "./types.js";
import { cardColor, cardRank, DECK_SIZE, isPlayColor } from "./deck.js";
import { countCards } from "./engine.js";
import type { StatsEntry } from "./stats.js";

export type CardPair = [string, string];

export interface SessionRecord {
	id: string;
	players: number[];
	names: Record<string, string>;
	hands: Record<string, CardPair[]>;
	deck: CardPair[];
	pile: CardPair[];
	current: number;
	direction: Direction;
	currentColor: PlayColor | null;
	started: boolean;
	lastActive: string;
}

export interface StatsRecord {
	id: string;
	entries: StatsEntry[];
}

export class RecordError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "RecordError";
	}
}

export function encodeCard(card: Card): CardPair {
	return [cardColor(card), String(cardRank(card))];
}

/**
 * Parse a `[color, rank]` pair. Rejects combinations that are not real cards
 * (a colored wild, a wild-colored numeral).
 */
export function decodeCard(value: unknown): Card {
	if (!Array.isArray(value) || value.length !== 2) throw new RecordError(`Bad card: ${JSON.stringify(value)}`);
	const [color, rank]: unknown[] = value;
	if (typeof color !== "string" || typeof rank !== "string") throw new RecordError(`Bad card: ${JSON.stringify(value)}`);
	return parseCard(color, rank);
}

export function parseCard(color: string, rank: string): Card {
	if (color === Color.Wild) {
		if (rank === ActionCard.Wild || rank === ActionCard.Wild4) return { kind: "wild", action: rank };
		throw new RecordError(`Bad wild card rank: ${rank}`);
	}
	if (!isPlayColor(color)) throw new RecordError(`Bad card color: ${color}`);
	if (rank === ActionCard.Skip || rank === ActionCard.Reverse || rank === ActionCard.Draw2) {
		return { kind: "action", color, action: rank };
	}
	const value = toNumericValue(rank);
	if (value === null) throw new RecordError(`Bad card rank: ${rank}`);
	return { kind: "number", color, value };
}

function toNumericValue(rank: string): NumericValue | null {
	switch (rank) {
		case "0": return 0;
		case "1": return 1;
		case "2": return 2;
		case "3": return 3;
		case "4": return 4;
		case "5": return 5;
		case "6": return 6;
		case "7": return 7;
		case "8": return 8;
		case "9": return 9;
		default: return null;
	}
}

export function encodeSession(state: GameState, lastActive: number): SessionRecord {
	const names: Record<string, string> = {};
	const hands: Record<string, CardPair[]> = {};
	for (const p of state.players) {
		names[String(p.tgUserId)] = p.displayName;
		hands[String(p.tgUserId)] = p.hand.map(encodeCard);
	}
	return {
		id: state.id,
		players: state.players.map((p) => p.tgUserId),
		names,
		hands,
		deck: state.drawPile.map(encodeCard),
		pile: state.discardPile.map(encodeCard),
		current: state.currentPlayerIdx,
		direction: state.direction,
		currentColor: state.currentColor,
		started: state.phase === "in_progress",
		lastActive: new Date(lastActive).toISOString()
	};
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function cardList(value: unknown, field: string): Card[] {
	if (!Array.isArray(value)) throw new RecordError(`${field} must be a list of cards`);
	return value.map(decodeCard);
}

/**
 * Validate and decode a stored session. Also checks the invariants a live
 * session must hold, so a hand-edited or truncated file is rejected instead of
 * producing an unplayable game.
 */
export function decodeSession(value: unknown): { state: GameState; lastActive: number } {
	if (!isRecord(value)) throw new RecordError("Session record must be an object");
	const { id, players, names, hands, current, direction, currentColor, started, lastActive } = value;
	if (typeof id !== "string" || id === "") throw new RecordError("Session id missing");
	if (!Array.isArray(players)) throw new RecordError(`Session ${id}: players must be a list`);
	const playerIds: number[] = [];
	for (const p of players) {
		if (typeof p !== "number" || !Number.isInteger(p)) throw new RecordError(`Session ${id}: bad player id ${JSON.stringify(p)}`);
		if (playerIds.includes(p)) throw new RecordError(`Session ${id}: duplicate player ${p}`);
		playerIds.push(p);
	}
	if (!isRecord(names) || !isRecord(hands)) throw new RecordError(`Session ${id}: names and hands must be objects`);
	if (typeof started !== "boolean") throw new RecordError(`Session ${id}: started must be a boolean`);
	if (direction !== 1 && direction !== -1) throw new RecordError(`Session ${id}: bad direction`);
	const dir: Direction = direction === -1 ? -1 : 1;
	if (typeof current !== "number" || !Number.isInteger(current)) throw new RecordError(`Session ${id}: bad current index`);
	let color: PlayColor | null = null;
	if (currentColor !== null) {
		if (typeof currentColor !== "string" || !isPlayColor(currentColor)) throw new RecordError(`Session ${id}: bad current color`);
		color = currentColor;
	}
	if (typeof lastActive !== "string") throw new RecordError(`Session ${id}: lastActive missing`);
	const lastActiveMs = Date.parse(lastActive);
	if (Number.isNaN(lastActiveMs)) throw new RecordError(`Session ${id}: bad lastActive ${lastActive}`);

	const playerStates: PlayerState[] = playerIds.map((tgUserId) => {
		const key = String(tgUserId);
		const name = names[key];
		const hand = hands[key];
		return {
			tgUserId,
			displayName: typeof name === "string" ? name : key,
			hand: hand === undefined ? [] : cardList(hand, `hands.${key}`)
		};
	});

	const state: GameState = {
		id,
		phase: started ? "in_progress" : "awaiting_players",
		players: playerStates,
		currentPlayerIdx: current,
		direction: dir,
		drawPile: cardList(value.deck, "deck"),
		discardPile: cardList(value.pile, "pile"),
		currentColor: color
	};

	if (started) {
		if (playerStates.length < 2) throw new RecordError(`Session ${id}: started with fewer than 2 players`);
		if (current < 0 || current >= playerStates.length) throw new RecordError(`Session ${id}: current index out of range`);
		if (state.discardPile.length === 0 || color === null) throw new RecordError(`Session ${id}: no top card`);
		if (countCards(state) !== DECK_SIZE) throw new RecordError(`Session ${id}: holds ${countCards(state)} cards`);
	} else if (countCards(state) !== 0) {
		throw new RecordError(`Session ${id}: cards present before the game began`);
	}

	return { state, lastActive: lastActiveMs };
}

export function encodeStats(id: string, entries: readonly StatsEntry[]): StatsRecord {
	return { id, entries: entries.map((e) => ({ ...e })) };
}

export function decodeStats(value: unknown): StatsRecord {
	if (!isRecord(value)) throw new RecordError("Stats record must be an object");
	const { id, entries } = value;
	if (typeof id !== "string" || id === "") throw new RecordError("Stats id missing");
	if (!Array.isArray(entries)) throw new RecordError(`Stats ${id}: entries must be a list`);
	const decoded: StatsEntry[] = [];
	for (const entry of entries) {
		if (!isRecord(entry)) throw new RecordError(`Stats ${id}: bad entry`);
		const { playerId, displayName, wins } = entry;
		if (typeof playerId !== "number" || !Number.isInteger(playerId)) throw new RecordError(`Stats ${id}: bad player id`);
		if (typeof wins !== "number" || !Number.isInteger(wins) || wins < 0) throw new RecordError(`Stats ${id}: bad win count`);
		decoded.push({ playerId, displayName: typeof displayName === "string" ? displayName : String(playerId), wins });
	}
	return { id, entries: decoded };
}
