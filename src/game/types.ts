/**
 * Core game type definitions for the UNO engine.
 *
 * This module contains only data types and the engine error class. It is
 * imported by the engine, the serializer and the bot layer.
 */
export enum Color {
	Red = "red",
	Yellow = "yellow",
	Green = "green",
	Blue = "blue",
	Wild = "wild"
}

/** The four colors a card can be matched on or a wild can declare. */
export type PlayColor = Exclude<Color, Color.Wild>;

export const PLAY_COLORS: readonly PlayColor[] = [Color.Red, Color.Green, Color.Blue, Color.Yellow];

/**
 * Numeric face values available for number cards.
 */
export type NumericValue = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * Special card kinds.
 * - Skip: next player loses their turn
 * - Reverse: flips turn direction (acts like Skip with two players)
 * - Draw2: next player draws 2 and is skipped
 * - Wild: player chooses the next active color
 * - Wild4: Wild that also makes the next player draw 4 and skip
 */
export enum ActionCard {
	Skip = "skip",
	Reverse = "reverse",
	Draw2 = "draw2",
	Wild = "wild",
	Wild4 = "wild4"
}

export type ColoredAction = ActionCard.Skip | ActionCard.Reverse | ActionCard.Draw2;
export type WildAction = ActionCard.Wild | ActionCard.Wild4;

/**
 * Union of all possible cards.
 * - number: colored numeric card 0-9
 * - action: colored Skip/Reverse/Draw2
 * - wild: Wild or Wild Draw Four, no color of its own
 */
export type Card =
	| { kind: "number"; color: PlayColor; value: NumericValue }
	| { kind: "action"; color: PlayColor; action: ColoredAction }
	| { kind: "wild"; action: WildAction };

/** What a card matches on besides color. */
export type Rank = NumericValue | ActionCard;

/**
 * Per-player state stored in a `GameState`.
 * - `tgUserId` ties the player to a Telegram user and is the player identifier
 * - `hand` holds the player's current cards
 */
export interface PlayerState {
	tgUserId: number;
	displayName: string;
	hand: Card[];
}

/**
 * High-level game lifecycle phases. `finished` only appears on the state
 * returned by a winning play; the session store drops it right away.
 */
export type Phase = "awaiting_players" | "in_progress" | "finished";

export type Direction = 1 | -1;

/**
 * What the last successful action did, for the bot layer to announce.
 * Not persisted.
 */
export type TurnEvent =
	| { kind: "play"; playerId: number; card: Card; penalty?: { playerId: number; cards: number } }
	| { kind: "draw"; playerId: number; card: Card };

/**
 * The complete state for a single chat's game.
 *
 * - `players`: join order is turn order
 * - `drawPile`/`discardPile`: top of each stack is the last element
 * - `currentColor`: active color for matching (declared after a wild)
 * - `winnerId`: set when a player empties their hand
 */
export interface GameState {
	id: string;
	phase: Phase;
	players: PlayerState[];
	currentPlayerIdx: number;
	direction: Direction;
	drawPile: Card[];
	discardPile: Card[];
	currentColor: PlayColor | null;
	lastTurn?: TurnEvent;
	winnerId?: number;
}

/**
 * Discriminated union of all actions that mutate a `GameState` in the engine.
 * These are consumed by the reducer in `engine.ts`.
 */
export type EngineAction =
	| { type: "createGame"; gameId: string }
	| { type: "joinGame"; tgUserId: number; displayName: string }
	| { type: "beginGame" }
	| { type: "playCard"; tgUserId: number; card: Card; declaredColor?: PlayColor }
	| { type: "draw"; tgUserId: number };

export type EngineErrorCode =
	| "no_such_session"
	| "already_in_progress"
	| "already_started"
	| "already_joined"
	| "not_enough_players"
	| "not_started"
	| "not_your_turn"
	| "card_not_held"
	| "illegal_play"
	| "color_required"
	| "deck_exhausted"
	| "empty_session_no_op";

/**
 * Engine-level error with a machine-readable `code` for the bot layer
 * to present user-friendly messages.
 */
export class EngineError extends Error {
	code: EngineErrorCode;
	constructor(code: EngineErrorCode, message: string) {
		super(message);
		this.name = "EngineError";
		this.code = code;
	}
}
