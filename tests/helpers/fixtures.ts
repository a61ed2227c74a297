/**
 * Card builders, seeded RNG and hand-built game states for tests.
 */
import { ActionCard, EngineError } from "../../src/game/types.js";
import type { Card, ColoredAction, Direction, GameState, NumericValue, PlayColor } from "../../src/game/types.js";

// Deterministic RNG for reproducible tests
export function makeRng(seed: number = 42) {
	let s = seed;
	return () => {
		s = (s * 16807) % 2147483647;
		return s / 2147483647;
	};
}

export function num(color: PlayColor, value: NumericValue): Card {
	return { kind: "number", color, value };
}

export function act(color: PlayColor, action: ColoredAction): Card {
	return { kind: "action", color, action };
}

export const WILD: Card = { kind: "wild", action: ActionCard.Wild };
export const WILD4: Card = { kind: "wild", action: ActionCard.Wild4 };

export interface GameSetup {
	id?: string;
	players: Array<{ id: number; name?: string; hand: Card[] }>;
	drawPile?: Card[];
	discardPile: Card[];
	currentColor: PlayColor;
	currentPlayerIdx?: number;
	direction?: Direction;
}

/** An in-progress game with exactly the given cards. */
export function makeGame(setup: GameSetup): GameState {
	return {
		id: setup.id ?? "chat-1",
		phase: "in_progress",
		players: setup.players.map((p) => ({ tgUserId: p.id, displayName: p.name ?? `@p${p.id}`, hand: p.hand.slice() })),
		currentPlayerIdx: setup.currentPlayerIdx ?? 0,
		direction: setup.direction ?? 1,
		drawPile: (setup.drawPile ?? []).slice(),
		discardPile: setup.discardPile.slice(),
		currentColor: setup.currentColor
	};
}

export function handOf(state: GameState, id: number): Card[] {
	const player = state.players.find((p) => p.tgUserId === id);
	if (!player) throw new Error(`no player ${id}`);
	return player.hand;
}

/** The EngineError code `fn` throws, or undefined when it returns. */
export function codeOf(fn: () => unknown): string | undefined {
	try {
		fn();
	} catch (err) {
		if (err instanceof EngineError) return err.code;
		throw err;
	}
	return undefined;
}
