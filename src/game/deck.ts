/**
 * Deck utilities: deck creation, shuffling, legality and drawing.
 *
 * The draw/discard piles are modeled as arrays with the top card as the last
 * element. Every function here returns new arrays and leaves its inputs alone.
 */
import { ActionCard, Color, EngineError, PLAY_COLORS } from "./types.js";
import type { Card, ColoredAction, NumericValue, PlayColor, Rank } from "./types.js";

export const DECK_SIZE = 108;

const NUMBERS: NumericValue[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];
const COLORED_ACTIONS: ColoredAction[] = [ActionCard.Skip, ActionCard.Reverse, ActionCard.Draw2];

/**
 * Create a new shuffled 108-card deck:
 * - one 0 and two of each 1-9 per color
 * - two Skip, two Reverse, two Draw2 per color
 * - four Wild and four Wild Draw Four
 */
export function createDeck(rng: () => number = Math.random): Card[] {
	const deck: Card[] = [];

	for (const color of PLAY_COLORS) {
		deck.push({ kind: "number", color, value: 0 });
		for (const n of NUMBERS) {
			deck.push({ kind: "number", color, value: n }, { kind: "number", color, value: n });
		}
		for (const action of COLORED_ACTIONS) {
			deck.push({ kind: "action", color, action }, { kind: "action", color, action });
		}
	}

	for (let i = 0; i < 4; i++) {
		deck.push({ kind: "wild", action: ActionCard.Wild });
		deck.push({ kind: "wild", action: ActionCard.Wild4 });
	}

	return shuffle(deck, rng);
}

/**
 * Fisher–Yates shuffle that returns a new array.
 */
export function shuffle<T>(arr: readonly T[], rng: () => number = Math.random): T[] {
	const a = arr.slice();
	for (let i = a.length - 1; i > 0; i--) {
		const j = Math.floor(rng() * (i + 1));
		[a[i], a[j]] = [a[j], a[i]];
	}
	return a;
}

export function cardColor(card: Card): Color {
	return card.kind === "wild" ? Color.Wild : card.color;
}

export function cardRank(card: Card): Rank {
	return card.kind === "number" ? card.value : card.action;
}

export function cardsEqual(a: Card, b: Card): boolean {
	return cardColor(a) === cardColor(b) && cardRank(a) === cardRank(b);
}

export function isPlayColor(value: string): value is PlayColor {
	return PLAY_COLORS.some((c) => c === value);
}

/**
 * A card can be played when it is wild, matches the active color, or matches
 * the top card's rank. A declared-color wild on top is matched the same way:
 * by the declared color or by another wild of the same rank.
 */
export function isPlayable(card: Card, currentColor: PlayColor | null, top: Card): boolean {
	if (card.kind === "wild") return true;
	if (currentColor !== null && card.color === currentColor) return true;
	return cardRank(card) === cardRank(top);
}

/**
 * Draw a single card from the draw pile. When the draw pile is empty,
 * reshuffle the discard pile (except for the top card) into a new draw pile.
 *
 * @param drawPile current draw pile (top is at the end)
 * @param discardPile current discard pile (top is at the end)
 * @returns the drawn card and updated piles
 * @throws EngineError `deck_exhausted` when there are no cards to draw at all
 */
export function drawOne(
	drawPile: readonly Card[],
	discardPile: readonly Card[],
	rng: () => number = Math.random
): { card: Card; newDraw: Card[]; newDiscard: Card[] } {
	let d = drawPile.slice();
	let disc = discardPile.slice();
	if (d.length === 0) {
		if (disc.length <= 1) throw new EngineError("deck_exhausted", "No cards left to draw");
		d = shuffle(disc.slice(0, -1), rng);
		disc = disc.slice(-1);
	}
	const card = d.pop();
	if (card === undefined) throw new EngineError("deck_exhausted", "No cards left to draw");
	return { card, newDraw: d, newDiscard: disc };
}

/** Whether `drawOne` would succeed on these piles. */
export function canDraw(drawPile: readonly Card[], discardPile: readonly Card[]): boolean {
	return drawPile.length > 0 || discardPile.length > 1;
}
