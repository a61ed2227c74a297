/**
 * Pure game engine for UNO.
 *
 * This module contains pure functions that operate over `GameState` and return
 * new states. There are no side effects: every precondition is checked before
 * anything is built, so a thrown `EngineError` leaves the caller's state as it
 * was. The session store integrates with the engine via the `reduce` function.
 */
import { ActionCard, EngineError, PLAY_COLORS } from "./types.js";
import type { Card, EngineAction, GameState, PlayColor, PlayerState, TurnEvent } from "./types.js";
import { canDraw, cardsEqual, createDeck, drawOne, isPlayable, isPlayColor } from "./deck.js";

export const HAND_SIZE = 7;
export const MIN_PLAYERS = 2;

/**
 * Initialize an empty game that is ready to accept players.
 */
export function createEmptyGame(gameId: string): GameState {
	return {
		id: gameId,
		phase: "awaiting_players",
		players: [],
		currentPlayerIdx: 0,
		direction: 1,
		drawPile: [],
		discardPile: [],
		currentColor: null
	};
}

/**
 * Append a player in join order.
 * @throws EngineError when the game has begun or the player already joined
 */
export function joinGame(state: GameState, tgUserId: number, displayName: string): GameState {
	if (state.phase !== "awaiting_players") throw new EngineError("already_started", "Game already started");
	if (state.players.some((p) => p.tgUserId === tgUserId)) {
		throw new EngineError("already_joined", "Already joined");
	}
	const player: PlayerState = { tgUserId, displayName, hand: [] };
	return { ...state, players: [...state.players, player], lastTurn: undefined };
}

/**
 * Begin the match: build a deck, deal 7 cards to each player in join order and
 * flip the starting card. A wild starting card seeds a random color.
 */
export function beginGame(state: GameState, rng: () => number = Math.random): GameState {
	if (state.phase !== "awaiting_players") throw new EngineError("already_started", "Game already started");
	if (state.players.length < MIN_PLAYERS) {
		throw new EngineError("not_enough_players", `At least ${MIN_PLAYERS} players are required`);
	}
	const deck = createDeck(rng);
	// deck is a stack: each player takes the next 7 off the end
	const players = state.players.map((p) => ({ ...p, hand: deck.splice(deck.length - HAND_SIZE, HAND_SIZE).reverse() }));
	const top = deck.pop();
	if (top === undefined) throw new EngineError("deck_exhausted", "No cards left to draw");
	const currentColor = top.kind === "wild" ? pickColor(rng) : top.color;
	return {
		...state,
		phase: "in_progress",
		players,
		drawPile: deck,
		discardPile: [top],
		currentColor,
		currentPlayerIdx: 0,
		direction: 1,
		lastTurn: undefined,
		winnerId: undefined
	};
}

function pickColor(rng: () => number): PlayColor {
	return PLAY_COLORS[Math.floor(rng() * PLAY_COLORS.length)];
}

/** The top card of the discard pile. */
export function topCard(state: GameState): Card | undefined {
	return state.discardPile[state.discardPile.length - 1];
}

export function currentPlayer(state: GameState): PlayerState | undefined {
	return state.phase === "in_progress" ? state.players[state.currentPlayerIdx] : undefined;
}

/**
 * Move the turn `steps` seats in the current direction.
 */
export function advance(state: GameState, steps = 1): GameState {
	const n = state.players.length;
	let idx = state.currentPlayerIdx;
	for (let i = 0; i < steps; i++) {
		idx = (((idx + state.direction) % n) + n) % n;
	}
	return { ...state, currentPlayerIdx: idx };
}

function requireTurn(state: GameState, tgUserId: number): PlayerState {
	if (state.phase !== "in_progress") throw new EngineError("not_started", "Game not in progress");
	const player = state.players[state.currentPlayerIdx];
	if (!player || player.tgUserId !== tgUserId) throw new EngineError("not_your_turn", "Not your turn");
	return player;
}

function withHand(state: GameState, idx: number, hand: Card[]): GameState {
	const players = state.players.slice();
	players[idx] = { ...players[idx], hand };
	return { ...state, players };
}

/**
 * Give the player at `idx` up to `count` cards. Stops early only when deck and
 * discard pile together cannot supply another card.
 */
function giveCards(state: GameState, idx: number, count: number, rng: () => number): { state: GameState; drawn: number } {
	let drawPile = state.drawPile;
	let discardPile = state.discardPile;
	const cards: Card[] = [];
	while (cards.length < count && canDraw(drawPile, discardPile)) {
		const res = drawOne(drawPile, discardPile, rng);
		drawPile = res.newDraw;
		discardPile = res.newDiscard;
		cards.push(res.card);
	}
	const next = withHand({ ...state, drawPile, discardPile }, idx, state.players[idx].hand.concat(cards));
	return { state: next, drawn: cards.length };
}

/**
 * Apply the played card's effect to the turn order. `state` already has the
 * card on the discard pile.
 */
function resolveEffect(state: GameState, card: Card, rng: () => number): { state: GameState; penalty?: { playerId: number; cards: number } } {
	const action = card.kind === "number" ? null : card.action;
	switch (action) {
		case ActionCard.Skip:
			return { state: advance(state, 2) };
		case ActionCard.Reverse: {
			const reversed: GameState = { ...state, direction: state.direction === 1 ? -1 : 1 };
			return { state: advance(reversed, state.players.length === 2 ? 2 : 1) };
		}
		case ActionCard.Draw2:
		case ActionCard.Wild4: {
			const victimTurn = advance(state, 1);
			const victimIdx = victimTurn.currentPlayerIdx;
			const { state: afterDraw, drawn } = giveCards(victimTurn, victimIdx, action === ActionCard.Draw2 ? 2 : 4, rng);
			return {
				state: advance(afterDraw, 1),
				penalty: { playerId: afterDraw.players[victimIdx].tgUserId, cards: drawn }
			};
		}
		default:
			return { state: advance(state, 1) };
	}
}

/**
 * Play a card from the current player's hand, resolve its effect and check
 * for a win. A winning play returns a `finished` state with `winnerId` set.
 */
export function playCard(
	state: GameState,
	tgUserId: number,
	card: Card,
	declaredColor?: PlayColor,
	rng: () => number = Math.random
): GameState {
	const player = requireTurn(state, tgUserId);
	const handIdx = player.hand.findIndex((c) => cardsEqual(c, card));
	if (handIdx === -1) throw new EngineError("card_not_held", "You don't have that card");
	let nextColor: PlayColor;
	if (card.kind === "wild") {
		if (declaredColor === undefined || !isPlayColor(declaredColor)) {
			throw new EngineError("color_required", "Choose a color for the wild card");
		}
		nextColor = declaredColor;
	} else {
		nextColor = card.color;
	}
	const top = topCard(state);
	if (!top || !isPlayable(card, state.currentColor, top)) {
		throw new EngineError("illegal_play", "Card does not match color or value");
	}

	const played = player.hand[handIdx];
	const hand = player.hand.slice(0, handIdx).concat(player.hand.slice(handIdx + 1));
	const placed: GameState = {
		...withHand(state, state.currentPlayerIdx, hand),
		discardPile: state.discardPile.concat(played),
		currentColor: nextColor
	};

	const { state: resolved, penalty } = resolveEffect(placed, played, rng);
	const lastTurn: TurnEvent = { kind: "play", playerId: tgUserId, card: played, penalty };

	if (hand.length === 0) {
		return { ...resolved, phase: "finished", winnerId: tgUserId, lastTurn };
	}
	return { ...resolved, lastTurn };
}

/**
 * Draw one card. Drawing always ends the turn.
 */
export function draw(state: GameState, tgUserId: number, rng: () => number = Math.random): GameState {
	requireTurn(state, tgUserId);
	if (!canDraw(state.drawPile, state.discardPile)) {
		throw new EngineError("deck_exhausted", "No cards left to draw");
	}
	const { card, newDraw, newDiscard } = drawOne(state.drawPile, state.discardPile, rng);
	const idx = state.currentPlayerIdx;
	const next = withHand({ ...state, drawPile: newDraw, discardPile: newDiscard }, idx, state.players[idx].hand.concat(card));
	return { ...advance(next, 1), lastTurn: { kind: "draw", playerId: tgUserId, card } };
}

/**
 * Read a player's own hand. Only the requesting player's cards are returned.
 */
export function getHand(state: GameState, tgUserId: number): Card[] {
	if (state.phase !== "in_progress") throw new EngineError("not_started", "Game not in progress");
	const player = state.players.find((p) => p.tgUserId === tgUserId);
	if (!player) throw new EngineError("empty_session_no_op", "You have no cards in this game");
	return player.hand.slice();
}

/** Public, hand-free summary of a game. */
export interface GameSummary {
	id: string;
	playerCount: number;
	started: boolean;
	currentPlayer?: { tgUserId: number; displayName: string };
	currentColor?: PlayColor;
	topCard?: Card;
	handSizes: Array<{ tgUserId: number; displayName: string; cards: number }>;
}

export function summarize(state: GameState): GameSummary {
	const started = state.phase === "in_progress";
	const current = currentPlayer(state);
	return {
		id: state.id,
		playerCount: state.players.length,
		started,
		currentPlayer: current ? { tgUserId: current.tgUserId, displayName: current.displayName } : undefined,
		currentColor: started && state.currentColor !== null ? state.currentColor : undefined,
		topCard: started ? topCard(state) : undefined,
		handSizes: state.players.map((p) => ({ tgUserId: p.tgUserId, displayName: p.displayName, cards: p.hand.length }))
	};
}

/** Total cards across draw pile, discard pile and all hands. */
export function countCards(state: GameState): number {
	return state.players.reduce((sum, p) => sum + p.hand.length, state.drawPile.length + state.discardPile.length);
}

/**
 * The single reducer entry point used by the session layer.
 */
export function reduce(state: GameState, action: EngineAction, rng: () => number = Math.random): GameState {
	switch (action.type) {
		case "createGame":
			return createEmptyGame(action.gameId);
		case "joinGame":
			return joinGame(state, action.tgUserId, action.displayName);
		case "beginGame":
			return beginGame(state, rng);
		case "playCard":
			return playCard(state, action.tgUserId, action.card, action.declaredColor, rng);
		case "draw":
			return draw(state, action.tgUserId, rng);
	}
}
