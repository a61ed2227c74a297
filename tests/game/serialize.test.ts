/**
 * Tests for the stored record format and its validation.
 */
import { describe, it, expect } from "vitest";
import { decodeCard, decodeSession, decodeStats, encodeCard, encodeSession, encodeStats, RecordError } from "../../src/game/serialize.js";
import { beginGame, createEmptyGame, joinGame } from "../../src/game/engine.js";
import { ActionCard, Color } from "../../src/game/types.js";
import { act, makeRng, num, WILD, WILD4 } from "../helpers/fixtures.js";

const AT = Date.parse("2026-03-01T12:00:00.000Z");

function started() {
	const lobby = joinGame(joinGame(createEmptyGame("-100123"), 1, "@ann"), 2, "Bob Smith");
	return beginGame(lobby, makeRng(3));
}

describe("card pairs", () => {
	it("encodes cards as color and rank strings", () => {
		expect(encodeCard(num(Color.Red, 7))).toEqual(["red", "7"]);
		expect(encodeCard(act(Color.Blue, ActionCard.Draw2))).toEqual(["blue", "draw2"]);
		expect(encodeCard(WILD4)).toEqual(["wild", "wild4"]);
	});

	it("decodes valid pairs", () => {
		expect(decodeCard(["green", "0"])).toEqual(num(Color.Green, 0));
		expect(decodeCard(["yellow", "skip"])).toEqual(act(Color.Yellow, ActionCard.Skip));
		expect(decodeCard(["wild", "wild"])).toEqual(WILD);
	});

	it("rejects pairs that are not real cards", () => {
		expect(() => decodeCard(["red", "wild4"])).toThrow(RecordError);
		expect(() => decodeCard(["wild", "7"])).toThrow(RecordError);
		expect(() => decodeCard(["purple", "1"])).toThrow(RecordError);
		expect(() => decodeCard(["red", "10"])).toThrow(RecordError);
		expect(() => decodeCard(["red"])).toThrow(RecordError);
		expect(() => decodeCard("red 7")).toThrow(RecordError);
	});
});

describe("session records", () => {
	it("writes the documented field layout", () => {
		const record = encodeSession(started(), AT);

		expect(record.id).toBe("-100123");
		expect(record.players).toEqual([1, 2]);
		expect(record.names).toEqual({ "1": "@ann", "2": "Bob Smith" });
		expect(record.hands["1"]).toHaveLength(7);
		expect(record.deck).toHaveLength(93);
		expect(record.pile).toHaveLength(1);
		expect(record.current).toBe(0);
		expect(record.direction).toBe(1);
		expect(record.started).toBe(true);
		expect(record.lastActive).toBe("2026-03-01T12:00:00.000Z");
	});

	it("reads back the same game through JSON", () => {
		const state = { ...started(), currentPlayerIdx: 1, direction: -1 as const };
		const { state: back, lastActive } = decodeSession(JSON.parse(JSON.stringify(encodeSession(state, AT))));

		expect(back).toEqual(state);
		expect(lastActive).toBe(AT);
	});

	it("reads back a lobby", () => {
		const lobby = joinGame(createEmptyGame("chat-9"), 5, "@eve");
		const { state } = decodeSession(encodeSession(lobby, AT));

		expect(state.phase).toBe("awaiting_players");
		expect(state.players).toEqual([{ tgUserId: 5, displayName: "@eve", hand: [] }]);
	});

	it("rejects records with missing or mistyped fields", () => {
		const good = encodeSession(started(), AT);

		expect(() => decodeSession(null)).toThrow(RecordError);
		expect(() => decodeSession({ ...good, id: "" })).toThrow("Session id missing");
		expect(() => decodeSession({ ...good, players: [1, 1] })).toThrow("duplicate player 1");
		expect(() => decodeSession({ ...good, direction: 2 })).toThrow("bad direction");
		expect(() => decodeSession({ ...good, currentColor: "wild" })).toThrow("bad current color");
		expect(() => decodeSession({ ...good, lastActive: "yesterday" })).toThrow("bad lastActive");
	});

	it("rejects started records that break game invariants", () => {
		const good = encodeSession(started(), AT);

		expect(() => decodeSession({ ...good, current: 2 })).toThrow("current index out of range");
		expect(() => decodeSession({ ...good, deck: good.deck.slice(1) })).toThrow("holds 107 cards");
		expect(() => decodeSession({ ...good, players: [1] })).toThrow("fewer than 2 players");
	});

	it("rejects a lobby holding cards", () => {
		const lobby = encodeSession(joinGame(createEmptyGame("chat-9"), 5, "@eve"), AT);
		expect(() => decodeSession({ ...lobby, pile: [["red", "1"]] })).toThrow("cards present before the game began");
	});
});

describe("stats records", () => {
	it("round-trips entries in order", () => {
		const entries = [
			{ playerId: 2, displayName: "@bob", wins: 3 },
			{ playerId: 1, displayName: "@ann", wins: 3 }
		];
		expect(decodeStats(JSON.parse(JSON.stringify(encodeStats("chat-1", entries))))).toEqual({ id: "chat-1", entries });
	});

	it("rejects bad win counts", () => {
		expect(() => decodeStats({ id: "chat-1", entries: [{ playerId: 1, displayName: "@a", wins: -1 }] })).toThrow("bad win count");
		expect(() => decodeStats({ id: "chat-1", entries: {} })).toThrow("entries must be a list");
	});

	it("falls back to the player id when the name is missing", () => {
		expect(decodeStats({ id: "chat-1", entries: [{ playerId: 7, wins: 1 }] }).entries).toEqual([
			{ playerId: 7, displayName: "7", wins: 1 }
		]);
	});
});
