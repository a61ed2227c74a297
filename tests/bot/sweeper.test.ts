import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { SessionStore } from "../../src/bot/session.js";
import { FileStorage } from "../../src/bot/storage.js";
import { recoverSessions, startExpirySweeper, sweepIdleSessions } from "../../src/bot/sweeper.js";
import { StatsLedger } from "../../src/game/stats.js";
import { beginGame, createEmptyGame, joinGame } from "../../src/game/engine.js";
import { encodeSession, encodeStats } from "../../src/game/serialize.js";
import { makeRng } from "../helpers/fixtures.js";
import { MemoryStorage } from "../helpers/memoryStorage.js";

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;
const T0 = Date.parse("2026-03-01T00:00:00.000Z");

function startedGame(id: string) {
	return beginGame(joinGame(joinGame(createEmptyGame(id), 1, "@ann"), 2, "@bob"), makeRng(4));
}

describe("recoverSessions", () => {
	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => undefined);
		vi.spyOn(console, "warn").mockImplementation(() => undefined);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("restores fresh games, drops stale ones and skips malformed records", async () => {
		const storage = new MemoryStorage();
		storage.sessions.set("fresh", encodeSession(startedGame("fresh"), T0));
		storage.sessions.set("lobby", encodeSession(joinGame(createEmptyGame("lobby"), 3, "@cat"), T0 - HOUR));
		storage.sessions.set("stale", encodeSession(startedGame("stale"), T0 - 2 * DAY));
		storage.rawSessions.push({ id: "garbled", data: undefined }, { id: "partial", data: { id: "partial", players: [1] } });
		storage.stats.set("fresh", encodeStats("fresh", [{ playerId: 1, displayName: "@ann", wins: 2 }]));
		const store = new SessionStore(storage, new StatsLedger());

		const recovered = await recoverSessions(store, storage, T0 + HOUR, DAY);

		expect(recovered).toBe(3);
		expect(store.listActive().map((s) => s.id)).toEqual(["fresh", "lobby"]);
		expect(store.entry("fresh").lastActive).toBe(T0);
		expect(store.get("fresh").players.map((p) => p.hand.length)).toEqual([7, 7]);
		expect(storage.sessions.has("stale")).toBe(false);
		expect(store.stats.wins("fresh", 1)).toBe(2);
		expect(console.warn).toHaveBeenCalledTimes(2);
		expect(console.log).toHaveBeenCalledWith("[uno] Loaded 3 games from storage");
	});

	it("recovers good files next to unreadable ones", async () => {
		const root = await mkdtemp(path.join(os.tmpdir(), "uno-recover-"));
		try {
			const storage = new FileStorage(root);
			await storage.saveSession(encodeSession(startedGame("good"), T0));
			await mkdir(path.join(root, "sessions", "zzz.json"));
			await writeFile(path.join(root, "sessions", "%zz.json"), "{}", "utf-8");
			const store = new SessionStore(storage, new StatsLedger());

			expect(await recoverSessions(store, storage, T0, DAY)).toBe(1);
			expect(store.has("good")).toBe(true);
		} finally {
			await rm(root, { recursive: true, force: true });
		}
	});

	it("keeps starting when a whole store cannot be listed", async () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);
		const storage = new MemoryStorage();
		storage.sessions.set("fresh", encodeSession(startedGame("fresh"), T0));
		vi.spyOn(storage, "loadStats").mockRejectedValue(new Error("EACCES: permission denied"));
		const store = new SessionStore(storage, new StatsLedger());

		expect(await recoverSessions(store, storage, T0, DAY)).toBe(1);
		expect(store.has("fresh")).toBe(true);
		expect(console.error).toHaveBeenCalledWith("[uno] Could not load stored stats: EACCES: permission denied");
	});

	it("starts empty when nothing was stored", async () => {
		const storage = new MemoryStorage();
		const store = new SessionStore(storage, new StatsLedger());

		expect(await recoverSessions(store, storage, T0, DAY)).toBe(0);
		expect(store.listActive()).toEqual([]);
	});
});

describe("sweepIdleSessions", () => {
	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => undefined);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("removes sessions idle strictly longer than the limit", async () => {
		const storage = new MemoryStorage();
		const store = new SessionStore(storage, new StatsLedger());
		store.restore(createEmptyGame("edge"), T0 - DAY);
		store.restore(createEmptyGame("old"), T0 - DAY - 1);
		store.restore(createEmptyGame("new"), T0);

		expect(await sweepIdleSessions(store, T0, DAY)).toEqual(["old"]);
		expect(await sweepIdleSessions(store, T0, DAY)).toEqual([]);
		expect(store.listActive().map((s) => s.id)).toEqual(["edge", "new"]);
	});
});

describe("startExpirySweeper", () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.spyOn(console, "log").mockImplementation(() => undefined);
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	it("sweeps on each tick until stopped", async () => {
		let now = T0;
		const storage = new MemoryStorage();
		const store = new SessionStore(storage, new StatsLedger(), { clock: () => now });
		await store.create("chat-1");
		await store.create("chat-2");

		const stop = startExpirySweeper(store, 60_000, HOUR, () => now);

		now = T0 + 30 * 60_000;
		await vi.advanceTimersByTimeAsync(60_000);
		expect(store.has("chat-1")).toBe(true);

		now = T0 + 2 * HOUR;
		await vi.advanceTimersByTimeAsync(60_000);
		expect(store.has("chat-1")).toBe(false);
		expect(storage.sessions.size).toBe(0);

		stop();
		store.restore(createEmptyGame("chat-3"), T0);
		await vi.advanceTimersByTimeAsync(5 * 60_000);
		expect(store.has("chat-3")).toBe(true);
	});
});
