/**
 * Startup recovery and idle-session expiry.
 */
import { decodeSession, decodeStats } from "../game/serialize.js";
import type { SessionStore } from "./session.js";
import type { GameStorage, StoredEntry } from "./storage.js";

export const DEFAULT_IDLE_MS = 24 * 60 * 60 * 1000;

function reason(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Remove every session idle for longer than `maxIdleMs`. Running it again at
 * the same `now` removes nothing more.
 * @returns ids of the removed sessions
 */
export async function sweepIdleSessions(store: SessionStore, now: number, maxIdleMs: number = DEFAULT_IDLE_MS): Promise<string[]> {
	const stale = store.listActive().filter((s) => now - s.lastActive > maxIdleMs);
	const removed: string[] = [];
	for (const { id } of stale) {
		if (await store.evictIfIdle(id, now, maxIdleMs)) {
			console.log(`[uno] Removing inactive game in chat ${id}`);
			removed.push(id);
		}
	}
	return removed;
}

// A failed listing starts the bot with nothing from that store.
async function loadOrEmpty(what: string, load: () => Promise<StoredEntry[]>): Promise<StoredEntry[]> {
	try {
		return await load();
	} catch (err) {
		console.error(`[uno] Could not load stored ${what}: ${reason(err)}`);
		return [];
	}
}

/**
 * Load stats and sessions from storage into memory, then sweep out the ones
 * that went idle while the bot was down. Malformed records are skipped.
 * @returns number of sessions recovered before the sweep
 */
export async function recoverSessions(store: SessionStore, storage: GameStorage, now: number = Date.now(), maxIdleMs: number = DEFAULT_IDLE_MS): Promise<number> {
	for (const { id, data } of await loadOrEmpty("stats", () => storage.loadStats())) {
		try {
			const record = decodeStats(data);
			store.stats.load(record.id, record.entries);
		} catch (err) {
			console.warn(`[uno] Skipping stored stats ${id}: ${reason(err)}`);
		}
	}

	let recovered = 0;
	for (const { id, data } of await loadOrEmpty("sessions", () => storage.loadSessions())) {
		try {
			const { state, lastActive } = decodeSession(data);
			store.restore(state, lastActive);
			recovered++;
		} catch (err) {
			console.warn(`[uno] Skipping stored session ${id}: ${reason(err)}`);
		}
	}
	console.log(`[uno] Loaded ${recovered} games from storage`);

	await sweepIdleSessions(store, now, maxIdleMs);
	return recovered;
}

/**
 * Sweep on an interval. The timer does not keep the process alive.
 * @returns a function that stops the timer
 */
export function startExpirySweeper(store: SessionStore, intervalMs: number, maxIdleMs: number = DEFAULT_IDLE_MS, clock: () => number = Date.now): () => void {
	const timer = setInterval(() => {
		sweepIdleSessions(store, clock(), maxIdleMs).catch((err: unknown) => {
			console.error("[uno] Idle sweep failed:", err);
		});
	}, intervalMs);
	timer.unref();
	return () => clearInterval(timer);
}
