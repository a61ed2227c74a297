/**
 * Session storage for UNO games, one session per chat.
 *
 * The store wraps the pure engine reducer, keyed by chat id. Each mutation
 * runs in that chat's queue and is written to durable storage before the
 * returned promise resolves. Reads see the last committed state.
 */
import type { EngineAction, GameState } from "../game/types.js";
import { EngineError } from "../game/types.js";
import { createEmptyGame, reduce } from "../game/engine.js";
import { encodeSession, encodeStats } from "../game/serialize.js";
import type { StatsLedger } from "../game/stats.js";
import { KeyedQueue } from "./queue.js";
import { PersistenceError } from "./storage.js";
import type { GameStorage } from "./storage.js";

export interface SessionEntry {
	state: GameState;
	lastActive: number;
}

/**
 * Result of a mutation. `persisted` is false when the durable write failed
 * twice; the in-memory change still stands.
 */
export interface MutationResult {
	state: GameState;
	persisted: boolean;
	/** Set when the action ended the game. */
	winner?: { tgUserId: number; displayName: string; wins: number };
}

export interface SessionStoreOptions {
	clock?: () => number;
	rng?: () => number;
}

export class SessionStore {
	private readonly sessions = new Map<string, SessionEntry>();
	private readonly queue = new KeyedQueue();
	private readonly clock: () => number;
	private readonly rng: () => number;
	private degradedOps = 0;

	constructor(
		private readonly storage: GameStorage,
		readonly stats: StatsLedger,
		options: SessionStoreOptions = {}
	) {
		this.clock = options.clock ?? Date.now;
		this.rng = options.rng ?? Math.random;
	}

	/** True once any write has failed after its retry. */
	get degraded(): boolean {
		return this.degradedOps > 0;
	}

	has(id: string): boolean {
		return this.sessions.has(id);
	}

	/** @throws EngineError `no_such_session` */
	get(id: string): GameState {
		return this.entry(id).state;
	}

	entry(id: string): SessionEntry {
		const entry = this.sessions.get(id);
		if (!entry) throw new EngineError("no_such_session", "No active game in this chat");
		return entry;
	}

	listActive(): Array<{ id: string } & SessionEntry> {
		return Array.from(this.sessions, ([id, entry]) => ({ id, ...entry }));
	}

	/** Put a recovered session back without writing it. */
	restore(state: GameState, lastActive: number): void {
		this.sessions.set(state.id, { state, lastActive });
	}

	/**
	 * Create an empty game for a chat.
	 * @throws EngineError `already_in_progress` when the chat has a game
	 */
	create(id: string): Promise<MutationResult> {
		return this.queue.run(id, async () => {
			if (this.sessions.has(id)) throw new EngineError("already_in_progress", "A game already exists in this chat");
			const state = createEmptyGame(id);
			return this.commit(id, state);
		});
	}

	/**
	 * Apply an engine action to a chat's game. A winning play records the win,
	 * deletes the session and reports the winner.
	 */
	apply(id: string, action: EngineAction): Promise<MutationResult> {
		return this.queue.run(id, async () => {
			const current = this.get(id);
			const next = reduce(current, action, this.rng);
			if (next.phase === "finished" && next.winnerId !== undefined) {
				return this.finish(id, next, next.winnerId);
			}
			return this.commit(id, next);
		});
	}

	/**
	 * Force-delete a chat's game. Stats are kept.
	 * @throws EngineError `no_such_session`
	 */
	remove(id: string): Promise<MutationResult> {
		return this.queue.run(id, async () => {
			const state = this.get(id);
			this.sessions.delete(id);
			const persisted = await this.persist("deleteSession", id, () => this.storage.deleteSession(id));
			return { state, persisted };
		});
	}

	/**
	 * Remove a session if it has been idle for longer than `maxIdleMs` at
	 * `now`. The check runs inside the chat's queue, so a command that landed
	 * in between keeps the game alive.
	 * @returns whether the session was removed
	 */
	evictIfIdle(id: string, now: number, maxIdleMs: number): Promise<boolean> {
		return this.queue.run(id, async () => {
			const entry = this.sessions.get(id);
			if (!entry || now - entry.lastActive <= maxIdleMs) return false;
			this.sessions.delete(id);
			await this.persist("deleteSession", id, () => this.storage.deleteSession(id));
			return true;
		});
	}

	private async commit(id: string, state: GameState): Promise<MutationResult> {
		const lastActive = this.clock();
		this.sessions.set(id, { state, lastActive });
		const record = encodeSession(state, lastActive);
		const persisted = await this.persist("saveSession", id, () => this.storage.saveSession(record));
		return { state, persisted };
	}

	private async finish(id: string, state: GameState, winnerId: number): Promise<MutationResult> {
		const winner = state.players.find((p) => p.tgUserId === winnerId);
		const displayName = winner?.displayName ?? String(winnerId);
		const wins = this.stats.recordWin(id, winnerId, displayName);
		this.sessions.delete(id);
		const statsRecord = encodeStats(id, this.stats.entries(id));
		const statsSaved = await this.persist("saveStats", id, () => this.storage.saveStats(statsRecord));
		const sessionDeleted = await this.persist("deleteSession", id, () => this.storage.deleteSession(id));
		return { state, persisted: statsSaved && sessionDeleted, winner: { tgUserId: winnerId, displayName, wins } };
	}

	/**
	 * Run a storage write, retrying once. A second failure is logged and
	 * reported as `false`.
	 */
	private async persist(operation: string, id: string, write: () => Promise<void>): Promise<boolean> {
		for (let attempt = 1; attempt <= 2; attempt++) {
			try {
				await write();
				return true;
			} catch (err) {
				const error = new PersistenceError(operation, id, err);
				if (attempt === 1) {
					console.warn(`[uno] ${error.message}; retrying`);
				} else {
					this.degradedOps++;
					console.error(`[uno] Persistence degraded: ${error.message}`);
				}
			}
		}
		return false;
	}
}
