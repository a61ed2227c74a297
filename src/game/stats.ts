/**
 * Per-chat win counters. Lives apart from game state so the leaderboard
 * survives resets, wins and idle expiry.
 */

export interface StatsEntry {
	playerId: number;
	displayName: string;
	wins: number;
}

export class StatsLedger {
	// Map keeps first-win order, which breaks ties in topN.
	private readonly bySession = new Map<string, Map<number, StatsEntry>>();

	/**
	 * Add one win, creating the entry if needed. The display name is refreshed
	 * so the leaderboard follows username changes.
	 * @returns the player's new win count
	 */
	recordWin(sessionId: string, playerId: number, displayName: string): number {
		let entries = this.bySession.get(sessionId);
		if (!entries) {
			entries = new Map();
			this.bySession.set(sessionId, entries);
		}
		const prev = entries.get(playerId);
		const wins = (prev?.wins ?? 0) + 1;
		entries.set(playerId, { playerId, displayName, wins });
		return wins;
	}

	/** Players by wins, most first; equal counts keep first-win order. */
	topN(sessionId: string, n: number): StatsEntry[] {
		return this.entries(sessionId)
			.sort((a, b) => b.wins - a.wins)
			.slice(0, Math.max(0, n));
	}

	wins(sessionId: string, playerId: number): number {
		return this.bySession.get(sessionId)?.get(playerId)?.wins ?? 0;
	}

	entries(sessionId: string): StatsEntry[] {
		return Array.from(this.bySession.get(sessionId)?.values() ?? [], (e) => ({ ...e }));
	}

	/** Replace a session's counters with stored ones, keeping their order. */
	load(sessionId: string, entries: readonly StatsEntry[]): void {
		this.bySession.set(sessionId, new Map(entries.map((e) => [e.playerId, { ...e }])));
	}

	sessionIds(): string[] {
		return Array.from(this.bySession.keys());
	}
}
