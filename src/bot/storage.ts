/**
 * Durable storage for sessions and win stats.
 *
 * `FileStorage` keeps one JSON file per chat under `sessions/` and `stats/`,
 * so a write only ever touches the chat being mutated. Files are written to a
 * temporary name and renamed into place.
 */
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { SessionRecord, StatsRecord } from "../game/serialize.js";

/** A raw stored record; contents are validated by the caller. */
export interface StoredEntry {
	id: string;
	data: unknown;
}

export interface GameStorage {
	loadSessions(): Promise<StoredEntry[]>;
	saveSession(record: SessionRecord): Promise<void>;
	deleteSession(id: string): Promise<void>;
	loadStats(): Promise<StoredEntry[]>;
	saveStats(record: StatsRecord): Promise<void>;
}

/**
 * Raised when a storage operation fails. `operation` names what was being
 * done, e.g. `saveSession`.
 */
export class PersistenceError extends Error {
	constructor(
		readonly operation: string,
		readonly id: string,
		cause: unknown
	) {
		super(`${operation} failed for ${id}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
		this.name = "PersistenceError";
	}
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

export class FileStorage implements GameStorage {
	private readonly sessionsDir: string;
	private readonly statsDir: string;

	constructor(readonly root: string) {
		this.sessionsDir = path.join(root, "sessions");
		this.statsDir = path.join(root, "stats");
	}

	loadSessions(): Promise<StoredEntry[]> {
		return this.loadDir(this.sessionsDir);
	}

	saveSession(record: SessionRecord): Promise<void> {
		return this.writeJson(this.sessionsDir, record.id, record);
	}

	async deleteSession(id: string): Promise<void> {
		await rm(this.fileFor(this.sessionsDir, id), { force: true });
	}

	loadStats(): Promise<StoredEntry[]> {
		return this.loadDir(this.statsDir);
	}

	saveStats(record: StatsRecord): Promise<void> {
		return this.writeJson(this.statsDir, record.id, record);
	}

	private fileFor(dir: string, id: string): string {
		return path.join(dir, `${encodeURIComponent(id)}.json`);
	}

	private async writeJson(dir: string, id: string, data: SessionRecord | StatsRecord): Promise<void> {
		await mkdir(dir, { recursive: true });
		const file = this.fileFor(dir, id);
		const tmp = `${file}.${process.pid}.tmp`;
		try {
			await writeFile(tmp, JSON.stringify(data, null, 2), "utf-8");
			await rename(tmp, file);
		} catch (err) {
			await rm(tmp, { force: true });
			throw err;
		}
	}

	/**
	 * Read every `.json` file in `dir`. A missing directory means nothing was
	 * stored yet. Files that cannot be read, have an undecodable name or are
	 * not valid JSON are reported with `data` undefined so the caller can log
	 * and skip them.
	 */
	private async loadDir(dir: string): Promise<StoredEntry[]> {
		let names: string[];
		try {
			names = await readdir(dir);
		} catch (err) {
			if (isNotFound(err)) return [];
			throw err;
		}
		const entries: StoredEntry[] = [];
		for (const name of names.filter((n) => n.endsWith(".json")).sort()) {
			entries.push(await this.readEntry(dir, name));
		}
		return entries;
	}

	private async readEntry(dir: string, name: string): Promise<StoredEntry> {
		try {
			const id = decodeURIComponent(name.slice(0, -".json".length));
			const text = await readFile(path.join(dir, name), "utf-8");
			return { id, data: parseJson(text) };
		} catch (err) {
			console.warn(`[uno] Could not read ${path.join(dir, name)}: ${err instanceof Error ? err.message : String(err)}`);
			return { id: name, data: undefined };
		}
	}
}
