/**
 * Runs tasks one at a time per key. Tasks for different keys never wait on
 * each other.
 */
export class KeyedQueue {
	private readonly tails = new Map<string, Promise<void>>();

	run<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const result = previous.then(task);
		const settled = result.then(
			() => undefined,
			() => undefined
		);
		this.tails.set(key, settled);
		return result.finally(() => {
			if (this.tails.get(key) === settled) this.tails.delete(key);
		});
	}

	/** Number of keys with queued or running work. */
	get size(): number {
		return this.tails.size;
	}
}
