/**
 * KeyedMutex: exclusive async sections per key.
 *
 * Sections for the same key run one after another in call order; sections
 * for different keys do not wait on each other. A failing section releases
 * the key and its error reaches only its own caller.
 */
export class KeyedMutex<K> {
	private readonly tails = new Map<K, Promise<void>>();

	async runExclusive<T>(key: K, section: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const run = previous.then(section);
		const tail = run.then(
			() => undefined,
			() => undefined,
		);
		this.tails.set(key, tail);
		try {
			return await run;
		} finally {
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/** Whether a section for `key` is running or queued. */
	isLocked(key: K): boolean {
		return this.tails.has(key);
	}

	/** Number of keys with a running or queued section. */
	get size(): number {
		return this.tails.size;
	}
}
