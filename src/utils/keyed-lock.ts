/**
 * Serializes async tasks that share a key while letting different keys run
 * concurrently. Each key keeps only the tail of its queue.
 */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const run = previous.then(task);
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

    get pendingKeys(): number {
        return this.tails.size;
    }
}
