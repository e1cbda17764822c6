/**
 * FIFO mutual exclusion per key. Callers for the same key run one at a time in
 * the order they called `runExclusive`; different keys never wait on each other.
 */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();
    private readonly pending = new Map<string, number>();

    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);
        this.pending.set(key, (this.pending.get(key) ?? 0) + 1);

        await previous;
        try {
            return await task();
        } finally {
            release();
            const remaining = (this.pending.get(key) ?? 1) - 1;
            if (remaining === 0) {
                this.pending.delete(key);
                if (this.tails.get(key) === tail) {
                    this.tails.delete(key);
                }
            } else {
                this.pending.set(key, remaining);
            }
        }
    }

    /** Number of holders plus waiters for the key. */
    queued(key: string): number {
        return this.pending.get(key) ?? 0;
    }

    isLocked(key: string): boolean {
        return this.queued(key) > 0;
    }
}
