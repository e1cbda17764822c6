/**
 * Bounded single-consumer queue bridging a push-based producer (process
 * streams) and an async-iterator consumer. `push` reports when the buffer is
 * full so the producer can pause its source until `onDrain` fires.
 */
export class EventQueue<T> implements AsyncIterable<T> {
    private readonly buffer: T[] = [];
    private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
    private readonly drainListeners: Array<() => void> = [];
    private closed = false;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.buffer.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Returns false once the buffer is at capacity; items pushed after close are dropped. */
    push(item: T): boolean {
        if (this.closed) {
            return false;
        }
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter({ value: item, done: false });
            return true;
        }
        this.buffer.push(item);
        return this.buffer.length < this.capacity;
    }

    onDrain(listener: () => void): void {
        this.drainListeners.push(listener);
    }

    /** Ends iteration once buffered items are consumed. */
    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        while (this.waiters.length > 0) {
            const waiter = this.waiters.shift();
            waiter?.({ value: undefined, done: true });
        }
        this.notifyDrain();
    }

    /** Drops buffered items and ends iteration immediately. */
    abort(): void {
        this.buffer.length = 0;
        this.close();
    }

    next(): Promise<IteratorResult<T>> {
        if (this.buffer.length > 0) {
            const [value] = this.buffer.splice(0, 1);
            if (this.buffer.length < this.capacity) {
                this.notifyDrain();
            }
            return Promise.resolve({ value, done: false });
        }
        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => this.waiters.push(resolve));
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return {
            next: () => this.next(),
            return: async () => {
                this.abort();
                return { value: undefined, done: true };
            },
        };
    }

    private notifyDrain(): void {
        const listeners = this.drainListeners.splice(0);
        for (const listener of listeners) {
            listener();
        }
    }
}
