/**
 * Unbounded single-consumer channel. Producers `push` without waiting; the
 * consumer drains it with `for await`. Closing ends iteration once the
 * buffered items are consumed.
 */
export class AsyncQueue<T extends object> implements AsyncIterable<T> {
    private readonly buffer: T[] = [];
    private waiters: Array<(result: IteratorResult<T>) => void> = [];
    private closed = false;

    get size(): number {
        return this.buffer.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    push(item: T): boolean {
        if (this.closed) {
            return false;
        }

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter({ value: item, done: false });
        } else {
            this.buffer.push(item);
        }
        return true;
    }

    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        const pending = this.waiters;
        this.waiters = [];
        for (const waiter of pending) {
            waiter({ value: undefined, done: true });
        }
    }

    next(): Promise<IteratorResult<T>> {
        const item = this.buffer.shift();
        if (item !== undefined) {
            return Promise.resolve({ value: item, done: false });
        }

        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }

        return new Promise((resolve) => this.waiters.push(resolve));
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return {
            next: () => this.next(),
        };
    }
}
