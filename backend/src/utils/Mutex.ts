/**
 * Non-reentrant in-process mutex. Callers queue in arrival order.
 * Calling runExclusive from inside a held section deadlocks.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private held = false;

    get isLocked(): boolean {
        return this.held;
    }

    async runExclusive<T>(task: () => Promise<T>): Promise<T> {
        let release: () => void = () => {};
        const next = new Promise<void>(resolve => { release = resolve; });
        const previous = this.tail;
        this.tail = previous.then(() => next);

        await previous;
        this.held = true;
        try {
            return await task();
        } finally {
            this.held = false;
            release();
        }
    }
}
