/**
 * Promise-based mutual exclusion for async critical sections.
 * 
 * Waiters are served in arrival order. The lock is held across awaits inside the critical section,
 * which is what protects multi-step read-then-write bookkeeping.
 */
export class Mutex {

    private tail: Promise<void> = Promise.resolve();

    /**
     * Runs the given function while holding the lock.
     * 
     * @param fn the critical section
     * @returns whatever the critical section returns
     */
    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {

        let release: () => void = () => { };

        const acquired = new Promise<void>((resolve) => { release = resolve; });

        const previous = this.tail;

        this.tail = previous.then(() => acquired);

        await previous;

        try {
            return await fn();
        }
        finally {
            release();
        }
    }
}
