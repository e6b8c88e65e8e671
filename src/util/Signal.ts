/**
 * Wake-up signal between producers of events (task completions, dependency notifications) and a
 * single waiting loop.
 * 
 * A notification sent while nobody is waiting is remembered, so the next wait() returns at once.
 */
export class Signal {

    private pending: boolean = false;
    private waiter: (() => void) | null = null;

    notify(): void {

        if (this.waiter) {
            const wake = this.waiter;
            this.waiter = null;
            wake();
            return;
        }

        this.pending = true;
    }

    /**
     * Waits until notified or until the timeout expires.
     * 
     * @param timeoutMs maximum wait in milliseconds
     * @returns true if woken by a notification, false on timeout
     */
    wait(timeoutMs: number): Promise<boolean> {

        if (this.pending) {
            this.pending = false;
            return Promise.resolve(true);
        }

        return new Promise<boolean>((resolve) => {

            const timer = setTimeout(() => {
                this.waiter = null;
                resolve(false);
            }, Math.max(0, timeoutMs));

            this.waiter = () => {
                clearTimeout(timer);
                resolve(true);
            };
        });
    }
}
