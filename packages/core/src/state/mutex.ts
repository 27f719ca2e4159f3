/**
 * FIFO async lock. `acquire()` resolves with a release function;
 * `runExclusive` wraps acquire/release around a callback.
 */
export class Mutex {
    private locked = false;
    private readonly queue: Array<() => void> = [];

    async acquire(): Promise<() => void> {
        return new Promise((resolve) => {
            let released = false;
            const release = () => {
                if (released) return;
                released = true;
                const next = this.queue.shift();
                if (next) {
                    next();
                    return;
                }
                this.locked = false;
            };

            if (!this.locked) {
                this.locked = true;
                resolve(release);
                return;
            }

            this.queue.push(() => {
                this.locked = true;
                resolve(release);
            });
        });
    }

    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }
}
