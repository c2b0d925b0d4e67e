import { Clock, systemClock } from './types';

/**
 * Process-wide spacing of primary web searches. Callers queue on one shared
 * clock: each acquisition waits until `minIntervalMs` has passed since the
 * previous one started, then records its own start.
 */
export class SearchRateLimiter {
    private lastCallAt = -Infinity;
    private tail: Promise<void> = Promise.resolve();

    constructor(
        readonly minIntervalMs: number,
        private readonly clock: Clock = systemClock,
    ) {}

    acquire(): Promise<void> {
        const slot = this.tail.then(async () => {
            const wait = this.lastCallAt + this.minIntervalMs - this.clock.now();
            if (wait > 0) {
                await this.clock.sleep(wait);
            }
            this.lastCallAt = this.clock.now();
        });
        // A failed sleep must not wedge later callers; the caller still sees the rejection.
        this.tail = slot.catch(() => undefined);
        return slot;
    }

    async schedule<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        return task();
    }
}
