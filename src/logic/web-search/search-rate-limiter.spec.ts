import { SearchRateLimiter } from './search-rate-limiter';
import { Clock } from './types';

class FakeClock implements Clock {
    current = 0;
    readonly sleeps: number[] = [];

    now(): number {
        return this.current;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.current += ms;
    }
}

describe('SearchRateLimiter', () => {
    let clock: FakeClock;
    let limiter: SearchRateLimiter;

    beforeEach(() => {
        clock = new FakeClock();
        limiter = new SearchRateLimiter(1000, clock);
    });

    it('lets the first call through immediately', async () => {
        await limiter.acquire();
        expect(clock.sleeps).toEqual([]);
    });

    it('waits out the remainder of the interval', async () => {
        await limiter.acquire();
        clock.current += 400;
        await limiter.acquire();
        expect(clock.sleeps).toEqual([600]);
        expect(clock.now()).toBe(1000);
    });

    it('does not wait once the interval has passed', async () => {
        await limiter.acquire();
        clock.current += 1500;
        await limiter.acquire();
        expect(clock.sleeps).toEqual([]);
    });

    it('spaces concurrent callers at least the interval apart', async () => {
        await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);
        expect(clock.sleeps).toEqual([1000, 1000]);
        expect(clock.now()).toBe(2000);
    });

    it('runs scheduled tasks after their slot', async () => {
        const startedAt: number[] = [];
        const task = async () => {
            startedAt.push(clock.now());
            return startedAt.length;
        };

        await expect(limiter.schedule(task)).resolves.toBe(1);
        await expect(limiter.schedule(task)).resolves.toBe(2);
        expect(startedAt).toEqual([0, 1000]);
    });
});
