import { setTimeout as sleepMs } from 'timers/promises';

const WINDOW_MS = 60_000;

export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: async (ms: number) => {
        await sleepMs(ms);
    },
};

/**
 * Sliding one-minute window limiter. Each module owns one, sized from
 * `rate_limits` in settings.
 */
export class RateLimiter {
    private requests: number[] = [];

    constructor(private readonly maxRequestsPerMinute: number, private readonly clock: Clock = systemClock) {
        if (maxRequestsPerMinute < 1) {
            throw new RangeError('maxRequestsPerMinute must be at least 1');
        }
    }

    private prune(now: number): void {
        this.requests = this.requests.filter(t => now - t < WINDOW_MS);
    }

    canMakeRequest(): boolean {
        this.prune(this.clock.now());
        return this.requests.length < this.maxRequestsPerMinute;
    }

    recordRequest(): void {
        this.requests.push(this.clock.now());
    }

    get pending(): number {
        this.prune(this.clock.now());
        return this.requests.length;
    }

    /**
     * Wait until the oldest request leaves the window (plus one second of slack),
     * then record the new request.
     */
    async waitIfNeeded(): Promise<void> {
        if (!this.canMakeRequest()) {
            const oldest = Math.min(...this.requests);
            const waitMs = WINDOW_MS - (this.clock.now() - oldest);
            if (waitMs > 0) {
                await this.clock.sleep(waitMs + 1_000);
            }
            this.prune(this.clock.now());
        }
        this.recordRequest();
    }
}

export async function randomDelay(minMs: number, maxMs: number, clock: Clock = systemClock): Promise<void> {
    const low = Math.min(minMs, maxMs);
    const high = Math.max(minMs, maxMs);
    const delay = low + Math.random() * (high - low);
    if (delay > 0) {
        await clock.sleep(delay);
    }
}
