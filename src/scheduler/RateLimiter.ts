import { ConfigurationError } from '../errors';
import { sleep } from '../utils/time';

/**
 * Pool-wide throttle. Every acquisition is granted at least `1000 / rps` ms
 * after the previous one, whichever worker asked. Grants are serialized on a
 * single promise chain so waits are computed one at a time against the last
 * granted timestamp.
 */
export class RateLimiter {
    readonly requestsPerSecond: number;
    readonly minIntervalMs: number;
    private lastGrantedAt: number | null = null;
    private tail: Promise<unknown> = Promise.resolve();
    private granted = 0;

    constructor(requestsPerSecond: number) {
        if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
            throw new ConfigurationError(`Rate limit must be a positive number of requests per second, got ${requestsPerSecond}`);
        }
        this.requestsPerSecond = requestsPerSecond;
        this.minIntervalMs = 1000 / requestsPerSecond;
    }

    /**
     * Resolves once the caller may send a request, with the time spent waiting
     * (queued behind earlier callers included).
     */
    acquire(): Promise<number> {
        const requestedAt = Date.now();
        const turn = this.tail.then(() => this.grant(requestedAt));
        this.tail = turn;
        return turn;
    }

    get grantedCount(): number {
        return this.granted;
    }

    private async grant(requestedAt: number): Promise<number> {
        if (this.lastGrantedAt !== null) {
            const earliest = this.lastGrantedAt + this.minIntervalMs;
            let now = Date.now();
            // timers may fire a tick early
            while (now < earliest) {
                await sleep(earliest - now);
                now = Date.now();
            }
        }

        this.lastGrantedAt = Date.now();
        this.granted++;
        return this.lastGrantedAt - requestedAt;
    }
}
