export type Clock = {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
};

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: abortableSleep,
};

/**
 * Spaces requests at least `60000 / requestsPerMinute` ms apart. Slots are
 * reserved synchronously, so concurrent callers queue in call order.
 */
export class RateLimiter {
    private readonly intervalMs: number;
    private nextSlot = 0;

    constructor(requestsPerMinute: number, private readonly clock: Clock = systemClock) {
        if (!Number.isFinite(requestsPerMinute) || requestsPerMinute <= 0) {
            throw new RangeError(`requestsPerMinute must be > 0: ${requestsPerMinute}`);
        }
        this.intervalMs = 60_000 / requestsPerMinute;
    }

    get interval(): number {
        return this.intervalMs;
    }

    /** Resolves once the caller may send; returns the time waited in ms. */
    async acquire(signal?: AbortSignal): Promise<number> {
        const now = this.clock.now();
        const slot = Math.max(now, this.nextSlot);
        this.nextSlot = slot + this.intervalMs;
        const wait = slot - now;
        if (wait > 0) await this.clock.sleep(wait, signal);
        return wait;
    }
}
