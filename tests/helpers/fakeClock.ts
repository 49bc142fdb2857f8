import type { Clock } from "../../src/providers/rateLimiter.js";

/** Time only moves when someone sleeps. */
export class FakeClock implements Clock {
    readonly sleeps: number[] = [];

    constructor(private t = 0) { }

    now(): number {
        return this.t;
    }

    advance(ms: number): void {
        this.t += ms;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.t += ms;
    }
}

/** Sleeps are recorded but time stands still, as when callers start together. */
export class FrozenClock implements Clock {
    readonly sleeps: number[] = [];

    constructor(private readonly t = 0) { }

    now(): number {
        return this.t;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
    }
}
