import { describe, it, expect } from "vitest";
import { RateLimiter, abortableSleep } from "../src/providers/rateLimiter.js";
import { FakeClock, FrozenClock } from "./helpers/fakeClock.js";

describe("RateLimiter", () => {
    it("spaces requests by 60000 / rpm", async () => {
        const clock = new FakeClock();
        const limiter = new RateLimiter(60, clock);
        expect(limiter.interval).toBe(1000);
        expect(await limiter.acquire()).toBe(0);
        expect(await limiter.acquire()).toBe(1000);
        expect(await limiter.acquire()).toBe(1000);
        expect(clock.sleeps).toEqual([1000, 1000]);
    });

    it("does not wait once the interval has passed", async () => {
        const clock = new FakeClock();
        const limiter = new RateLimiter(30, clock);
        await limiter.acquire();
        clock.advance(5000);
        expect(await limiter.acquire()).toBe(0);
        expect(clock.sleeps).toEqual([]);
    });

    it("reserves slots in call order for concurrent callers", async () => {
        const clock = new FrozenClock();
        const limiter = new RateLimiter(120, clock);
        const waits = await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);
        expect(waits).toEqual([0, 500, 1000]);
        expect(clock.sleeps).toEqual([500, 1000]);
    });

    it("rejects a non-positive rate", () => {
        expect(() => new RateLimiter(0)).toThrow(RangeError);
    });
});

describe("abortableSleep", () => {
    it("rejects with the signal's reason", async () => {
        const controller = new AbortController();
        const pending = abortableSleep(10_000, controller.signal);
        controller.abort(new Error("stop"));
        await expect(pending).rejects.toThrow("stop");
    });

    it("rejects at once when already aborted", async () => {
        await expect(abortableSleep(10, AbortSignal.abort(new Error("gone")))).rejects.toThrow("gone");
    });
});
