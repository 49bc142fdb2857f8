import { describe, it, expect } from "vitest";
import { runWithLimit } from "../src/core/limit.js";

const tick = () => new Promise((r) => setTimeout(r, 5));

describe("runWithLimit", () => {
    it("never runs more than n jobs at once", async () => {
        let active = 0;
        let peak = 0;
        const done: number[] = [];
        const jobs = [0, 1, 2, 3, 4].map((i) => async () => {
            active++;
            peak = Math.max(peak, active);
            await tick();
            done.push(i);
            active--;
        });
        await runWithLimit(2, jobs);
        expect(peak).toBe(2);
        expect(done.sort()).toEqual([0, 1, 2, 3, 4]);
    });

    it("runs every job and rethrows the first failure", async () => {
        const ran: string[] = [];
        const jobs = [
            async () => {
                ran.push("a");
                throw new Error("boom-a");
            },
            async () => {
                await tick();
                ran.push("b");
            },
        ];
        await expect(runWithLimit(1, jobs)).rejects.toThrow("boom-a");
        expect(ran).toEqual(["a", "b"]);
    });

    it("resolves immediately without jobs", async () => {
        await expect(runWithLimit(3, [])).resolves.toBeUndefined();
    });
});
