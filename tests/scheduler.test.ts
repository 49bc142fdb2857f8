import { describe, it, expect } from "vitest";
import { buildBatches, topologicalOrder } from "../src/core/scheduler.js";
import { SchedulerError } from "../src/core/errors.js";

const task = (id: string, dependsOn: string[] = []) => ({ id, dependsOn });

describe("task scheduling", () => {
    it("builds batches in topo order", () => {
        const batches = buildBatches([task("t1"), task("t2", ["t1"]), task("t3", ["t1"])]);
        expect(batches.map((b) => b.map((t) => t.id))).toEqual([["t1"], ["t2", "t3"]]);
    });

    it("keeps input order inside a layer", () => {
        const order = topologicalOrder([task("c", ["a"]), task("b"), task("a"), task("d", ["b", "c"])]);
        expect(order.map((t) => t.id)).toEqual(["b", "a", "c", "d"]);
    });

    it("ignores a repeated dependency", () => {
        const batches = buildBatches([task("a"), task("b", ["a", "a"])]);
        expect(batches.map((b) => b.map((t) => t.id))).toEqual([["a"], ["b"]]);
    });

    it("rejects unknown dependencies", () => {
        expect(() => buildBatches([task("a", ["zz"])])).toThrow("dependsOn not found: a -> zz");
    });

    it("rejects cycles and names the stuck tasks", () => {
        const run = () => buildBatches([task("a"), task("b", ["c"]), task("c", ["b"])]);
        expect(run).toThrow(SchedulerError);
        expect(run).toThrow("cycle detected in dependsOn: b, c");
    });

    it("rejects duplicate ids", () => {
        expect(() => buildBatches([task("a"), task("a")])).toThrow("duplicate task id: a");
    });
});
