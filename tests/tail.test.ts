import { describe, it, expect } from "vitest";
import fs from "node:fs";
import { parseTypes, tailFollow, tailOnce } from "../src/cli/tail.js";
import { withTmp } from "./helpers/tmp.js";

const taskStart = JSON.stringify({ t: 1, type: "task", source: "1", data: { state: "start", role: "coder", attempt: 1 } });
const otherTask = JSON.stringify({ t: 2, type: "task", source: "2", data: { state: "start", role: "writer", attempt: 1 } });
const modelCall = JSON.stringify({
    t: 3,
    type: "model",
    source: "analysis",
    data: { purpose: "analysis", provider: "gemini", model: "m", latencyMs: 5, ok: true, attempt: 1 },
});
const phaseStart = JSON.stringify({ t: 4, type: "phase", source: "pipeline", data: { phase: "testing", state: "start", round: 1 } });

describe("parseTypes", () => {
    it("splits a csv and drops blanks", () => {
        expect(parseTypes("phase, task,,")).toEqual(new Set(["phase", "task"]));
        expect(parseTypes(undefined)).toBeNull();
    });

    it("rejects unknown event types", () => {
        expect(() => parseTypes("task,stdout")).toThrow("unknown event type: stdout (use phase, task, model, log)");
    });
});

describe("symphony tail", () => {
    it("filters by source and type without following", async () => {
        await withTmp(async ({ path }) => {
            const events = path("events.ndjson");
            fs.writeFileSync(events, [taskStart, otherTask, modelCall, phaseStart, "not json"].join("\n") + "\n");

            expect(await tailOnce(events, { source: "1", types: new Set(["task"]) })).toEqual([taskStart]);
            expect(await tailOnce(events, { source: "analysis", types: parseTypes("model,phase") })).toEqual([modelCall]);
            expect(await tailOnce(events, { source: "all", types: null })).toEqual([taskStart, otherTask, modelCall, phaseStart]);
        });
    });

    it("returns nothing for a missing file", async () => {
        expect(await tailOnce("/nonexistent/events.ndjson", { types: null })).toEqual([]);
    });

    it("follows appended lines, including one split across writes", async () => {
        await withTmp(async ({ path }) => {
            const events = path("events.ndjson");
            const cut = Math.floor(otherTask.length / 2);
            fs.writeFileSync(events, `${taskStart}\n${otherTask.slice(0, cut)}`);
            setTimeout(() => fs.appendFileSync(events, `${otherTask.slice(cut)}\n${phaseStart}\n`), 80);

            const lines = await tailFollow(events, { source: "all", types: parseTypes("task") }, 300, 40);
            expect(lines).toEqual([taskStart, otherTask]);
        });
    });
});
