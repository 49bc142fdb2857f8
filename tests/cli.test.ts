import { describe, it, expect } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { isRecord } from "../src/core/guards.js";
import { ScriptedModel, json } from "./helpers/fakeModel.js";
import { memoryIO, runCli } from "./helpers/io.js";
import { withTmp } from "./helpers/tmp.js";

const analysisReply = json({
    projectName: "Greeter",
    techStack: ["Python"],
    tasks: [{ id: "1", title: "Script", role: "coder" }],
});

function model(testing: string): ScriptedModel {
    return new ScriptedModel()
        .on("analysis", analysisReply)
        .on("specialist:coder", json({ files: [{ path: "main.py", content: "print('hi')" }], summary: "script" }))
        .on("integration", json({ files: [] }))
        .on("testing", testing);
}

function parseOut(text: string | undefined): Record<string, unknown> {
    const value: unknown = JSON.parse(text ?? "null");
    if (!isRecord(value)) throw new Error(`not a JSON object: ${text}`);
    return value;
}

describe("symphony generate", () => {
    it("prints the run location and exits 0 when the tester passes", async () => {
        await withTmp(async ({ dir }) => {
            const m = memoryIO(dir, { model: model(json({ status: "pass" })) });
            await runCli(m.io, ["generate", "--brief", "a greeting script", "--out", "runs", "--quiet"]);

            const printed = parseOut(m.out[0]);
            expect(printed.status).toBe("passed");
            expect(String(printed.runDir).startsWith(path.join(dir, "runs", "run-"))).toBe(true);
            expect(printed.projectDir).toBe(path.join(String(printed.runDir), "project"));
            expect(m.exitCode()).toBe(0);

            await runCli(m.io, ["status", "--out", "runs"]);
            expect(parseOut(m.out[1])).toMatchObject({ status: "passed", projectName: "Greeter", rounds: 1 });

            await runCli(m.io, ["tail", "--out", "runs", "--type", "phase"]);
            const lines = (m.out[2] ?? "").trim().split("\n");
            expect(lines).toHaveLength(8);
            expect(lines.every((l) => parseOut(l).type === "phase")).toBe(true);
        });
    });

    it("exits 2 when the iterations run out without a pass", async () => {
        await withTmp(async ({ dir }) => {
            const m = memoryIO(dir, { model: model(json({ status: "fail", errors: ["prints nothing"] })) });
            await runCli(m.io, ["generate", "--brief", "a greeting script", "--out", "runs", "--max-iterations", "1", "--quiet"]);
            expect(parseOut(m.out[0]).status).toBe("unverified");
            expect(m.exitCode()).toBe(2);
        });
    });

    it("reports a missing provider with a hint", async () => {
        await withTmp(async ({ dir }) => {
            const m = memoryIO(dir);
            await runCli(m.io, ["generate", "--brief", "x", "--out", "runs"]);
            expect(m.err).toEqual([
                "[symphony generate] no model provider is configured Hint: set GOOGLE_API_KEY (Google AI Studio) or HUGGINGFACE_TOKEN, or OPENAI_COMPAT_API_KEY for an OpenAI-compatible endpoint",
            ]);
            expect(m.exitCode()).toBe(1);
            expect(fs.existsSync(path.join(dir, "runs"))).toBe(false);
        });
    });
});

describe("symphony analyze", () => {
    it("reads the brief from a file and prints the task breakdown", async () => {
        await withTmp(async ({ dir, path: p }) => {
            fs.writeFileSync(p("brief.md"), "A script that greets the user by name\n", "utf8");
            const scripted = model(json({ status: "pass" }));
            const m = memoryIO(dir, { model: scripted });
            await runCli(m.io, ["analyze", "--brief", "brief.md"]);
            expect(parseOut(m.out[0])).toMatchObject({ projectName: "Greeter", techStack: ["Python"] });
            expect(scripted.calls[0]?.prompt).toContain("A script that greets the user by name");
            expect(m.exitCode()).toBeUndefined();
        });
    });
});

describe("symphony providers", () => {
    it("shows the order and which providers have credentials", async () => {
        await withTmp(async ({ dir }) => {
            const m = memoryIO(dir, { env: { HF_TOKEN: "test-hf" } });
            await runCli(m.io, ["providers"]);
            expect(JSON.parse(m.out[0] ?? "[]")).toEqual([
                { name: "gemini", role: "default", available: false, models: ["gemini-2.0-flash"], requestsPerMinute: 60 },
                {
                    name: "huggingface",
                    role: "fallback",
                    available: true,
                    models: ["mistralai/Mistral-7B-Instruct-v0.2", "meta-llama/Llama-3.1-8B-Instruct"],
                },
                { name: "openai-compatible", role: "fallback", available: false, models: ["mistralai/Mixtral-8x7B-Instruct-v0.1"] },
            ]);
        });
    });
});

describe("symphony prompts up", () => {
    it("installs templates and response schemas", async () => {
        await withTmp(async ({ dir, path: p }) => {
            const m = memoryIO(dir);
            await runCli(m.io, ["prompts", "up", "--dir", "my-prompts"]);
            expect(m.out).toEqual([`8 prompts installed under ${p("my-prompts")}`]);
            expect(fs.existsSync(p("my-prompts", "coder.md"))).toBe(true);
            expect(fs.readdirSync(p("my-prompts", "schemas")).sort()).toEqual([
                "analysis.schema.json",
                "integration.schema.json",
                "taskOutput.schema.json",
                "testReport.schema.json",
            ]);
        });
    });
});

describe("symphony status", () => {
    it("fails when there is no run yet", async () => {
        await withTmp(async ({ dir }) => {
            const m = memoryIO(dir);
            await runCli(m.io, ["status", "--out", "runs"]);
            expect(m.err).toEqual([
                `[symphony status] no run found under ${path.join(dir, "runs")}. Provide --run-dir <dir> or --out <dir>.`,
            ]);
            expect(m.exitCode()).toBe(1);
        });
    });
});
