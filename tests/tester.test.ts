import { describe, it, expect } from "vitest";
import type { IntegrationOutput, ProjectAnalysis, TestReport, VerificationResult } from "../src/core/types.js";
import { UNPARSEABLE_REPORT, applyVerification, testProject } from "../src/agents/tester.js";
import { agentContext } from "./helpers/context.js";
import { ScriptedModel, json } from "./helpers/fakeModel.js";

const passing: TestReport = { status: "pass", score: 95, errors: [], suggestions: [], restartAnalysis: false, tasksToFix: [] };

function verification(extra: Partial<VerificationResult>): VerificationResult {
    return { command: "pytest", exitCode: 0, passed: true, timedOut: false, output: "", ...extra };
}

const analysis: ProjectAnalysis = {
    projectName: "Calc",
    description: "",
    tasks: [],
    techStack: [],
    successCriteria: ["adds numbers"],
    constraints: [],
};
const integration: IntegrationOutput = {
    files: [{ path: "calc.py", content: "def add(a, b): return a + b" }],
    documentation: "",
    dependencies: [],
    buildCommands: [],
    conflicts: [],
};
const tasks = [{ id: "1", title: "calc", description: "", role: "coder" as const, priority: "high" as const, dependsOn: [], expectedOutput: "" }];

describe("applyVerification", () => {
    it("attaches a passing run without changing the verdict", () => {
        const v = verification({});
        expect(applyVerification(passing, v)).toEqual({ ...passing, verification: v });
    });

    it("fails the report with the tail of the command output", () => {
        const v = verification({ exitCode: 3, passed: false, output: "collected 2 items\n1 failed\n" });
        expect(applyVerification(passing, v)).toMatchObject({
            status: "fail",
            errors: ["verification command exited with 3: collected 2 items\n1 failed"],
        });
    });

    it("reports a timeout", () => {
        const v = verification({ exitCode: -1, passed: false, timedOut: true });
        expect(applyVerification(passing, v).errors).toEqual(["verification command timed out"]);
    });
});

describe("testProject", () => {
    it("normalizes the tester's verdict", async () => {
        const model = new ScriptedModel().on("testing", json({ status: " PASS ", score: 90, tasksToFix: [1] }));
        const result = await testProject(agentContext(model), { analysis, tasks, integration });
        expect(result.status).toBe("completed");
        expect(result.output).toEqual({
            status: "pass",
            score: 90,
            errors: [],
            suggestions: [],
            restartAnalysis: false,
            tasksToFix: ["1"],
        });
        const prompt = model.calls[0]?.prompt ?? "";
        expect(prompt).toContain("- adds numbers");
        expect(prompt).toContain("--- calc.py ---\ndef add(a, b): return a + b");
        expect(prompt).toContain("(no verification command configured)");
    });

    it("turns an unparseable verdict into a failing report", async () => {
        const model = new ScriptedModel().on("testing", "looks fine").on("testing:repair", "really fine");
        const result = await testProject(agentContext(model), { analysis, tasks, integration });
        expect(result.status).toBe("completed");
        expect(result.output.status).toBe("fail");
        expect(result.output.errors).toEqual([UNPARSEABLE_REPORT]);
        expect(result.meta.note).toBe("unparseable report");
    });

    it("marks the phase failed when the tester is unreachable", async () => {
        const result = await testProject(agentContext(new ScriptedModel()), { analysis, tasks, integration });
        expect(result.status).toBe("failed");
        expect(result.output.errors).toEqual(["tester unavailable: no scripted reply for testing"]);
    });
});
