import { describe, it, expect } from "vitest";
import type { ProjectAnalysis, TaskResult } from "../src/core/types.js";
import { integrate, mergeTaskOutputs, overlayFiles } from "../src/agents/integrator.js";
import { agentContext } from "./helpers/context.js";
import { ScriptedModel, json } from "./helpers/fakeModel.js";

const results: TaskResult[] = [
    {
        taskId: "1",
        role: "coder",
        status: "completed",
        attempt: 1,
        output: {
            files: [{ path: "./src/app.py", content: "v1" }, { path: "README.md", content: "readme" }],
            summary: "core module",
            dependencies: ["flask"],
        },
    },
    {
        taskId: "2",
        role: "coder",
        status: "completed",
        attempt: 1,
        output: {
            files: [{ path: "src/app.py", content: "v2" }],
            summary: "routes",
            dependencies: ["flask", "pytest"],
            instructions: "run python src/app.py",
        },
    },
    { taskId: "3", role: "writer", status: "failed", attempt: 1, error: "boom" },
];

const analysis: ProjectAnalysis = {
    projectName: "Web app",
    description: "A tiny web app",
    tasks: [],
    techStack: ["Python"],
    successCriteria: [],
    constraints: [],
};

describe("mergeTaskOutputs", () => {
    it("keeps the last writer of a path and records the conflict", () => {
        expect(mergeTaskOutputs(results)).toEqual({
            files: [{ path: "src/app.py", content: "v2" }, { path: "README.md", content: "readme" }],
            documentation: "- Task 1 (coder): core module\n- Task 2 (coder): routes\n  run python src/app.py",
            dependencies: ["flask", "pytest"],
            buildCommands: [],
            conflicts: [{ path: "src/app.py", taskIds: ["1", "2"], keptFrom: "2" }],
        });
    });
});

describe("overlayFiles", () => {
    it("replaces same paths and appends new ones", () => {
        expect(overlayFiles([{ path: "a", content: "1" }, { path: "b", content: "2" }], [{ path: "./b", content: "3" }, { path: "c", content: "4" }]))
            .toEqual([{ path: "a", content: "1" }, { path: "b", content: "3" }, { path: "c", content: "4" }]);
    });
});

describe("integrate", () => {
    it("overlays the integrator's files on the merge", async () => {
        const model = new ScriptedModel().on("integration", json({
            files: [{ path: "README.md", content: "# Web app" }, { path: "requirements.txt", content: "flask" }],
            entryPoint: "src/app.py",
            dependencies: ["gunicorn"],
            buildCommands: ["pip install -r requirements.txt"],
        }));
        const result = await integrate(agentContext(model), { analysis, results });
        expect(result.status).toBe("completed");
        expect(result.output.files.map((f) => f.path)).toEqual(["src/app.py", "README.md", "requirements.txt"]);
        expect(result.output.files[1]?.content).toBe("# Web app");
        expect(result.output.entryPoint).toBe("src/app.py");
        expect(result.output.documentation).toBe("- Task 1 (coder): core module\n- Task 2 (coder): routes\n  run python src/app.py");
        expect(result.output.dependencies).toEqual(["flask", "pytest", "gunicorn"]);
        expect(result.output.buildCommands).toEqual(["pip install -r requirements.txt"]);
        expect(model.calls[0]?.prompt).toContain("- src/app.py: written by 1, 2, kept 2");
    });

    it("keeps the deterministic merge when the answer is unusable", async () => {
        const model = new ScriptedModel().on("integration", "no idea").on("integration:repair", "still no idea");
        const result = await integrate(agentContext(model), { analysis, results });
        expect(result.status).toBe("completed");
        expect(result.output).toEqual(mergeTaskOutputs(results));
        expect(result.meta.note).toBe("deterministic merge");
        expect(result.error).toBe("integration: response did not match the expected JSON");
    });

    it("keeps the deterministic merge when no provider answers", async () => {
        const result = await integrate(agentContext(new ScriptedModel()), { analysis, results });
        expect(result.output.files).toHaveLength(2);
        expect(result.error).toBe("no scripted reply for integration");
    });
});
