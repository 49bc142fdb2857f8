import { describe, it, expect } from "vitest";
import type { IntegrationOutput, ProjectAnalysis } from "../src/core/types.js";
import { dependencyManifest, projectFiles } from "../src/pipeline/projectWriter.js";

const analysis = (techStack: string[], projectName = "Api Server"): ProjectAnalysis => ({
    projectName,
    description: "",
    tasks: [],
    techStack,
    successCriteria: [],
    constraints: [],
});

const integration = (over: Partial<IntegrationOutput>): IntegrationOutput => ({
    files: [{ path: "app.py", content: "app = 1" }],
    documentation: "",
    dependencies: [],
    buildCommands: [],
    conflicts: [],
    ...over,
});

describe("projectFiles", () => {
    it("adds README.md and requirements.txt from the integrator's answer", () => {
        const files = projectFiles(
            integration({ documentation: "# Api\nRun it.\n", dependencies: ["flask", " gunicorn ", ""] }),
            analysis(["Python", "Flask"])
        );
        expect(files).toEqual([
            { path: "app.py", content: "app = 1" },
            { path: "README.md", content: "# Api\nRun it.\n" },
            { path: "requirements.txt", content: "flask\ngunicorn\n" },
        ]);
    });

    it("keeps the files the integrator already shipped", () => {
        const files = projectFiles(
            integration({
                files: [{ path: "./readme.md", content: "mine" }, { path: "requirements.txt", content: "django" }],
                documentation: "# Other",
                dependencies: ["flask"],
            }),
            analysis(["Python"])
        );
        expect(files.map((f) => f.path)).toEqual(["./readme.md", "requirements.txt"]);
    });

    it("adds nothing when there is no documentation or dependency", () => {
        expect(projectFiles(integration({ documentation: "  " }), analysis(["Python"])).map((f) => f.path)).toEqual(["app.py"]);
    });
});

describe("dependencyManifest", () => {
    it("writes package.json for a JavaScript stack", () => {
        const manifest = dependencyManifest(["express@^4", "@scope/lib", "cors"], analysis(["Node.js", "Express"]));
        expect(manifest.path).toBe("package.json");
        expect(JSON.parse(manifest.content)).toEqual({
            name: "api-server",
            version: "0.1.0",
            private: true,
            dependencies: { express: "^4", "@scope/lib": "*", cors: "*" },
        });
    });

    it("falls back to a plain list for other stacks", () => {
        expect(dependencyManifest(["serde"], analysis(["Rust"]))).toEqual({ path: "dependencies.txt", content: "serde\n" });
        expect(dependencyManifest(["requests"], analysis([]))).toEqual({ path: "requirements.txt", content: "requests\n" });
    });
});
