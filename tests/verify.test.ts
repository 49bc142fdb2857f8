import { describe, it, expect } from "vitest";
import fs from "node:fs";
import { VerificationError } from "../src/core/errors.js";
import { runVerification } from "../src/pipeline/verify.js";
import { writeProject } from "../src/pipeline/projectWriter.js";
import { withTmp } from "./helpers/tmp.js";

describe("runVerification", () => {
    it("returns a non-zero exit as a result", async () => {
        await withTmp(async ({ dir }) => {
            const result = await runVerification("echo checking && exit 3", dir, { timeoutMs: 10_000 });
            expect(result).toEqual({
                command: "echo checking && exit 3",
                exitCode: 3,
                passed: false,
                timedOut: false,
                output: "checking",
            });
        });
    });

    it("runs inside the project directory", async () => {
        await withTmp(async ({ dir, path }) => {
            fs.writeFileSync(path("marker.txt"), "ok", "utf8");
            const result = await runVerification("cat marker.txt", dir, { timeoutMs: 10_000 });
            expect(result.passed).toBe(true);
            expect(result.output).toBe("ok");
        });
    });

    it("stops a command that runs too long", async () => {
        await withTmp(async ({ dir }) => {
            const result = await runVerification("sleep 5", dir, { timeoutMs: 200 });
            expect(result.timedOut).toBe(true);
            expect(result.passed).toBe(false);
        });
    });

    it("refuses a missing directory", async () => {
        await expect(runVerification("true", "/nonexistent/symphony-dir", { timeoutMs: 1000 }))
            .rejects.toBeInstanceOf(VerificationError);
    });
});

describe("writeProject", () => {
    it("replaces the directory and skips paths that leave it", async () => {
        await withTmp(({ path }) => {
            const projectDir = path("project");
            fs.mkdirSync(projectDir);
            fs.writeFileSync(path("project", "stale.txt"), "old", "utf8");
            const result = writeProject(projectDir, [
                { path: "src/app.py", content: "print(1)" },
                { path: "../evil.sh", content: "x" },
                { path: "/etc/passwd", content: "x" },
                { path: "./README.md", content: "# App" },
            ]);
            expect(result).toEqual({
                written: ["README.md", "src/app.py"],
                skipped: [
                    "../evil.sh: output path contains '..': ../evil.sh",
                    "/etc/passwd: refusing to write outside the project: /etc/passwd",
                ],
            });
            expect(fs.existsSync(path("project", "stale.txt"))).toBe(false);
            expect(fs.readFileSync(path("project", "src", "app.py"), "utf8")).toBe("print(1)");
            expect(fs.existsSync(path("evil.sh"))).toBe(false);
        });
    });
});
