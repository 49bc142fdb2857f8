import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { assertSafeRelative, isSafeRelativeUnder, writeFileUtf8 } from "../core/paths.js";
import type { GeneratedFile, IntegrationOutput, ProjectAnalysis } from "../core/types.js";

export type WriteProjectResult = {
    written: string[];
    /** `path: reason` for each refused file */
    skipped: string[];
};

/** Replaces the contents of `projectDir` with `files`. Paths that would leave it are skipped. */
export function writeProject(projectDir: string, files: readonly GeneratedFile[], logger?: Logger): WriteProjectResult {
    fs.rmSync(projectDir, { recursive: true, force: true });
    fs.mkdirSync(projectDir, { recursive: true });

    const written: string[] = [];
    const skipped: string[] = [];
    for (const file of files) {
        try {
            const rel = assertSafeRelative(file.path);
            if (!isSafeRelativeUnder(projectDir, rel)) {
                throw new Error(`refusing to write outside the project: ${file.path}`);
            }
            writeFileUtf8(path.join(projectDir, rel), file.content);
            written.push(rel);
        } catch (err) {
            logger?.warn(`skipped ${file.path}: ${errorMessage(err)}`);
            skipped.push(`${file.path}: ${errorMessage(err)}`);
        }
    }
    return { written: written.sort(), skipped };
}

const MANIFESTS = new Set([
    "requirements.txt",
    "pyproject.toml",
    "setup.py",
    "package.json",
    "go.mod",
    "cargo.toml",
    "pom.xml",
    "build.gradle",
    "gemfile",
    "composer.json",
    "dependencies.txt",
]);

function packageName(projectName: string): string {
    const slug = projectName.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "");
    return slug || "generated-project";
}

/** `name@range` or a bare name; a leading `@` belongs to the scope. */
function splitRequirement(spec: string): [string, string] {
    const at = spec.lastIndexOf("@");
    return at > 0 ? [spec.slice(0, at), spec.slice(at + 1) || "*"] : [spec, "*"];
}

export function dependencyManifest(dependencies: readonly string[], analysis: ProjectAnalysis): GeneratedFile {
    const stack = analysis.techStack.map((t) => t.trim().toLowerCase());
    if (stack.some((t) => ["javascript", "typescript", "node", "node.js"].includes(t)) && !stack.includes("python")) {
        const deps = Object.fromEntries(dependencies.map(splitRequirement));
        const pkg = { name: packageName(analysis.projectName), version: "0.1.0", private: true, dependencies: deps };
        return { path: "package.json", content: JSON.stringify(pkg, null, 2) + "\n" };
    }
    const name = stack.length === 0 || stack.includes("python") ? "requirements.txt" : "dependencies.txt";
    return { path: name, content: dependencies.join("\n") + "\n" };
}

/**
 * The integrated files plus README.md from the documentation and a dependency
 * manifest, each added only when the integrator did not ship one.
 */
export function projectFiles(integration: IntegrationOutput, analysis: ProjectAnalysis): GeneratedFile[] {
    const files = [...integration.files];
    const names = new Set(files.map((f) => f.path.trim().replace(/^\.\//, "").toLowerCase()));
    const documentation = integration.documentation.trim();
    if (documentation && !names.has("readme.md")) {
        files.push({ path: "README.md", content: documentation + "\n" });
    }
    const dependencies = integration.dependencies.map((d) => d.trim()).filter(Boolean);
    if (dependencies.length > 0 && ![...names].some((n) => MANIFESTS.has(n))) {
        files.push(dependencyManifest(dependencies, analysis));
    }
    return files;
}
