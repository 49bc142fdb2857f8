import { parseJsonResponse, stripCodeFences } from "../core/jsonExtract.js";
import { clip } from "../core/prompts.js";
import type { AgentRole, AgentTask, PhaseMeta, ProjectAnalysis, TaskOutput, TaskResult } from "../core/types.js";
import { promptSchema } from "../schemas/jsonSchema.js";
import { TaskOutputSchema } from "../schemas/taskOutput.js";
import { NONE, type AgentContext } from "./context.js";
import { metaOf } from "./structured.js";

const EXTENSIONS: Record<string, string> = {
    python: "py",
    javascript: "js",
    node: "js",
    "node.js": "js",
    typescript: "ts",
    java: "java",
    kotlin: "kt",
    go: "go",
    golang: "go",
    rust: "rs",
    ruby: "rb",
    php: "php",
    "c#": "cs",
    "c++": "cpp",
    c: "c",
    swift: "swift",
    html: "html",
    bash: "sh",
    shell: "sh",
};

/** Where a role's raw, non-JSON answer is stored. */
export function defaultFileName(role: AgentRole, techStack: readonly string[]): string {
    switch (role) {
        case "coder": {
            const first = techStack[0]?.trim().toLowerCase() ?? "";
            return `main.${EXTENSIONS[first] ?? "txt"}`;
        }
        case "designer":
            return "docs/design.md";
        case "researcher":
            return "docs/research.md";
        case "writer":
            return "README.md";
    }
}

export type SpecialistInput = {
    analysis: ProjectAnalysis;
    task: AgentTask;
    dependencies: readonly TaskResult[];
    attempt: number;
    feedback?: string;
};

export function renderDependencyOutputs(results: readonly TaskResult[], maxChars: number): string {
    const sections = results
        .filter((r) => r.output)
        .map((r) => {
            const files = (r.output?.files ?? []).map((f) => `--- ${f.path} ---\n${f.content}`).join("\n\n");
            return clip(`### Task ${r.taskId} (${r.role}): ${r.output?.summary ?? ""}\n${files}`, maxChars);
        });
    return sections.length > 0 ? sections.join("\n\n") : NONE;
}

/** Non-JSON answers become one file under the role's default name. */
export function parseTaskOutput(text: string, task: AgentTask, techStack: readonly string[]): TaskOutput {
    const parsed = parseJsonResponse(text, TaskOutputSchema);
    if (parsed.ok && (parsed.value.files.length > 0 || parsed.value.summary)) return parsed.value;
    const body = stripCodeFences(text);
    return {
        files: [{ path: defaultFileName(task.role, techStack), content: body + "\n" }],
        summary: `Generated ${task.expectedOutput || task.title}`,
        dependencies: [],
    };
}

export async function runSpecialist(
    ctx: AgentContext,
    input: SpecialistInput
): Promise<{ output: TaskOutput; meta: PhaseMeta }> {
    const { analysis, task } = input;
    const prompt = ctx.prompts.render(task.role, {
        projectName: analysis.projectName,
        taskId: task.id,
        taskTitle: task.title,
        taskDescription: task.description,
        expectedOutput: task.expectedOutput || NONE,
        techStack: analysis.techStack.join(", ") || NONE,
        constraints: analysis.constraints.join("; ") || NONE,
        dependencyOutputs: renderDependencyOutputs(input.dependencies, ctx.maxContextChars),
        feedback: input.feedback ? clip(input.feedback, ctx.maxContextChars) : NONE,
        schema: promptSchema(TaskOutputSchema),
    });
    const completion = await ctx.model.generate({
        purpose: `specialist:${task.role}`,
        prompt,
        json: true,
        signal: ctx.signal,
    });
    const output = parseTaskOutput(completion.text, task, analysis.techStack);
    ctx.logger.debug(`task ${task.id} (${task.role}) attempt ${input.attempt}: ${output.files.length} files`);
    return { output, meta: metaOf(completion) };
}
