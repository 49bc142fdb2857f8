import { ProviderError, ResponseFormatError } from "../core/errors.js";
import { dedupe } from "../core/guards.js";
import { toPosix } from "../core/paths.js";
import { clip } from "../core/prompts.js";
import type { FileConflict, GeneratedFile, IntegrationOutput, PhaseResult, ProjectAnalysis, TaskResult } from "../core/types.js";
import { IntegratorResponseSchema } from "../schemas/integration.js";
import { promptSchema } from "../schemas/jsonSchema.js";
import { NONE, localMeta, renderFiles, type AgentContext } from "./context.js";
import { generateStructured } from "./structured.js";

export function normalizeFilePath(p: string): string {
    return toPosix(p.trim()).replace(/^(\.\/)+/, "");
}

/**
 * Merges the files of completed tasks, given in dependency order. A path
 * written by several tasks keeps the last writer and is recorded as a conflict.
 */
export function mergeTaskOutputs(results: readonly TaskResult[]): IntegrationOutput {
    const files = new Map<string, { content: string; writers: string[] }>();
    const summaries: string[] = [];
    const dependencies: string[] = [];

    for (const r of results) {
        if (r.status !== "completed" || !r.output) continue;
        if (r.output.summary) summaries.push(`- Task ${r.taskId} (${r.role}): ${r.output.summary}`);
        if (r.output.instructions) summaries.push(`  ${r.output.instructions}`);
        dependencies.push(...r.output.dependencies);
        for (const f of r.output.files) {
            const key = normalizeFilePath(f.path);
            const entry = files.get(key);
            if (entry) {
                entry.content = f.content;
                if (!entry.writers.includes(r.taskId)) entry.writers.push(r.taskId);
            } else {
                files.set(key, { content: f.content, writers: [r.taskId] });
            }
        }
    }

    const conflicts: FileConflict[] = [];
    for (const [p, entry] of files) {
        if (entry.writers.length > 1) {
            conflicts.push({ path: p, taskIds: entry.writers, keptFrom: entry.writers[entry.writers.length - 1] });
        }
    }
    return {
        files: [...files].map(([p, entry]) => ({ path: p, content: entry.content })),
        documentation: summaries.join("\n"),
        dependencies: dedupe(dependencies),
        buildCommands: [],
        conflicts,
    };
}

/** Integrator files replace merged files with the same path; new paths are appended. */
export function overlayFiles(base: readonly GeneratedFile[], overlay: readonly GeneratedFile[]): GeneratedFile[] {
    const byPath = new Map<string, string>(base.map((f) => [f.path, f.content]));
    for (const f of overlay) byPath.set(normalizeFilePath(f.path), f.content);
    return [...byPath].map(([p, content]) => ({ path: p, content }));
}

export type IntegrateInput = {
    analysis: ProjectAnalysis;
    /** in dependency order */
    results: readonly TaskResult[];
    feedback?: string;
};

export async function integrate(ctx: AgentContext, input: IntegrateInput): Promise<PhaseResult<IntegrationOutput>> {
    const merged = mergeTaskOutputs(input.results);
    const { analysis } = input;
    const schemaText = promptSchema(IntegratorResponseSchema);
    const prompt = ctx.prompts.render("integration", {
        projectName: analysis.projectName,
        description: analysis.description,
        techStack: analysis.techStack.join(", ") || NONE,
        conflicts: merged.conflicts.length > 0
            ? merged.conflicts.map((c) => `- ${c.path}: written by ${c.taskIds.join(", ")}, kept ${c.keptFrom}`).join("\n")
            : NONE,
        files: renderFiles(merged.files, ctx.maxContextChars),
        feedback: input.feedback ? clip(input.feedback, ctx.maxContextChars) : NONE,
        schema: schemaText,
    });

    try {
        const { value, meta } = await generateStructured(ctx.model, ctx.prompts, {
            purpose: "integration",
            prompt,
            schema: IntegratorResponseSchema,
            schemaText,
            repairAttempts: ctx.jsonRepairAttempts,
            signal: ctx.signal,
        });
        const output: IntegrationOutput = {
            files: overlayFiles(merged.files, value.files),
            entryPoint: value.entryPoint,
            documentation: value.documentation || merged.documentation,
            dependencies: dedupe([...merged.dependencies, ...value.dependencies]),
            buildCommands: value.buildCommands,
            conflicts: merged.conflicts,
        };
        return { phase: "integration", status: "completed", output, meta };
    } catch (err) {
        if (!(err instanceof ResponseFormatError || err instanceof ProviderError) || ctx.signal?.aborted) throw err;
        ctx.logger.warn(`integration: ${err.message}; keeping the deterministic merge`);
        return {
            phase: "integration",
            status: "completed",
            output: merged,
            meta: localMeta("deterministic merge"),
            error: err.message,
        };
    }
}
