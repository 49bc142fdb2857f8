import { z } from "zod";
import { ResponseFormatError, errorMessage } from "../core/errors.js";
import { dedupe } from "../core/guards.js";
import { buildBatches } from "../core/scheduler.js";
import type { AgentTask, PhaseResult, ProjectAnalysis, ProjectBrief } from "../core/types.js";
import { ProjectAnalysisSchema } from "../schemas/analysis.js";
import { promptSchema } from "../schemas/jsonSchema.js";
import { localMeta, type AgentContext } from "./context.js";
import { generateStructured } from "./structured.js";

/** Drops dependencies on unknown tasks and on the task itself. */
export function normalizeTasks(tasks: AgentTask[]): AgentTask[] {
    const ids = new Set(tasks.map((t) => t.id));
    return tasks.map((t) => ({
        ...t,
        dependsOn: dedupe(t.dependsOn).filter((d) => d !== t.id && ids.has(d)),
    }));
}

export const AnalysisResponseSchema = ProjectAnalysisSchema
    .transform((analysis): ProjectAnalysis => ({ ...analysis, tasks: normalizeTasks(analysis.tasks) }))
    .superRefine((analysis, ctx) => {
        try {
            buildBatches(analysis.tasks);
        } catch (err) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["tasks"], message: errorMessage(err) });
        }
    });

export function fallbackAnalysis(brief: ProjectBrief): ProjectAnalysis {
    return {
        projectName: `Project from: ${brief.description.slice(0, 50)}`,
        description: brief.description,
        tasks: [
            {
                id: "1",
                title: "Create main implementation",
                description: brief.description,
                role: "coder",
                priority: "high",
                dependsOn: [],
                expectedOutput: "Main code implementation",
                estimatedTime: "1 hour",
            },
            {
                id: "2",
                title: "Create documentation",
                description: "Document the project",
                role: "writer",
                priority: "medium",
                dependsOn: ["1"],
                expectedOutput: "Project documentation",
                estimatedTime: "30 minutes",
            },
        ],
        techStack: ["Python"],
        successCriteria: ["Working implementation"],
        constraints: [],
    };
}

/**
 * Analysis phase. Provider failures propagate; an answer that stays
 * unusable after the repair prompts degrades to the fallback analysis.
 */
export async function analyzeProject(ctx: AgentContext, brief: ProjectBrief): Promise<PhaseResult<ProjectAnalysis>> {
    const schemaText = promptSchema(ProjectAnalysisSchema);
    const prompt = ctx.prompts.render("analysis", { brief: brief.description, schema: schemaText });
    try {
        const { value, meta } = await generateStructured(ctx.model, ctx.prompts, {
            purpose: "analysis",
            prompt,
            schema: AnalysisResponseSchema,
            schemaText,
            repairAttempts: ctx.jsonRepairAttempts,
            signal: ctx.signal,
        });
        ctx.logger.info(`analysis: ${value.tasks.length} tasks for "${value.projectName}"`);
        return { phase: "analysis", status: "completed", output: value, meta };
    } catch (err) {
        if (!(err instanceof ResponseFormatError)) throw err;
        ctx.logger.warn(`analysis: unusable response (${err.issues.join("; ")}), using the fallback task list`);
        return {
            phase: "analysis",
            status: "completed",
            output: fallbackAnalysis(brief),
            meta: localMeta("fallback"),
            error: err.message,
        };
    }
}
