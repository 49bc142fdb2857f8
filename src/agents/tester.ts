import { ProviderError, ResponseFormatError } from "../core/errors.js";
import type { AgentTask, IntegrationOutput, PhaseResult, ProjectAnalysis, TestReport, VerificationResult } from "../core/types.js";
import { promptSchema } from "../schemas/jsonSchema.js";
import { TesterResponseSchema } from "../schemas/testReport.js";
import { NONE, bulletList, localMeta, renderFiles, type AgentContext } from "./context.js";
import { generateStructured } from "./structured.js";

export const UNPARSEABLE_REPORT = "tester response could not be parsed";

const OUTPUT_TAIL_CHARS = 2000;

function describeVerification(v: VerificationResult | undefined): string {
    if (!v) return "(no verification command configured)";
    const state = v.timedOut ? "timed out" : `exit code ${v.exitCode}`;
    return `$ ${v.command}\n${state}\n${v.output.slice(-OUTPUT_TAIL_CHARS) || "(no output)"}`;
}

/** A failed verification command always fails the report. */
export function applyVerification(report: TestReport, v: VerificationResult | undefined): TestReport {
    if (!v) return report;
    if (v.passed) return { ...report, verification: v };
    const reason = v.timedOut ? "timed out" : `exited with ${v.exitCode}`;
    const tail = v.output.slice(-OUTPUT_TAIL_CHARS).trim();
    return {
        ...report,
        status: "fail",
        errors: [...report.errors, `verification command ${reason}${tail ? `: ${tail}` : ""}`],
        verification: v,
    };
}

function failedReport(error: string): TestReport {
    return { status: "fail", errors: [error], suggestions: [], restartAnalysis: false, tasksToFix: [] };
}

export type TestInput = {
    analysis: ProjectAnalysis;
    tasks: readonly AgentTask[];
    integration: IntegrationOutput;
    verification?: VerificationResult;
};

export async function testProject(ctx: AgentContext, input: TestInput): Promise<PhaseResult<TestReport>> {
    const { analysis, integration } = input;
    const schemaText = promptSchema(TesterResponseSchema);
    const prompt = ctx.prompts.render("testing", {
        projectName: analysis.projectName,
        successCriteria: bulletList(analysis.successCriteria),
        tasks: input.tasks.length > 0 ? input.tasks.map((t) => `- ${t.id}: ${t.title}`).join("\n") : NONE,
        verification: describeVerification(input.verification),
        files: renderFiles(integration.files, ctx.maxContextChars),
        schema: schemaText,
    });

    try {
        const { value, meta } = await generateStructured(ctx.model, ctx.prompts, {
            purpose: "testing",
            prompt,
            schema: TesterResponseSchema,
            schemaText,
            repairAttempts: ctx.jsonRepairAttempts,
            signal: ctx.signal,
        });
        return { phase: "testing", status: "completed", output: applyVerification(value, input.verification), meta };
    } catch (err) {
        if (err instanceof ResponseFormatError) {
            ctx.logger.warn(`testing: ${UNPARSEABLE_REPORT}`);
            return {
                phase: "testing",
                status: "completed",
                output: applyVerification(failedReport(UNPARSEABLE_REPORT), input.verification),
                meta: localMeta("unparseable report"),
                error: err.message,
            };
        }
        if (err instanceof ProviderError && !ctx.signal?.aborted) {
            ctx.logger.warn(`testing: ${err.message}`);
            return {
                phase: "testing",
                status: "failed",
                output: applyVerification(failedReport(`tester unavailable: ${err.message}`), input.verification),
                meta: localMeta("tester unavailable"),
                error: err.message,
            };
        }
        throw err;
    }
}
