import path from "node:path";
import type { AgentContext } from "../agents/context.js";
import { integrate } from "../agents/integrator.js";
import { testProject } from "../agents/tester.js";
import type { SymphonyConfig } from "../core/config.js";
import type { EventSink } from "../core/events.js";
import { writeJson } from "../core/paths.js";
import { topologicalOrder } from "../core/scheduler.js";
import type {
    IntegrationOutput,
    PhaseName,
    PhaseResult,
    ProjectAnalysis,
    ProjectBrief,
    RefinementAction,
    RefinementAttempt,
    TaskResult,
    TestReport,
} from "../core/types.js";
import { dispatchTasks } from "./dispatcher.js";
import { projectFiles, writeProject } from "./projectWriter.js";
import { runVerification } from "./verify.js";

export type DecisionState = {
    iteration: number;
    maxIterations: number;
    restartsUsed: number;
    maxRestarts: number;
    /** ids of the tasks in the current analysis */
    taskIds: readonly string[];
    results: ReadonlyMap<string, TaskResult>;
};

export type Decision = { action: RefinementAction; targets?: string[] };

/**
 * pass → accept; a requested restart while restarts remain → restart;
 * last iteration → exhausted; otherwise fix the named (or failed) tasks,
 * or re-integrate when there is nothing to re-run.
 */
export function decideAction(report: TestReport, s: DecisionState): Decision {
    if (report.status === "pass") return { action: "accept" };
    if (report.restartAnalysis && s.restartsUsed < s.maxRestarts) return { action: "restart" };
    if (s.iteration >= s.maxIterations) return { action: "exhausted" };

    const known = new Set(s.taskIds);
    const named = [...new Set(report.tasksToFix)].filter((id) => known.has(id));
    if (named.length > 0) return { action: "fix-tasks", targets: named };

    const unfinished = s.taskIds.filter((id) => {
        const status = s.results.get(id)?.status;
        return status === "failed" || status === "blocked";
    });
    if (unfinished.length > 0) return { action: "fix-tasks", targets: unfinished };
    return { action: "reintegrate" };
}

export function feedbackFromReport(report: TestReport): string {
    const lines: string[] = [];
    if (report.errors.length > 0) lines.push("Errors:", ...report.errors.map((e) => `- ${e}`));
    if (report.suggestions.length > 0) lines.push("Suggestions:", ...report.suggestions.map((s) => `- ${s}`));
    return lines.length > 0 ? lines.join("\n") : "The tester rejected the previous result without details.";
}

/** A restart never edits the brief in place; it derives the next revision. */
export function deriveRestartBrief(brief: ProjectBrief, report: TestReport, now = new Date()): ProjectBrief {
    const issues = report.errors.length > 0 ? report.errors : ["the tester asked for a new task breakdown"];
    return Object.freeze({
        description: `${brief.description}\n\nIssues to fix:\n${issues.map((e) => `- ${e}`).join("\n")}`,
        revision: brief.revision + 1,
        createdAt: now.toISOString(),
        parentRevision: brief.revision,
    });
}

export function orderedResults(analysis: ProjectAnalysis, results: ReadonlyMap<string, TaskResult>): TaskResult[] {
    return topologicalOrder(analysis.tasks).flatMap((t) => {
        const r = results.get(t.id);
        return r ? [r] : [];
    });
}

export type RoundContext = {
    ctx: AgentContext;
    config: SymphonyConfig;
    events: EventSink;
    round: number;
    phasesDir: string;
    projectDir: string;
    restartsUsed: number;
};

export type RoundState = {
    brief: ProjectBrief;
    analysis: ProjectAnalysis;
    results: Map<string, TaskResult>;
    integration: IntegrationOutput;
};

export type RoundOutcome = {
    outcome: "accepted" | "restart" | "exhausted";
    attempts: RefinementAttempt[];
    integration: IntegrationOutput;
    results: Map<string, TaskResult>;
    filesWritten: string[];
    skippedFiles: string[];
    nextBrief?: ProjectBrief;
};

export function phaseEvent(
    events: EventSink,
    phase: PhaseName,
    round: number,
    iteration: number | undefined,
    end?: { status: "completed" | "failed"; note?: string }
): void {
    events.write({
        t: Date.now(),
        type: "phase",
        source: "pipeline",
        data: end
            ? { phase, state: "end", round, iteration, status: end.status, note: end.note }
            : { phase, state: "start", round, iteration },
    });
}

async function reintegrate(rc: RoundContext, state: RoundState, iteration: number, feedback: string): Promise<IntegrationOutput> {
    phaseEvent(rc.events, "integration", rc.round, iteration);
    const result: PhaseResult<IntegrationOutput> = await integrate(rc.ctx, {
        analysis: state.analysis,
        results: orderedResults(state.analysis, state.results),
        feedback,
    });
    writeJson(path.join(rc.phasesDir, `integration-${iteration + 1}.json`), result);
    phaseEvent(rc.events, "integration", rc.round, iteration, { status: result.status, note: result.meta.note });
    return result.output;
}

/** Test → decide → fix, until accepted, a restart is due, or the iteration budget runs out. */
export async function refineRound(rc: RoundContext, initial: RoundState): Promise<RoundOutcome> {
    const { ctx, config, round } = rc;
    const state: RoundState = { ...initial, results: new Map(initial.results) };
    const attempts: RefinementAttempt[] = [];
    let filesWritten: string[] = [];
    let skippedFiles: string[] = [];

    for (let iteration = 1; iteration <= config.maxIterations; iteration++) {
        phaseEvent(rc.events, "testing", round, iteration);
        const written = writeProject(rc.projectDir, projectFiles(state.integration, state.analysis), ctx.logger);
        filesWritten = written.written;
        skippedFiles = written.skipped;

        const verification = config.verifyCommand
            ? await runVerification(config.verifyCommand, rc.projectDir, {
                timeoutMs: config.requestTimeoutMs,
                signal: ctx.signal,
            })
            : undefined;
        const testing = await testProject(ctx, {
            analysis: state.analysis,
            tasks: state.analysis.tasks,
            integration: state.integration,
            verification,
        });
        writeJson(path.join(rc.phasesDir, `testing-${iteration}.json`), testing);
        phaseEvent(rc.events, "testing", round, iteration, { status: testing.status, note: testing.output.status });

        const report = testing.output;
        const decision = decideAction(report, {
            iteration,
            maxIterations: config.maxIterations,
            restartsUsed: rc.restartsUsed,
            maxRestarts: config.maxRestarts,
            taskIds: state.analysis.tasks.map((t) => t.id),
            results: state.results,
        });
        attempts.push({ round, iteration, action: decision.action, report, ...(decision.targets ? { targets: decision.targets } : {}) });
        ctx.logger.info(
            `round ${round} iteration ${iteration}: ${report.status} → ${decision.action}` +
            (decision.targets ? ` (${decision.targets.join(", ")})` : "")
        );

        const base = { attempts, integration: state.integration, results: state.results, filesWritten, skippedFiles };
        switch (decision.action) {
            case "accept":
                return { outcome: "accepted", ...base };
            case "exhausted":
                return { outcome: "exhausted", ...base };
            case "restart":
                return { outcome: "restart", ...base, nextBrief: deriveRestartBrief(state.brief, report) };
            case "fix-tasks": {
                const feedback = feedbackFromReport(report);
                phaseEvent(rc.events, "specialists", round, iteration);
                state.results = await dispatchTasks(ctx, {
                    analysis: state.analysis,
                    concurrency: config.concurrency,
                    events: rc.events,
                    previous: state.results,
                    rerun: new Set(decision.targets),
                    feedback,
                    tasksDir: path.join(rc.phasesDir, "tasks"),
                });
                phaseEvent(rc.events, "specialists", round, iteration, { status: "completed" });
                state.integration = await reintegrate(rc, state, iteration, feedback);
                break;
            }
            case "reintegrate":
                state.integration = await reintegrate(rc, state, iteration, feedbackFromReport(report));
                break;
        }
    }
    // maxIterations >= 1 and the last iteration always returns
    return { outcome: "exhausted", attempts, integration: state.integration, results: state.results, filesWritten, skippedFiles };
}
