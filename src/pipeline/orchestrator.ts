import path from "node:path";
import type { AgentContext } from "../agents/context.js";
import { integrate } from "../agents/integrator.js";
import { analyzeProject } from "../agents/projectManager.js";
import { assertUsableConfig, type SymphonyConfig } from "../core/config.js";
import { ConfigError, errorMessage } from "../core/errors.js";
import type { EventSink } from "../core/events.js";
import { createEventsWriter } from "../core/eventsWriter.js";
import { createLogger, type Logger } from "../core/logger.js";
import { createRunDir, writeJson } from "../core/paths.js";
import { PromptLibrary } from "../core/prompts.js";
import { SUMMARY_FILE, writeRunSummary, type RunSummary } from "../core/summary.js";
import type { IntegrationOutput, ProjectBrief, RefinementAttempt, RunResult, RunStatus, TaskResult } from "../core/types.js";
import { ModelRouter, createModelRouter } from "../providers/index.js";
import type { ModelClient } from "../providers/modelClient.js";
import { dispatchTasks } from "./dispatcher.js";
import { orderedResults, phaseEvent, refineRound } from "./refinement.js";

export const EVENTS_FILE = "events.ndjson";
export const PROJECT_DIR = "project";
export const LATEST_FILE = "latest.json";

export type GenerateOptions = {
    brief: string;
    config: SymphonyConfig;
    /** replaces the provider router built from `config` */
    model?: ModelClient;
    signal?: AbortSignal;
    debug?: boolean;
    quiet?: boolean;
    print?: (line: string) => void;
};

export function createBrief(description: string, now = new Date()): ProjectBrief {
    const text = description.trim();
    if (!text) throw new ConfigError("the project brief is empty");
    return Object.freeze({ description: text, revision: 1, createdAt: now.toISOString() });
}

function instructionsOf(integration: IntegrationOutput, results: readonly TaskResult[]): string[] {
    const out: string[] = [];
    if (integration.entryPoint) out.push(`entry point: ${integration.entryPoint}`);
    out.push(...integration.buildCommands);
    for (const r of results) {
        if (r.output?.instructions) out.push(r.output.instructions);
    }
    return out;
}

function abortReason(signal: AbortSignal, timeoutMs: number): string {
    const reason: unknown = signal.reason;
    if (reason instanceof Error && reason.name === "TimeoutError") return `run timed out after ${timeoutMs}ms`;
    return "run aborted";
}

type RunState = {
    brief: ProjectBrief;
    projectName: string;
    rounds: number;
    attempts: RefinementAttempt[];
    filesWritten: string[];
    skippedFiles: string[];
    instructions: string[];
};

async function runRounds(
    ctx: AgentContext,
    config: SymphonyConfig,
    runDir: string,
    events: EventSink,
    state: RunState,
    logger: Logger
): Promise<RunStatus> {
    const projectDir = path.join(runDir, PROJECT_DIR);
    for (let restartsUsed = 0; ; restartsUsed++) {
        const round = restartsUsed + 1;
        state.rounds = round;
        const phasesDir = path.join(runDir, "phases", `r${round}`);
        logger.info(`round ${round}: brief revision ${state.brief.revision}`);

        phaseEvent(events, "analysis", round, undefined);
        const analysis = await analyzeProject(ctx, state.brief);
        writeJson(path.join(phasesDir, "analysis.json"), analysis);
        phaseEvent(events, "analysis", round, undefined, { status: analysis.status, note: analysis.meta.note });
        state.projectName = analysis.output.projectName;

        phaseEvent(events, "specialists", round, undefined);
        const results = await dispatchTasks(ctx, {
            analysis: analysis.output,
            concurrency: config.concurrency,
            events,
            tasksDir: path.join(phasesDir, "tasks"),
        });
        const failed = [...results.values()].filter((r) => r.status !== "completed").length;
        phaseEvent(events, "specialists", round, undefined, {
            status: "completed",
            note: failed > 0 ? `${failed} of ${results.size} tasks not completed` : undefined,
        });

        phaseEvent(events, "integration", round, undefined);
        const integration = await integrate(ctx, {
            analysis: analysis.output,
            results: orderedResults(analysis.output, results),
        });
        writeJson(path.join(phasesDir, "integration-1.json"), integration);
        phaseEvent(events, "integration", round, undefined, { status: integration.status, note: integration.meta.note });

        const outcome = await refineRound(
            { ctx, config, events, round, phasesDir, projectDir, restartsUsed },
            { brief: state.brief, analysis: analysis.output, results, integration: integration.output }
        );
        state.attempts.push(...outcome.attempts);
        state.filesWritten = outcome.filesWritten;
        state.skippedFiles = outcome.skippedFiles;
        state.instructions = instructionsOf(outcome.integration, orderedResults(analysis.output, outcome.results));

        if (outcome.outcome === "restart" && outcome.nextBrief) {
            state.brief = outcome.nextBrief;
            writeJson(path.join(runDir, `brief-r${round + 1}.json`), state.brief);
            continue;
        }
        return outcome.outcome === "accepted" ? "passed" : "unverified";
    }
}

/**
 * Runs the whole pipeline for one brief. Configuration problems throw before
 * the run directory exists; everything later is reported in the result.
 */
export async function runSymphony(opts: GenerateOptions): Promise<RunResult> {
    const { config } = opts;
    if (!opts.model) assertUsableConfig(config);
    const initialBrief = createBrief(opts.brief);

    const runDir = createRunDir(config.outputDir);
    const runId = path.basename(runDir);
    const events = createEventsWriter(path.join(runDir, EVENTS_FILE));
    const logger = createLogger({ debug: opts.debug, quiet: opts.quiet, print: opts.print, events });
    writeJson(path.join(config.outputDir, LATEST_FILE), { runId, runDir });
    writeJson(path.join(runDir, "brief.json"), initialBrief);

    const model = opts.model ?? createModelRouter(config, { events, logger: logger.child("model") });
    const timeout = AbortSignal.timeout(config.runTimeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;
    const ctx: AgentContext = {
        model,
        prompts: new PromptLibrary(config.promptsDir),
        logger,
        jsonRepairAttempts: config.jsonRepairAttempts,
        maxContextChars: config.maxContextChars,
        signal,
    };

    const started = Date.now();
    const state: RunState = {
        brief: initialBrief,
        projectName: "",
        rounds: 0,
        attempts: [],
        filesWritten: [],
        skippedFiles: [],
        instructions: [],
    };
    let status: RunStatus;
    let error: string | undefined;
    try {
        const providers = model instanceof ModelRouter ? model.order.join(", ") : model.name;
        logger.info(`run ${runId} started (providers: ${providers})`);
        status = await runRounds(ctx, config, runDir, events, state, logger);
    } catch (err) {
        status = "failed";
        error = signal.aborted ? `${abortReason(signal, config.runTimeoutMs)}: ${errorMessage(err)}` : errorMessage(err);
        logger.error(error);
    }
    logger.info(`run ${runId} finished: ${status}`);

    const summary: RunSummary = {
        version: 1,
        runId,
        status,
        startedAt: new Date(started).toISOString(),
        finishedAt: new Date().toISOString(),
        durationMs: Math.max(0, Date.now() - started),
        brief: { ...state.brief },
        projectName: state.projectName,
        rounds: state.rounds,
        attempts: state.attempts.map((a) => ({
            round: a.round,
            iteration: a.iteration,
            action: a.action,
            status: a.report.status,
            ...(a.report.score !== undefined ? { score: a.report.score } : {}),
            errors: a.report.errors,
            ...(a.targets ? { targets: a.targets } : {}),
        })),
        projectDir: PROJECT_DIR,
        events: EVENTS_FILE,
        filesWritten: state.filesWritten,
        skippedFiles: state.skippedFiles,
        instructions: state.instructions,
        ...(error ? { error } : {}),
    };
    writeRunSummary(path.join(runDir, SUMMARY_FILE), summary);
    await events.close();

    return {
        runId,
        runDir,
        projectDir: path.join(runDir, PROJECT_DIR),
        status,
        projectName: state.projectName,
        brief: state.brief,
        rounds: state.rounds,
        attempts: state.attempts,
        filesWritten: state.filesWritten,
        skippedFiles: state.skippedFiles,
        instructions: state.instructions,
        ...(error ? { error } : {}),
    };
}
