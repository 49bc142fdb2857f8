import path from "node:path";
import { errorMessage } from "../core/errors.js";
import type { EventSink } from "../core/events.js";
import { runWithLimit } from "../core/limit.js";
import { writeJson } from "../core/paths.js";
import { buildBatches } from "../core/scheduler.js";
import type { AgentTask, ProjectAnalysis, TaskResult } from "../core/types.js";
import type { AgentContext } from "../agents/context.js";
import { runSpecialist } from "../agents/specialists.js";

export type DispatchOptions = {
    analysis: ProjectAnalysis;
    concurrency: number;
    events: EventSink;
    /** results of an earlier pass; kept unless the task is in `rerun` */
    previous?: ReadonlyMap<string, TaskResult>;
    /** ids to run again; without `previous` every task runs */
    rerun?: ReadonlySet<string>;
    /** tester feedback for re-run tasks */
    feedback?: string;
    /** where `task-<id>-<role>.json` files go */
    tasksDir?: string;
};

export function taskResultFile(tasksDir: string, r: TaskResult): string {
    const safeId = r.taskId.replace(/[^A-Za-z0-9_.-]+/g, "_");
    return path.join(tasksDir, `task-${safeId}-${r.role}.json`);
}

function shouldRun(task: AgentTask, opts: DispatchOptions, results: Map<string, TaskResult>): boolean {
    const prev = opts.previous?.get(task.id);
    if (!prev) return true;
    if (opts.rerun?.has(task.id)) return true;
    // a task blocked last time runs once its dependencies succeed
    return prev.status === "blocked" && task.dependsOn.every((d) => results.get(d)?.status === "completed");
}

/**
 * Runs the analysis tasks layer by layer, at most `concurrency` at a time.
 * Failures are recorded on the task; dependents of a failed or blocked task
 * are blocked and never dispatched.
 */
export async function dispatchTasks(ctx: AgentContext, opts: DispatchOptions): Promise<Map<string, TaskResult>> {
    const { analysis, events } = opts;
    const batches = buildBatches(analysis.tasks);
    const results = new Map<string, TaskResult>();

    const record = (r: TaskResult) => {
        results.set(r.taskId, r);
        if (opts.tasksDir) writeJson(taskResultFile(opts.tasksDir, r), r);
    };

    for (const layer of batches) {
        const runnable: AgentTask[] = [];
        for (const t of layer) {
            const prev = opts.previous?.get(t.id);
            if (prev && !shouldRun(t, opts, results)) {
                results.set(t.id, prev);
                continue;
            }
            const failedDeps = t.dependsOn.filter((d) => results.get(d)?.status !== "completed");
            if (failedDeps.length > 0) {
                events.write({
                    t: Date.now(),
                    type: "task",
                    source: t.id,
                    data: { state: "blocked", role: t.role, deps: failedDeps },
                });
                ctx.logger.warn(`task ${t.id} blocked by ${failedDeps.join(", ")}`);
                record({
                    taskId: t.id,
                    role: t.role,
                    status: "blocked",
                    attempt: prev?.attempt ?? 0,
                    blockedBy: failedDeps,
                    error: `dependency failed: ${failedDeps.join(", ")}`,
                });
            } else {
                runnable.push(t);
            }
        }

        await runWithLimit(
            opts.concurrency,
            runnable.map((t) => async () => {
                const prev = opts.previous?.get(t.id);
                const attempt = (prev?.attempt ?? 0) + 1;
                const feedback = prev && opts.rerun?.has(t.id) ? opts.feedback : undefined;
                events.write({ t: Date.now(), type: "task", source: t.id, data: { state: "start", role: t.role, attempt } });
                const dependencies = t.dependsOn.flatMap((d) => {
                    const dep = results.get(d);
                    return dep ? [dep] : [];
                });
                let result: TaskResult;
                try {
                    const { output, meta } = await runSpecialist(ctx, { analysis, task: t, dependencies, attempt, feedback });
                    result = { taskId: t.id, role: t.role, status: "completed", attempt, output, meta };
                } catch (err) {
                    // a run-level abort is not a task failure
                    if (ctx.signal?.aborted) throw err;
                    ctx.logger.warn(`task ${t.id} (${t.role}) failed: ${errorMessage(err)}`);
                    result = { taskId: t.id, role: t.role, status: "failed", attempt, error: errorMessage(err) };
                }
                events.write({
                    t: Date.now(),
                    type: "task",
                    source: t.id,
                    data: { state: "exit", role: t.role, attempt, status: result.status, error: result.error },
                });
                record(result);
            })
        );
    }
    return results;
}
