import fs from "node:fs";
import path from "node:path";
import { z, ZodError } from "zod";
import { SummaryValidationError, errorMessage } from "./errors.js";
import { isSafeRelativeUnder } from "./paths.js";

export const SUMMARY_FILE = "summary.json";

const isoDate = z.string().refine((value) => Number.isFinite(Date.parse(value)), {
    message: "must be an ISO date string",
});

const relativePath = z.string().refine((value) => isSafeRelativeUnder(".", value), {
    message: "must be a relative path inside the run directory",
});

const attemptSchema = z.object({
    round: z.number().int().min(1),
    iteration: z.number().int().min(1),
    action: z.enum(["accept", "fix-tasks", "reintegrate", "restart", "exhausted"]),
    status: z.enum(["pass", "fail"]),
    score: z.number().optional(),
    errors: z.array(z.string()),
    targets: z.array(z.string()).optional(),
});

const runSummarySchema = z.object({
    version: z.literal(1),
    runId: z.string().min(1),
    status: z.enum(["passed", "unverified", "failed"]),
    startedAt: isoDate,
    finishedAt: isoDate,
    durationMs: z.number().int().nonnegative(),
    brief: z.object({
        description: z.string(),
        revision: z.number().int().min(1),
        createdAt: isoDate,
        parentRevision: z.number().int().min(1).optional(),
    }),
    projectName: z.string(),
    rounds: z.number().int().nonnegative(),
    attempts: z.array(attemptSchema),
    projectDir: relativePath,
    events: relativePath,
    filesWritten: z.array(z.string()),
    skippedFiles: z.array(z.string()),
    instructions: z.array(z.string()).default([]),
    error: z.string().optional(),
});

export type RunSummary = z.infer<typeof runSummarySchema>;
export type RunSummaryAttempt = z.infer<typeof attemptSchema>;

export function validateRunSummary(candidate: unknown): RunSummary {
    try {
        return runSummarySchema.parse(candidate);
    } catch (err) {
        if (err instanceof ZodError) {
            const first = err.issues[0];
            const pathStr = first?.path.length ? first.path.join(".") : "<root>";
            throw new SummaryValidationError(
                `Run summary validation failed at ${pathStr}: ${first?.message ?? err.message}`,
                err
            );
        }
        throw new SummaryValidationError("Run summary validation failed", err);
    }
}

export function readRunSummary(filePath: string): RunSummary {
    try {
        const raw = fs.readFileSync(filePath, "utf8");
        return validateRunSummary(JSON.parse(raw));
    } catch (err) {
        if (err instanceof SummaryValidationError) throw err;
        throw new SummaryValidationError(`Failed to read run summary at ${filePath}: ${errorMessage(err)}`, err);
    }
}

export function writeRunSummary(filePath: string, summary: RunSummary): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const payload = JSON.stringify(validateRunSummary(summary), null, 2);
    fs.writeFileSync(filePath, `${payload}\n`, "utf8");
}
