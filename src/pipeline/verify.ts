import fs from "node:fs";
import { execa } from "execa";
import { VerificationError, errorMessage } from "../core/errors.js";
import type { VerificationResult } from "../core/types.js";

const MAX_OUTPUT_CHARS = 20_000;

/** Runs `command` through the shell inside `cwd`; a non-zero exit is a result, not an error. */
export async function runVerification(
    command: string,
    cwd: string,
    opts: { timeoutMs: number; signal?: AbortSignal }
): Promise<VerificationResult> {
    if (!fs.existsSync(cwd)) {
        throw new VerificationError(`project directory does not exist: ${cwd}`);
    }
    try {
        const result = await execa(command, {
            cwd,
            shell: true,
            reject: false,
            all: true,
            timeout: opts.timeoutMs,
            cancelSignal: opts.signal,
            env: { CI: "1" },
        });
        const output = String(result.all ?? "");
        const exitCode = result.exitCode ?? -1;
        return {
            command,
            exitCode,
            passed: exitCode === 0 && !result.timedOut,
            timedOut: result.timedOut,
            output: output.length > MAX_OUTPUT_CHARS ? output.slice(-MAX_OUTPUT_CHARS) : output,
        };
    } catch (err) {
        throw new VerificationError(`verification command could not run: ${errorMessage(err)}`, err);
    }
}
