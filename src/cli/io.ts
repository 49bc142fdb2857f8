import { InvalidArgumentError } from "commander";
import fs from "node:fs";
import path from "node:path";
import { ConfigError, formatCliError, errorMessage } from "../core/errors.js";
import type { ModelClient } from "../providers/modelClient.js";

/** Where commands read and write; tests swap it for an in-memory one. */
export type CliIO = {
    cwd: string;
    env: NodeJS.ProcessEnv;
    out: (text: string) => void;
    err: (line: string) => void;
    setExitCode: (code: number) => void;
    /** replaces the configured providers */
    model?: ModelClient;
};

export function processIO(): CliIO {
    return {
        cwd: process.cwd(),
        env: process.env,
        out: (text) => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`),
        err: (line) => console.error(line),
        setExitCode: (code) => {
            process.exitCode = code;
        },
    };
}

export function printJson(io: CliIO, value: unknown): void {
    io.out(JSON.stringify(value, null, 2));
}

export function reportError(io: CliIO, cmd: string, err: unknown): void {
    const hint = err instanceof ConfigError ? err.hint : undefined;
    io.err(formatCliError(cmd, errorMessage(err), hint));
    io.setExitCode(1);
}

/** `--brief` is a file path when such a file exists, otherwise the brief text itself. */
export function readBrief(io: CliIO, value: string): string {
    const candidate = path.resolve(io.cwd, value);
    if (value.length < 4096 && fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
        return fs.readFileSync(candidate, "utf8");
    }
    return value;
}

export function parseIntOption(value: string): number {
    const n = Number(value);
    if (value.trim() === "" || !Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");
    return n;
}
