import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { loadConfig } from "../core/config.js";
import { findLatestRunDir } from "../core/paths.js";
import { SUMMARY_FILE, readRunSummary } from "../core/summary.js";
import { isRecord } from "../core/guards.js";
import { LATEST_FILE } from "../pipeline/orchestrator.js";
import { printJson, reportError, type CliIO } from "./io.js";

/** `latest.json` when it points at an existing run, else the newest `run-*` directory. */
export function resolveRunDir(outDir: string): string {
    const latest = path.join(outDir, LATEST_FILE);
    if (fs.existsSync(latest)) {
        const parsed: unknown = JSON.parse(fs.readFileSync(latest, "utf8"));
        if (isRecord(parsed) && typeof parsed.runDir === "string" && fs.existsSync(parsed.runDir)) {
            return parsed.runDir;
        }
    }
    const found = findLatestRunDir(outDir);
    if (!found) {
        throw new Error(`no run found under ${outDir}. Provide --run-dir <dir> or --out <dir>.`);
    }
    return found;
}

export function cmdStatus(io: CliIO): Command {
    const cmd = new Command("status");
    cmd
        .description("Print the summary of the latest (or given) run")
        .option("--run-dir <dir>", "Run directory")
        .option("--out <dir>", "Output directory holding the runs")
        .option("--config <file>", "Config file (default: ./symphony.config.json when present)")
        .action((opts: { runDir?: string; out?: string; config?: string }) => {
            try {
                const runDir = opts.runDir
                    ? path.resolve(io.cwd, opts.runDir)
                    : resolveRunDir(
                        opts.out
                            ? path.resolve(io.cwd, opts.out)
                            : loadConfig({ cwd: io.cwd, env: io.env, configPath: opts.config }).outputDir
                    );
                printJson(io, readRunSummary(path.join(runDir, SUMMARY_FILE)));
            } catch (err) {
                reportError(io, "status", err);
            }
        });
    return cmd;
}
