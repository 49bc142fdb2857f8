import { Command } from "commander";
import { loadConfig } from "../core/config.js";
import type { RunStatus } from "../core/types.js";
import { runSymphony } from "../pipeline/orchestrator.js";
import { parseIntOption, printJson, readBrief, reportError, type CliIO } from "./io.js";

type GenerateOpts = {
    brief: string;
    out?: string;
    config?: string;
    provider?: string;
    concurrency?: number;
    maxIterations?: number;
    maxRestarts?: number;
    verify?: string;
    promptsDir?: string;
    timeout?: number;
    debug?: boolean;
    quiet?: boolean;
};

export const EXIT_CODES: Record<RunStatus, number> = { passed: 0, unverified: 2, failed: 1 };

export function cmdGenerate(io: CliIO): Command {
    const cmd = new Command("generate");
    cmd
        .description("Generate a project from a brief: analysis, specialists, integration, testing")
        .requiredOption("--brief <fileOrText>", "Brief text, or a path to a file holding it")
        .option("--out <dir>", "Output directory for runs (default: generated_projects)")
        .option("--config <file>", "Config file (default: ./symphony.config.json when present)")
        .option("--provider <name>", "Preferred provider: gemini, huggingface, openai-compatible")
        .option("--concurrency <n>", "Specialist tasks run at once", parseIntOption)
        .option("--max-iterations <n>", "Testing iterations per round", parseIntOption)
        .option("--max-restarts <n>", "Restarts from analysis the tester may request", parseIntOption)
        .option("--verify <cmd>", "Shell command run inside the generated project before review")
        .option("--prompts-dir <dir>", "Directory whose templates override the defaults")
        .option("--timeout <ms>", "Run timeout in milliseconds", parseIntOption)
        .option("--debug", "Print debug lines")
        .option("--quiet", "Only print warnings and errors")
        .action(async (opts: GenerateOpts) => {
            try {
                const config = loadConfig({
                    cwd: io.cwd,
                    env: io.env,
                    configPath: opts.config,
                    overrides: {
                        defaultProvider: opts.provider,
                        concurrency: opts.concurrency,
                        maxIterations: opts.maxIterations,
                        maxRestarts: opts.maxRestarts,
                        outputDir: opts.out,
                        promptsDir: opts.promptsDir,
                        verifyCommand: opts.verify,
                        runTimeoutMs: opts.timeout,
                    },
                });
                const result = await runSymphony({
                    brief: readBrief(io, opts.brief),
                    config,
                    model: io.model,
                    debug: opts.debug,
                    quiet: opts.quiet,
                    print: io.err,
                });
                printJson(io, { runDir: result.runDir, status: result.status, projectDir: result.projectDir });
                if (result.error) io.err(`[symphony generate] ${result.error}`);
                io.setExitCode(EXIT_CODES[result.status]);
            } catch (err) {
                reportError(io, "generate", err);
            }
        });
    return cmd;
}
