import { Command } from "commander";
import { analyzeProject } from "../agents/projectManager.js";
import { assertUsableConfig, loadConfig } from "../core/config.js";
import { createLogger } from "../core/logger.js";
import { PromptLibrary } from "../core/prompts.js";
import { createBrief } from "../pipeline/orchestrator.js";
import { createModelRouter } from "../providers/index.js";
import { printJson, readBrief, reportError, type CliIO } from "./io.js";

type AnalyzeOpts = {
    brief: string;
    config?: string;
    provider?: string;
    promptsDir?: string;
    debug?: boolean;
};

export function cmdAnalyze(io: CliIO): Command {
    const cmd = new Command("analyze");
    cmd
        .description("Run only the analysis phase and print the task breakdown")
        .requiredOption("--brief <fileOrText>", "Brief text, or a path to a file holding it")
        .option("--config <file>", "Config file (default: ./symphony.config.json when present)")
        .option("--provider <name>", "Preferred provider: gemini, huggingface, openai-compatible")
        .option("--prompts-dir <dir>", "Directory whose templates override the defaults")
        .option("--debug", "Print debug lines")
        .action(async (opts: AnalyzeOpts) => {
            try {
                const config = loadConfig({
                    cwd: io.cwd,
                    env: io.env,
                    configPath: opts.config,
                    overrides: { defaultProvider: opts.provider, promptsDir: opts.promptsDir },
                });
                if (!io.model) assertUsableConfig(config);
                const logger = createLogger({ debug: opts.debug, print: io.err });
                const result = await analyzeProject(
                    {
                        model: io.model ?? createModelRouter(config, { logger: logger.child("model") }),
                        prompts: new PromptLibrary(config.promptsDir),
                        logger,
                        jsonRepairAttempts: config.jsonRepairAttempts,
                        maxContextChars: config.maxContextChars,
                        signal: AbortSignal.timeout(config.runTimeoutMs),
                    },
                    createBrief(readBrief(io, opts.brief))
                );
                printJson(io, result.output);
            } catch (err) {
                reportError(io, "analyze", err);
            }
        });
    return cmd;
}
