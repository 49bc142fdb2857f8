import path from "node:path";
import { Command } from "commander";
import { installPromptSet } from "../core/prompts.js";
import { writeResponseSchemaFiles } from "../schemas/jsonSchema.js";
import { reportError, type CliIO } from "./io.js";

export function cmdPrompts(io: CliIO): Command {
    const cmd = new Command("prompts");
    cmd.description("Install or update prompt templates");

    cmd
        .command("up")
        .description("Copy the default prompt templates into a directory for editing")
        .requiredOption("--dir <dir>", "Target directory (use it later with --prompts-dir)")
        .option("--preset <name>", "Prompt preset name", "default")
        .action((opts: { dir: string; preset: string }) => {
            try {
                const target = path.resolve(io.cwd, opts.dir);
                const files = installPromptSet(target, opts.preset);
                writeResponseSchemaFiles(path.join(target, "schemas"));
                io.out(`${files.length} prompts installed under ${target}`);
            } catch (err) {
                reportError(io, "prompts", err);
            }
        });

    return cmd;
}
