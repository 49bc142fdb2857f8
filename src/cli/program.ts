import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { isRecord } from "../core/guards.js";
import { cmdAnalyze } from "./analyze.js";
import { cmdGenerate } from "./generate.js";
import { processIO, type CliIO } from "./io.js";
import { cmdPrompts } from "./prompts.js";
import { cmdProviders } from "./providers.js";
import { cmdStatus } from "./status.js";
import { cmdTail } from "./tail.js";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));
const packageJsonPath = path.resolve(moduleDir, "..", "..", "package.json");

function readPackageInfo(): { name: string; version: string; description: string } {
    const fallback = { name: "symphony", version: "0.0.0", description: "" };
    if (!fs.existsSync(packageJsonPath)) return fallback;
    const pkg: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"));
    if (!isRecord(pkg)) return fallback;
    return {
        name: typeof pkg.name === "string" ? pkg.name : fallback.name,
        version: typeof pkg.version === "string" ? pkg.version : fallback.version,
        description: typeof pkg.description === "string" ? pkg.description : fallback.description,
    };
}

export function createProgram(io: CliIO = processIO()): Command {
    const { name, version, description } = readPackageInfo();
    const program = new Command();
    program
        .name(name)
        .description(description || "Symphony CLI: generate, analyze, providers, prompts, status, tail")
        .version(version);

    program.addCommand(cmdGenerate(io));
    program.addCommand(cmdAnalyze(io));
    program.addCommand(cmdProviders(io));
    program.addCommand(cmdPrompts(io));
    program.addCommand(cmdStatus(io));
    program.addCommand(cmdTail(io));

    return program;
}
