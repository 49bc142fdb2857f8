import { Command } from "commander";
import { loadConfig, type ProviderName, type SymphonyConfig } from "../core/config.js";
import { createClient } from "../providers/index.js";
import { printJson, reportError, type CliIO } from "./io.js";

export type ProviderStatus = {
    name: ProviderName;
    role: "default" | "fallback";
    available: boolean;
    models: string[];
    requestsPerMinute?: number;
};

function modelsOf(config: SymphonyConfig, provider: ProviderName): string[] {
    switch (provider) {
        case "gemini":
            return [config.gemini.model];
        case "huggingface":
            return config.huggingface.models;
        case "openai-compatible":
            return [config.openaiCompatible.model];
    }
}

export function describeProviders(config: SymphonyConfig): ProviderStatus[] {
    return [config.defaultProvider, ...config.fallbackProviders].map((name, i) => ({
        name,
        role: i === 0 ? "default" : "fallback",
        available: createClient(config, name).isAvailable(),
        models: modelsOf(config, name),
        ...(config.requestsPerMinute[name] ? { requestsPerMinute: config.requestsPerMinute[name] } : {}),
    }));
}

export function cmdProviders(io: CliIO): Command {
    const cmd = new Command("providers");
    cmd
        .description("Show the provider order, which providers have credentials, and their models")
        .option("--config <file>", "Config file (default: ./symphony.config.json when present)")
        .action((opts: { config?: string }) => {
            try {
                const config = loadConfig({ cwd: io.cwd, env: io.env, configPath: opts.config });
                printJson(io, describeProviders(config));
            } catch (err) {
                reportError(io, "providers", err);
            }
        });
    return cmd;
}
