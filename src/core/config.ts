import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { ConfigError, errorMessage } from "./errors.js";
import { assertValid, loadSchema } from "./schema.js";

export const PROVIDER_NAMES = ["gemini", "huggingface", "openai-compatible"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export type GenerationSettings = {
    temperature: number;
    topP: number;
    topK: number;
    maxOutputTokens: number;
};

export type SymphonyConfig = {
    defaultProvider: ProviderName;
    fallbackProviders: ProviderName[];
    gemini: { apiKey?: string; model: string };
    huggingface: { token?: string; baseUrl: string; models: string[] };
    openaiCompatible: { apiKey?: string; baseUrl: string; model: string };
    generation: GenerationSettings;
    requestsPerMinute: Partial<Record<ProviderName, number>>;
    retry: { maxRetries: number; baseDelayMs: number };
    requestTimeoutMs: number;
    runTimeoutMs: number;
    maxIterations: number;
    maxRestarts: number;
    concurrency: number;
    jsonRepairAttempts: number;
    maxContextChars: number;
    outputDir: string;
    promptsDir?: string;
    verifyCommand?: string;
};

/** Shape of symphony.config.json; see schemas/config.schema.json. Secrets are never read from it. */
export type ConfigFile = {
    defaultProvider?: ProviderName;
    fallbackProviders?: ProviderName[];
    gemini?: { model?: string };
    huggingface?: { baseUrl?: string; models?: string[] };
    openaiCompatible?: { baseUrl?: string; model?: string };
    generation?: Partial<GenerationSettings>;
    requestsPerMinute?: Partial<Record<ProviderName, number>>;
    retry?: { maxRetries?: number; baseDelayMs?: number };
    requestTimeoutMs?: number;
    runTimeoutMs?: number;
    maxIterations?: number;
    maxRestarts?: number;
    concurrency?: number;
    jsonRepairAttempts?: number;
    maxContextChars?: number;
    outputDir?: string;
    promptsDir?: string;
    verifyCommand?: string;
};

export type ConfigOverrides = {
    defaultProvider?: string;
    concurrency?: number;
    maxIterations?: number;
    maxRestarts?: number;
    outputDir?: string;
    promptsDir?: string;
    verifyCommand?: string;
    runTimeoutMs?: number;
};

export const CONFIG_FILE_NAME = "symphony.config.json";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(moduleDir, "..", "..");
export const CONFIG_SCHEMA_PATH = path.join(projectRoot, "schemas", "config.schema.json");

export function defaultConfig(): SymphonyConfig {
    return {
        defaultProvider: "gemini",
        fallbackProviders: ["huggingface", "openai-compatible"],
        gemini: { model: "gemini-2.0-flash" },
        huggingface: {
            baseUrl: "https://router.huggingface.co/v1",
            models: ["mistralai/Mistral-7B-Instruct-v0.2", "meta-llama/Llama-3.1-8B-Instruct"],
        },
        openaiCompatible: {
            baseUrl: "https://api.together.xyz/v1",
            model: "mistralai/Mixtral-8x7B-Instruct-v0.1",
        },
        generation: { temperature: 0.7, topP: 0.8, topK: 40, maxOutputTokens: 2048 },
        // Gemini free tier
        requestsPerMinute: { gemini: 60 },
        retry: { maxRetries: 2, baseDelayMs: 1000 },
        requestTimeoutMs: 120_000,
        runTimeoutMs: 300_000,
        maxIterations: 3,
        maxRestarts: 1,
        concurrency: 2,
        jsonRepairAttempts: 1,
        maxContextChars: 12_000,
        outputDir: "generated_projects",
    };
}

export function isProviderName(v: string): v is ProviderName {
    return (PROVIDER_NAMES as readonly string[]).includes(v);
}

function parseProvider(raw: string, source: string): ProviderName {
    const value = raw.trim().toLowerCase();
    if (!isProviderName(value)) {
        throw new ConfigError(`${source}: unknown provider "${raw}"`, {
            hint: `use one of ${PROVIDER_NAMES.join(", ")}`,
        });
    }
    return value;
}

function parseInteger(raw: string | number, source: string, min: number): number {
    const value = typeof raw === "number" ? raw : Number(raw.trim());
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigError(`${source} must be an integer >= ${min}: ${raw}`);
    }
    return value;
}

function nonEmpty(v: string | undefined): string | undefined {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
}

/** process.env wins over .env, as with dotenv's own loader. */
export function readEnvironment(cwd: string, env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    const envFile = path.join(cwd, ".env");
    if (!fs.existsSync(envFile)) return { ...env };
    try {
        const parsed = dotenv.parse(fs.readFileSync(envFile));
        return { ...parsed, ...env };
    } catch (err) {
        throw new ConfigError(`failed to read ${envFile}: ${errorMessage(err)}`, { cause: err });
    }
}

export function readConfigFile(filePath: string): ConfigFile {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
        throw new ConfigError(`failed to read config at ${filePath}: ${errorMessage(err)}`, { cause: err });
    }
    const validate = loadSchema<ConfigFile>(CONFIG_SCHEMA_PATH);
    try {
        assertValid(validate, raw, `Config ${path.basename(filePath)}`);
    } catch (err) {
        throw new ConfigError(errorMessage(err), { hint: `see ${CONFIG_SCHEMA_PATH}`, cause: err });
    }
    return raw;
}

function mergeFile(base: SymphonyConfig, file: ConfigFile): SymphonyConfig {
    return {
        ...base,
        defaultProvider: file.defaultProvider ?? base.defaultProvider,
        fallbackProviders: file.fallbackProviders ?? base.fallbackProviders,
        gemini: { ...base.gemini, ...file.gemini },
        huggingface: { ...base.huggingface, ...file.huggingface },
        openaiCompatible: { ...base.openaiCompatible, ...file.openaiCompatible },
        generation: { ...base.generation, ...file.generation },
        requestsPerMinute: { ...base.requestsPerMinute, ...file.requestsPerMinute },
        retry: { ...base.retry, ...file.retry },
        requestTimeoutMs: file.requestTimeoutMs ?? base.requestTimeoutMs,
        runTimeoutMs: file.runTimeoutMs ?? base.runTimeoutMs,
        maxIterations: file.maxIterations ?? base.maxIterations,
        maxRestarts: file.maxRestarts ?? base.maxRestarts,
        concurrency: file.concurrency ?? base.concurrency,
        jsonRepairAttempts: file.jsonRepairAttempts ?? base.jsonRepairAttempts,
        maxContextChars: file.maxContextChars ?? base.maxContextChars,
        outputDir: file.outputDir ?? base.outputDir,
        promptsDir: file.promptsDir ?? base.promptsDir,
        verifyCommand: file.verifyCommand ?? base.verifyCommand,
    };
}

function mergeEnv(base: SymphonyConfig, env: NodeJS.ProcessEnv): SymphonyConfig {
    const next: SymphonyConfig = {
        ...base,
        gemini: {
            ...base.gemini,
            apiKey: nonEmpty(env.GOOGLE_API_KEY) ?? nonEmpty(env.GEMINI_API_KEY),
        },
        huggingface: {
            ...base.huggingface,
            token: nonEmpty(env.HUGGINGFACE_TOKEN) ?? nonEmpty(env.HF_TOKEN),
        },
        openaiCompatible: {
            apiKey: nonEmpty(env.OPENAI_COMPAT_API_KEY),
            baseUrl: nonEmpty(env.OPENAI_COMPAT_BASE_URL) ?? base.openaiCompatible.baseUrl,
            model: nonEmpty(env.OPENAI_COMPAT_MODEL) ?? base.openaiCompatible.model,
        },
    };
    const provider = nonEmpty(env.SYMPHONY_PROVIDER);
    if (provider) next.defaultProvider = parseProvider(provider, "SYMPHONY_PROVIDER");
    const outputDir = nonEmpty(env.SYMPHONY_OUTPUT_DIR);
    if (outputDir) next.outputDir = outputDir;
    const iterations = nonEmpty(env.SYMPHONY_MAX_ITERATIONS);
    if (iterations) next.maxIterations = parseInteger(iterations, "SYMPHONY_MAX_ITERATIONS", 1);
    const concurrency = nonEmpty(env.SYMPHONY_CONCURRENCY);
    if (concurrency) next.concurrency = parseInteger(concurrency, "SYMPHONY_CONCURRENCY", 1);
    return next;
}

function mergeOverrides(base: SymphonyConfig, o: ConfigOverrides): SymphonyConfig {
    const next = { ...base };
    if (o.defaultProvider) next.defaultProvider = parseProvider(o.defaultProvider, "--provider");
    if (o.concurrency !== undefined) next.concurrency = parseInteger(o.concurrency, "--concurrency", 1);
    if (o.maxIterations !== undefined) next.maxIterations = parseInteger(o.maxIterations, "--max-iterations", 1);
    if (o.maxRestarts !== undefined) next.maxRestarts = parseInteger(o.maxRestarts, "--max-restarts", 0);
    if (o.runTimeoutMs !== undefined) next.runTimeoutMs = parseInteger(o.runTimeoutMs, "--timeout", 1);
    if (o.outputDir) next.outputDir = o.outputDir;
    if (o.promptsDir) next.promptsDir = o.promptsDir;
    if (o.verifyCommand) next.verifyCommand = o.verifyCommand;
    return next;
}

/** A provider replaced as the default becomes the first fallback, unless the fallbacks were set alongside it. */
function demoteReplacedProvider(before: SymphonyConfig, after: SymphonyConfig, fallbacksGiven: boolean): SymphonyConfig {
    if (fallbacksGiven || before.defaultProvider === after.defaultProvider) return after;
    const demoted = before.defaultProvider;
    return { ...after, fallbackProviders: [demoted, ...after.fallbackProviders.filter((p) => p !== demoted)] };
}

export type LoadConfigOptions = {
    cwd?: string;
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: ConfigOverrides;
};

/** CLI flags > environment (.env included) > config file > defaults. */
export function loadConfig(opts: LoadConfigOptions = {}): SymphonyConfig {
    const cwd = opts.cwd ?? process.cwd();
    let config = defaultConfig();

    const explicit = opts.configPath ? path.resolve(cwd, opts.configPath) : undefined;
    if (explicit && !fs.existsSync(explicit)) {
        throw new ConfigError(`config file not found: ${opts.configPath}`);
    }
    const configPath = explicit ?? path.join(cwd, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
        const file = readConfigFile(configPath);
        config = demoteReplacedProvider(config, mergeFile(config, file), file.fallbackProviders !== undefined);
    }

    config = demoteReplacedProvider(config, mergeEnv(config, readEnvironment(cwd, opts.env ?? process.env)), false);
    config = demoteReplacedProvider(config, mergeOverrides(config, opts.overrides ?? {}), false);

    config.outputDir = path.resolve(cwd, config.outputDir);
    if (config.promptsDir) config.promptsDir = path.resolve(cwd, config.promptsDir);
    config.fallbackProviders = config.fallbackProviders.filter((p) => p !== config.defaultProvider);
    return config;
}

export function providerCredential(config: SymphonyConfig, provider: ProviderName): string | undefined {
    switch (provider) {
        case "gemini":
            return config.gemini.apiKey;
        case "huggingface":
            return config.huggingface.token;
        case "openai-compatible":
            return config.openaiCompatible.apiKey;
    }
}

export function configuredProviders(config: SymphonyConfig): ProviderName[] {
    return [config.defaultProvider, ...config.fallbackProviders].filter((p) => Boolean(providerCredential(config, p)));
}

export function assertUsableConfig(config: SymphonyConfig): void {
    if (configuredProviders(config).length === 0) {
        throw new ConfigError("no model provider is configured", {
            hint: "set GOOGLE_API_KEY (Google AI Studio) or HUGGINGFACE_TOKEN, or OPENAI_COMPAT_API_KEY for an OpenAI-compatible endpoint",
        });
    }
}
