import type { ProviderName, SymphonyConfig } from "../core/config.js";
import type { EventSink } from "../core/events.js";
import type { Logger } from "../core/logger.js";
import { ChatCompletionsClient } from "./chatCompletions.js";
import { GeminiClient, type GeminiModels } from "./gemini.js";
import type { ModelClient } from "./modelClient.js";
import type { Clock } from "./rateLimiter.js";
import { ModelRouter } from "./router.js";

export type ProviderOverrides = {
    fetchImpl?: typeof fetch;
    geminiModels?: GeminiModels;
};

export function createClient(
    config: SymphonyConfig,
    provider: ProviderName,
    overrides: ProviderOverrides = {}
): ModelClient {
    switch (provider) {
        case "gemini":
            return new GeminiClient({
                apiKey: config.gemini.apiKey,
                model: config.gemini.model,
                generation: config.generation,
                timeoutMs: config.requestTimeoutMs,
                models: overrides.geminiModels,
            });
        case "huggingface":
            return new ChatCompletionsClient({
                name: "huggingface",
                baseUrl: config.huggingface.baseUrl,
                apiKey: config.huggingface.token,
                models: config.huggingface.models,
                generation: config.generation,
                timeoutMs: config.requestTimeoutMs,
                fetchImpl: overrides.fetchImpl,
            });
        case "openai-compatible":
            return new ChatCompletionsClient({
                name: "openai-compatible",
                baseUrl: config.openaiCompatible.baseUrl,
                apiKey: config.openaiCompatible.apiKey,
                models: [config.openaiCompatible.model],
                generation: config.generation,
                timeoutMs: config.requestTimeoutMs,
                fetchImpl: overrides.fetchImpl,
            });
    }
}

export type CreateRouterOptions = ProviderOverrides & {
    events?: EventSink;
    logger?: Logger;
    clock?: Clock;
};

export function createModelRouter(config: SymphonyConfig, opts: CreateRouterOptions = {}): ModelRouter {
    const order = [config.defaultProvider, ...config.fallbackProviders.filter((p) => p !== config.defaultProvider)];
    const clients = order.map((p) => createClient(config, p, opts));
    return new ModelRouter(clients, {
        retry: config.retry,
        requestsPerMinute: config.requestsPerMinute,
        events: opts.events,
        logger: opts.logger,
        clock: opts.clock,
    });
}

export type { ModelClient, GenerateRequest, Completion } from "./modelClient.js";
export { ModelRouter } from "./router.js";
export { GeminiClient } from "./gemini.js";
export { ChatCompletionsClient } from "./chatCompletions.js";
export { RateLimiter } from "./rateLimiter.js";
