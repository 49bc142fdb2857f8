import { ConfigError, ProviderError, errorMessage } from "../core/errors.js";
import { nullSink, type EventSink } from "../core/events.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { Completion, GenerateRequest, ModelClient } from "./modelClient.js";
import { RateLimiter, systemClock, type Clock } from "./rateLimiter.js";

export type RouterOptions = {
    retry: { maxRetries: number; baseDelayMs: number };
    /** keyed by client name; clients without an entry are not throttled */
    requestsPerMinute?: Record<string, number | undefined>;
    events?: EventSink;
    logger?: Logger;
    clock?: Clock;
};

/**
 * Preferred client first, then the fallbacks. Retryable errors are retried on
 * the same client with exponential back-off before moving on.
 */
export class ModelRouter implements ModelClient {
    readonly name = "router";
    private readonly limiters = new Map<string, RateLimiter>();
    private readonly events: EventSink;
    private readonly logger: Logger;
    private readonly clock: Clock;

    constructor(private readonly clients: ModelClient[], private readonly opts: RouterOptions) {
        this.events = opts.events ?? nullSink;
        this.logger = opts.logger ?? silentLogger;
        this.clock = opts.clock ?? systemClock;
        for (const client of clients) {
            const rpm = opts.requestsPerMinute?.[client.name];
            if (rpm && rpm > 0) this.limiters.set(client.name, new RateLimiter(rpm, this.clock));
        }
    }

    /** Names of the clients that would be tried, in order. */
    get order(): string[] {
        return this.clients.filter((c) => c.isAvailable()).map((c) => c.name);
    }

    isAvailable(): boolean {
        return this.clients.some((c) => c.isAvailable());
    }

    async generate(req: GenerateRequest): Promise<Completion> {
        const available = this.clients.filter((c) => c.isAvailable());
        if (available.length === 0) {
            throw new ConfigError("no model provider is configured", {
                hint: "set GOOGLE_API_KEY, HUGGINGFACE_TOKEN or OPENAI_COMPAT_API_KEY",
            });
        }

        const failures: string[] = [];
        for (const client of available) {
            const outcome = await this.tryClient(client, req);
            if (!(outcome instanceof ProviderError)) return outcome;
            failures.push(`${client.name}: ${outcome.message}`);
            if (req.signal?.aborted) break;
            this.logger.warn(`${req.purpose}: ${client.name} failed, trying next provider`);
        }
        throw new ProviderError(`all providers failed for ${req.purpose}: ${failures.join("; ")}`, {
            provider: this.name,
            retryable: false,
        });
    }

    /** Returns the completion, or the last ProviderError from this client. */
    private async tryClient(client: ModelClient, req: GenerateRequest): Promise<Completion | ProviderError> {
        const { maxRetries, baseDelayMs } = this.opts.retry;
        const limiter = this.limiters.get(client.name);
        let last: ProviderError | undefined;

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            if (limiter) await limiter.acquire(req.signal);
            const started = this.clock.now();
            try {
                const completion = await client.generate(req);
                this.emit(req.purpose, attempt + 1, {
                    provider: completion.provider,
                    model: completion.model,
                    latencyMs: completion.latencyMs,
                    ok: true,
                });
                return completion;
            } catch (err) {
                this.emit(req.purpose, attempt + 1, {
                    provider: client.name,
                    model: "-",
                    latencyMs: this.clock.now() - started,
                    ok: false,
                    error: errorMessage(err),
                });
                if (!(err instanceof ProviderError)) throw err;
                last = err;
                if (!err.retryable || req.signal?.aborted || attempt === maxRetries) break;
                const delay = baseDelayMs * 2 ** attempt;
                this.logger.debug(`${req.purpose}: ${client.name} retry ${attempt + 1}/${maxRetries} in ${delay}ms`);
                await this.clock.sleep(delay, req.signal);
            }
        }
        return last ?? new ProviderError(`${client.name} made no attempt`, { provider: client.name });
    }

    private emit(
        purpose: string,
        attempt: number,
        data: { provider: string; model: string; latencyMs: number; ok: boolean; error?: string }
    ): void {
        this.events.write({
            t: Date.now(),
            type: "model",
            source: purpose,
            data: { purpose, attempt, ...data },
        });
    }
}
