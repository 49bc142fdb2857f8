import { ProviderError, errorMessage, isAbortError } from "../core/errors.js";
import type { GenerationSettings } from "../core/config.js";
import { isRecord } from "../core/guards.js";
import { requestSignal, type Completion, type GenerateRequest, type ModelClient } from "./modelClient.js";

export type ChatCompletionsOptions = {
    name: string;
    baseUrl: string;
    apiKey?: string;
    /** tried in order; the next model is used when one is unavailable */
    models: string[];
    generation: GenerationSettings;
    timeoutMs: number;
    fetchImpl?: typeof fetch;
};

export function isRetryableStatus(status: number): boolean {
    return status === 408 || status === 429 || status >= 500;
}

function readChoice(body: unknown): { text: string; finishReason?: string } {
    const choices: unknown[] = isRecord(body) && Array.isArray(body.choices) ? body.choices : [];
    const first = choices[0];
    const choice: Record<string, unknown> = isRecord(first) ? first : {};
    const content = isRecord(choice.message) ? choice.message.content : undefined;
    const text = typeof content === "string" ? content.trim() : "";
    const finishReason = typeof choice.finish_reason === "string" ? choice.finish_reason : undefined;
    return { text, finishReason };
}

/**
 * OpenAI-style `POST {baseUrl}/chat/completions`. Serves both the Hugging Face
 * router and any OpenAI-compatible endpoint.
 */
export class ChatCompletionsClient implements ModelClient {
    readonly name: string;

    constructor(private readonly opts: ChatCompletionsOptions) {
        this.name = opts.name;
    }

    isAvailable(): boolean {
        return Boolean(this.opts.apiKey) && this.opts.models.length > 0;
    }

    async generate(req: GenerateRequest): Promise<Completion> {
        if (!this.opts.apiKey) {
            throw new ProviderError(`${this.name} is not configured`, { provider: this.name });
        }
        let last: ProviderError | undefined;
        for (const model of this.opts.models) {
            try {
                return await this.generateWith(model, req);
            } catch (err) {
                if (!(err instanceof ProviderError)) throw err;
                last = err;
                // auth problems and aborted runs affect every model alike
                if (err.status === 401 || err.status === 403 || req.signal?.aborted) throw err;
            }
        }
        throw last ?? new ProviderError(`${this.name} has no models configured`, { provider: this.name });
    }

    private async generateWith(model: string, req: GenerateRequest): Promise<Completion> {
        const fetchImpl = this.opts.fetchImpl ?? fetch;
        const url = `${this.opts.baseUrl.replace(/\/+$/, "")}/chat/completions`;
        const messages = [
            ...(req.system ? [{ role: "system", content: req.system }] : []),
            { role: "user", content: req.prompt },
        ];
        const started = Date.now();
        let response: Response;
        try {
            response = await fetchImpl(url, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    Authorization: `Bearer ${this.opts.apiKey}`,
                },
                body: JSON.stringify({
                    model,
                    messages,
                    max_tokens: req.maxOutputTokens ?? this.opts.generation.maxOutputTokens,
                    temperature: req.temperature ?? this.opts.generation.temperature,
                    top_p: this.opts.generation.topP,
                    ...(req.json ? { response_format: { type: "json_object" } } : {}),
                }),
                signal: requestSignal(this.opts.timeoutMs, req.signal),
            });
        } catch (err) {
            const reason = isAbortError(err) ? "request aborted or timed out" : errorMessage(err);
            throw new ProviderError(`${this.name} ${model}: ${reason}`, {
                provider: this.name,
                retryable: !req.signal?.aborted,
                cause: err,
            });
        }

        if (!response.ok) {
            const body = await response.text().catch(() => "");
            throw new ProviderError(
                `${this.name} ${model} failed with ${response.status}: ${body.slice(0, 300) || response.statusText}`,
                { provider: this.name, status: response.status, retryable: isRetryableStatus(response.status) }
            );
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (err) {
            throw new ProviderError(`${this.name} ${model} returned a non-JSON body`, {
                provider: this.name,
                retryable: true,
                cause: err,
            });
        }
        const { text, finishReason } = readChoice(body);
        if (!text) {
            throw new ProviderError(`${this.name} ${model} returned an empty completion`, {
                provider: this.name,
                retryable: true,
            });
        }
        return { text, provider: this.name, model, latencyMs: Date.now() - started, finishReason };
    }
}
