import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import { ProviderError, errorMessage, isAbortError } from "../core/errors.js";
import type { GenerationSettings } from "../core/config.js";
import { isRecord } from "../core/guards.js";
import { isRetryableStatus } from "./chatCompletions.js";
import { requestSignal, type Completion, type GenerateRequest, type ModelClient } from "./modelClient.js";

/** The slice of `GoogleGenAI#models` the adapter needs. */
export interface GeminiModels {
    generateContent(params: GenerateContentParameters): Promise<{
        text?: string;
        candidates?: Array<{ finishReason?: string }>;
    }>;
}

export type GeminiClientOptions = {
    apiKey?: string;
    model: string;
    generation: GenerationSettings;
    timeoutMs: number;
    models?: GeminiModels;
};

function statusOf(err: unknown): number | undefined {
    return isRecord(err) && typeof err.status === "number" ? err.status : undefined;
}

export class GeminiClient implements ModelClient {
    readonly name = "gemini";
    private models?: GeminiModels;

    constructor(private readonly opts: GeminiClientOptions) {
        this.models = opts.models;
    }

    isAvailable(): boolean {
        return Boolean(this.opts.apiKey || this.opts.models);
    }

    private resolveModels(): GeminiModels {
        if (this.models) return this.models;
        if (!this.opts.apiKey) {
            throw new ProviderError("gemini is not configured", { provider: this.name });
        }
        this.models = new GoogleGenAI({ apiKey: this.opts.apiKey }).models;
        return this.models;
    }

    async generate(req: GenerateRequest): Promise<Completion> {
        const models = this.resolveModels();
        const { generation } = this.opts;
        const started = Date.now();
        let response: Awaited<ReturnType<GeminiModels["generateContent"]>>;
        try {
            response = await models.generateContent({
                model: this.opts.model,
                contents: req.prompt,
                config: {
                    ...(req.system ? { systemInstruction: req.system } : {}),
                    temperature: req.temperature ?? generation.temperature,
                    topP: generation.topP,
                    topK: generation.topK,
                    maxOutputTokens: req.maxOutputTokens ?? generation.maxOutputTokens,
                    ...(req.json ? { responseMimeType: "application/json" } : {}),
                    abortSignal: requestSignal(this.opts.timeoutMs, req.signal),
                },
            });
        } catch (err) {
            const status = statusOf(err);
            const reason = isAbortError(err) ? "request aborted or timed out" : errorMessage(err);
            throw new ProviderError(`gemini ${this.opts.model}: ${reason}`, {
                provider: this.name,
                status,
                retryable: req.signal?.aborted ? false : status === undefined || isRetryableStatus(status),
                cause: err,
            });
        }

        const text = response.text?.trim() ?? "";
        const finishReason = response.candidates?.[0]?.finishReason;
        if (!text) {
            // SAFETY / RECITATION blocks come back without text
            throw new ProviderError(`gemini ${this.opts.model} returned no text (${finishReason ?? "no candidates"})`, {
                provider: this.name,
                retryable: finishReason === undefined,
            });
        }
        return {
            text,
            provider: this.name,
            model: this.opts.model,
            latencyMs: Date.now() - started,
            finishReason,
        };
    }
}
