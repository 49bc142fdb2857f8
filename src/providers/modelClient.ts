export type GenerateRequest = {
    /** what the call is for (analysis, specialist:coder, integration, ...); used in events and logs */
    purpose: string;
    prompt: string;
    system?: string;
    /** ask the provider for a JSON-only answer where it supports that */
    json?: boolean;
    temperature?: number;
    maxOutputTokens?: number;
    signal?: AbortSignal;
};

export type Completion = {
    text: string;
    provider: string;
    model: string;
    latencyMs: number;
    finishReason?: string;
};

export interface ModelClient {
    readonly name: string;
    isAvailable(): boolean;
    generate(req: GenerateRequest): Promise<Completion>;
}

/** Combines the caller's signal with a per-request timeout. */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
