import { describe, it, expect } from "vitest";
import { ProviderError } from "../src/core/errors.js";
import { defaultConfig } from "../src/core/config.js";
import { ChatCompletionsClient } from "../src/providers/chatCompletions.js";

type Sent = { url: string; auth: string | null; body: Record<string, unknown> };

function stubFetch(responses: Array<() => Response>) {
    const sent: Sent[] = [];
    const fetchImpl: typeof fetch = async (input, init) => {
        const raw = init?.body;
        sent.push({
            url: String(input),
            auth: new Headers(init?.headers).get("Authorization"),
            body: typeof raw === "string" ? JSON.parse(raw) : {},
        });
        const next = responses[Math.min(sent.length - 1, responses.length - 1)];
        if (!next) throw new Error("no stubbed response");
        return next();
    };
    return { sent, fetchImpl };
}

const okBody = (content: string) => () =>
    new Response(JSON.stringify({ choices: [{ message: { content }, finish_reason: "stop" }] }), { status: 200 });

function client(fetchImpl: typeof fetch, models = ["m1"], apiKey?: string) {
    return new ChatCompletionsClient({
        name: "hf",
        baseUrl: "http://llm.test/v1/",
        apiKey,
        models,
        generation: defaultConfig().generation,
        timeoutMs: 5000,
        fetchImpl,
    });
}

describe("ChatCompletionsClient", () => {
    it("posts an OpenAI-style request and returns the trimmed answer", async () => {
        const { sent, fetchImpl } = stubFetch([okBody("  {\"a\":1}  ")]);
        const result = await client(fetchImpl, ["m1"], "test-secret").generate({ purpose: "analysis", prompt: "hello", system: "be brief", json: true });
        expect(result).toMatchObject({ text: "{\"a\":1}", provider: "hf", model: "m1", finishReason: "stop" });
        expect(sent[0]?.url).toBe("http://llm.test/v1/chat/completions");
        expect(sent[0]?.auth).toBe("Bearer test-secret");
        expect(sent[0]?.body).toMatchObject({
            model: "m1",
            messages: [
                { role: "system", content: "be brief" },
                { role: "user", content: "hello" },
            ],
            max_tokens: 2048,
            temperature: 0.7,
            response_format: { type: "json_object" },
        });
    });

    it("tries the next model when one is overloaded", async () => {
        const { sent, fetchImpl } = stubFetch([() => new Response("busy", { status: 503 }), okBody("done")]);
        const result = await client(fetchImpl, ["m1", "m2"], "test-secret").generate({ purpose: "p", prompt: "x" });
        expect(result.model).toBe("m2");
        expect(sent.map((s) => s.body.model)).toEqual(["m1", "m2"]);
    });

    it("stops on an authentication failure", async () => {
        const { sent, fetchImpl } = stubFetch([() => new Response("nope", { status: 401 })]);
        const run = client(fetchImpl, ["m1", "m2"], "test-secret").generate({ purpose: "p", prompt: "x" });
        await expect(run).rejects.toThrow("hf m1 failed with 401: nope");
        expect(sent).toHaveLength(1);
    });

    it("treats an empty completion as a retryable failure", async () => {
        const { fetchImpl } = stubFetch([okBody("   ")]);
        const err = await client(fetchImpl, ["m1"], "test-secret").generate({ purpose: "p", prompt: "x" }).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(ProviderError);
        if (!(err instanceof ProviderError)) return;
        expect(err.message).toBe("hf m1 returned an empty completion");
        expect(err.retryable).toBe(true);
    });

    it("is unavailable without an API key", () => {
        const { fetchImpl } = stubFetch([]);
        expect(client(fetchImpl, ["m1"]).isAvailable()).toBe(false);
        expect(client(fetchImpl, ["m1"], "test-secret").isAvailable()).toBe(true);
    });

    it("refuses to send without an API key", async () => {
        const { sent, fetchImpl } = stubFetch([okBody("x")]);
        await expect(client(fetchImpl).generate({ purpose: "p", prompt: "x" })).rejects.toThrow("hf is not configured");
        expect(sent).toHaveLength(0);
    });
});
