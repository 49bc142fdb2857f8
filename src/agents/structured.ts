import type { ZodTypeAny, output } from "zod";
import { ResponseFormatError } from "../core/errors.js";
import { parseJsonResponse } from "../core/jsonExtract.js";
import type { PromptLibrary } from "../core/prompts.js";
import type { PhaseMeta } from "../core/types.js";
import type { Completion, ModelClient } from "../providers/modelClient.js";

export type StructuredRequest<S extends ZodTypeAny> = {
    purpose: string;
    prompt: string;
    schema: S;
    /** schema text shown to the model in repair prompts */
    schemaText: string;
    repairAttempts: number;
    system?: string;
    signal?: AbortSignal;
};

export type StructuredResult<T> = {
    value: T;
    meta: PhaseMeta;
    /** repair prompts that were needed */
    repairs: number;
};

export function metaOf(completion: Completion, note?: string): PhaseMeta {
    return {
        provider: completion.provider,
        model: completion.model,
        latencyMs: completion.latencyMs,
        ...(note ? { note } : {}),
    };
}

/**
 * Asks for JSON, validates it, and sends repair prompts while the answer is
 * unusable. Provider errors propagate; a still-invalid answer throws
 * ResponseFormatError carrying the last raw text.
 */
export async function generateStructured<S extends ZodTypeAny>(
    model: ModelClient,
    prompts: PromptLibrary,
    req: StructuredRequest<S>
): Promise<StructuredResult<output<S>>> {
    let prompt = req.prompt;
    let last: { issues: string[]; raw: string } | undefined;

    for (let attempt = 0; attempt <= req.repairAttempts; attempt++) {
        const completion = await model.generate({
            purpose: attempt === 0 ? req.purpose : `${req.purpose}:repair`,
            prompt,
            system: req.system,
            json: true,
            signal: req.signal,
        });
        const parsed = parseJsonResponse(completion.text, req.schema);
        if (parsed.ok) {
            return {
                value: parsed.value,
                meta: metaOf(completion, attempt > 0 ? "JSON was repaired" : undefined),
                repairs: attempt,
            };
        }
        last = { issues: parsed.issues, raw: completion.text };
        prompt = prompts.render("repair", {
            issues: parsed.issues.map((i) => `- ${i}`).join("\n"),
            response: completion.text,
            schema: req.schemaText,
        });
    }

    throw new ResponseFormatError(`${req.purpose}: response did not match the expected JSON`, {
        issues: last?.issues,
        raw: last?.raw,
    });
}
