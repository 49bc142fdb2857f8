import type { ZodError, ZodTypeAny, output } from "zod";

export function stripCodeFences(text: string): string {
    const trimmed = text.trim();
    const fenced = trimmed.match(/^```[\w-]*[ \t]*\r?\n?([\s\S]*?)\s*```$/);
    return fenced ? fenced[1].trim() : trimmed;
}

/** First balanced `{...}` or `[...]` in the text, strings and escapes respected. */
export function extractBalancedJson(text: string): string | null {
    const input = stripCodeFences(text);
    const firstBrace = input.indexOf("{");
    const firstBracket = input.indexOf("[");

    let start = -1;
    let opening = "{";
    let closing = "}";
    if (firstBrace !== -1 && (firstBracket === -1 || firstBrace < firstBracket)) {
        start = firstBrace;
    } else if (firstBracket !== -1) {
        start = firstBracket;
        opening = "[";
        closing = "]";
    }
    if (start === -1) return null;

    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let index = start; index < input.length; index += 1) {
        const char = input[index];
        if (inString) {
            if (escaped) escaped = false;
            else if (char === "\\") escaped = true;
            else if (char === "\"") inString = false;
            continue;
        }
        if (char === "\"") {
            inString = true;
            continue;
        }
        if (char === opening) {
            depth += 1;
        } else if (char === closing) {
            depth -= 1;
            if (depth === 0) return input.slice(start, index + 1);
        }
    }
    return null;
}

export function summarizeZodIssues(error: ZodError): string[] {
    return error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
        return `${where}: ${issue.message}`;
    });
}

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; issues: string[] };

export function parseJsonResponse<S extends ZodTypeAny>(text: string, schema: S): ParseOutcome<output<S>> {
    const candidate = extractBalancedJson(text);
    if (candidate === null) {
        return { ok: false, issues: ["no JSON value found in the response"] };
    }
    let data: unknown;
    try {
        data = JSON.parse(candidate);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return { ok: false, issues: [`response is not valid JSON: ${reason}`] };
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) return { ok: false, issues: summarizeZodIssues(parsed.error) };
    return { ok: true, value: parsed.data };
}
