import fs from "node:fs";
import path from "node:path";
import type { ZodTypeAny } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { ProjectAnalysisSchema } from "./analysis.js";
import { IntegratorResponseSchema } from "./integration.js";
import { TaskOutputSchema } from "./taskOutput.js";
import { TesterResponseSchema } from "./testReport.js";

/** Inline JSON Schema text for embedding in a prompt. */
export function promptSchema(schema: ZodTypeAny): string {
    const json = zodToJsonSchema(schema, { $refStrategy: "none" });
    return JSON.stringify(json, null, 2);
}

export const RESPONSE_SCHEMAS = {
    analysis: ProjectAnalysisSchema,
    taskOutput: TaskOutputSchema,
    integration: IntegratorResponseSchema,
    testReport: TesterResponseSchema,
} as const;

/** Writes every response schema as `<name>.schema.json` under `destDir`. */
export function writeResponseSchemaFiles(destDir: string): string[] {
    fs.mkdirSync(destDir, { recursive: true });
    const written: string[] = [];
    for (const [name, schema] of Object.entries(RESPONSE_SCHEMAS)) {
        const dest = path.join(destDir, `${name}.schema.json`);
        fs.writeFileSync(dest, JSON.stringify(zodToJsonSchema(schema, { name }), null, 2) + "\n", "utf8");
        written.push(dest);
    }
    return written;
}
