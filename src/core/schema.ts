import fs from "node:fs";
import Ajv2020Module from "ajv/dist/2020.js";
import addFormatsModule from "ajv-formats";
import type { ValidateFunction, ErrorObject } from "ajv";

// both packages are CommonJS; under NodeNext the class/plugin sits on `.default`
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

export function loadSchema<T>(schemaPath: string): ValidateFunction<T> {
    const json = JSON.parse(fs.readFileSync(schemaPath, "utf8"));
    // recompiling a schema whose $id is already registered throws
    if (typeof json?.$id === "string") ajv.removeSchema(json.$id);
    return ajv.compile<T>(json);
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
    return (errors ?? [])
        .map((e: ErrorObject) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`)
        .join("; ");
}

export function assertValid<T>(
    validate: ValidateFunction<T>,
    data: unknown,
    label = "Schema"
): asserts data is T {
    const ok = validate(data);
    if (!ok) {
        const err = new Error(`${label} validation failed: ${formatSchemaErrors(validate.errors)}`) as Error & {
            errors?: ErrorObject[] | null;
        };
        err.errors = validate.errors ?? null;
        throw err;
    }
}
