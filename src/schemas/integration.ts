import { z } from "zod";
import { GeneratedFileSchema } from "./taskOutput.js";

/** What the integrator agent answers; conflicts are computed locally. */
export const IntegratorResponseSchema = z.object({
    files: z.array(GeneratedFileSchema).default([]),
    entryPoint: z.string().optional(),
    documentation: z.string().default(""),
    dependencies: z.array(z.string()).default([]),
    buildCommands: z.array(z.string()).default([]),
});

export type IntegratorResponse = z.infer<typeof IntegratorResponseSchema>;
