import { z } from "zod";

export const GeneratedFileSchema = z.object({
    path: z.string().trim().min(1),
    content: z.string(),
});

export const TaskOutputSchema = z.object({
    files: z.array(GeneratedFileSchema).default([]),
    summary: z.string().default(""),
    dependencies: z.array(z.string()).default([]),
    instructions: z.string().optional(),
});
