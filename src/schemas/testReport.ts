import { z } from "zod";

const IdSchema = z.union([z.string().trim().min(1), z.number().int()]).transform((v) => String(v));

export const TesterResponseSchema = z.object({
    status: z
        .string()
        .transform((s) => s.trim().toLowerCase())
        .pipe(z.enum(["pass", "fail"])),
    score: z.number().min(0).max(100).optional(),
    errors: z.array(z.string()).default([]),
    suggestions: z.array(z.string()).default([]),
    restartAnalysis: z.boolean().default(false),
    tasksToFix: z.array(IdSchema).default([]),
});

export type TesterResponse = z.infer<typeof TesterResponseSchema>;
