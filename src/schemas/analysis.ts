import { z } from "zod";
import { AGENT_ROLES, type AgentRole } from "../core/types.js";

/** Unknown roles fall back to coder. */
export function normalizeRole(value: string): AgentRole {
    const role = value.trim().toLowerCase().replace(/[\s_-]*agent$/, "");
    return AGENT_ROLES.find((r) => r === role) ?? "coder";
}

const IdSchema = z.union([z.string().trim().min(1), z.number().int()]).transform((v) => String(v));

export const AgentTaskSchema = z.object({
    id: IdSchema,
    title: z.string().trim().min(1),
    description: z.string().default(""),
    role: z.string().default("coder").transform(normalizeRole),
    priority: z.enum(["high", "medium", "low"]).catch("medium"),
    dependsOn: z.array(IdSchema).default([]),
    expectedOutput: z.string().default(""),
    estimatedTime: z.string().optional(),
});

export const ProjectAnalysisSchema = z.object({
    projectName: z.string().trim().min(1),
    description: z.string().default(""),
    tasks: z.array(AgentTaskSchema).min(1),
    techStack: z.array(z.string()).default([]),
    successCriteria: z.array(z.string()).default([]),
    constraints: z.array(z.string()).default([]),
});

export type ProjectAnalysisInput = z.input<typeof ProjectAnalysisSchema>;
