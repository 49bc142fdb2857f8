import type { Logger } from "../core/logger.js";
import type { PromptLibrary } from "../core/prompts.js";
import type { GeneratedFile, PhaseMeta } from "../core/types.js";
import { clip } from "../core/prompts.js";
import type { ModelClient } from "../providers/modelClient.js";

/** What every agent needs to talk to a model. */
export type AgentContext = {
    model: ModelClient;
    prompts: PromptLibrary;
    logger: Logger;
    jsonRepairAttempts: number;
    maxContextChars: number;
    signal?: AbortSignal;
};

export const NONE = "(none)";

export function localMeta(note: string): PhaseMeta {
    return { provider: "local", model: "-", latencyMs: 0, note };
}

export function bulletList(items: readonly string[]): string {
    return items.length > 0 ? items.map((i) => `- ${i}`).join("\n") : NONE;
}

/** Files as `--- path ---` blocks, clipped as one section. */
export function renderFiles(files: readonly GeneratedFile[], maxChars: number): string {
    if (files.length === 0) return NONE;
    const text = files.map((f) => `--- ${f.path} ---\n${f.content}`).join("\n\n");
    return clip(text, maxChars);
}
