export { runSymphony, createBrief, type GenerateOptions } from "./pipeline/orchestrator.js";
export { dispatchTasks, type DispatchOptions } from "./pipeline/dispatcher.js";
export { decideAction, deriveRestartBrief, refineRound } from "./pipeline/refinement.js";
export { runVerification } from "./pipeline/verify.js";
export { writeProject } from "./pipeline/projectWriter.js";
export { analyzeProject, fallbackAnalysis } from "./agents/projectManager.js";
export { runSpecialist } from "./agents/specialists.js";
export { integrate, mergeTaskOutputs } from "./agents/integrator.js";
export { testProject } from "./agents/tester.js";
export type { AgentContext } from "./agents/context.js";
export { loadConfig, defaultConfig, type SymphonyConfig, type ProviderName } from "./core/config.js";
export { createLogger, silentLogger, type Logger } from "./core/logger.js";
export { PromptLibrary, renderTemplate, installPromptSet } from "./core/prompts.js";
export { readRunSummary, type RunSummary } from "./core/summary.js";
export * from "./core/errors.js";
export type * from "./core/types.js";
export type { EventRecord, EventSink } from "./core/events.js";
export {
    createModelRouter,
    createClient,
    ModelRouter,
    GeminiClient,
    ChatCompletionsClient,
    RateLimiter,
    type ModelClient,
    type GenerateRequest,
    type Completion,
} from "./providers/index.js";
