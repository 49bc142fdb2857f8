export const AGENT_ROLES = ["coder", "designer", "researcher", "writer"] as const;
export type AgentRole = (typeof AGENT_ROLES)[number];

export type Priority = "high" | "medium" | "low";

export type PhaseName = "analysis" | "specialists" | "integration" | "testing";

export type ProjectBrief = Readonly<{
    description: string;
    revision: number;
    createdAt: string;
    parentRevision?: number;
}>;

export type AgentTask = {
    id: string;
    title: string;
    description: string;
    role: AgentRole;
    priority: Priority;
    dependsOn: string[];
    expectedOutput: string;
    estimatedTime?: string;
};

export type ProjectAnalysis = {
    projectName: string;
    description: string;
    tasks: AgentTask[];
    techStack: string[];
    successCriteria: string[];
    constraints: string[];
};

export type PhaseMeta = {
    provider: string;
    model: string;
    latencyMs: number;
    note?: string;
};

export type PhaseResult<T> = {
    phase: PhaseName;
    status: "completed" | "failed";
    output: T;
    meta: PhaseMeta;
    error?: string;
};

export type GeneratedFile = {
    path: string;
    content: string;
};

export type TaskOutput = {
    files: GeneratedFile[];
    summary: string;
    dependencies: string[];
    instructions?: string;
};

export type TaskStatus = "completed" | "failed" | "blocked";

export type TaskResult = {
    taskId: string;
    role: AgentRole;
    status: TaskStatus;
    attempt: number;
    output?: TaskOutput;
    error?: string;
    blockedBy?: string[];
    meta?: PhaseMeta;
};

export type FileConflict = {
    path: string;
    taskIds: string[];
    keptFrom: string;
};

export type IntegrationOutput = {
    files: GeneratedFile[];
    entryPoint?: string;
    documentation: string;
    dependencies: string[];
    buildCommands: string[];
    conflicts: FileConflict[];
};

export type VerificationResult = {
    command: string;
    exitCode: number;
    passed: boolean;
    timedOut: boolean;
    output: string;
};

export type TestReport = {
    status: "pass" | "fail";
    score?: number;
    errors: string[];
    suggestions: string[];
    restartAnalysis: boolean;
    tasksToFix: string[];
    verification?: VerificationResult;
};

export type RefinementAction = "accept" | "fix-tasks" | "reintegrate" | "restart" | "exhausted";

export type RefinementAttempt = {
    round: number;
    iteration: number;
    action: RefinementAction;
    report: TestReport;
    targets?: string[];
};

export type RunStatus = "passed" | "unverified" | "failed";

export type RunResult = {
    runId: string;
    runDir: string;
    projectDir: string;
    status: RunStatus;
    projectName: string;
    brief: ProjectBrief;
    rounds: number;
    attempts: RefinementAttempt[];
    filesWritten: string[];
    skippedFiles: string[];
    instructions: string[];
    error?: string;
};
