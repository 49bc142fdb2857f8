import type { AgentRole, PhaseName, TaskStatus } from "./types.js";

export type PhaseEventData =
    | { phase: PhaseName; state: "start"; round: number; iteration?: number }
    | { phase: PhaseName; state: "end"; round: number; iteration?: number; status: "completed" | "failed"; note?: string };

export type TaskEventData =
    | { state: "start"; role: AgentRole; attempt: number }
    | { state: "exit"; role: AgentRole; attempt: number; status: TaskStatus; error?: string }
    | { state: "blocked"; role: AgentRole; deps: string[] };

export type ModelEventData = {
    purpose: string;
    provider: string;
    model: string;
    latencyMs: number;
    ok: boolean;
    attempt: number;
    error?: string;
};

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogEventData = { level: LogLevel; line: string };

export type PhaseEvent = { t: number; type: "phase"; source: string; data: PhaseEventData };
export type TaskEvent = { t: number; type: "task"; source: string; data: TaskEventData };
export type ModelEvent = { t: number; type: "model"; source: string; data: ModelEventData };
export type LogEvent = { t: number; type: "log"; source: string; data: LogEventData };

export type EventRecord = PhaseEvent | TaskEvent | ModelEvent | LogEvent;
export type EventType = EventRecord["type"];

export const EVENT_TYPES: readonly EventType[] = ["phase", "task", "model", "log"];

export interface EventSink {
    write(event: EventRecord): void;
}

/** Sink used when a caller does not care about events (library use, unit tests). */
export const nullSink: EventSink = { write() { } };

function isObject(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null;
}

export function isEventRecord(u: unknown): u is EventRecord {
    if (!isObject(u)) return false;
    const { t, type, source, data } = u;
    if (typeof t !== "number" || typeof source !== "string" || typeof type !== "string" || !isObject(data)) {
        return false;
    }
    switch (type) {
        case "phase":
            return typeof data.phase === "string" && (data.state === "start" || data.state === "end");
        case "task":
            return data.state === "start" || data.state === "exit" || data.state === "blocked";
        case "model":
            return typeof data.provider === "string" && typeof data.ok === "boolean";
        case "log":
            return typeof data.level === "string" && typeof data.line === "string";
        default:
            return false;
    }
}

export function parseEventLine(line: string): EventRecord | null {
    try {
        const obj = JSON.parse(line) as unknown;
        return isEventRecord(obj) ? obj : null;
    } catch {
        return null;
    }
}
