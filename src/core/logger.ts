import type { EventSink, LogLevel } from "./events.js";
import { nullSink } from "./events.js";

export interface Logger {
    debug(line: string): void;
    info(line: string): void;
    warn(line: string): void;
    error(line: string): void;
    child(source: string): Logger;
}

export type LoggerOptions = {
    debug?: boolean;
    quiet?: boolean;
    events?: EventSink;
    source?: string;
    /** stderr by default */
    print?: (line: string) => void;
};

/**
 * Human-readable lines go to stderr (stdout is reserved for machine output),
 * every line is also recorded as a `log` event.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
    const events = opts.events ?? nullSink;
    const source = opts.source ?? "pipeline";
    const print = opts.print ?? ((line: string) => console.error(line));

    const emit = (level: LogLevel, line: string) => {
        events.write({ t: Date.now(), type: "log", source, data: { level, line } });
        if (level === "debug") {
            if (opts.debug) print(`[debug] ${line}`);
            return;
        }
        if (opts.quiet && level === "info") return;
        print(level === "info" ? `[symphony] ${line}` : `[symphony] ${level}: ${line}`);
    };

    return {
        debug: (line) => emit("debug", line),
        info: (line) => emit("info", line),
        warn: (line) => emit("warn", line),
        error: (line) => emit("error", line),
        child: (childSource) => createLogger({ ...opts, source: childSource }),
    };
}

export const silentLogger: Logger = createLogger({ quiet: true, print: () => { } });
