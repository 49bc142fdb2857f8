import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../core/config.js";
import { EVENT_TYPES, parseEventLine } from "../core/events.js";
import { EVENTS_FILE } from "../pipeline/orchestrator.js";
import { parseIntOption, reportError, type CliIO } from "./io.js";
import { resolveRunDir } from "./status.js";

type TailOpts = {
    source?: string;            // task id, phase source ("pipeline"), model purpose, or "all"
    type?: string;              // csv: phase,task,model,log
    events?: string;            // (test用) events.ndjson を直接指定
    runDir?: string;
    out?: string;
    config?: string;
    duration?: number;          // フォロー時間(ms)。未指定なら既存分を出して終了
    interval?: number;          // ポーリング間隔(ms)
};

export type TailFilter = { source?: string; types: Set<string> | null };

function resolveEventsFile(opts: TailOpts, io: CliIO): string {
    if (opts.events) return path.resolve(io.cwd, opts.events);
    const runDir = opts.runDir
        ? path.resolve(io.cwd, opts.runDir)
        : resolveRunDir(
            opts.out
                ? path.resolve(io.cwd, opts.out)
                : loadConfig({ cwd: io.cwd, env: io.env, configPath: opts.config }).outputDir
        );
    const ev = path.join(runDir, EVENTS_FILE);
    if (!fs.existsSync(ev)) {
        throw new Error(`${EVENTS_FILE} not found at ${ev}`);
    }
    return ev;
}

export function parseTypes(v?: string): Set<string> | null {
    if (!v) return null;
    const s = new Set<string>();
    for (const t of v.split(",").map((x) => x.trim()).filter(Boolean)) {
        if (!EVENT_TYPES.some((known) => known === t)) {
            throw new Error(`unknown event type: ${t} (use ${EVENT_TYPES.join(", ")})`);
        }
        s.add(t);
    }
    return s;
}

export function matches(line: string, filter: TailFilter): boolean {
    const ev = parseEventLine(line);
    if (!ev) return false;
    if (filter.source && filter.source !== "all" && ev.source !== filter.source) return false;
    if (filter.types && !filter.types.has(ev.type)) return false;
    return true;
}

function collect(text: string, filter: TailFilter, into: string[]): void {
    for (const ln of text.split(/\r?\n/)) {
        if (!ln.trim()) continue;
        if (matches(ln, filter)) into.push(ln);
    }
}

export async function tailOnce(evFile: string, filter: TailFilter): Promise<string[]> {
    if (!fs.existsSync(evFile)) return [];
    const out: string[] = [];
    collect(await fs.promises.readFile(evFile, "utf8"), filter, out);
    return out;
}

/** Prints what is there, then polls for appended lines until `durationMs` has passed. */
export async function tailFollow(
    evFile: string,
    filter: TailFilter,
    durationMs: number,
    intervalMs: number
): Promise<string[]> {
    let pos = 0;
    let partial = "";
    const lines: string[] = [];
    const start = Date.now();

    if (fs.existsSync(evFile)) {
        const buf = fs.readFileSync(evFile);
        pos = buf.length;
        const text = buf.toString("utf8");
        const cut = text.lastIndexOf("\n") + 1;
        collect(text.slice(0, cut), filter, lines);
        partial = text.slice(cut);
    }

    while (Date.now() - start < durationMs) {
        await new Promise((r) => setTimeout(r, intervalMs));
        if (!fs.existsSync(evFile)) continue;
        const st = fs.statSync(evFile);
        if (st.size <= pos) continue;
        const fd = fs.openSync(evFile, "r");
        try {
            const len = st.size - pos;
            const buf = Buffer.allocUnsafe(len);
            fs.readSync(fd, buf, 0, len, pos);
            pos = st.size;
            // 改行のない末尾行は次のポーリングまで保持
            const text = partial + buf.toString("utf8");
            const cut = text.lastIndexOf("\n") + 1;
            collect(text.slice(0, cut), filter, lines);
            partial = text.slice(cut);
        } finally {
            fs.closeSync(fd);
        }
    }
    if (partial.trim()) collect(partial, filter, lines);
    return lines;
}

export function cmdTail(io: CliIO) {
    const cmd = new Command("tail");
    cmd
        .description("Print or follow events.ndjson, filtered by source and type")
        .option("--source <id|all>", "Event source: task id, pipeline, or a model purpose (default: all)", "all")
        .option("--type <csv>", "Filter types: phase,task,model,log")
        .option("--events <file>", "Path to events.ndjson (otherwise the latest run's)")
        .option("--run-dir <dir>", "Run directory")
        .option("--out <dir>", "Output directory holding the runs")
        .option("--config <file>", "Config file (default: ./symphony.config.json when present)")
        .option("--duration <ms>", "Follow duration milliseconds (if omitted, just prints current contents and exit)", parseIntOption)
        .option("--interval <ms>", "Polling interval milliseconds", parseIntOption, 100)
        .action(async (opts: TailOpts) => {
            try {
                const evFile = resolveEventsFile(opts, io);
                const filter: TailFilter = { source: opts.source, types: parseTypes(opts.type) };
                const outLines = opts.duration !== undefined
                    ? await tailFollow(evFile, filter, opts.duration, opts.interval ?? 100)
                    : await tailOnce(evFile, filter);
                if (outLines.length) io.out(outLines.join("\n") + "\n");
            } catch (err) {
                reportError(io, "tail", err);
            }
        });
    return cmd;
}
