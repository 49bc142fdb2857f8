import fs from "node:fs";
import path from "node:path";
import type { EventRecord, EventSink } from "./events.js";

export type EventsWriter = EventSink & { close(): Promise<void> };

export function createEventsWriter(filepath: string): EventsWriter {
    fs.mkdirSync(path.dirname(filepath), { recursive: true });
    const ws = fs.createWriteStream(filepath, { flags: "a" });
    let queued = 0;
    let closed = false;
    return {
        write(obj: EventRecord) {
            if (closed) return;
            // task/model イベントの連続書き込みは軽くcork/uncork
            if (++queued % 200 === 0) ws.cork();
            ws.write(JSON.stringify(obj) + "\n");
            if (queued % 200 === 0) process.nextTick(() => ws.uncork());
        },
        async close() {
            if (closed) return;
            closed = true;
            await new Promise<void>((r) => ws.end(r));
        },
    };
}
