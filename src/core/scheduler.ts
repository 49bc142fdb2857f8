import { SchedulerError } from "./errors.js";

export type Schedulable = { id: string; dependsOn: readonly string[] };

/**
 * Splits tasks into layers that can run side by side, in topological order.
 * Order inside a layer follows input order. Throws on an unknown dependency or a cycle.
 */
export function buildBatches<T extends Schedulable>(tasks: readonly T[]): T[][] {
    const byId = new Map<string, T>();
    for (const t of tasks) {
        if (byId.has(t.id)) throw new SchedulerError(`duplicate task id: ${t.id}`);
        byId.set(t.id, t);
    }
    const indeg = new Map<string, number>();
    const adj = new Map<string, string[]>();

    // 初期化
    for (const t of tasks) {
        indeg.set(t.id, 0);
        adj.set(t.id, []);
    }
    for (const t of tasks) {
        for (const d of new Set(t.dependsOn)) {
            const dependents = adj.get(d);
            if (!dependents) throw new SchedulerError(`dependsOn not found: ${t.id} -> ${d}`);
            indeg.set(t.id, (indeg.get(t.id) ?? 0) + 1);
            dependents.push(t.id);
        }
    }

    const layers: T[][] = [];
    let ready = tasks.filter((t) => (indeg.get(t.id) ?? 0) === 0);

    let visited = 0;
    while (ready.length > 0) {
        layers.push(ready);
        const nextIds = new Set<string>();
        for (const u of ready) {
            visited++;
            for (const v of adj.get(u.id) ?? []) {
                const deg = (indeg.get(v) ?? 0) - 1;
                indeg.set(v, deg);
                if (deg === 0) nextIds.add(v);
            }
        }
        ready = tasks.filter((t) => nextIds.has(t.id));
    }

    if (visited !== tasks.length) {
        const stuck = tasks.filter((t) => (indeg.get(t.id) ?? 0) > 0).map((t) => t.id);
        throw new SchedulerError(`cycle detected in dependsOn: ${stuck.join(", ")}`);
    }
    return layers;
}

/** Flattened topological order. */
export function topologicalOrder<T extends Schedulable>(tasks: readonly T[]): T[] {
    return buildBatches(tasks).flat();
}
