/**
 * Runs jobs with at most `n` in flight. Every job is started even when an
 * earlier one fails; the first failure is rethrown once all have settled.
 */
export async function runWithLimit(n: number, jobs: Array<() => Promise<void>>): Promise<void> {
    const limit = Math.max(1, Math.floor(n));
    let i = 0;
    let active = 0;
    let firstError: { error: unknown } | undefined;
    await new Promise<void>((resolve) => {
        const next = () => {
            if (i === jobs.length && active === 0) return resolve();
            while (active < limit && i < jobs.length) {
                const job = jobs[i++];
                active++;
                job()
                    .catch((error: unknown) => {
                        firstError ??= { error };
                    })
                    .finally(() => {
                        active--;
                        next();
                    });
            }
        };
        next();
    });
    if (firstError) throw firstError.error;
}
