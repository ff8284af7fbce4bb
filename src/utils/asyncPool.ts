/**
 * Run a list of async tasks with limited concurrency while preserving result order.
 * A rejected task rejects the pool; wrap tasks that may fail.
 */
export async function runPool<T>(tasks: Array<() => Promise<T>>, concurrency = 8): Promise<T[]> {
    const results: T[] = new Array(tasks.length);
    let idx = 0;

    async function worker(): Promise<void> {
        while (idx < tasks.length) {
            const current = idx++;
            results[current] = await tasks[current]();
        }
    }

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(Math.max(1, concurrency), tasks.length); i++) {
        workers.push(worker());
    }
    await Promise.all(workers);
    return results;
}
