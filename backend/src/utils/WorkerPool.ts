/**
 * Runs `tasks` with at most `limit` in flight. Results keep submission order.
 * Tasks are expected to resolve with typed outcomes; a rejection fails the whole run.
 */
export async function runBounded<T>(tasks: Array<() => Promise<T>>, limit: number): Promise<T[]> {
    const results: T[] = new Array(tasks.length);
    const width = Math.max(1, Math.min(Math.floor(limit), tasks.length));
    let cursor = 0;

    const worker = async () => {
        while (cursor < tasks.length) {
            const index = cursor++;
            results[index] = await tasks[index]();
        }
    };

    await Promise.all(Array.from({ length: width }, () => worker()));
    return results;
}
