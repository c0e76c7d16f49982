/**
 * Weather Ingest — Bounded Worker Pool
 */

export type PoolOutcome<R> =
    | { status: 'done'; value: R }
    | { status: 'skipped' };

/**
 * Run `task` over `items` with at most `concurrency` in flight. Items not yet
 * started when `signal` aborts are reported as skipped. Outcomes keep input
 * order.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    concurrency: number,
    task: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
): Promise<PoolOutcome<R>[]> {
    const outcomes: PoolOutcome<R>[] = items.map(() => ({ status: 'skipped' }));
    let next = 0;

    const worker = async () => {
        while (next < items.length && !signal?.aborted) {
            const index = next++;
            outcomes[index] = { status: 'done', value: await task(items[index], index) };
        }
    };

    const width = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: width }, worker));
    return outcomes;
}
