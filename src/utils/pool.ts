/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 *
 * Results come back in input order. Once `signal` is aborted no further
 * items are started; items already running finish and are included.
 * A worker that rejects rejects the whole call after in-flight work settles.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
): Promise<R[]> {
    const done: Array<{ index: number; value: R }> = [];
    const errors: unknown[] = [];
    let next = 0;

    const lane = async (): Promise<void> => {
        while (next < items.length && errors.length === 0 && !signal?.aborted) {
            const index = next++;
            try {
                const value = await worker(items[index], index);
                done.push({ index, value });
            } catch (error) {
                errors.push(error);
            }
        }
    };

    const lanes = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: lanes }, () => lane()));

    if (errors.length > 0) {
        throw errors[0];
    }

    return done.sort((a, b) => a.index - b.index).map(entry => entry.value);
}
