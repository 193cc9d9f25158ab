/**
 * Runs an async function over items with at most `limit` calls in flight.
 * Results keep the order of the items.
 *
 * @param items - Items to process
 * @param limit - Maximum number of concurrent calls
 * @param fn - Async function to process each item
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T) => Promise<R>
): Promise<R[]> {
    if (!(Number.isInteger(limit) && limit > 0)) {
        throw new TypeError('Expected `limit` to be a number from 1 and up');
    }

    const results: R[] = new Array(items.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
        while (nextIndex < items.length) {
            const index = nextIndex++;
            results[index] = await fn(items[index]);
        }
    };

    await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => worker()));
    return results;
}
