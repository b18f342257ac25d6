/**
 * A concurrency-limited runner: accepts a thunk and resolves with its result
 * once a slot is free.
 */
export type LimitFunction = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Concurrency limiter shared by the OCR gateway and document fan-out.
 * Each holds its own limiter, so OCR calls never borrow document slots.
 * Waiting tasks start in submission order.
 *
 * @param concurrency - Positive integer, or Infinity for no bound
 */
export function pLimit(concurrency: number): LimitFunction {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const waiting: (() => void)[] = [];
    let running = 0;

    const acquire = (): Promise<void> => {
        if (running < concurrency) {
            running++;
            return Promise.resolve();
        }
        // The releasing task hands its slot over, so `running` is unchanged
        return new Promise<void>(resolve => waiting.push(resolve));
    };

    const release = (): void => {
        const handOver = waiting.shift();
        if (handOver) {
            handOver();
        } else {
            running--;
        }
    };

    return async <T>(fn: () => Promise<T>): Promise<T> => {
        await acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    };
}

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const limitFn = pLimit(limit);
    return Promise.all(items.map((item, index) => limitFn(() => fn(item, index))));
}
