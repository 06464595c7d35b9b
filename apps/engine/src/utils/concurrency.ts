/** Resolves after `ms`, or early once `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}

function abortReason(signal: AbortSignal): Error {
    return signal.reason instanceof Error ? signal.reason : new Error('Operation aborted');
}

/**
 * Settles with `promise`, or rejects with `onTimeout()` after `ms`,
 * or with the abort reason once `signal` fires. The underlying work is
 * not cancelled; its late result is ignored.
 */
export function withTimeout<T>(
    promise: Promise<T>,
    ms: number,
    onTimeout: () => Error,
    signal?: AbortSignal,
): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        if (signal?.aborted) {
            reject(abortReason(signal));
            return;
        }

        const timer = setTimeout(() => {
            cleanup();
            reject(onTimeout());
        }, ms);
        timer.unref();

        const onAbort = () => {
            cleanup();
            if (signal) reject(abortReason(signal));
        };
        const cleanup = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        };
        signal?.addEventListener('abort', onAbort, { once: true });

        promise.then(
            value => {
                cleanup();
                resolve(value);
            },
            err => {
                cleanup();
                reject(err);
            },
        );
    });
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight and resolves
 * once every started call has settled. Once `signal` aborts, no new calls
 * start; results are returned for the calls that ran, in completion order.
 * `fn` is expected not to reject.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T) => Promise<R>,
    signal?: AbortSignal,
): Promise<R[]> {
    const results: R[] = [];
    let next = 0;

    const lane = async (): Promise<void> => {
        while (next < items.length && !signal?.aborted) {
            const item = items[next++];
            results.push(await fn(item));
        }
    };

    const lanes = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: lanes }, () => lane()));
    return results;
}
