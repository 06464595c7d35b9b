import { sleep } from '../../src/utils/concurrency';

export { sleep };

export interface WaitForOptions {
    timeoutMs?: number;
    intervalMs?: number;
}

/** Resolves once `condition` holds; rejects after `timeoutMs` so a stuck test fails fast. */
export async function waitFor(
    condition: () => boolean | Promise<boolean>,
    { timeoutMs = 2000, intervalMs = 10 }: WaitForOptions = {},
): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!(await condition())) {
        if (Date.now() >= deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
        await sleep(intervalMs);
    }
}
