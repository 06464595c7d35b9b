import { mapWithConcurrency, sleep, withTimeout } from '../../src/utils/concurrency';

describe('withTimeout', () => {
    it('resolves with the value when it arrives in time', async () => {
        await expect(withTimeout(Promise.resolve(7), 50, () => new Error('late'))).resolves.toBe(7);
    });

    it('passes through a rejection', async () => {
        await expect(withTimeout(Promise.reject(new Error('boom')), 50, () => new Error('late'))).rejects.toThrow('boom');
    });

    it('rejects with the timeout error', async () => {
        const never = new Promise<number>(() => undefined);
        await expect(withTimeout(never, 10, () => new Error('late'))).rejects.toThrow('late');
    });

    it('rejects with the abort reason', async () => {
        const controller = new AbortController();
        const pending = withTimeout(new Promise<number>(() => undefined), 1000, () => new Error('late'), controller.signal);
        controller.abort(new Error('stopping'));

        await expect(pending).rejects.toThrow('stopping');
    });

    it('rejects at once for an already aborted signal', async () => {
        const controller = new AbortController();
        controller.abort(new Error('stopped'));

        await expect(withTimeout(Promise.resolve(1), 1000, () => new Error('late'), controller.signal)).rejects.toThrow('stopped');
    });
});

describe('mapWithConcurrency', () => {
    it('runs every item with at most `limit` in flight', async () => {
        let active = 0;
        let peak = 0;
        const results = await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async (n) => {
            active++;
            peak = Math.max(peak, active);
            await sleep(2);
            active--;
            return n * 10;
        });

        expect(peak).toBe(3);
        expect([...results].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50, 60]);
    });

    it('returns an empty list for no items', async () => {
        await expect(mapWithConcurrency([], 4, async (n: number) => n)).resolves.toEqual([]);
    });

    it('starts nothing new after abort', async () => {
        const controller = new AbortController();
        const seen: number[] = [];

        await mapWithConcurrency([1, 2, 3, 4], 1, async (n) => {
            seen.push(n);
            if (n === 2) controller.abort();
            return n;
        }, controller.signal);

        expect(seen).toEqual([1, 2]);
    });
});

describe('sleep', () => {
    it('wakes early when its signal aborts', async () => {
        const controller = new AbortController();
        const started = Date.now();
        const nap = sleep(10_000, controller.signal);

        controller.abort();
        await nap;

        expect(Date.now() - started).toBeLessThan(1000);
    });

    it('returns at once for an already aborted signal', async () => {
        await expect(sleep(10_000, AbortSignal.abort())).resolves.toBeUndefined();
    });
});
