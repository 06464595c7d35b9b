import { taskState } from '@taskfleet/sdk';
import { RemoteTaskHandle, classifyRecord } from '../../src/broker/remote-task-handle';
import { PollTimeoutError } from '../../src/errors';

describe('classifyRecord', () => {
    it('treats a missing record as pending', () => {
        expect(classifyRecord(null)).toEqual({ kind: taskState.PENDING });
        expect(classifyRecord(undefined)).toEqual({ kind: taskState.PENDING });
    });

    it.each([
        ['received', taskState.PENDING],
        ['started', taskState.RUNNING],
        ['retry', taskState.RUNNING],
        ['success', taskState.SUCCESS],
    ])('maps "%s" to %s', (state, kind) => {
        expect(classifyRecord({ state })).toEqual({ kind });
    });

    it('keeps the failure reason', () => {
        expect(classifyRecord({ state: 'failure', info: 'exit code 2' })).toEqual({
            kind: taskState.FAILED,
            info: 'exit code 2',
        });
        expect(classifyRecord({ state: 'revoked' })).toEqual({ kind: taskState.FAILED });
    });

    it('reports an unknown state as a lookup error', () => {
        expect(classifyRecord({ state: 'exploded' })).toEqual({
            kind: 'lookup_error',
            error: { name: 'MalformedResultError', message: 'unknown task state "exploded"' },
        });
    });

    it('reports a record without a state as a lookup error', () => {
        expect(classifyRecord({ status: 'success' })).toEqual({
            kind: 'lookup_error',
            error: { name: 'MalformedResultError', message: 'unexpected result shape: object with keys [status]' },
        });
        expect(classifyRecord('success')).toEqual({
            kind: 'lookup_error',
            error: { name: 'MalformedResultError', message: 'unexpected result shape: string' },
        });
    });
});

describe('RemoteTaskHandle', () => {
    it('polls the broker with its token', async () => {
        const fetchState = jest.fn().mockResolvedValue({ state: 'running' });
        const handle = new RemoteTaskHandle('tok-1', { fetchState }, 100);

        await expect(handle.poll()).resolves.toEqual({ kind: taskState.RUNNING });
        expect(fetchState).toHaveBeenCalledWith('tok-1');
    });

    it('turns a rejected lookup into a lookup error', async () => {
        const handle = new RemoteTaskHandle('tok-1', { fetchState: () => Promise.reject(new TypeError('bad reply')) }, 100);

        const result = await handle.poll();

        expect(result).toEqual({ kind: 'lookup_error', error: expect.objectContaining({ name: 'TypeError', message: 'bad reply' }) });
    });

    it('turns a slow lookup into a timeout', async () => {
        const handle = new RemoteTaskHandle('tok-1', { fetchState: () => new Promise(() => undefined) }, 10);

        const result = await handle.poll();

        expect(result).toEqual({
            kind: 'lookup_error',
            error: expect.objectContaining({ name: 'PollTimeoutError', message: 'State lookup for tok-1 timed out after 10ms' }),
        });
    });

    it('returns false from revoke when the transport cannot revoke', async () => {
        const handle = new RemoteTaskHandle('tok-1', { fetchState: jest.fn() }, 100);
        await expect(handle.revoke()).resolves.toBe(false);
    });

    it('revokes through the transport', async () => {
        const revoke = jest.fn().mockResolvedValue(undefined);
        const handle = new RemoteTaskHandle('tok-1', { fetchState: jest.fn(), revoke }, 100);

        await expect(handle.revoke()).resolves.toBe(true);
        expect(revoke).toHaveBeenCalledWith('tok-1');
    });

    describe('waitForTerminal', () => {
        it('polls until a terminal state', async () => {
            const fetchState = jest.fn()
                .mockResolvedValueOnce(null)
                .mockResolvedValueOnce({ state: 'running' })
                .mockResolvedValueOnce({ state: 'success' });
            const handle = new RemoteTaskHandle('tok-1', { fetchState }, 100);

            await expect(handle.waitForTerminal({ intervalMs: 1 })).resolves.toEqual({ kind: taskState.SUCCESS });
            expect(fetchState).toHaveBeenCalledTimes(3);
        });

        it('returns a lookup error instead of retrying it', async () => {
            const fetchState = jest.fn().mockRejectedValue(new Error('gone'));
            const handle = new RemoteTaskHandle('tok-1', { fetchState }, 100);

            const result = await handle.waitForTerminal({ intervalMs: 1 });

            expect(result.kind).toBe('lookup_error');
            expect(fetchState).toHaveBeenCalledTimes(1);
        });

        it('throws PollTimeoutError when the deadline passes', async () => {
            const handle = new RemoteTaskHandle('tok-1', { fetchState: jest.fn().mockResolvedValue({ state: 'running' }) }, 100);

            await expect(handle.waitForTerminal({ intervalMs: 5, timeoutMs: 20 })).rejects.toBeInstanceOf(PollTimeoutError);
        });

        it('stops when the signal aborts', async () => {
            const controller = new AbortController();
            const handle = new RemoteTaskHandle('tok-1', { fetchState: jest.fn().mockResolvedValue(null) }, 100);

            const waiting = handle.waitForTerminal({ intervalMs: 5, signal: controller.signal });
            controller.abort(new Error('scheduler stopping'));

            await expect(waiting).rejects.toThrow('scheduler stopping');
        });
    });
});
