import { ErrorDetail, PollResult, isTerminal, parseTaskState, taskState, toErrorDetail } from '@taskfleet/sdk';
import { PollTimeoutError } from '../errors';
import { sleep, withTimeout } from '../utils/concurrency';
import { MessageBroker } from './types';

export interface WaitOptions {
    intervalMs?: number;
    /** Omit to wait until `signal` aborts. */
    timeoutMs?: number;
    signal?: AbortSignal;
}

function malformed(message: string): ErrorDetail {
    return { name: 'MalformedResultError', message };
}

/**
 * Closes the transport's answer into a PollResult.
 * No record means no worker has picked the task up yet.
 */
export function classifyRecord(raw: unknown): PollResult {
    if (raw === null || raw === undefined) return { kind: taskState.PENDING };

    if (typeof raw !== 'object' || !('state' in raw) || typeof raw.state !== 'string') {
        return { kind: 'lookup_error', error: malformed(`unexpected result shape: ${describe(raw)}`) };
    }

    const state = parseTaskState(raw.state);
    switch (state) {
        case taskState.PENDING:
            return { kind: taskState.PENDING };
        case taskState.RUNNING:
            return { kind: taskState.RUNNING };
        case taskState.SUCCESS:
            return { kind: taskState.SUCCESS };
        case taskState.FAILED: {
            const info = 'info' in raw && typeof raw.info === 'string' ? raw.info : undefined;
            return info === undefined ? { kind: taskState.FAILED } : { kind: taskState.FAILED, info };
        }
        default:
            return { kind: 'lookup_error', error: malformed(`unknown task state "${raw.state}"`) };
    }
}

function describe(raw: unknown): string {
    if (Array.isArray(raw)) return 'array';
    if (typeof raw === 'object' && raw !== null) return `object with keys [${Object.keys(raw).join(', ')}]`;
    return typeof raw;
}

/** One dispatched task on the broker, owned by the executor entry that created it. */
export class RemoteTaskHandle {
    constructor(
        readonly token: string,
        private readonly broker: Pick<MessageBroker, 'fetchState' | 'revoke'>,
        private readonly pollTimeoutMs: number,
    ) { }

    /** Never rejects; any failure comes back as lookup_error. */
    async poll(signal?: AbortSignal): Promise<PollResult> {
        try {
            const raw = await withTimeout(
                this.broker.fetchState(this.token),
                this.pollTimeoutMs,
                () => new PollTimeoutError(this.token, this.pollTimeoutMs),
                signal,
            );
            return classifyRecord(raw);
        } catch (err) {
            return { kind: 'lookup_error', error: toErrorDetail(err) };
        }
    }

    /** Returns false when the transport has no revoke. */
    async revoke(): Promise<boolean> {
        if (!this.broker.revoke) return false;
        await this.broker.revoke(this.token);
        return true;
    }

    /**
     * Polls until the task is terminal or its state cannot be read.
     * For callers outside the executor's sync pass; sync() only ever uses poll().
     */
    async waitForTerminal(options: WaitOptions = {}): Promise<PollResult> {
        const intervalMs = options.intervalMs ?? 500;
        const deadline = options.timeoutMs === undefined ? Infinity : Date.now() + options.timeoutMs;

        const throwIfAborted = () => {
            if (options.signal?.aborted) {
                throw options.signal.reason instanceof Error ? options.signal.reason : new Error('Wait aborted');
            }
        };

        for (;;) {
            throwIfAborted();
            const result = await this.poll(options.signal);
            throwIfAborted();
            if (result.kind === 'lookup_error' || isTerminal(result.kind)) return result;

            if (Date.now() + intervalMs > deadline) {
                throw new PollTimeoutError(this.token, options.timeoutMs ?? 0);
            }
            await sleep(intervalMs);
        }
    }
}
