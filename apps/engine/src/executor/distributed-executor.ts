import { PollResult, formatErrorDetail, formatTaskKey, taskState } from '@taskfleet/sdk';
import { RemoteTaskHandle } from '../broker/remote-task-handle';
import { MessageBroker } from '../broker/types';
import { DispatchError, ExecutorFatalError } from '../errors';
import { mapWithConcurrency, sleep, withTimeout } from '../utils/concurrency';
import { BaseExecutor, BaseExecutorOptions } from './base-executor';
import { InFlightEntry, PendingEntry, ShutdownOptions } from './types';

const TAG = '[executor]';

/** Fixed marker log scrapers alert on; every lookup error is logged with it. */
export const TASK_FETCH_ERR_MSG_HEADER = 'Error fetching task state';

// How long shutdown(wait=false) gives each revoke before moving on
const REVOKE_GRACE_MS = 1000;

export interface DistributedExecutorOptions extends BaseExecutorOptions {
    /** State lookups run concurrently during one sync pass. */
    syncParallelism: number;
    pollTimeoutMs: number;
    sendTimeoutMs: number;
    shutdownTimeoutMs: number;
    /** Pause between sync passes while shutdown(wait=true) drains. */
    shutdownPollIntervalMs?: number;
}

/**
 * Executor on top of a MessageBroker.
 *
 * Dispatch hands each command to the broker and keeps the returned handle in
 * flight. sync() polls every in-flight handle, fanned out over
 * `syncParallelism` lanes, and only after all polls settle applies the results
 * to the tables. A lookup that fails resolves that one key as FAILED and is
 * logged under TASK_FETCH_ERR_MSG_HEADER; the rest of the pass is unaffected.
 */
export class DistributedExecutor extends BaseExecutor {
    private syncing: Promise<void> | null = null;
    private shutdownPass: Promise<void> | null = null;

    constructor(
        private readonly broker: MessageBroker,
        private readonly config: DistributedExecutorOptions,
    ) {
        super(config);
        if (config.pollTimeoutMs <= 0) throw new RangeError('pollTimeoutMs must be positive');
        if (config.syncParallelism < 1) throw new RangeError('syncParallelism must be at least 1');
    }

    /** Concurrent callers share the pass already running. */
    sync(): Promise<void> {
        if (this.syncing) return this.syncing;
        const pass = this.runSync().finally(() => {
            this.syncing = null;
        });
        this.syncing = pass;
        return pass;
    }

    /**
     * Every call returns the same shutdown. A wait=false call made while a
     * wait=true shutdown is draining aborts the drain and revokes what is in flight.
     */
    shutdown(options: ShutdownOptions = { wait: true }): Promise<void> {
        if (this.shutdownPass) {
            if (!options.wait && !this.signal.aborted) {
                console.log(`${TAG} forcing shutdown`);
                this.beginShutdown(true);
            }
            return this.shutdownPass;
        }
        this.shutdownPass = this.runShutdown(options);
        return this.shutdownPass;
    }

    protected async dispatch(entry: PendingEntry): Promise<RemoteTaskHandle> {
        try {
            const token = await withTimeout(
                this.broker.submit(entry.command, { key: entry.key, queue: entry.queue }),
                this.config.sendTimeoutMs,
                () => new Error(`Submission timed out after ${this.config.sendTimeoutMs}ms`),
                this.signal,
            );
            return new RemoteTaskHandle(token, this.broker, this.config.pollTimeoutMs);
        } catch (err) {
            throw new DispatchError(`Failed to submit ${formatTaskKey(entry.key)} to queue "${entry.queue}"`, err);
        }
    }

    private async runSync(): Promise<void> {
        const entries = this.state.inFlightSnapshot();
        if (entries.length === 0) return;

        const signal = this.signal;
        const polled = await mapWithConcurrency(
            entries,
            this.config.syncParallelism,
            async (entry) => ({ entry, result: await entry.handle.poll(signal) }),
            signal,
        );

        if (signal.aborted) {
            throw new ExecutorFatalError('Executor shut down during sync', signal.reason);
        }

        for (const { entry, result } of polled) {
            this.reconcile(entry, result);
        }
    }

    private reconcile(entry: InFlightEntry, result: PollResult): void {
        // cancelled while its poll was out
        if (!this.state.isInFlight(entry.id, entry.handle)) return;

        switch (result.kind) {
            case taskState.PENDING:
            case taskState.RUNNING:
                if (this.state.observe(entry.id, result.kind)) {
                    console.debug(`${TAG} ${formatTaskKey(entry.key)} is ${result.kind}`);
                }
                return;
            case taskState.SUCCESS:
                this.state.resolve(entry.id, entry.key, taskState.SUCCESS);
                console.log(`${TAG} ${formatTaskKey(entry.key)} succeeded`);
                return;
            case taskState.FAILED:
                this.state.resolve(entry.id, entry.key, taskState.FAILED, result.info);
                console.log(`${TAG} ${formatTaskKey(entry.key)} failed${result.info ? `: ${result.info}` : ''}`);
                return;
            case 'lookup_error':
                console.error(`${TAG} ${TASK_FETCH_ERR_MSG_HEADER} for ${formatTaskKey(entry.key)}: ${formatErrorDetail(result.error)}`);
                this.state.resolve(entry.id, entry.key, taskState.FAILED, result.error);
                return;
        }
    }

    private async runShutdown(options: ShutdownOptions): Promise<void> {
        this.beginShutdown(!options.wait);
        console.log(`${TAG} shutting down (${options.wait ? 'waiting for' : 'revoking'} ${this.inFlightCount} in flight)`);

        try {
            if (options.wait) {
                try {
                    await this.drain(options.timeoutMs ?? this.config.shutdownTimeoutMs);
                } catch (err) {
                    // a forced shutdown aborts the pass the drain was waiting on
                    if (!this.signal.aborted) throw err;
                }
            }
            if (this.signal.aborted) await this.revokeInFlight();
        } finally {
            await this.broker.close();
            console.log(`${TAG} shutdown complete`);
        }
    }

    private async drain(timeoutMs: number): Promise<void> {
        const deadline = Date.now() + timeoutMs;
        const interval = this.config.shutdownPollIntervalMs ?? 1000;
        const outstanding = () => this.state.pendingCount + this.state.inFlightCount();

        while (outstanding() > 0 && !this.signal.aborted) {
            await this.triggerPending();
            await this.sync();
            if (outstanding() === 0) return;

            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                console.warn(
                    `${TAG} shutdown timed out after ${timeoutMs}ms with ` +
                    `${this.state.pendingCount} pending and ${this.state.inFlightCount()} in flight`,
                );
                return;
            }
            await sleep(Math.min(interval, remaining), this.signal);
        }
    }

    private async revokeInFlight(): Promise<void> {
        const entries = this.state.inFlightSnapshot();
        await Promise.all(entries.map(entry =>
            withTimeout(
                this.revokeQuietly(entry.handle, entry.key),
                REVOKE_GRACE_MS,
                () => new Error(`Revoke timed out after ${REVOKE_GRACE_MS}ms`),
            ).catch(err => console.warn(`${TAG} ${formatTaskKey(entry.key)}: ${err instanceof Error ? err.message : String(err)}`)),
        ));
    }
}
