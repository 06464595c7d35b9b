import {
    Command,
    ExecutionContext,
    TaskEvent,
    TaskInstanceKey,
    buildCommand,
    formatTaskKey,
    formatErrorDetail,
    taskKeyId,
    taskState,
    toErrorDetail,
} from '@taskfleet/sdk';
import { RemoteTaskHandle } from '../broker/remote-task-handle';
import { DispatchError, DuplicateKeyError, ExecutorFatalError } from '../errors';
import { ExecutorState } from './executor-state';
import { Executor, PendingEntry, ShutdownOptions } from './types';

const TAG = '[executor]';

export const TASK_SEND_ERR_MSG_HEADER = 'Error sending task to broker';

export interface BaseExecutorOptions {
    /** Global in-flight budget. 0 means unbounded. */
    parallelism: number;
    /** Per-queue in-flight budgets; queues not listed are only bound globally. */
    queueParallelism?: Readonly<Record<string, number>>;
    /** Consecutive failed submissions tolerated before heartbeat() gives up. */
    maxDispatchFailures: number;
    defaultQueue: string;
}

/**
 * Queueing, budgets and event hand-off shared by every executor.
 * Subclasses decide how an entry is dispatched and how in-flight work is reconciled.
 */
export abstract class BaseExecutor implements Executor {
    protected readonly state = new ExecutorState();
    private readonly lifecycle = new AbortController();
    private consecutiveDispatchFailures = 0;
    private triggering: Promise<void> | null = null;
    private shuttingDown = false;

    constructor(protected readonly options: BaseExecutorOptions) {
        if (options.maxDispatchFailures < 1) {
            throw new RangeError('maxDispatchFailures must be at least 1');
        }
    }

    /** Aborts once shutdown starts; in-progress transport waits listen to it. */
    protected get signal(): AbortSignal {
        return this.lifecycle.signal;
    }

    protected get closing(): boolean {
        return this.shuttingDown;
    }

    protected beginShutdown(abort: boolean): void {
        this.shuttingDown = true;
        if (abort) this.lifecycle.abort(new ExecutorFatalError('Executor is shutting down'));
    }

    queue(key: TaskInstanceKey, command: Command, queueName: string = this.options.defaultQueue, priority: number = 0): void {
        this.assertOpen();
        // own copies: a caller mutating its objects later must not move the entry
        const owned: TaskInstanceKey = Object.freeze({
            workflowId: key.workflowId,
            taskId: key.taskId,
            logicalTimestamp: key.logicalTimestamp,
            attempt: key.attempt,
        });
        const id = taskKeyId(owned);
        if (this.state.has(id)) throw new DuplicateKeyError(owned);
        this.state.enqueue({ id, key: owned, command: Object.freeze([...command]), queue: queueName, priority });
    }

    queueTaskInstance(key: TaskInstanceKey, context?: ExecutionContext, queueName?: string, priority?: number): void {
        this.queue(key, buildCommand(key, context), queueName, priority);
    }

    hasTask(key: TaskInstanceKey): boolean {
        return this.state.has(taskKeyId(key));
    }

    isPending(key: TaskInstanceKey): boolean {
        return this.state.isPending(taskKeyId(key));
    }

    isInFlight(key: TaskInstanceKey): boolean {
        return this.state.isInFlight(taskKeyId(key));
    }

    lastObservedState(key: TaskInstanceKey): taskState | undefined {
        return this.state.lastObservedState(taskKeyId(key));
    }

    get pendingCount(): number {
        return this.state.pendingCount;
    }

    get inFlightCount(): number {
        return this.state.inFlightCount();
    }

    /** Open global slots; Infinity when unbounded. */
    get slots(): number {
        if (this.options.parallelism === 0) return Infinity;
        return Math.max(this.options.parallelism - this.state.inFlightCount(), 0);
    }

    drainEvents(workflowIds?: readonly string[]): Map<string, TaskEvent> {
        return this.state.events.drain(workflowIds);
    }

    async heartbeat(): Promise<void> {
        this.assertOpen();
        console.debug(`${TAG} ${this.slots} open slots, ${this.state.pendingCount} pending, ${this.state.inFlightCount()} in flight`);
        await this.triggerPending();
        await this.sync();
    }

    /** Dispatches pending entries while global and per-queue budgets allow. */
    triggerPending(): Promise<void> {
        if (this.triggering) return this.triggering;
        const pass = this.runTrigger().finally(() => {
            this.triggering = null;
        });
        this.triggering = pass;
        return pass;
    }

    /**
     * Withdraws a pending or in-flight key and records it FAILED ("cancelled").
     * Dispatched work is revoked on the broker where the transport allows.
     */
    async cancel(key: TaskInstanceKey): Promise<boolean> {
        const id = taskKeyId(key);

        if (this.state.removePending(id)) {
            this.state.events.put(key, taskState.FAILED, 'cancelled');
            return true;
        }

        if (!this.state.isInFlight(id)) return false;
        const entry = this.state.resolve(id, key, taskState.FAILED, 'cancelled');
        if (entry) await this.revokeQuietly(entry.handle, key);
        return true;
    }

    abstract sync(): Promise<void>;
    abstract shutdown(options?: ShutdownOptions): Promise<void>;

    /** Submits one entry. Any rejection is treated as a dispatch failure. */
    protected abstract dispatch(entry: PendingEntry): Promise<RemoteTaskHandle>;

    protected async revokeQuietly(handle: RemoteTaskHandle, key: TaskInstanceKey): Promise<void> {
        try {
            await handle.revoke();
        } catch (err) {
            console.warn(`${TAG} could not revoke ${formatTaskKey(key)}: ${formatErrorDetail(toErrorDetail(err))}`);
        }
    }

    private assertOpen(): void {
        if (this.closing) throw new ExecutorFatalError('Executor is shut down');
    }

    private hasQueueSlot(queue: string): boolean {
        const limit = this.options.queueParallelism?.[queue];
        return limit === undefined || this.state.inFlightCount(queue) < limit;
    }

    private async runTrigger(): Promise<void> {
        for (const entry of this.state.pendingSnapshot()) {
            if (this.signal.aborted || this.slots <= 0) return;
            if (!this.hasQueueSlot(entry.queue)) continue;
            if (!this.state.isPending(entry.id)) continue;

            let handle: RemoteTaskHandle;
            try {
                handle = await this.dispatch(entry);
            } catch (err) {
                this.onDispatchFailure(entry, err);
                continue;
            }

            this.consecutiveDispatchFailures = 0;
            if (!this.state.markDispatched(entry, handle)) {
                // cancelled while the submission was on the wire
                await this.revokeQuietly(handle, entry.key);
            }
        }
    }

    private onDispatchFailure(entry: PendingEntry, err: unknown): void {
        this.state.requeue(entry.id);
        if (this.signal.aborted) return;

        const error = err instanceof DispatchError ? err : new DispatchError(`Failed to dispatch ${formatTaskKey(entry.key)}`, err);
        const cause = error.cause === undefined ? toErrorDetail(error) : toErrorDetail(error.cause);
        this.consecutiveDispatchFailures++;

        console.warn(
            `${TAG} ${TASK_SEND_ERR_MSG_HEADER} for ${formatTaskKey(entry.key)}: ${formatErrorDetail(cause)} ` +
            `(${this.consecutiveDispatchFailures}/${this.options.maxDispatchFailures}), requeued`,
        );

        if (this.consecutiveDispatchFailures >= this.options.maxDispatchFailures) {
            console.error(`${TAG} giving up after ${this.consecutiveDispatchFailures} consecutive dispatch failures`);
            throw new ExecutorFatalError(
                `Broker unreachable: ${this.consecutiveDispatchFailures} consecutive dispatch failures`,
                error,
            );
        }
    }
}
