import { Command, TaskEvent, TaskInstanceKey, taskState } from '@taskfleet/sdk';
import { RemoteTaskHandle } from '../broker/remote-task-handle';

export interface PendingEntry {
    id: string;  // taskKeyId(key)
    key: TaskInstanceKey;
    command: Command;
    queue: string;
    priority: number;
}

export interface InFlightEntry {
    id: string;
    key: TaskInstanceKey;
    queue: string;
    handle: RemoteTaskHandle;
}

export interface ShutdownOptions {
    /** Wait for in-flight work to finish (bounded by timeoutMs) instead of revoking it. */
    wait: boolean;
    timeoutMs?: number;
}

/**
 * What the scheduler sees. heartbeat() only rejects for executor-wide
 * failures; everything that goes wrong with one task ends up in drainEvents().
 */
export interface Executor {
    queue(key: TaskInstanceKey, command: Command, queueName?: string, priority?: number): void;
    triggerPending(): Promise<void>;
    sync(): Promise<void>;
    heartbeat(): Promise<void>;
    drainEvents(workflowIds?: readonly string[]): Map<string, TaskEvent>;
    shutdown(options?: ShutdownOptions): Promise<void>;
    hasTask(key: TaskInstanceKey): boolean;
}

export type NonTerminalState = taskState.PENDING | taskState.RUNNING;
