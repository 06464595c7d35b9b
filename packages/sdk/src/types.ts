/**
 * Lifecycle states a dispatched task reports through the result backend.
 * Tasks progress: PENDING → RUNNING → SUCCESS/FAILED
 */
export enum taskState {
    PENDING = 'pending',
    RUNNING = 'running',
    SUCCESS = 'success',
    FAILED = 'failed',
}

export type TerminalState = taskState.SUCCESS | taskState.FAILED;

/**
 * Identity of one attempt of one task instance.
 * Immutable; use `taskKeyId()` wherever a map key is needed.
 */
export interface TaskInstanceKey {
    readonly workflowId: string;
    readonly taskId: string;
    readonly logicalTimestamp: string;  // ISO-8601, UTC
    readonly attempt: number;
}

/** Opaque argv handed to the worker. argv[0] is the executable. */
export type Command = readonly string[];

export interface ErrorDetail {
    name: string;
    message: string;
    stack?: string;
}

/**
 * Result of polling one remote task. Transport faults never escape a poll;
 * they arrive here as `lookup_error`.
 */
export type PollResult =
    | { kind: taskState.PENDING }
    | { kind: taskState.RUNNING }
    | { kind: taskState.SUCCESS }
    | { kind: taskState.FAILED; info?: string }
    | { kind: 'lookup_error'; error: ErrorDetail };

/** Terminal outcome handed back to the scheduler. */
export interface TaskEvent {
    key: TaskInstanceKey;
    state: TerminalState;
    info?: string | ErrorDetail;
}

/** Envelope pushed onto a broker queue. `id` doubles as the result token. */
export interface TaskMessage {
    id: string;
    key: TaskInstanceKey;
    command: Command;
    queue: string;
    sentAt: string;
}

/** What a worker writes to the result backend for a token. */
export interface ResultRecord {
    state: string;
    info?: string;
    workerId?: string;
    updatedAt: string;
}
