import { Command, ResultRecord, TaskInstanceKey } from '@taskfleet/sdk';

export interface SubmitOptions {
    key: TaskInstanceKey;
    queue: string;
}

/**
 * Transport the executor dispatches through. Implementations may throw
 * freely; the executor wraps submission failures in DispatchError and
 * turns lookup failures into per-task outcomes.
 */
export interface MessageBroker {
    /** Enqueues the command and returns the correlation token for later lookups. */
    submit(command: Command, options: SubmitOptions): Promise<string>;
    /** Raw state record for a token; shape is validated by the caller. */
    fetchState(token: string): Promise<unknown>;
    /** Asks workers not to run the token. Optional: not every transport can. */
    revoke?(token: string): Promise<void>;
    close(): Promise<void>;
}

/** Where workers write task state and the broker reads it back. */
export interface ResultBackend {
    get(token: string): Promise<ResultRecord | null>;
    store(token: string, record: ResultRecord): Promise<void>;
    close(): Promise<void>;
}
