import { ErrorDetail, TaskEvent, TaskInstanceKey, TerminalState, taskKeyId } from '@taskfleet/sdk';

/** Terminal outcomes waiting for the scheduler. Only drain() removes entries. */
export class EventBuffer {
    private events = new Map<string, TaskEvent>();

    get size(): number {
        return this.events.size;
    }

    has(key: TaskInstanceKey): boolean {
        return this.events.has(taskKeyId(key));
    }

    put(key: TaskInstanceKey, state: TerminalState, info?: string | ErrorDetail): void {
        const event: TaskEvent = info === undefined ? { key, state } : { key, state, info };
        this.events.set(taskKeyId(key), event);
    }

    /** Returns and clears buffered events, or only those of the given workflows. */
    drain(workflowIds?: readonly string[]): Map<string, TaskEvent> {
        if (workflowIds === undefined) {
            const drained = this.events;
            this.events = new Map();
            return drained;
        }

        const wanted = new Set(workflowIds);
        const drained = new Map<string, TaskEvent>();
        for (const [id, event] of this.events) {
            if (!wanted.has(event.key.workflowId)) continue;
            drained.set(id, event);
            this.events.delete(id);
        }
        return drained;
    }
}
