import { ErrorDetail, TaskInstanceKey, TerminalState } from '@taskfleet/sdk';
import { RemoteTaskHandle } from '../broker/remote-task-handle';
import { EventBuffer } from './event-buffer';
import { PendingQueue } from './pending-queue';
import { InFlightEntry, NonTerminalState, PendingEntry } from './types';

/**
 * Every table the executor keeps, behind one set of entry points.
 *
 * A queued key lives in exactly one of pending / in-flight until it resolves;
 * resolving removes it from in-flight and last-observed before the event is buffered.
 */
export class ExecutorState {
    private readonly pending = new PendingQueue();
    private readonly inFlight = new Map<string, InFlightEntry>();
    private readonly lastObserved = new Map<string, NonTerminalState>();
    readonly events = new EventBuffer();

    get pendingCount(): number {
        return this.pending.size;
    }

    has(id: string): boolean {
        return this.pending.has(id) || this.inFlight.has(id);
    }

    isPending(id: string): boolean {
        return this.pending.has(id);
    }

    /** With a handle, only true if that exact dispatch is still the live one. */
    isInFlight(id: string, handle?: RemoteTaskHandle): boolean {
        const entry = this.inFlight.get(id);
        return entry !== undefined && (handle === undefined || entry.handle === handle);
    }

    inFlightCount(queue?: string): number {
        if (queue === undefined) return this.inFlight.size;
        let count = 0;
        for (const entry of this.inFlight.values()) {
            if (entry.queue === queue) count++;
        }
        return count;
    }

    lastObservedState(id: string): NonTerminalState | undefined {
        return this.lastObserved.get(id);
    }

    enqueue(entry: PendingEntry): void {
        this.pending.push(entry);
    }

    pendingSnapshot(): readonly PendingEntry[] {
        return this.pending.snapshot();
    }

    inFlightSnapshot(): InFlightEntry[] {
        return Array.from(this.inFlight.values());
    }

    /** Moves a pending entry in flight. False if it left pending meanwhile (cancelled). */
    markDispatched(entry: PendingEntry, handle: RemoteTaskHandle): boolean {
        if (!this.pending.remove(entry.id)) return false;
        this.inFlight.set(entry.id, { id: entry.id, key: entry.key, queue: entry.queue, handle });
        return true;
    }

    requeue(id: string): boolean {
        return this.pending.requeue(id);
    }

    removePending(id: string): PendingEntry | undefined {
        return this.pending.remove(id);
    }

    /** Records a non-terminal state. Returns false when it repeats the last one. */
    observe(id: string, state: NonTerminalState): boolean {
        if (this.lastObserved.get(id) === state) return false;
        this.lastObserved.set(id, state);
        return true;
    }

    resolve(id: string, key: TaskInstanceKey, state: TerminalState, info?: string | ErrorDetail): InFlightEntry | undefined {
        const entry = this.inFlight.get(id);
        this.inFlight.delete(id);
        this.lastObserved.delete(id);
        this.events.put(key, state, info);
        return entry;
    }
}
