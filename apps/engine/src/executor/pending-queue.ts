import { PendingEntry } from './types';

/**
 * Work accepted by queue() but not yet dispatched, kept in dispatch order:
 * higher priority first, then enqueue order. Requeued entries go to the very tail.
 */
export class PendingQueue {
    private entries: PendingEntry[] = [];

    get size(): number {
        return this.entries.length;
    }

    has(id: string): boolean {
        return this.entries.some(e => e.id === id);
    }

    push(entry: PendingEntry): void {
        // after the last entry of equal or higher priority
        let index = this.entries.length;
        while (index > 0 && this.entries[index - 1].priority < entry.priority) index--;
        this.entries.splice(index, 0, entry);
    }

    requeue(id: string): boolean {
        const entry = this.remove(id);
        if (!entry) return false;
        this.entries.push(entry);
        return true;
    }

    remove(id: string): PendingEntry | undefined {
        const index = this.entries.findIndex(e => e.id === id);
        if (index === -1) return undefined;
        const [entry] = this.entries.splice(index, 1);
        return entry;
    }

    snapshot(): readonly PendingEntry[] {
        return [...this.entries];
    }
}
