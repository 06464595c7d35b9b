import { TaskEvent } from '@taskfleet/sdk';
import { ExecutorFatalError } from '../errors';
import { Executor } from '../executor/types';

const TAG = '[heartbeat]';

export interface HeartbeatConfig {
    intervalMs?: number;
    /** Receives each non-empty batch of terminal outcomes. A batch it rejects is offered again next tick. */
    onEvents: (events: Map<string, TaskEvent>) => void | Promise<void>;
    /** Called once when the executor reports a fatal error; the loop has stopped by then. */
    onFatal?: (err: ExecutorFatalError) => void;
}

/**
 * Drives an executor on a fixed period on behalf of the scheduler.
 * Ticks never overlap: a slow heartbeat delays the next one.
 */
export class HeartbeatService {
    readonly intervalMs: number;
    private intervalHandle: NodeJS.Timeout | null = null;
    private ticking = false;
    private undelivered = new Map<string, TaskEvent>();

    constructor(
        private readonly executor: Executor,
        private readonly config: HeartbeatConfig,
    ) {
        this.intervalMs = config.intervalMs ?? 5000;
    }

    start(): void {
        if (this.intervalHandle) {
            console.warn(`${TAG} already running`);
            return;
        }

        console.log(`${TAG} started (interval: ${this.intervalMs}ms)`);
        this.intervalHandle = setInterval(() => {
            void this.tick();
        }, this.intervalMs);
        void this.tick();
    }

    stop(): void {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
            console.log(`${TAG} stopped`);
        }
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    /** One heartbeat plus event hand-off. Exposed for callers that drive it themselves. */
    async tick(): Promise<void> {
        if (this.ticking) return;
        this.ticking = true;

        try {
            await this.executor.heartbeat();
            await this.deliver();
        } catch (err) {
            if (err instanceof ExecutorFatalError) {
                console.error(`${TAG} executor failed, stopping:`, err);
                this.stop();
                this.config.onFatal?.(err);
                return;
            }
            console.error(`${TAG} tick failed:`, err);
        } finally {
            this.ticking = false;
        }
    }

    /** Returns and clears outcomes that onEvents has not accepted yet, e.g. after a fatal stop. */
    takeUndelivered(): Map<string, TaskEvent> {
        const events = this.undelivered;
        this.undelivered = new Map();
        return events;
    }

    private async deliver(): Promise<void> {
        // newer outcomes for the same key replace held-back ones
        for (const [id, event] of this.executor.drainEvents()) this.undelivered.set(id, event);
        if (this.undelivered.size === 0) return;

        const batch = this.takeUndelivered();
        try {
            await this.config.onEvents(batch);
        } catch (err) {
            this.undelivered = new Map(batch);
            throw err;
        }
    }
}
