import {
    TaskMessage,
    formatErrorDetail,
    formatTaskKey,
    taskState,
    toErrorDetail,
} from '@taskfleet/sdk';
import { RedisTaskQueue } from '../broker/redis-task-queue';
import { ResultBackend } from '../broker/types';
import { BackoffPolicy, backoffDelay } from '../utils/backoff';
import { sleep } from '../utils/concurrency';
import { CommandRunner, runCommand } from './command-runner';

const TAG = '[worker]';

// Terminal states are retried: without one the executor would see the task as in flight forever
const TERMINAL_REPORT_ATTEMPTS = 3;
const TERMINAL_REPORT_BACKOFF: BackoffPolicy = { initialMs: 100, multiplier: 2, maxMs: 1000 };

export interface TaskWorkerConfig {
    workerId: string;
    queues: readonly string[];
    concurrency?: number;
    runCommand?: CommandRunner;
}

/**
 * Consumes task messages and runs their commands, reporting state to the result backend.
 * Polls with backoff while idle and stops polling while `concurrency` commands are running.
 */
export class TaskWorker {
    private interval = 100;
    private readonly minInterval = 100;
    private readonly maxInterval = 500;
    private readonly concurrency: number;
    private readonly run: CommandRunner;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly active = new Set<Promise<void>>();

    constructor(
        private readonly queue: Pick<RedisTaskQueue, 'pop' | 'push' | 'consumeRevoked'>,
        private readonly results: ResultBackend,
        private readonly config: TaskWorkerConfig,
    ) {
        this.concurrency = config.concurrency || 4;
        this.run = config.runCommand ?? runCommand;
    }

    get activeCount(): number {
        return this.active.size;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (worker: ${this.config.workerId}, queues: ${this.config.queues.join(', ')})`);
        void this.poll();
    }

    /** Stops taking new work and waits for running commands to finish. */
    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        await Promise.allSettled(this.active);
        console.log(`${TAG} stopped`);
    }

    /**
     * Pops and starts at most one message. Returns false when nothing was taken,
     * either because the queues are empty or the worker is saturated.
     */
    async pollOnce(): Promise<boolean> {
        if (this.active.size >= this.concurrency) return false;

        const message = await this.queue.pop(this.config.queues);
        if (!message) return false;

        const execution: Promise<void> = this.execute(message).finally(() => {
            this.active.delete(execution);
        });
        this.active.add(execution);
        return true;
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        if (this.active.size >= this.concurrency) {
            this.schedule(this.maxInterval);
            return;
        }

        try {
            if (await this.pollOnce()) {
                this.interval = this.minInterval;
                this.schedule(0);
                return;
            }
            // backoff: 100 -> 200 -> 400 -> 500ms cap
            this.interval = Math.min(this.interval * 2, this.maxInterval);
        } catch (err) {
            console.error(`${TAG} receive error:`, err);
            this.interval = this.maxInterval;
        }

        this.schedule(this.interval);
    }

    private schedule(delayMs: number): void {
        if (this.running) {
            this.currentTimeout = setTimeout(() => void this.poll(), delayMs);
        }
    }

    private async execute(message: TaskMessage): Promise<void> {
        const label = formatTaskKey(message.key);

        try {
            if (await this.queue.consumeRevoked(message.id)) {
                console.log(`${TAG} ${label} was revoked, skipping`);
                await this.reportTerminal(message.id, taskState.FAILED, 'revoked').catch(err => {
                    console.error(`${TAG} could not record revocation of ${label}:`, err);
                });
                return;
            }

            await this.report(message.id, taskState.RUNNING);
            console.log(`${TAG} running ${label}: ${message.command.join(' ')}`);
        } catch (err) {
            console.error(`${TAG} could not start ${label}:`, err);
            await this.abandon(message, err);
            return;
        }

        let outcome: taskState.SUCCESS | taskState.FAILED = taskState.SUCCESS;
        let info: string | undefined;
        try {
            await this.run(message.command);
        } catch (err) {
            outcome = taskState.FAILED;
            info = formatErrorDetail(toErrorDetail(err));
            console.error(`${TAG} ${label} failed: ${info}`);
        }

        try {
            await this.reportTerminal(message.id, outcome, info);
            if (outcome === taskState.SUCCESS) console.log(`${TAG} ${label} succeeded`);
        } catch (err) {
            console.error(`${TAG} could not record ${outcome} for ${label}:`, err);
        }
    }

    /**
     * A message that could not be started is recorded FAILED with the cause,
     * or put back on its queue when even that write fails.
     */
    private async abandon(message: TaskMessage, cause: unknown): Promise<void> {
        const label = formatTaskKey(message.key);
        try {
            await this.reportTerminal(message.id, taskState.FAILED, formatErrorDetail(toErrorDetail(cause)));
            return;
        } catch (err) {
            console.error(`${TAG} could not record failure for ${label}, requeueing:`, err);
        }

        try {
            await this.queue.push(message);
        } catch (err) {
            console.error(`${TAG} lost ${label}: requeue failed:`, err);
        }
    }

    private async reportTerminal(token: string, state: taskState.SUCCESS | taskState.FAILED, info?: string): Promise<void> {
        for (let attempt = 1; ; attempt++) {
            try {
                await this.report(token, state, info);
                return;
            } catch (err) {
                if (attempt >= TERMINAL_REPORT_ATTEMPTS) throw err;
                await sleep(backoffDelay(attempt, TERMINAL_REPORT_BACKOFF));
            }
        }
    }

    private async report(token: string, state: taskState, info?: string): Promise<void> {
        await this.results.store(token, {
            state,
            ...(info === undefined ? {} : { info }),
            workerId: this.config.workerId,
            updatedAt: new Date().toISOString(),
        });
    }
}
