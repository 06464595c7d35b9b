import { v7 as uuid } from 'uuid';
import { Command } from '@taskfleet/sdk';
import { MessageBroker, ResultBackend, SubmitOptions } from './types';
import { RedisTaskQueue } from './redis-task-queue';

const TAG = '[broker]';

/**
 * Redis list broker. The message id is the result token: workers write
 * state for it to the result backend, the executor reads it back.
 */
export class RedisBroker implements MessageBroker {
    constructor(
        private readonly queue: RedisTaskQueue,
        private readonly results: ResultBackend,
        private readonly disconnect: () => Promise<void>,
    ) { }

    async submit(command: Command, options: SubmitOptions): Promise<string> {
        const id = uuid();
        await this.queue.push({
            id,
            key: options.key,
            command,
            queue: options.queue,
            sentAt: new Date().toISOString(),
        });
        return id;
    }

    async fetchState(token: string): Promise<unknown> {
        return this.results.get(token);
    }

    async revoke(token: string): Promise<void> {
        await this.queue.revoke(token);
    }

    async close(): Promise<void> {
        try {
            await this.results.close();
        } finally {
            await this.disconnect();
            console.log(`${TAG} closed`);
        }
    }
}
