import { TaskMessage, decodeMessage, encodeMessage, toErrorDetail, formatErrorDetail } from '@taskfleet/sdk';

const TAG = '[broker]';

export const QUEUE_KEY_PREFIX = 'taskfleet:queue:';
export const REVOKED_KEY_PREFIX = 'taskfleet:revoked:';

/** The part of an ioredis client the queue uses. */
export interface RedisQueueCommands {
    lpush(key: string, value: string): Promise<unknown>;
    rpop(key: string): Promise<string | null>;
    set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
    del(key: string): Promise<number>;
}

// FIFO per queue: producers LPUSH, workers RPOP.
export class RedisTaskQueue {
    constructor(
        private readonly redis: RedisQueueCommands,
        /** Revoke marks for tokens no worker pops again expire after this. */
        private readonly revokeTtlSeconds: number = 86400,
    ) { }

    async push(message: TaskMessage): Promise<void> {
        await this.redis.lpush(QUEUE_KEY_PREFIX + message.queue, encodeMessage(message));
    }

    /**
     * Pops the next message, trying `queues` in order. Undecodable messages
     * are logged and discarded: without a token there is nothing to report to.
     */
    async pop(queues: readonly string[]): Promise<TaskMessage | null> {
        for (const queue of queues) {
            for (;;) {
                const raw = await this.redis.rpop(QUEUE_KEY_PREFIX + queue);
                if (raw === null) break;
                try {
                    return decodeMessage(raw);
                } catch (err) {
                    console.error(`${TAG} dropping undecodable message on ${queue}: ${formatErrorDetail(toErrorDetail(err))}`);
                }
            }
        }
        return null;
    }

    async revoke(token: string): Promise<void> {
        await this.redis.set(REVOKED_KEY_PREFIX + token, '1', 'EX', this.revokeTtlSeconds);
    }

    /** True once for a revoked token; the mark is cleared as it is consumed. */
    async consumeRevoked(token: string): Promise<boolean> {
        return (await this.redis.del(REVOKED_KEY_PREFIX + token)) === 1;
    }
}
