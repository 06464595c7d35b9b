import { RedisQueueCommands } from '../../src/broker/redis-task-queue';
import { RedisResultCommands } from '../../src/repositories/redis-result.repository';

/** Just enough of Redis lists and expiring strings for the queue and result repository. */
export class FakeRedis implements RedisQueueCommands, RedisResultCommands {
    readonly lists = new Map<string, string[]>();
    readonly strings = new Map<string, { value: string; ttlSeconds: number }>();
    quitCalled = false;

    async lpush(key: string, value: string): Promise<number> {
        const list = this.lists.get(key) ?? [];
        list.unshift(value);
        this.lists.set(key, list);
        return list.length;
    }

    async rpop(key: string): Promise<string | null> {
        return this.lists.get(key)?.pop() ?? null;
    }

    async get(key: string): Promise<string | null> {
        return this.strings.get(key)?.value ?? null;
    }

    async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<'OK'> {
        this.strings.set(key, { value, ttlSeconds: seconds });
        return 'OK';
    }

    async del(key: string): Promise<number> {
        return this.strings.delete(key) ? 1 : 0;
    }

    async quit(): Promise<'OK'> {
        this.quitCalled = true;
        return 'OK';
    }
}
