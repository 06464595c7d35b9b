import { ResultRecord, decodeResult, encodeResult } from '@taskfleet/sdk';
import { ResultBackend } from '../broker/types';

export const RESULT_KEY_PREFIX = 'taskfleet:result:';

/** The part of an ioredis client this repository uses. */
export interface RedisResultCommands {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
    quit(): Promise<unknown>;
}

export class RedisResultRepository implements ResultBackend {
    constructor(
        private readonly redis: RedisResultCommands,
        private readonly ttlSeconds: number = 86400,
    ) { }

    async get(token: string): Promise<ResultRecord | null> {
        const raw = await this.redis.get(RESULT_KEY_PREFIX + token);
        return raw === null ? null : decodeResult(raw);
    }

    async store(token: string, record: ResultRecord): Promise<void> {
        await this.redis.set(RESULT_KEY_PREFIX + token, encodeResult(record), 'EX', this.ttlSeconds);
    }

    async close(): Promise<void> {
        await this.redis.quit();
    }
}
