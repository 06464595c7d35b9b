import { ConfigError } from '../errors';
import { createPool, createRedis } from '../db';
import { RedisResultRepository } from '../repositories/redis-result.repository';
import { TaskResultRepository } from '../repositories/task-result.repository';
import { RedisBroker } from './redis-broker';
import { RedisTaskQueue } from './redis-task-queue';
import { ResultBackend } from './types';

export { RedisBroker } from './redis-broker';
export { RedisTaskQueue } from './redis-task-queue';
export { RemoteTaskHandle, classifyRecord } from './remote-task-handle';
export type { WaitOptions } from './remote-task-handle';
export type { MessageBroker, ResultBackend, SubmitOptions } from './types';

export interface BrokerSettings {
    brokerUrl: string;
    resultBackendUrl: string;
    resultTtlSeconds: number;
}

/** Picks the backend from the URI scheme. Postgres backends get their table created. */
export async function createResultBackend(url: string, ttlSeconds: number): Promise<ResultBackend> {
    const scheme = new URL(url).protocol;

    switch (scheme) {
        case 'redis:':
        case 'rediss:':
            return new RedisResultRepository(createRedis(url), ttlSeconds);
        case 'postgres:':
        case 'postgresql:':
            return TaskResultRepository.open(createPool(url));
        default:
            throw new ConfigError(`Unsupported result backend scheme "${scheme}"`);
    }
}

export async function createBroker(settings: BrokerSettings): Promise<RedisBroker> {
    const redis = createRedis(settings.brokerUrl);
    let results: ResultBackend;
    try {
        results = await createResultBackend(settings.resultBackendUrl, settings.resultTtlSeconds);
    } catch (err) {
        redis.disconnect();
        throw err;
    }
    return new RedisBroker(new RedisTaskQueue(redis, settings.resultTtlSeconds), results, async () => {
        await redis.quit();
    });
}
