/**
 * Connection factories for the broker (Redis) and the SQL result backend (Postgres).
 * Each caller owns what it creates and is responsible for closing it.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';
import { REDIS_RECONNECT_BACKOFF, backoffDelay } from '../utils/backoff';

const TAG = '[db]';

/** Redis client that reconnects with capped exponential backoff. */
export function createRedis(url: string): Redis {
    const redis = new Redis(url, {
        maxRetriesPerRequest: 3,
        retryStrategy: (times) => backoffDelay(times, REDIS_RECONNECT_BACKOFF),
    });
    redis.on('error', (err) => console.error(`${TAG} redis error:`, err));
    return redis;
}

/**
 * Postgres pool for result records:
 * - max: 10 connections (lookups are single-row reads)
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast so a poll turns into a lookup error)
 */
export function createPool(url: string): Pool {
    const pool = new Pool({
        connectionString: url,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
    pool.on('error', (err) => console.error(`${TAG} idle client error:`, err));
    return pool;
}
