import os from 'os';
import { ConfigError } from './errors';

export interface EngineConfig {
    brokerUrl: string;
    resultBackendUrl: string;
    resultTtlSeconds: number;
    parallelism: number;
    queueParallelism: Readonly<Record<string, number>>;
    syncParallelism: number;
    maxDispatchFailures: number;
    pollTimeoutMs: number;
    sendTimeoutMs: number;
    defaultQueue: string;
    shutdownTimeoutMs: number;
    heartbeatIntervalMs: number;
    workerQueues: readonly string[];
    workerConcurrency: number;
}

type Env = Readonly<Record<string, string | undefined>>;

const SUPPORTED_BROKER_SCHEMES = ['redis:', 'rediss:'];
const SUPPORTED_BACKEND_SCHEMES = ['redis:', 'rediss:', 'postgres:', 'postgresql:'];

function readInt(env: Env, name: string, fallback: number, min: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    if (!/^-?\d+$/.test(raw.trim())) {
        throw new ConfigError(`${name} must be an integer, got "${raw}"`);
    }
    const value = parseInt(raw, 10);
    if (value < min) {
        throw new ConfigError(`${name} must be >= ${min}, got ${value}`);
    }
    return value;
}

function readUrl(env: Env, name: string, fallback: string, schemes: readonly string[]): string {
    const raw = env[name]?.trim() || fallback;
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new ConfigError(`${name} is not a valid URI: "${raw}"`);
    }
    if (!schemes.includes(url.protocol)) {
        throw new ConfigError(`${name} has unsupported scheme "${url.protocol}" (expected one of ${schemes.join(', ')})`);
    }
    return raw;
}

function readList(env: Env, name: string, fallback: readonly string[]): readonly string[] {
    const raw = env[name];
    if (!raw) return fallback;
    const items = raw.split(',').map(s => s.trim()).filter(Boolean);
    return items.length > 0 ? items : fallback;
}

/** Parses "default=8,gpu=2" into per-queue budgets. */
export function parseQueueParallelism(raw: string | undefined): Record<string, number> {
    const budgets: Record<string, number> = {};
    if (!raw) return budgets;

    for (const part of raw.split(',').map(s => s.trim()).filter(Boolean)) {
        const match = /^([^=\s]+)\s*=\s*(\d+)$/.exec(part);
        if (!match) {
            throw new ConfigError(`TASKFLEET_QUEUE_PARALLELISM entry "${part}" must look like queue=n`);
        }
        const limit = parseInt(match[2], 10);
        if (limit < 1) {
            throw new ConfigError(`TASKFLEET_QUEUE_PARALLELISM for "${match[1]}" must be >= 1`);
        }
        budgets[match[1]] = limit;
    }
    return budgets;
}

/**
 * Reads the engine configuration from `env` (process.env by default).
 * Call once at startup and pass the result down; nothing reads env later.
 */
export function loadConfig(env: Env = process.env): EngineConfig {
    const brokerUrl = readUrl(env, 'TASKFLEET_BROKER_URL', 'redis://localhost:6379/0', SUPPORTED_BROKER_SCHEMES);
    const defaultQueue = env.TASKFLEET_DEFAULT_QUEUE?.trim() || 'default';

    return Object.freeze({
        brokerUrl,
        resultBackendUrl: readUrl(env, 'TASKFLEET_RESULT_BACKEND_URL', brokerUrl, SUPPORTED_BACKEND_SCHEMES),
        resultTtlSeconds: readInt(env, 'TASKFLEET_RESULT_TTL_SECONDS', 86400, 1),
        parallelism: readInt(env, 'TASKFLEET_PARALLELISM', 32, 0),
        queueParallelism: Object.freeze(parseQueueParallelism(env.TASKFLEET_QUEUE_PARALLELISM)),
        syncParallelism: readInt(env, 'TASKFLEET_SYNC_PARALLELISM', Math.max(1, os.cpus().length - 1), 1),
        maxDispatchFailures: readInt(env, 'TASKFLEET_MAX_DISPATCH_FAILURES', 5, 1),
        pollTimeoutMs: readInt(env, 'TASKFLEET_POLL_TIMEOUT_MS', 2000, 1),
        sendTimeoutMs: readInt(env, 'TASKFLEET_SEND_TIMEOUT_MS', 2000, 1),
        defaultQueue,
        shutdownTimeoutMs: readInt(env, 'TASKFLEET_SHUTDOWN_TIMEOUT_MS', 60000, 0),
        heartbeatIntervalMs: readInt(env, 'TASKFLEET_HEARTBEAT_INTERVAL_MS', 5000, 1),
        workerQueues: Object.freeze([...readList(env, 'TASKFLEET_WORKER_QUEUES', [defaultQueue])]),
        workerConcurrency: readInt(env, 'TASKFLEET_WORKER_CONCURRENCY', 4, 1),
    });
}
