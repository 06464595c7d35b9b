import superjson from 'superjson';
import { isTaskInstanceKey } from '../task-key';
import { ResultRecord, TaskMessage } from '../types';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown): string {
    try {
        const stringified = superjson.stringify(value);

        if (Buffer.byteLength(stringified) > MAX_PAYLOAD_SIZE) {
            throw new SerializationError(
                `Payload size exceeds maximum limit of 1MB. Current size: ${(Buffer.byteLength(stringified) / 1024 / 1024).toFixed(2)}MB`
            );
        }

        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize(value: string): unknown {
    if (value.trim() === '') {
        throw new SerializationError('Failed to deserialize data: empty payload');
    }

    try {
        return superjson.parse<unknown>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isOptionalString(value: unknown): value is string | undefined {
    return value === undefined || typeof value === 'string';
}

export function encodeMessage(message: TaskMessage): string {
    return serialize(message);
}

export function decodeMessage(raw: string): TaskMessage {
    const value = deserialize(raw);
    if (
        typeof value !== 'object' || value === null
        || !('id' in value) || typeof value.id !== 'string'
        || !('key' in value) || !isTaskInstanceKey(value.key)
        || !('command' in value) || !isStringArray(value.command)
        || !('queue' in value) || typeof value.queue !== 'string'
        || !('sentAt' in value) || typeof value.sentAt !== 'string'
    ) {
        throw new SerializationError('Malformed task message');
    }
    return { id: value.id, key: value.key, command: value.command, queue: value.queue, sentAt: value.sentAt };
}

export function encodeResult(record: ResultRecord): string {
    return serialize(record);
}

export function decodeResult(raw: string): ResultRecord {
    const value = deserialize(raw);
    if (
        typeof value !== 'object' || value === null
        || !('state' in value) || typeof value.state !== 'string'
        || !('updatedAt' in value) || typeof value.updatedAt !== 'string'
    ) {
        throw new SerializationError('Malformed result record');
    }

    const info = 'info' in value ? value.info : undefined;
    const workerId = 'workerId' in value ? value.workerId : undefined;
    if (!isOptionalString(info) || !isOptionalString(workerId)) {
        throw new SerializationError('Malformed result record');
    }

    const record: ResultRecord = { state: value.state, updatedAt: value.updatedAt };
    if (info !== undefined) record.info = info;
    if (workerId !== undefined) record.workerId = workerId;
    return record;
}
