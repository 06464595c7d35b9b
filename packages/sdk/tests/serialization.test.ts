import {
    serialize,
    deserialize,
    encodeMessage,
    decodeMessage,
    encodeResult,
    decodeResult,
    SerializationError,
} from '../src/utils/serialization';
import { createTaskKey } from '../src/task-key';
import { TaskMessage } from '../src/types';

describe('Serialization Utils', () => {
    test('should serialize and deserialize primitives', () => {
        expect(deserialize(serialize(123))).toBe(123);
        expect(deserialize(serialize('hello'))).toBe('hello');
        expect(deserialize(serialize(true))).toBe(true);
        expect(deserialize(serialize(null))).toBe(null);
    });

    test('should enforce 1MB size limit', () => {
        const largeString = 'a'.repeat(1024 * 1024 + 1); // > 1MB
        expect(() => serialize(largeString)).toThrow(SerializationError);
        expect(() => serialize(largeString)).toThrow(/Payload size exceeds maximum limit/);
    });

    test('should reject empty and non-JSON payloads', () => {
        expect(() => deserialize('')).toThrow('Failed to deserialize data: empty payload');
        expect(() => deserialize('{not json')).toThrow(/^Failed to deserialize data/);
    });
});

describe('task message codec', () => {
    const message: TaskMessage = {
        id: '0190a1b2-0000-7000-8000-000000000001',
        key: createTaskKey('nightly', 'load', '2024-01-01T00:00:00Z', 2),
        command: ['taskfleet', 'tasks', 'run', 'nightly', 'load'],
        queue: 'default',
        sentAt: '2024-01-01T00:00:05.000Z',
    };

    test('decodes what it encodes', () => {
        expect(decodeMessage(encodeMessage(message))).toEqual(message);
    });

    test('rejects a message missing fields', () => {
        expect(() => decodeMessage(serialize({ id: 'x', queue: 'default' }))).toThrow('Malformed task message');
    });

    test('rejects a command that is not a list of strings', () => {
        expect(() => decodeMessage(serialize({ ...message, command: ['ok', 3] }))).toThrow(SerializationError);
    });
});

describe('result record codec', () => {
    test('keeps optional fields only when present', () => {
        const bare = decodeResult(encodeResult({ state: 'success', updatedAt: '2024-01-01T00:00:00.000Z' }));
        expect(bare).toEqual({ state: 'success', updatedAt: '2024-01-01T00:00:00.000Z' });
        expect('info' in bare).toBe(false);

        const full = decodeResult(encodeResult({
            state: 'failed',
            info: 'exit code 1',
            workerId: 'worker-1',
            updatedAt: '2024-01-01T00:00:00.000Z',
        }));
        expect(full.info).toBe('exit code 1');
        expect(full.workerId).toBe('worker-1');
    });

    test('rejects records with a non-string state', () => {
        expect(() => decodeResult(serialize({ state: 1, updatedAt: 'x' }))).toThrow('Malformed result record');
        expect(() => decodeResult(serialize({ state: 'failed', updatedAt: 'x', info: 42 }))).toThrow('Malformed result record');
    });
});
