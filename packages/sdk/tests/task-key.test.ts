import { createTaskKey, taskKeyId, formatTaskKey, isTaskInstanceKey } from '../src/task-key';

describe('createTaskKey', () => {
    test('normalizes the logical timestamp to ISO-8601 UTC', () => {
        const key = createTaskKey('nightly', 'load', '2024-03-01T10:00:00+02:00');
        expect(key.logicalTimestamp).toBe('2024-03-01T08:00:00.000Z');
        expect(key.attempt).toBe(1);
    });

    test('accepts a Date', () => {
        const key = createTaskKey('nightly', 'load', new Date(Date.UTC(2024, 0, 2)), 3);
        expect(key).toEqual({
            workflowId: 'nightly',
            taskId: 'load',
            logicalTimestamp: '2024-01-02T00:00:00.000Z',
            attempt: 3,
        });
    });

    test('returns a frozen value', () => {
        const key = createTaskKey('nightly', 'load', '2024-01-01T00:00:00Z');
        expect(Object.isFrozen(key)).toBe(true);
    });

    test('rejects invalid parts', () => {
        expect(() => createTaskKey('', 'load', '2024-01-01')).toThrow('workflowId cannot be empty');
        expect(() => createTaskKey('wf', '', '2024-01-01')).toThrow('taskId cannot be empty');
        expect(() => createTaskKey('wf', 'load', 'yesterday')).toThrow('invalid logical timestamp: yesterday');
        expect(() => createTaskKey('wf', 'load', '2024-01-01', 0)).toThrow('attempt must be a positive integer, got 0');
    });
});

describe('taskKeyId', () => {
    test('equal keys share an id', () => {
        const a = createTaskKey('wf', 'load', '2024-01-01T00:00:00Z');
        const b = createTaskKey('wf', 'load', new Date('2024-01-01T00:00:00Z'));
        expect(taskKeyId(a)).toBe(taskKeyId(b));
    });

    test('separators inside ids do not collide', () => {
        const a = createTaskKey('a.b', 'c', '2024-01-01T00:00:00Z');
        const b = createTaskKey('a', 'b.c', '2024-01-01T00:00:00Z');
        expect(taskKeyId(a)).not.toBe(taskKeyId(b));
        expect(formatTaskKey(a)).toBe('a.b.c@2024-01-01T00:00:00.000Z#1');
    });
});

describe('isTaskInstanceKey', () => {
    test('checks every field', () => {
        expect(isTaskInstanceKey(createTaskKey('wf', 't', '2024-01-01'))).toBe(true);
        expect(isTaskInstanceKey({ workflowId: 'wf', taskId: 't', logicalTimestamp: 'x' })).toBe(false);
        expect(isTaskInstanceKey(null)).toBe(false);
    });
});
