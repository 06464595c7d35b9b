import { TaskInstanceKey } from './types';

export function createTaskKey(
    workflowId: string,
    taskId: string,
    logicalTimestamp: Date | string,
    attempt: number = 1,
): TaskInstanceKey {
    if (!workflowId) throw new Error('workflowId cannot be empty');
    if (!taskId) throw new Error('taskId cannot be empty');
    if (!Number.isInteger(attempt) || attempt < 1) {
        throw new Error(`attempt must be a positive integer, got ${attempt}`);
    }

    const date = logicalTimestamp instanceof Date ? logicalTimestamp : new Date(logicalTimestamp);
    if (Number.isNaN(date.getTime())) {
        throw new Error(`invalid logical timestamp: ${String(logicalTimestamp)}`);
    }

    return Object.freeze({
        workflowId,
        taskId,
        logicalTimestamp: date.toISOString(),
        attempt,
    });
}

// JSON array form keeps ids containing separators unambiguous
export function taskKeyId(key: TaskInstanceKey): string {
    return JSON.stringify([key.workflowId, key.taskId, key.logicalTimestamp, key.attempt]);
}

export function formatTaskKey(key: TaskInstanceKey): string {
    return `${key.workflowId}.${key.taskId}@${key.logicalTimestamp}#${key.attempt}`;
}

export function isTaskInstanceKey(value: unknown): value is TaskInstanceKey {
    return typeof value === 'object' && value !== null
        && 'workflowId' in value && typeof value.workflowId === 'string'
        && 'taskId' in value && typeof value.taskId === 'string'
        && 'logicalTimestamp' in value && typeof value.logicalTimestamp === 'string'
        && 'attempt' in value && typeof value.attempt === 'number';
}
