/**
 * Row of the `task_results` table. One row per dispatched token,
 * overwritten as the worker moves the task through its states.
 */
export interface TaskResultEntity {
    token: string;
    state: string;
    info: string | null;
    worker_id: string | null;
    updated_at: Date | string;
}

export function isTaskResultRow(row: unknown): row is TaskResultEntity {
    return typeof row === 'object' && row !== null
        && 'token' in row && typeof row.token === 'string'
        && 'state' in row && typeof row.state === 'string'
        && 'info' in row && (row.info === null || typeof row.info === 'string')
        && 'worker_id' in row && (row.worker_id === null || typeof row.worker_id === 'string')
        && 'updated_at' in row && (row.updated_at instanceof Date || typeof row.updated_at === 'string');
}
