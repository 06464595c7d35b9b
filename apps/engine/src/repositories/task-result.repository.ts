import { ResultRecord, SerializationError } from '@taskfleet/sdk';
import { ResultBackend } from '../broker/types';
import { isTaskResultRow } from '../db/task-result.entity';

const TAG = '[db]';

/** The part of a pg Pool this repository uses. */
export interface SqlPool {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
    end(): Promise<void>;
}

export class TaskResultRepository implements ResultBackend {
    constructor(private readonly pool: SqlPool) { }

    /** Repository with its table in place. The pool is ended if that fails. */
    static async open(pool: SqlPool): Promise<TaskResultRepository> {
        const repo = new TaskResultRepository(pool);
        try {
            await repo.ensureSchema();
        } catch (err) {
            await pool.end().catch(endErr => console.error(`${TAG} could not end pool:`, endErr));
            throw err;
        }
        return repo;
    }

    async ensureSchema(): Promise<void> {
        await this.pool.query(
            `CREATE TABLE IF NOT EXISTS task_results (
                token       TEXT PRIMARY KEY,
                state       TEXT NOT NULL,
                info        TEXT,
                worker_id   TEXT,
                updated_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
            )`,
        );
    }

    async get(token: string): Promise<ResultRecord | null> {
        const res = await this.pool.query(
            'SELECT token, state, info, worker_id, updated_at FROM task_results WHERE token = $1',
            [token],
        );
        const row = res.rows[0];
        if (row === undefined) return null;
        if (!isTaskResultRow(row)) {
            throw new SerializationError(`Malformed task_results row for ${token}`);
        }

        const record: ResultRecord = {
            state: row.state,
            updatedAt: row.updated_at instanceof Date ? row.updated_at.toISOString() : row.updated_at,
        };
        if (row.info !== null) record.info = row.info;
        if (row.worker_id !== null) record.workerId = row.worker_id;
        return record;
    }

    async store(token: string, record: ResultRecord): Promise<void> {
        await this.pool.query(
            `INSERT INTO task_results (token, state, info, worker_id, updated_at)
             VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT (token) DO UPDATE
             SET state = EXCLUDED.state,
                 info = EXCLUDED.info,
                 worker_id = EXCLUDED.worker_id,
                 updated_at = EXCLUDED.updated_at`,
            [token, record.state, record.info ?? null, record.workerId ?? null, record.updatedAt],
        );
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
