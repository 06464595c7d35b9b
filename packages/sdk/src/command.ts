import { Command, TaskInstanceKey } from './types';

export const COMMAND_EXECUTABLE = 'taskfleet';

/**
 * Execution context a scheduler attaches to a task instance.
 * Every field maps to one flag of the worker-side `taskfleet tasks run` command.
 */
export interface ExecutionContext {
    /** Run through the local supervisor rather than raw. Defaults to true. */
    local?: boolean;
    raw?: boolean;
    pool?: string;
    /** Directory or file the worker loads the workflow definition from. */
    subdir?: string;
    markSuccess?: boolean;
    ignoreAllDeps?: boolean;
    ignoreDependsOnPast?: boolean;
    ignoreTaskDeps?: boolean;
    force?: boolean;
    jobId?: string | number;
    pickleId?: string | number;
    cfgPath?: string;
}

export type CommandBuilder = (key: TaskInstanceKey, context?: ExecutionContext) => Command;

/**
 * Pure: identical (key, context) always yields an identical argv.
 * Flags are emitted in a fixed order regardless of how `context` was built.
 *
 * @example
 * buildCommand(key, { pool: 'etl' })
 * // ['taskfleet', 'tasks', 'run', 'nightly', 'load', '2024-01-01T00:00:00.000Z',
 * //  '--attempt', '1', '--local', '--pool', 'etl']
 */
export const buildCommand: CommandBuilder = (key, context = {}) => {
    const argv: string[] = [
        COMMAND_EXECUTABLE, 'tasks', 'run',
        key.workflowId,
        key.taskId,
        key.logicalTimestamp,
        '--attempt', String(key.attempt),
    ];

    if (context.local ?? true) argv.push('--local');
    if (context.raw) argv.push('--raw');
    if (context.pool) argv.push('--pool', context.pool);
    if (context.subdir) argv.push('--subdir', context.subdir);
    if (context.markSuccess) argv.push('--mark-success');
    if (context.ignoreAllDeps) argv.push('--ignore-all-deps');
    if (context.ignoreDependsOnPast) argv.push('--ignore-depends-on-past');
    if (context.ignoreTaskDeps) argv.push('--ignore-task-deps');
    if (context.force) argv.push('--force');
    if (context.jobId !== undefined) argv.push('--job-id', String(context.jobId));
    if (context.pickleId !== undefined) argv.push('--pickle', String(context.pickleId));
    if (context.cfgPath) argv.push('--cfg-path', context.cfgPath);

    return Object.freeze(argv);
};
