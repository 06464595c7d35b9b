export { TaskWorker } from './task-worker';
export type { TaskWorkerConfig } from './task-worker';
export { runCommand } from './command-runner';
export type { CommandRunner, RunOptions } from './command-runner';
