// public api for @taskfleet/engine
// usage:
//   import { createDistributedExecutor, createHeartbeat, loadConfig } from '@taskfleet/engine';
//   const config = loadConfig();
//   const executor = await createDistributedExecutor(config);
//   executor.queueTaskInstance(key, { pool: 'etl' });
//   const heartbeat = createHeartbeat(executor, config, { onEvents: (outcomes) => scheduler.apply(outcomes) });
//   heartbeat.start();

import { createBroker } from '../broker';
import { EngineConfig } from '../config';
import { HeartbeatConfig, HeartbeatService } from '../services/heartbeat.service';
import { DistributedExecutor } from './distributed-executor';
import { Executor } from './types';

export { BaseExecutor, TASK_SEND_ERR_MSG_HEADER } from './base-executor';
export type { BaseExecutorOptions } from './base-executor';
export { DistributedExecutor, TASK_FETCH_ERR_MSG_HEADER } from './distributed-executor';
export type { DistributedExecutorOptions } from './distributed-executor';
export { EventBuffer } from './event-buffer';
export type { Executor, ShutdownOptions } from './types';
export { HeartbeatService } from '../services/heartbeat.service';
export type { HeartbeatConfig } from '../services/heartbeat.service';
export { RemoteTaskHandle } from '../broker/remote-task-handle';
export type { MessageBroker, ResultBackend } from '../broker/types';
export { loadConfig } from '../config';
export type { EngineConfig } from '../config';
export * from '../errors';

export async function createDistributedExecutor(config: EngineConfig): Promise<DistributedExecutor> {
    const broker = await createBroker(config);
    return new DistributedExecutor(broker, config);
}

/** Heartbeat driver ticking at `config.heartbeatIntervalMs`. */
export function createHeartbeat(
    executor: Executor,
    config: Pick<EngineConfig, 'heartbeatIntervalMs'>,
    handlers: Omit<HeartbeatConfig, 'intervalMs'>,
): HeartbeatService {
    return new HeartbeatService(executor, { ...handlers, intervalMs: config.heartbeatIntervalMs });
}
