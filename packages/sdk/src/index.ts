// public api for @taskfleet/sdk
// usage:
//   import { createTaskKey, buildCommand } from '@taskfleet/sdk';
//   const cmd = buildCommand(createTaskKey('nightly', 'load', new Date()), { pool: 'etl' });

export * from './types';
export { createTaskKey, taskKeyId, formatTaskKey, isTaskInstanceKey } from './task-key';
export { buildCommand, COMMAND_EXECUTABLE } from './command';
export type { CommandBuilder, ExecutionContext } from './command';
export { parseTaskState, isTerminal } from './state';
export { toErrorDetail, formatErrorDetail } from './errors';
export {
    serialize,
    deserialize,
    encodeMessage,
    decodeMessage,
    encodeResult,
    decodeResult,
    SerializationError,
} from './utils/serialization';
