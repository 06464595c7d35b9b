export { DuplicateKeyError } from './duplicate-key.error';
export { DispatchError } from './dispatch.error';
export { ExecutorFatalError } from './executor-fatal.error';
export { PollTimeoutError } from './poll-timeout.error';
export { ConfigError } from './config.error';
export { CommandFailedError } from './command-failed.error';
