import { TaskInstanceKey, formatTaskKey } from '@taskfleet/sdk';

export class DuplicateKeyError extends Error {
    constructor(public readonly key: TaskInstanceKey) {
        super(`Task ${formatTaskKey(key)} is already queued or running`);
        this.name = 'DuplicateKeyError';
    }
}
