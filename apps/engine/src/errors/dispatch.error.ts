// Submission to the broker failed. The executor requeues the entry;
// only a run of consecutive failures escalates to ExecutorFatalError.
export class DispatchError extends Error {
    constructor(message: string, cause: unknown) {
        super(message, { cause });
        this.name = 'DispatchError';
    }
}
