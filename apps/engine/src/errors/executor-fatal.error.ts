export class ExecutorFatalError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ExecutorFatalError';
    }
}
