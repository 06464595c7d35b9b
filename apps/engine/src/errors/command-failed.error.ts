export class CommandFailedError extends Error {
    constructor(
        public readonly exitCode: number | null,
        public readonly signal: NodeJS.Signals | null,
    ) {
        super(signal ? `Command terminated by signal ${signal}` : `Command exited with code ${exitCode}`);
        this.name = 'CommandFailedError';
    }
}
