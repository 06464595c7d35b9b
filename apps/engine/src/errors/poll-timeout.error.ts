export class PollTimeoutError extends Error {
    constructor(
        public readonly token: string,
        public readonly timeoutMs: number,
    ) {
        super(`State lookup for ${token} timed out after ${timeoutMs}ms`);
        this.name = 'PollTimeoutError';
    }
}
