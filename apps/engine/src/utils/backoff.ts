export interface BackoffPolicy {
    initialMs: number;
    multiplier: number;
    maxMs: number;
    /** Fraction of the delay added or removed at random. Defaults to 0.1. */
    jitter?: number;
}

// 100ms → 200ms → 400ms … capped at 5s
export const REDIS_RECONNECT_BACKOFF: BackoffPolicy = { initialMs: 100, multiplier: 2, maxMs: 5000 };

/** Delay before retry `attempt` (1-based; lower values count as 1). */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
    const exponent = Math.max(attempt, 1) - 1;
    const base = Math.min(policy.initialMs * Math.pow(policy.multiplier, exponent), policy.maxMs);
    const spread = base * (policy.jitter ?? 0.1);
    return Math.floor(base - spread + Math.random() * spread * 2);
}
