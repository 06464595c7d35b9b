import { TerminalState, taskState } from './types';

// Names other result producers use for the same lifecycle points
const STATE_ALIASES: Record<string, taskState> = {
    pending: taskState.PENDING,
    received: taskState.PENDING,
    running: taskState.RUNNING,
    started: taskState.RUNNING,
    retry: taskState.RUNNING,
    success: taskState.SUCCESS,
    failed: taskState.FAILED,
    failure: taskState.FAILED,
    revoked: taskState.FAILED,
};

/** Maps a raw state name (case-insensitive) onto the closed state set, or undefined if unknown. */
export function parseTaskState(raw: string): taskState | undefined {
    const normalized = raw.trim().toLowerCase();
    return Object.prototype.hasOwnProperty.call(STATE_ALIASES, normalized)
        ? STATE_ALIASES[normalized]
        : undefined;
}

export function isTerminal(state: taskState): state is TerminalState {
    return state === taskState.SUCCESS || state === taskState.FAILED;
}
