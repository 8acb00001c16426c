/**
 * Retry state machine shared by dispatch (per join record) and by the per-community
 * poll loops (per consecutive transient failure). The table below is the only place
 * transitions are defined.
 */

export type RetryState =
  | { status: 'pending' }
  | { status: 'retrying'; attempt: number }
  | { status: 'sent' }
  | { status: 'filtered' }
  | { status: 'failed'; attempt: number };

export type RetryEvent = 'succeeded' | 'filtered' | 'transient_failure';

export interface RetryPolicy {
  /** Total attempts allowed, first try included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0-1 spread applied around the exponential delay. */
  jitterFactor: number;
}

export const INITIAL_RETRY_STATE: RetryState = { status: 'pending' };

function failedAttempts(state: RetryState): number {
  return state.status === 'retrying' || state.status === 'failed' ? state.attempt : 0;
}

export function isTerminal(state: RetryState): boolean {
  return state.status === 'sent' || state.status === 'filtered' || state.status === 'failed';
}

export function transition(state: RetryState, event: RetryEvent, policy: RetryPolicy): RetryState {
  if (isTerminal(state)) {
    return state;
  }

  switch (event) {
    case 'succeeded':
      return { status: 'sent' };
    case 'filtered':
      return { status: 'filtered' };
    case 'transient_failure': {
      const attempt = failedAttempts(state) + 1;
      return attempt >= policy.maxAttempts
        ? { status: 'failed', attempt }
        : { status: 'retrying', attempt };
    }
  }
}

/**
 * Exponential backoff: base * 2^(attempt-1), spread by jitter, capped at maxDelayMs.
 */
export function backoffDelayMs(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(attempt, 1) - 1);
  const jitter = 1 - policy.jitterFactor + random() * 2 * policy.jitterFactor;
  return Math.min(Math.round(exponential * jitter), policy.maxDelayMs);
}
