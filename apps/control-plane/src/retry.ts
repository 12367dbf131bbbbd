import { config } from '@canopy/config';

/**
 * Who retries a failed directive: the supervisor itself, up to the cap, or
 * nobody at this tier (the first failure goes straight up).
 */
export type RetryOwner = 'SUPERVISOR' | 'ESCALATE';

export interface RetryPolicy {
    owner: RetryOwner;
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    owner: 'SUPERVISOR',
    maxRetries: config.supervisor.retry.maxRetries,
    baseDelayMs: config.supervisor.retry.baseDelay,
    maxDelayMs: config.supervisor.retry.maxDelay,
};

/**
 * Delay before retry number `attempt` (1-based): base · 2^(attempt−1), capped.
 */
export function backoffDelay(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(policy.baseDelayMs * Math.pow(2, exponent), policy.maxDelayMs);
}

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
    return { ...DEFAULT_RETRY_POLICY, ...overrides };
}
