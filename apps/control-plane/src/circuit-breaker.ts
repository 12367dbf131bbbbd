import { config } from '@canopy/config';
import type { BreakerState } from '@canopy/protocol';
import { logger } from './logger.js';

export interface BreakerOptions {
    failureThreshold?: number;
    openTimeoutMs?: number;
}

export interface BreakerSnapshot {
    targetId: string;
    state: BreakerState;
    consecutiveFailures: number;
    openedAt: number | null;
}

/**
 * Per-child circuit breaker.
 *
 * CLOSED counts consecutive failures and opens at the threshold. OPEN rejects
 * everything until the timeout passes, then reads as HALF_OPEN, which admits
 * exactly one trial: its success closes the breaker, its failure reopens it.
 */
export class CircuitBreaker {
    private state: BreakerState = 'CLOSED';
    private consecutiveFailures = 0;
    private openedAt: number | null = null;
    private trialInFlight = false;
    private readonly failureThreshold: number;
    private readonly openTimeoutMs: number;

    constructor(
        readonly targetId: string,
        options: BreakerOptions = {},
    ) {
        this.failureThreshold = options.failureThreshold ?? config.supervisor.breaker.failureThreshold;
        this.openTimeoutMs = options.openTimeoutMs ?? config.supervisor.breaker.openTimeout;
    }

    currentState(now: number = Date.now()): BreakerState {
        if (this.state === 'OPEN' && this.openedAt !== null && now - this.openedAt >= this.openTimeoutMs) {
            this.state = 'HALF_OPEN';
            this.trialInFlight = false;
            logger.info('Breaker', `🔌 ${this.targetId} half-open`);
        }
        return this.state;
    }

    /**
     * Whether a directive could be routed to the target right now.
     */
    canPass(now: number = Date.now()): boolean {
        switch (this.currentState(now)) {
            case 'CLOSED':
                return true;
            case 'OPEN':
                return false;
            case 'HALF_OPEN':
                return !this.trialInFlight;
        }
    }

    /**
     * Claim passage. In HALF_OPEN this takes the single trial slot.
     */
    acquire(now: number = Date.now()): boolean {
        if (!this.canPass(now)) return false;
        if (this.state === 'HALF_OPEN') this.trialInFlight = true;
        return true;
    }

    /**
     * Give back a trial slot that was acquired but never used.
     */
    releaseTrial(): void {
        this.trialInFlight = false;
    }

    recordSuccess(): void {
        if (this.state !== 'CLOSED') {
            logger.info('Breaker', `🔌 ${this.targetId} closed`);
        }
        this.state = 'CLOSED';
        this.consecutiveFailures = 0;
        this.openedAt = null;
        this.trialInFlight = false;
    }

    recordFailure(now: number = Date.now()): BreakerState {
        this.consecutiveFailures++;
        const state = this.currentState(now);

        if (state === 'HALF_OPEN') {
            this.open(now);
        } else if (state === 'CLOSED' && this.consecutiveFailures >= this.failureThreshold) {
            this.open(now);
        }
        return this.state;
    }

    /**
     * Forget history, e.g. after the target was restarted.
     */
    reset(): void {
        this.state = 'CLOSED';
        this.consecutiveFailures = 0;
        this.openedAt = null;
        this.trialInFlight = false;
    }

    snapshot(now: number = Date.now()): BreakerSnapshot {
        return {
            targetId: this.targetId,
            state: this.currentState(now),
            consecutiveFailures: this.consecutiveFailures,
            openedAt: this.openedAt,
        };
    }

    private open(now: number): void {
        this.state = 'OPEN';
        this.openedAt = now;
        this.trialInFlight = false;
        logger.warn('Breaker', `🔌 ${this.targetId} open after ${this.consecutiveFailures} consecutive failures`);
    }
}
