// =============================================================================
// CANOPY CONTROL PLANE - Mailbox
// =============================================================================
// Bounded, priority-ordered queue owned by one agent. Only the bus offers into
// it and only the owning runtime takes from it.
// =============================================================================

import { MAX_PRIORITY, MIN_PRIORITY, OrchestrationError, type Envelope } from '@canopy/protocol';

export type OfferResult = 'ACCEPTED' | 'FULL' | 'CLOSED';

export class Mailbox {
    // One FIFO bucket per priority level; index 10 is drained first.
    private readonly buckets: Envelope[][] = Array.from({ length: MAX_PRIORITY - MIN_PRIORITY + 1 }, () => []);
    private size = 0;
    private closed = false;
    private waiter: ((envelope: Envelope | null) => void) | null = null;

    constructor(
        readonly ownerId: string,
        readonly capacity: number,
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Mailbox capacity must be a positive integer, got ${capacity}`);
        }
    }

    get length(): number {
        return this.size;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Enqueue behind every pending envelope of the same or higher priority.
     */
    offer(envelope: Envelope): OfferResult {
        if (this.closed) return 'CLOSED';
        if (this.size >= this.capacity) return 'FULL';

        if (this.waiter) {
            // The owner is parked on an empty mailbox: hand over directly.
            const resolve = this.waiter;
            this.waiter = null;
            resolve(envelope);
            return 'ACCEPTED';
        }

        this.buckets[envelope.priority - MIN_PRIORITY].push(envelope);
        this.size++;
        return 'ACCEPTED';
    }

    /**
     * Remove the next envelope without waiting.
     */
    poll(): Envelope | undefined {
        for (let i = this.buckets.length - 1; i >= 0; i--) {
            const bucket = this.buckets[i];
            if (bucket.length > 0) {
                this.size--;
                return bucket.shift();
            }
        }
        return undefined;
    }

    /**
     * Wait for the next envelope. Resolves null once the mailbox is closed.
     */
    take(): Promise<Envelope | null> {
        const next = this.poll();
        if (next) return Promise.resolve(next);
        if (this.closed) return Promise.resolve(null);
        if (this.waiter) {
            throw new OrchestrationError('INVALID_TRANSITION', `Mailbox ${this.ownerId} already has a reader`);
        }
        return new Promise(resolve => {
            this.waiter = resolve;
        });
    }

    /**
     * Pending envelopes in delivery order, without removing them.
     */
    pending(): Envelope[] {
        const result: Envelope[] = [];
        for (let i = this.buckets.length - 1; i >= 0; i--) {
            result.push(...this.buckets[i]);
        }
        return result;
    }

    /**
     * Remove and return everything pending, in delivery order.
     */
    drain(): Envelope[] {
        const result = this.pending();
        for (const bucket of this.buckets) bucket.length = 0;
        this.size = 0;
        return result;
    }

    /**
     * Refuse further offers, wake a parked reader, return what was pending.
     */
    close(): Envelope[] {
        this.closed = true;
        const remaining = this.drain();
        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve(null);
        }
        return remaining;
    }
}
