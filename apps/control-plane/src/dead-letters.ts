// =============================================================================
// CANOPY CONTROL PLANE - Dead Letter Store
// =============================================================================
// Envelopes that were not, or could not be, delivered to a handler. Bounded:
// the oldest records are evicted first and the eviction is counted.
// =============================================================================

import { config } from '@canopy/config';
import type { DeadLetterReason, DeadLetterRecord, Envelope } from '@canopy/protocol';
import { logger } from './logger.js';

export interface DeadLetterFilter {
    reason?: DeadLetterReason;
    recipientId?: string;
    correlationId?: string;
    limit?: number;
}

export interface DeadLetterStats {
    total: number;
    evicted: number;
    byReason: Partial<Record<DeadLetterReason, number>>;
}

export class DeadLetterStore {
    private records: DeadLetterRecord[] = [];
    private evicted = 0;

    constructor(private readonly capacity: number = config.bus.deadLetterCapacity) {}

    record(envelope: Envelope, recipientId: string, reason: DeadLetterReason, detail?: string): DeadLetterRecord {
        const entry: DeadLetterRecord = {
            envelope,
            recipientId,
            reason,
            recordedAt: Date.now(),
            ...(detail !== undefined ? { detail } : {}),
        };
        this.records.push(entry);

        if (this.records.length > this.capacity) {
            this.records.shift();
            this.evicted++;
        }

        logger.deadLetter(envelope.id, recipientId, reason);
        return entry;
    }

    /**
     * Matching records, oldest first.
     */
    list(filter: DeadLetterFilter = {}): DeadLetterRecord[] {
        let result = this.records.filter(r =>
            (filter.reason === undefined || r.reason === filter.reason) &&
            (filter.recipientId === undefined || r.recipientId === filter.recipientId) &&
            (filter.correlationId === undefined ||
                (r.envelope.correlationId ?? r.envelope.id) === filter.correlationId)
        );
        if (filter.limit !== undefined) {
            result = result.slice(-filter.limit);
        }
        return result;
    }

    count(reason?: DeadLetterReason): number {
        if (reason === undefined) return this.records.length;
        return this.records.filter(r => r.reason === reason).length;
    }

    getStats(): DeadLetterStats {
        const byReason: Partial<Record<DeadLetterReason, number>> = {};
        for (const r of this.records) {
            byReason[r.reason] = (byReason[r.reason] ?? 0) + 1;
        }
        return { total: this.records.length, evicted: this.evicted, byReason };
    }

    clear(): void {
        this.records = [];
        this.evicted = 0;
    }
}
