import { describe, expect, it } from 'vitest';
import { ReportAggregator } from './report-aggregator.js';
import { backoffDelay, resolveRetryPolicy } from './retry.js';

const extras = { supervisorId: 'sup', queueDepth: 4, poolSize: 2, busy: 1 };

describe('ReportAggregator', () => {
    it('signals when a summary is due', () => {
        const aggregator = new ReportAggregator('text', 3, 0);

        expect(aggregator.record(true, 10)).toBe(false);
        expect(aggregator.record(false, 20)).toBe(false);
        expect(aggregator.record(true, 31)).toBe(true);
        expect(aggregator.pending).toBe(3);
    });

    it('compresses the window into counts, rate and rounded latency', () => {
        const aggregator = new ReportAggregator('text', 10, 100);
        aggregator.record(true, 10);
        aggregator.record(false, 20);
        aggregator.record(true, 31);

        expect(aggregator.flush(extras, 500)).toEqual({
            status: 'SUMMARY',
            supervisorId: 'sup',
            capability: 'text',
            count: 3,
            successCount: 2,
            failureCount: 1,
            successRate: 2 / 3,
            avgLatencyMs: 20,
            queueDepth: 4,
            poolSize: 2,
            busy: 1,
            windowStartedAt: 100,
            windowEndedAt: 500,
        });
    });

    it('starts a fresh window after flushing', () => {
        const aggregator = new ReportAggregator('text', 10, 0);
        aggregator.record(false, 50);
        aggregator.flush(extras, 100);

        const empty = aggregator.flush(extras, 200);
        expect(empty).toMatchObject({ count: 0, successRate: 1, avgLatencyMs: 0, windowStartedAt: 100 });
    });
});

describe('retry policy', () => {
    it('doubles the delay per attempt up to the cap', () => {
        const policy = resolveRetryPolicy({ baseDelayMs: 100, maxDelayMs: 500 });

        expect([1, 2, 3, 4, 5].map(n => backoffDelay(n, policy))).toEqual([100, 200, 400, 500, 500]);
    });

    it('fills unspecified fields from the defaults', () => {
        const policy = resolveRetryPolicy({ owner: 'ESCALATE' });

        expect(policy.owner).toBe('ESCALATE');
        expect(policy.maxRetries).toBe(3);
        expect(policy.baseDelayMs).toBe(500);
    });
});
