import type { SummaryReport } from '@canopy/protocol';

export interface SummaryExtras {
    supervisorId: string;
    queueDepth: number;
    poolSize: number;
    busy: number;
}

/**
 * Counts outcomes for one capability between SUMMARY reports.
 */
export class ReportAggregator {
    private count = 0;
    private successCount = 0;
    private totalLatencyMs = 0;
    private windowStartedAt: number;

    constructor(
        readonly capability: string,
        readonly every: number,
        now: number = Date.now(),
    ) {
        this.windowStartedAt = now;
    }

    get pending(): number {
        return this.count;
    }

    /**
     * Count one outcome. True when a summary is due.
     */
    record(success: boolean, latencyMs: number): boolean {
        this.count++;
        if (success) this.successCount++;
        this.totalLatencyMs += Math.max(0, latencyMs);
        return this.count >= this.every;
    }

    /**
     * Build the summary for the current window and start a new one.
     */
    flush(extras: SummaryExtras, now: number = Date.now()): SummaryReport {
        const report: SummaryReport = {
            status: 'SUMMARY',
            supervisorId: extras.supervisorId,
            capability: this.capability,
            count: this.count,
            successCount: this.successCount,
            failureCount: this.count - this.successCount,
            successRate: this.count === 0 ? 1 : this.successCount / this.count,
            avgLatencyMs: this.count === 0 ? 0 : Math.round(this.totalLatencyMs / this.count),
            queueDepth: extras.queueDepth,
            poolSize: extras.poolSize,
            busy: extras.busy,
            windowStartedAt: this.windowStartedAt,
            windowEndedAt: now,
        };

        this.count = 0;
        this.successCount = 0;
        this.totalLatencyMs = 0;
        this.windowStartedAt = now;
        return report;
    }
}
