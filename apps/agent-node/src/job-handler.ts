// =============================================================================
// CANOPY AGENT NODE - Directive Handler
// =============================================================================

import {
    classifyError,
    createReport,
    executeAction,
    isExpired,
    type DefinedWorker,
    type DirectiveEnvelope,
    type ReportEnvelope,
} from '@canopy/protocol';
import { log, COLORS } from './logger.js';

/**
 * Run one directive against the node's worker and build its report.
 * Every directive gets exactly one report, including expired ones.
 */
export async function handleDirective(
    directive: DirectiveEnvelope,
    worker: DefinedWorker,
    agentId: string,
): Promise<ReportEnvelope> {
    const { capability, action, params } = directive.payload;
    const startTime = Date.now();

    if (isExpired(directive, startTime)) {
        log('warn', 'Job', `⌛ ${directive.id} expired before it could run`);
        return createReport(directive, agentId, {
            status: 'FAILED',
            error: { code: 'EXPIRED', message: 'Directive expired before execution', retryable: false },
        });
    }

    log('info', 'Job', `📥 ${COLORS.blue}${capability}.${action}${COLORS.reset} (${directive.id})`);

    try {
        const data = await executeAction(worker, action, params, { agentId, directive });
        const latencyMs = Date.now() - startTime;
        log('info', 'Job', `✅ ${directive.id} completed in ${latencyMs}ms`);
        return createReport(directive, agentId, {
            status: 'SUCCESS',
            data,
            metrics: { latencyMs, sizeBytes: Buffer.byteLength(JSON.stringify(data ?? null)) },
        });
    } catch (error) {
        const { code, message, retryable } = classifyError(error);
        log('error', 'Job', `❌ ${directive.id} failed: ${code} - ${message}`);
        return createReport(directive, agentId, {
            status: 'FAILED',
            error: { code, message, retryable },
            metrics: { latencyMs: Date.now() - startTime },
        });
    }
}
