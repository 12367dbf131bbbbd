// =============================================================================
// CANOPY CONTROL PLANE - Gateway
// =============================================================================
// The way in for callers outside the hierarchy: submit a goal, get back its
// result or a GatewayError.
// =============================================================================

import { config } from '@canopy/config';
import {
    GatewayError,
    correlationOf,
    createEnvelope,
    type AgentIdentity,
    type DeadLetterReason,
    type DeliveryReceipt,
    type DirectivePayload,
    type ReportEnvelope,
} from '@canopy/protocol';
import type { AgentBehavior, AgentContext } from './agent-runtime.js';
import { logger } from './logger.js';

export interface GatewayOptions {
    gatewayId?: string;
    coordinatorId: string;
    timeoutMs?: number;
}

export interface SubmitOptions {
    priority?: number;
    ttlMs?: number;
    timeoutMs?: number;
    correlationId?: string;
}

interface PendingSubmission {
    resolve: (data: unknown) => void;
    reject: (error: GatewayError) => void;
    timer: NodeJS.Timeout;
    submittedAt: number;
}

type DeadLetteredReceipt = Extract<DeliveryReceipt, { status: 'DEAD_LETTERED' }>;

const RETRYABLE_REASONS: ReadonlySet<DeadLetterReason> = new Set(['MAILBOX_FULL', 'AGENT_STOPPED', 'AGENT_REMOVED']);

export class Gateway implements AgentBehavior {
    private ctx: AgentContext | null = null;
    private pending = new Map<string, PendingSubmission>();
    private readonly gatewayId: string;
    private readonly timeoutMs: number;

    constructor(private readonly options: GatewayOptions) {
        this.gatewayId = options.gatewayId ?? 'gateway';
        this.timeoutMs = options.timeoutMs ?? config.timing.gatewayTimeout;
    }

    get id(): string {
        return this.gatewayId;
    }

    get identity(): AgentIdentity {
        return { agentId: this.gatewayId, capabilities: ['gateway'], tier: 'execution' };
    }

    get inFlight(): number {
        return this.pending.size;
    }

    initialize(ctx: AgentContext): void {
        this.ctx = ctx;
    }

    /**
     * Send a goal to the coordinator and wait for its report.
     */
    submit(goal: DirectivePayload, options: SubmitOptions = {}): Promise<unknown> {
        const ctx = this.ctx;
        if (!ctx || ctx.state === 'STOPPED') {
            return Promise.reject(new GatewayError('AGENT_STOPPED', `Gateway ${this.gatewayId} is not running`, '', true));
        }

        const envelope = createEnvelope({
            senderId: this.gatewayId,
            recipientIds: [this.options.coordinatorId],
            kind: 'DIRECTIVE',
            payload: goal,
            requiresResponse: true,
            ...(options.priority !== undefined ? { priority: options.priority } : {}),
            ...(options.ttlMs !== undefined ? { ttlMs: options.ttlMs } : {}),
            ...(options.correlationId !== undefined ? { correlationId: options.correlationId } : {}),
        });
        const key = correlationOf(envelope);
        const timeoutMs = options.timeoutMs ?? this.timeoutMs;

        return new Promise<unknown>((resolve, reject) => {
            const timer = setTimeout(() => this.expire(key, timeoutMs), timeoutMs);
            this.pending.set(key, { resolve, reject, timer, submittedAt: Date.now() });
            logger.debug('Gateway', `📨 Submitted ${key} (${goal.capability}.${goal.action})`);

            const dead = ctx.post(envelope).find((r): r is DeadLetteredReceipt => r.status === 'DEAD_LETTERED');
            if (dead) {
                this.settle(key, new GatewayError(
                    dead.reason,
                    `Goal could not be delivered to ${dead.recipientId}: ${dead.reason}`,
                    key,
                    RETRYABLE_REASONS.has(dead.reason),
                ));
            }
        });
    }

    onReport(report: ReportEnvelope): void {
        const key = report.correlationId;
        const payload = report.payload;
        if (key === undefined || !this.pending.has(key)) {
            logger.debug('Gateway', `🗑️ No submission waiting for ${key ?? report.id}`);
            return;
        }

        if (payload.status === 'SUCCESS') {
            this.settle(key, null, payload.data);
        } else if (payload.status === 'FAILED') {
            this.settle(key, new GatewayError(payload.error.code, payload.error.message, key, payload.error.retryable));
        }
    }

    shutdown(): void {
        for (const key of [...this.pending.keys()]) {
            this.settle(key, new GatewayError('AGENT_STOPPED', 'Gateway is shutting down', key, true));
        }
    }

    private expire(key: string, timeoutMs: number): void {
        if (!this.pending.has(key)) return;
        this.ctx?.send({
            recipientIds: [this.options.coordinatorId],
            kind: 'EVENT',
            payload: { name: 'cancel', data: { correlationId: key } },
            priority: 9,
        });
        this.settle(key, new GatewayError('TIMEOUT', `No result within ${timeoutMs}ms`, key, true));
    }

    private settle(key: string, error: GatewayError | null, data?: unknown): void {
        const entry = this.pending.get(key);
        if (!entry) return;
        this.pending.delete(key);
        clearTimeout(entry.timer);

        const elapsed = Date.now() - entry.submittedAt;
        if (error) {
            logger.warn('Gateway', `❌ ${key} failed after ${elapsed}ms: ${error.code}`);
            entry.reject(error);
        } else {
            logger.debug('Gateway', `✅ ${key} resolved in ${elapsed}ms`);
            entry.resolve(data);
        }
    }
}
