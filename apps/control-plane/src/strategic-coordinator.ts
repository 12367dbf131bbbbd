// =============================================================================
// CANOPY CONTROL PLANE - Strategic Coordinator
// =============================================================================
// Root of the hierarchy. Splits goals across tactical supervisors, reads their
// summaries and steers them with control directives.
// =============================================================================

import { config } from '@canopy/config';
import {
    TaskError,
    correlationOf,
    createEnvelope,
    readString,
    remainingTtl,
    type AgentIdentity,
    type CapacityReport,
    type DirectiveEnvelope,
    type DirectivePayload,
    type EventEnvelope,
    type QueryEnvelope,
    type ReportEnvelope,
    type ReportError,
    type SummaryReport,
} from '@canopy/protocol';
import type { AgentBehavior, AgentContext } from './agent-runtime.js';
import { controlPayload, type ControlDirective } from './control.js';
import { defaultPlanner, type GoalPlanner } from './goal-planner.js';
import { logger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

export interface Thresholds {
    minSuccessRate: number;
    maxAvgLatencyMs: number;
    maxQueueDepth: number;
    minSamples: number;
}

export interface StrategicCoordinatorOptions {
    coordinatorId: string;
    planner?: GoalPlanner;
    /** capability → capability to fail over to when it breaches. */
    alternates?: Record<string, string>;
    thresholds?: Partial<Thresholds>;
    silenceThresholdMs?: number;
    sweepIntervalMs?: number;
}

interface Goal {
    key: string;
    directive: DirectiveEnvelope;
    parts: string[];
    results: Map<string, unknown>;
}

interface Part {
    key: string;
    goalKey: string;
    supervisorId: string;
    capability: string;
    /** The planned step, before any failover rewrote its capability. */
    request: DirectivePayload;
}

interface Route {
    supervisorId: string;
    payload: DirectivePayload;
}

export interface Decision {
    supervisorId: string;
    capability: string;
    action: ControlDirective['action'];
    reasons: string[];
    decidedAt: number;
}

interface CapacityEvent {
    supervisorId: string;
    capability: string;
    poolSize: number;
    removedAgentId: string;
    reason: string;
    receivedAt: number;
}

export interface CoordinatorStatus {
    coordinatorId: string;
    goals: number;
    parts: number;
    supervisors: Array<{ supervisorId: string; lastSeen: number; silentForMs: number; alerted: boolean }>;
    breaches: string[];
    unhealthy: string[];
    failovers: Record<string, string>;
    decisions: Decision[];
    capacity: CapacityEvent[];
    lastSummaries: SummaryReport[];
}

const HISTORY_LIMIT = 100;

// =============================================================================
// Coordinator
// =============================================================================

export class StrategicCoordinator implements AgentBehavior {
    private goals = new Map<string, Goal>();
    private parts = new Map<string, Part>();
    private controls = new Map<string, ControlDirective & { supervisorId: string }>();
    private lastSeen = new Map<string, number>();
    private alerted = new Set<string>();
    private unhealthy = new Set<string>();
    private breached = new Set<string>();
    private failovers = new Map<string, string>();
    private decisions: Decision[] = [];
    private capacity: CapacityEvent[] = [];
    private summaries = new Map<string, SummaryReport>();
    private readonly planner: GoalPlanner;
    private readonly thresholds: Thresholds;
    private readonly silenceThresholdMs: number;
    private readonly sweepIntervalMs: number;

    constructor(private readonly options: StrategicCoordinatorOptions) {
        this.planner = options.planner ?? defaultPlanner;
        this.thresholds = {
            minSuccessRate: config.coordinator.minSuccessRate,
            maxAvgLatencyMs: config.coordinator.maxAvgLatencyMs,
            maxQueueDepth: config.coordinator.maxQueueDepth,
            minSamples: config.coordinator.minSamples,
            ...options.thresholds,
        };
        this.silenceThresholdMs = options.silenceThresholdMs ?? config.timing.supervisorSilence;
        this.sweepIntervalMs = options.sweepIntervalMs ?? config.timing.healthSweepInterval;
    }

    get id(): string {
        return this.options.coordinatorId;
    }

    get identity(): AgentIdentity {
        return { agentId: this.options.coordinatorId, capabilities: ['coordination'], tier: 'strategic' };
    }

    initialize(ctx: AgentContext): void {
        ctx.every(this.sweepIntervalMs, { name: 'health-sweep' });
        logger.info('Coordinator', `🌳 ${this.id} ready (sweep every ${this.sweepIntervalMs / 1000}s)`);
    }

    // =========================================================================
    // Goals
    // =========================================================================

    onDirective(goal: DirectiveEnvelope, ctx: AgentContext): void {
        const key = correlationOf(goal);
        if (this.goals.has(key)) {
            ctx.reportFailure(goal, { code: 'DUPLICATE_CORRELATION', message: `Goal ${key} is already running`, retryable: false });
            return;
        }

        const plan = this.planner.plan(goal.payload);
        if (plan.length === 0) {
            throw new TaskError('INVALID_PLAN', `Goal ${key} planned to nothing`);
        }

        // Resolve every part before sending any, so a goal is all-or-nothing at submission.
        const routed: Array<{ request: DirectivePayload; route: Route }> = [];
        for (const part of plan) {
            const route = this.resolveSupervisor(part, ctx);
            if (!route) {
                ctx.reportFailure(goal, {
                    code: 'NO_CAPABLE_SUPERVISOR',
                    message: `No live supervisor for ${part.capability}`,
                    retryable: true,
                });
                return;
            }
            routed.push({ request: part, route });
        }

        const entry: Goal = { key, directive: goal, parts: [], results: new Map() };
        this.goals.set(key, entry);
        ctx.defer(goal);

        for (const [index, { request, route }] of routed.entries()) {
            if (!this.sendPart(entry, index, request, route, ctx)) return;
        }
        logger.debug('Coordinator', `🎯 Goal ${key} split into ${entry.parts.length} part(s)`);
    }

    /**
     * Send one step of a goal into its slot. False when delivery failed and
     * the goal was failed with it.
     */
    private sendPart(goal: Goal, index: number, request: DirectivePayload, route: Route, ctx: AgentContext): boolean {
        const ttlMs = remainingTtl(goal.directive);
        const envelope = createEnvelope({
            senderId: this.id,
            recipientIds: [route.supervisorId],
            kind: 'DIRECTIVE',
            payload: route.payload,
            priority: goal.directive.priority,
            ...(ttlMs !== undefined ? { ttlMs } : {}),
        });
        goal.parts[index] = envelope.id;
        this.parts.set(envelope.id, {
            key: envelope.id,
            goalKey: goal.key,
            supervisorId: route.supervisorId,
            capability: route.payload.capability,
            request,
        });

        const [receipt] = ctx.post(envelope);
        if (receipt?.status === 'DEAD_LETTERED') {
            this.partFailed(envelope.id, {
                code: receipt.reason,
                message: `Could not deliver to ${route.supervisorId}`,
                retryable: receipt.reason !== 'EXPIRED',
            }, ctx);
            return false;
        }
        return true;
    }

    private resolveSupervisor(part: DirectivePayload, ctx: AgentContext): Route | undefined {
        const direct = this.liveSupervisor(part.capability, ctx);
        if (direct) return { supervisorId: direct, payload: part };

        const alternate = this.failovers.get(part.capability) ?? this.options.alternates?.[part.capability];
        if (alternate === undefined) return undefined;
        const fallback = this.liveSupervisor(alternate, ctx);
        return fallback ? { supervisorId: fallback, payload: { ...part, capability: alternate } } : undefined;
    }

    private liveSupervisor(capability: string, ctx: AgentContext): string | undefined {
        return ctx.bus.findByCapability(capability, { tier: 'tactical' }).find(id => {
            if (this.unhealthy.has(id)) return false;
            const state = ctx.bus.registry.health(id)?.state;
            return state === 'RUNNING' || state === 'DEGRADED';
        });
    }

    private partSucceeded(partKey: string, data: unknown, ctx: AgentContext): void {
        const part = this.parts.get(partKey);
        const goal = part ? this.goals.get(part.goalKey) : undefined;
        if (!part || !goal) return;

        this.parts.delete(partKey);
        goal.results.set(partKey, data);
        if (goal.results.size < goal.parts.length) return;

        this.goals.delete(goal.key);
        const results = goal.parts.map(id => goal.results.get(id));
        ctx.reportSuccess(goal.directive, results.length === 1 ? results[0] : results);
        logger.info('Coordinator', `✅ Goal ${goal.key} complete`);
    }

    private partFailed(partKey: string, error: ReportError, ctx: AgentContext): void {
        const part = this.parts.get(partKey);
        const goal = part ? this.goals.get(part.goalKey) : undefined;
        if (!part || !goal) return;

        this.parts.delete(partKey);
        this.closeGoal(goal, ctx);
        ctx.reportFailure(goal.directive, error);
        logger.warn('Coordinator', `❌ Goal ${goal.key} failed: ${error.code}`);
    }

    /**
     * Forget a goal and abandon whatever parts are still out.
     */
    private closeGoal(goal: Goal, ctx: AgentContext): void {
        this.goals.delete(goal.key);
        for (const partKey of goal.parts) {
            const part = this.parts.get(partKey);
            if (!part) continue;
            this.parts.delete(partKey);
            ctx.send({
                recipientIds: [part.supervisorId],
                kind: 'EVENT',
                payload: { name: 'abandon', data: { correlationId: partKey } },
                priority: 9,
            });
        }
    }

    // =========================================================================
    // Reports
    // =========================================================================

    onReport(report: ReportEnvelope, ctx: AgentContext): void {
        this.markSeen(report.senderId);
        const payload = report.payload;

        if (payload.status === 'SUMMARY') {
            this.onAggregatedReport(payload, ctx);
            return;
        }
        if (payload.status === 'CAPACITY') {
            this.onCapacity(payload);
            return;
        }

        const key = report.correlationId;
        if (key === undefined) return;

        const control = this.controls.get(key);
        if (control) {
            this.controls.delete(key);
            if (payload.status === 'FAILED') {
                logger.warn('Coordinator', `⚠️ ${control.supervisorId} rejected ${control.action}: ${payload.error.message}`);
            }
            return;
        }

        if (payload.status === 'SUCCESS') {
            this.partSucceeded(key, payload.data, ctx);
        } else {
            this.partFailed(key, payload.error, ctx);
        }
    }

    /**
     * Compare one summary with the thresholds; act once per breach episode.
     */
    onAggregatedReport(summary: SummaryReport, ctx: AgentContext): Decision | undefined {
        const episodeKey = `${summary.supervisorId}:${summary.capability}`;
        this.summaries.set(episodeKey, summary);
        if (summary.count < this.thresholds.minSamples) return undefined;

        const reasons: string[] = [];
        if (summary.successRate < this.thresholds.minSuccessRate) {
            reasons.push(`success rate ${summary.successRate.toFixed(2)} < ${this.thresholds.minSuccessRate}`);
        }
        if (summary.avgLatencyMs > this.thresholds.maxAvgLatencyMs) {
            reasons.push(`avg latency ${summary.avgLatencyMs}ms > ${this.thresholds.maxAvgLatencyMs}ms`);
        }
        if (summary.queueDepth > this.thresholds.maxQueueDepth) {
            reasons.push(`queue depth ${summary.queueDepth} > ${this.thresholds.maxQueueDepth}`);
        }

        if (reasons.length === 0) {
            if (this.breached.delete(episodeKey)) {
                logger.info('Coordinator', `💚 ${episodeKey} back within thresholds`);
            }
            return undefined;
        }
        if (this.breached.has(episodeKey)) return undefined;
        this.breached.add(episodeKey);

        const alternate = this.options.alternates?.[summary.capability];
        const control: ControlDirective = alternate !== undefined
            ? { action: 'prefer-alternate', params: { capability: summary.capability, alternate } }
            : { action: 'reduce-concurrency', params: { capability: summary.capability, limit: Math.max(1, Math.floor(summary.poolSize / 2)) } };

        if (control.action === 'prefer-alternate') {
            this.failovers.set(summary.capability, control.params.alternate);
        }
        this.sendControl(summary.supervisorId, control, ctx);

        const decision: Decision = {
            supervisorId: summary.supervisorId,
            capability: summary.capability,
            action: control.action,
            reasons,
            decidedAt: Date.now(),
        };
        this.decisions.push(decision);
        if (this.decisions.length > HISTORY_LIMIT) this.decisions.shift();
        logger.warn('Coordinator', `📊 ${episodeKey} breached (${reasons.join('; ')}), sending ${control.action}`);
        return decision;
    }

    private sendControl(supervisorId: string, control: ControlDirective, ctx: AgentContext): void {
        const envelope = createEnvelope({
            senderId: this.id,
            recipientIds: [supervisorId],
            kind: 'DIRECTIVE',
            payload: controlPayload(control),
            priority: 9,
        });
        this.controls.set(envelope.id, { ...control, supervisorId });
        ctx.post(envelope);
    }

    private onCapacity(report: CapacityReport): void {
        this.capacity.push({
            supervisorId: report.supervisorId,
            capability: report.capability,
            poolSize: report.poolSize,
            removedAgentId: report.removedAgentId,
            reason: report.reason,
            receivedAt: Date.now(),
        });
        if (this.capacity.length > HISTORY_LIMIT) this.capacity.shift();
        logger.warn('Coordinator', `📉 ${report.supervisorId} lost ${report.removedAgentId} from ${report.capability} (now ${report.poolSize}): ${report.reason}`);
    }

    // =========================================================================
    // Events
    // =========================================================================

    onEvent(event: EventEnvelope, ctx: AgentContext): void {
        switch (event.payload.name) {
            case 'health-sweep':
                this.sweep(ctx);
                return;
            case 'cancel':
                this.cancel(readString(event.payload.data, 'correlationId'), ctx);
                return;
            case 'agent-unhealthy':
                this.onSupervisorUnhealthy(readString(event.payload.data, 'agentId'), ctx);
                return;
            default:
                logger.debug('Coordinator', `${this.id} ignored event ${event.payload.name}`);
        }
    }

    private markSeen(supervisorId: string): void {
        this.lastSeen.set(supervisorId, Date.now());
        this.unhealthy.delete(supervisorId);
        if (this.alerted.delete(supervisorId)) {
            logger.info('Coordinator', `💚 ${supervisorId} is reporting again`);
        }
    }

    /**
     * Raise one alert per silent supervisor per silence episode.
     */
    sweep(ctx: AgentContext, now: number = Date.now()): string[] {
        const registry = ctx.bus.registry;
        for (const id of registry.childrenOf(this.id)) {
            if (!this.lastSeen.has(id)) this.lastSeen.set(id, now);
        }

        const raised: string[] = [];
        for (const [supervisorId, seenAt] of this.lastSeen) {
            if (!registry.has(supervisorId)) {
                this.lastSeen.delete(supervisorId);
                this.alerted.delete(supervisorId);
                this.unhealthy.delete(supervisorId);
                continue;
            }
            const silentForMs = now - seenAt;
            if (silentForMs <= this.silenceThresholdMs || this.alerted.has(supervisorId)) continue;

            this.alerted.add(supervisorId);
            logger.error('Coordinator', `🚨 CRITICAL: ${supervisorId} silent for ${silentForMs}ms`);
            ctx.broadcast('tactical', { name: 'system-alert', data: { supervisorId, silentForMs } }, { priority: 10 });
            raised.push(supervisorId);
        }
        return raised;
    }

    /**
     * A supervisor missed its heartbeats: route around it until it reports
     * again and move the parts it holds to another live supervisor.
     */
    private onSupervisorUnhealthy(supervisorId: string | undefined, ctx: AgentContext): void {
        if (supervisorId === undefined || this.unhealthy.has(supervisorId)) return;
        this.unhealthy.add(supervisorId);
        logger.error('Coordinator', `🚨 CRITICAL: ${supervisorId} stopped heartbeating`);

        if (!this.alerted.has(supervisorId)) {
            this.alerted.add(supervisorId);
            ctx.broadcast('tactical', { name: 'system-alert', data: { supervisorId, reason: 'unhealthy' } }, { priority: 10 });
        }
        for (const part of [...this.parts.values()]) {
            if (part.supervisorId === supervisorId) this.reroute(part, ctx);
        }
    }

    private reroute(part: Part, ctx: AgentContext): void {
        const goal = this.goals.get(part.goalKey);
        if (!goal) return;

        const route = this.resolveSupervisor(part.request, ctx);
        if (!route) {
            this.partFailed(part.key, {
                code: 'SUPERVISOR_UNHEALTHY',
                message: `${part.supervisorId} stopped heartbeating and no other supervisor serves ${part.request.capability}`,
                retryable: true,
            }, ctx);
            return;
        }

        this.parts.delete(part.key);
        ctx.send({
            recipientIds: [part.supervisorId],
            kind: 'EVENT',
            payload: { name: 'abandon', data: { correlationId: part.key } },
            priority: 9,
        });
        const index = goal.parts.indexOf(part.key);
        if (this.sendPart(goal, index, part.request, route, ctx)) {
            logger.warn('Coordinator', `↪️ Goal ${goal.key} step ${index + 1} moved ${part.supervisorId} → ${route.supervisorId}`);
        }
    }

    private cancel(key: string | undefined, ctx: AgentContext): void {
        const goal = key === undefined ? undefined : this.goals.get(key);
        if (!goal) return;

        this.closeGoal(goal, ctx);
        ctx.reportFailure(goal.directive, { code: 'ABANDONED', message: `Goal ${goal.key} was cancelled`, retryable: false });
        logger.info('Coordinator', `🗑️ Goal ${goal.key} cancelled`);
    }

    // =========================================================================
    // Queries
    // =========================================================================

    onQuery(query: QueryEnvelope): CoordinatorStatus {
        if (query.payload.question !== 'status') {
            throw new TaskError('UNKNOWN_QUESTION', `${this.id} cannot answer "${query.payload.question}"`);
        }
        return this.status();
    }

    status(now: number = Date.now()): CoordinatorStatus {
        return {
            coordinatorId: this.id,
            goals: this.goals.size,
            parts: this.parts.size,
            supervisors: [...this.lastSeen].map(([supervisorId, lastSeen]) => ({
                supervisorId,
                lastSeen,
                silentForMs: now - lastSeen,
                alerted: this.alerted.has(supervisorId),
            })),
            breaches: [...this.breached],
            unhealthy: [...this.unhealthy],
            failovers: Object.fromEntries(this.failovers),
            decisions: [...this.decisions],
            capacity: [...this.capacity],
            lastSummaries: [...this.summaries.values()],
        };
    }
}
