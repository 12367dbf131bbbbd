// =============================================================================
// CANOPY CONTROL PLANE - Tactical Supervisor
// =============================================================================
// Owns one pool of children per capability. Routes directives to them,
// retries and circuit-breaks on their behalf and sends compressed summaries
// up instead of every child report.
//
// Everything here runs on the supervisor's own loop: timers only post events
// back to ourselves ("retry-due", "flush-summaries").
// =============================================================================

import { config } from '@canopy/config';
import {
    OrchestrationError,
    TaskError,
    correlationOf,
    deriveEnvelope,
    readString,
    type ActionCatalog,
    type AgentIdentity,
    type AgentLoad,
    type DefinedWorker,
    type DirectiveEnvelope,
    type EventEnvelope,
    type QueryEnvelope,
    type ReportEnvelope,
    type ReportError,
    type SummaryReport,
} from '@canopy/protocol';
import { AgentPool, type PoolMember } from './agent-pool.js';
import { AgentRuntime, type AgentBehavior, type AgentContext } from './agent-runtime.js';
import type { BreakerOptions, BreakerSnapshot } from './circuit-breaker.js';
import { CONTROL_CAPABILITY, controlDirectiveSchema } from './control.js';
import { logger } from './logger.js';
import type { MessageBus } from './message-bus.js';
import { ReportAggregator } from './report-aggregator.js';
import { backoffDelay, resolveRetryPolicy, type RetryOwner, type RetryPolicy } from './retry.js';
import { createWorker } from './worker.js';

// =============================================================================
// Types
// =============================================================================

export type BehaviorFactory = () => AgentBehavior;

export interface PoolSpec {
    capability: string;
    /** Local children spawned at start. */
    size: number;
    worker?: DefinedWorker;
    behavior?: BehaviorFactory;
    /** Action catalog for pools without a worker definition (e.g. remote-only). */
    catalog?: ActionCatalog;
    maxSize?: number;
    maxQueueDepth?: number;
    concurrencyLimit?: number;
    retry?: Partial<RetryPolicy>;
}

export interface ChildSpec {
    capability: string;
    definition?: DefinedWorker;
    behavior?: BehaviorFactory;
    agentId?: string;
}

export interface TacticalSupervisorOptions {
    supervisorId: string;
    pools: PoolSpec[];
    breaker?: BreakerOptions;
    summaryEvery?: number;
    summaryWindowMs?: number;
    childHeartbeatIntervalMs?: number;
}

type InFlightState = 'QUEUED' | 'DISPATCHED' | 'WAITING_RETRY';

interface InFlight {
    key: string;
    original: DirectiveEnvelope;
    capability: string;
    state: InFlightState;
    attempts: number;
    childId: string | null;
    dispatchedAt: number;
    lastError?: ReportError;
    cancelRetry?: () => void;
}

interface Alert {
    from: string;
    receivedAt: number;
    data: Record<string, unknown>;
}

export interface SupervisorStatus {
    supervisorId: string;
    state: string;
    pools: Array<{
        capability: string;
        size: number;
        busy: number;
        concurrencyLimit: number;
        queueDepth: number;
        retryOwner: RetryOwner;
        members: Array<{ agentId: string; busy: boolean; remote: boolean; breaker: BreakerSnapshot; load?: AgentLoad }>;
    }>;
    inFlight: number;
    preferences: Record<string, string>;
    restarts: number;
    alerts: Alert[];
}

type Assignment = 'ASSIGNED' | 'WAIT' | ReportError;

const MAX_ALERTS = 50;

// =============================================================================
// Supervisor
// =============================================================================

export class TacticalSupervisor implements AgentBehavior {
    private pools = new Map<string, AgentPool>();
    private policies = new Map<string, RetryPolicy>();
    private catalogs = new Map<string, ActionCatalog>();
    private aggregators = new Map<string, ReportAggregator>();
    private factories = new Map<string, BehaviorFactory>();
    private childFactories = new Map<string, BehaviorFactory>();
    private preferences = new Map<string, string>();
    private inFlight = new Map<string, InFlight>();
    private alerts: Alert[] = [];
    private restarts = 0;
    private spawned = 0;
    private ctx: AgentContext | null = null;
    private readonly summaryWindowMs: number;

    constructor(
        private readonly bus: MessageBus,
        private readonly options: TacticalSupervisorOptions,
    ) {
        this.summaryWindowMs = options.summaryWindowMs ?? config.timing.summaryWindow;
        const summaryEvery = options.summaryEvery ?? config.supervisor.summaryEvery;

        for (const spec of options.pools) {
            if (this.pools.has(spec.capability)) {
                throw new OrchestrationError('INVALID_DEFINITION', `Duplicate pool for ${spec.capability} in ${options.supervisorId}`);
            }
            if (spec.worker && spec.worker.capability !== spec.capability) {
                throw new OrchestrationError(
                    'INVALID_DEFINITION',
                    `Pool ${spec.capability} was given a worker for ${spec.worker.capability}`,
                );
            }
            this.pools.set(spec.capability, new AgentPool(spec.capability, {
                maxSize: spec.maxSize ?? Math.max(spec.size, config.supervisor.maxPoolSize),
                ...(spec.maxQueueDepth !== undefined ? { maxQueueDepth: spec.maxQueueDepth } : {}),
                ...(spec.concurrencyLimit !== undefined ? { concurrencyLimit: spec.concurrencyLimit } : {}),
                ...(options.breaker !== undefined ? { breaker: options.breaker } : {}),
            }));
            this.policies.set(spec.capability, resolveRetryPolicy(spec.retry));
            this.aggregators.set(spec.capability, new ReportAggregator(spec.capability, summaryEvery));

            const catalog = spec.worker?.catalog ?? spec.catalog;
            if (catalog) this.catalogs.set(spec.capability, catalog);

            const worker = spec.worker;
            const factory = spec.behavior ?? (worker ? () => createWorker(worker) : undefined);
            if (factory) this.factories.set(spec.capability, factory);
        }
    }

    get id(): string {
        return this.options.supervisorId;
    }

    get identity(): AgentIdentity {
        return {
            agentId: this.options.supervisorId,
            capabilities: [...this.pools.keys()],
            tier: 'tactical',
        };
    }

    // =========================================================================
    // Lifecycle
    // =========================================================================

    async initialize(ctx: AgentContext): Promise<void> {
        this.ctx = ctx;
        for (const spec of this.options.pools) {
            for (let i = 0; i < spec.size; i++) {
                await this.spawnChild({ capability: spec.capability });
            }
        }
        ctx.every(this.summaryWindowMs, { name: 'flush-summaries' });
        logger.info('Supervisor', `🌿 ${this.id} ready with ${this.pools.size} pool(s): ${[...this.pools.keys()].join(', ')}`);
    }

    async shutdown(): Promise<void> {
        for (const entry of this.inFlight.values()) entry.cancelRetry?.();
        this.inFlight.clear();

        for (const pool of this.pools.values()) {
            for (const member of pool.list()) {
                if (member.runtime) await member.runtime.retire('supervisor shutdown');
                pool.remove(member.agentId);
            }
        }
        logger.info('Supervisor', `🍂 ${this.id} stopped`);
    }

    /**
     * Create, register and start a child in the capability's pool.
     */
    async spawnChild(spec: ChildSpec): Promise<string> {
        const pool = this.pools.get(spec.capability);
        if (!pool) {
            throw new OrchestrationError('NO_CAPABLE_AGENT', `${this.id} has no pool for ${spec.capability}`);
        }
        const definition = spec.definition;
        const factory = spec.behavior
            ?? (definition ? () => createWorker(definition) : undefined)
            ?? this.factories.get(spec.capability);
        if (!factory) {
            throw new OrchestrationError('INVALID_DEFINITION', `No worker definition for ${spec.capability}`);
        }

        const agentId = spec.agentId ?? `${this.id}/${spec.capability}-${++this.spawned}`;
        const runtime = this.createChildRuntime(agentId, spec.capability, factory);
        const member = pool.add(agentId, runtime);

        try {
            await runtime.start();
        } catch (error) {
            pool.remove(member.agentId);
            await runtime.retire('failed to start');
            throw error;
        }
        this.childFactories.set(agentId, factory);
        logger.debug('Supervisor', `🌱 ${this.id} spawned ${agentId}`);
        return agentId;
    }

    private createChildRuntime(agentId: string, capability: string, factory: BehaviorFactory): AgentRuntime {
        return new AgentRuntime(
            this.bus,
            { agentId, capabilities: [capability], tier: 'execution' },
            factory(),
            {
                parentId: this.id,
                ...(this.options.childHeartbeatIntervalMs !== undefined
                    ? { heartbeatIntervalMs: this.options.childHeartbeatIntervalMs }
                    : {}),
            },
        );
    }

    // =========================================================================
    // Routing
    // =========================================================================

    async onDirective(directive: DirectiveEnvelope, ctx: AgentContext): Promise<void> {
        if (directive.payload.capability === CONTROL_CAPABILITY) {
            this.handleControl(directive, ctx);
            return;
        }

        const key = correlationOf(directive);
        if (this.inFlight.has(key)) {
            ctx.reportFailure(directive, {
                code: 'DUPLICATE_CORRELATION',
                message: `${key} is already in flight at ${this.id}`,
                retryable: false,
            });
            return;
        }

        const requested = directive.payload.capability;
        const capability = this.preferences.get(requested) ?? requested;
        const pool = this.pools.get(capability);
        if (!pool) {
            ctx.reportFailure(directive, {
                code: 'NO_CAPABLE_AGENT',
                message: `${this.id} has no pool for ${capability}`,
                retryable: false,
            });
            return;
        }

        const catalog = this.catalogs.get(capability);
        if (catalog && !catalog.has(directive.payload.action)) {
            ctx.reportFailure(directive, {
                code: 'UNKNOWN_ACTION',
                message: `Capability ${capability} has no action "${directive.payload.action}"`,
                retryable: false,
            });
            return;
        }

        const entry: InFlight = {
            key,
            original: directive,
            capability,
            state: 'QUEUED',
            attempts: 0,
            childId: null,
            dispatchedAt: 0,
        };
        this.inFlight.set(key, entry);
        ctx.defer(directive);

        if (requested !== capability) {
            logger.debug('Supervisor', `↪️ ${key} rerouted ${requested} → ${capability}`);
        }
        this.route(entry, pool, ctx);
    }

    /**
     * Assign the entry, queue it, or fail it upward.
     */
    private route(entry: InFlight, pool: AgentPool, ctx: AgentContext): void {
        const result = this.assign(entry, pool, ctx);
        if (result === 'ASSIGNED') return;
        if (result !== 'WAIT') {
            this.failUpward(entry, result, ctx);
            return;
        }

        if (pool.enqueue(entry.key)) {
            entry.state = 'QUEUED';
            logger.debug('Supervisor', `⏳ ${entry.key} queued for ${pool.capability} (depth ${pool.queueDepth})`);
            return;
        }
        this.failUpward(entry, {
            code: 'POOL_EXHAUSTED',
            message: `Pool ${pool.capability} has no idle member and a full queue`,
            retryable: true,
        }, ctx);
    }

    private assign(entry: InFlight, pool: AgentPool, ctx: AgentContext): Assignment {
        const now = Date.now();
        const target = entry.original.payload.target;

        if (target !== undefined) {
            const member = pool.get(target);
            if (!member) {
                return { code: 'UNKNOWN_AGENT', message: `${target} is not in pool ${pool.capability}`, retryable: false };
            }
            if (!member.breaker.canPass(now)) {
                return { code: 'CIRCUIT_OPEN', message: `Circuit open for ${target}`, retryable: true };
            }
            if (member.busy || !pool.hasCapacity()) return 'WAIT';
            return this.dispatchTo(entry, pool, member, ctx);
        }

        const members = pool.list();
        if (members.length === 0) {
            return { code: 'NO_CAPABLE_AGENT', message: `Pool ${pool.capability} has no members`, retryable: true };
        }
        if (members.every(m => !m.breaker.canPass(now))) {
            return { code: 'CIRCUIT_OPEN', message: `Every ${pool.capability} agent has an open circuit`, retryable: true };
        }

        const member = pool.nextIdle(m => m.breaker.canPass(now));
        if (!member) return 'WAIT';
        return this.dispatchTo(entry, pool, member, ctx);
    }

    private dispatchTo(entry: InFlight, pool: AgentPool, member: PoolMember, ctx: AgentContext): Assignment {
        member.breaker.acquire();
        pool.markBusy(member.agentId);
        entry.state = 'DISPATCHED';
        entry.childId = member.agentId;
        entry.attempts++;
        entry.dispatchedAt = Date.now();

        const child = deriveEnvelope(entry.original, {
            senderId: this.id,
            recipientIds: [member.agentId],
            payload: { ...entry.original.payload, capability: entry.capability },
        });
        logger.debug('Supervisor', `📤 ${entry.key} → ${member.agentId} (attempt ${entry.attempts})`);

        for (const receipt of ctx.post(child)) {
            if (receipt.status === 'DELIVERED') continue;
            pool.markIdle(member.agentId);
            entry.childId = null;
            if (receipt.reason === 'EXPIRED') {
                member.breaker.releaseTrial();
                return { code: 'EXPIRED', message: `${entry.key} expired before reaching ${member.agentId}`, retryable: false };
            }
            this.handleFailure(entry, member, {
                code: receipt.reason,
                message: `Could not deliver to ${member.agentId}`,
                retryable: true,
            }, 0, ctx);
        }
        return 'ASSIGNED';
    }

    /**
     * Hand queued work to members that became free.
     */
    private drainQueue(pool: AgentPool, ctx: AgentContext): void {
        for (;;) {
            const key = pool.peek();
            if (key === undefined) return;

            const entry = this.inFlight.get(key);
            if (!entry || entry.state !== 'QUEUED') {
                pool.dequeue();
                continue;
            }

            const result = this.assign(entry, pool, ctx);
            if (result === 'WAIT') return;
            pool.dequeue();
            if (result !== 'ASSIGNED') this.failUpward(entry, result, ctx);
        }
    }

    // =========================================================================
    // Child Reports
    // =========================================================================

    async onReport(report: ReportEnvelope, ctx: AgentContext): Promise<void> {
        const payload = report.payload;
        if (payload.status !== 'SUCCESS' && payload.status !== 'FAILED') {
            logger.debug('Supervisor', `${this.id} ignored ${payload.status} report from ${report.senderId}`);
            return;
        }

        const key = report.correlationId;
        const entry = key === undefined ? undefined : this.inFlight.get(key);
        if (!entry || entry.state !== 'DISPATCHED' || entry.childId !== report.senderId) {
            // Abandoned, or a stale report from before a restart.
            logger.debug('Supervisor', `🗑️ ${this.id} discarded late report ${key ?? report.id} from ${report.senderId}`);
            this.release(report.senderId, ctx);
            return;
        }

        const pool = this.pools.get(entry.capability);
        const member = pool?.get(report.senderId);
        entry.childId = null;
        pool?.markIdle(report.senderId);
        const latencyMs = payload.metrics?.latencyMs ?? Date.now() - entry.dispatchedAt;

        if (payload.status === 'SUCCESS') {
            member?.breaker.recordSuccess();
            this.inFlight.delete(entry.key);
            this.recordOutcome(entry.capability, true, latencyMs, ctx);
            ctx.reportSuccess(entry.original, payload.data, payload.metrics);
        } else if (payload.error.code === 'EXPIRED') {
            // The child never ran it; not held against its breaker.
            member?.breaker.releaseTrial();
            this.recordOutcome(entry.capability, false, latencyMs, ctx);
            this.failUpward(entry, payload.error, ctx);
        } else {
            this.handleFailure(entry, member, payload.error, latencyMs, ctx);
        }

        if (pool) this.drainQueue(pool, ctx);
    }

    private handleFailure(
        entry: InFlight,
        member: PoolMember | undefined,
        error: ReportError,
        latencyMs: number,
        ctx: AgentContext,
    ): void {
        const breakerState = member ? member.breaker.recordFailure() : 'CLOSED';
        this.recordOutcome(entry.capability, false, latencyMs, ctx);
        entry.lastError = error;
        entry.childId = null;

        const policy = this.policies.get(entry.capability) ?? resolveRetryPolicy();
        const retriesUsed = Math.max(0, entry.attempts - 1);

        if (
            error.retryable
            && policy.owner === 'SUPERVISOR'
            && retriesUsed < policy.maxRetries
            && breakerState !== 'OPEN'
        ) {
            const delay = backoffDelay(retriesUsed + 1, policy);
            entry.state = 'WAITING_RETRY';
            entry.cancelRetry = ctx.schedule(delay, { name: 'retry-due', data: { correlationId: entry.key } });
            logger.info('Supervisor', `🔄 ${entry.key} retry ${retriesUsed + 1}/${policy.maxRetries} in ${delay}ms (${error.code})`);
            return;
        }

        if (policy.owner === 'SUPERVISOR' && retriesUsed > 0) {
            this.failUpward(entry, {
                code: 'RETRIES_EXHAUSTED',
                message: `${entry.attempts} attempts failed, last: ${error.code}: ${error.message}`,
                retryable: false,
            }, ctx);
            return;
        }
        this.failUpward(entry, error, ctx);
    }

    private failUpward(entry: InFlight, error: ReportError, ctx: AgentContext): void {
        this.inFlight.delete(entry.key);
        entry.cancelRetry?.();
        logger.warn('Supervisor', `❌ ${entry.key} failed at ${this.id}: ${error.code}`);
        ctx.reportFailure(entry.original, error);
    }

    /**
     * Mark a child idle unless it is still assigned to something.
     */
    private release(agentId: string, ctx: AgentContext): void {
        for (const entry of this.inFlight.values()) {
            if (entry.childId === agentId) return;
        }
        for (const pool of this.pools.values()) {
            const member = pool.get(agentId);
            if (member?.busy) {
                pool.markIdle(agentId);
                this.drainQueue(pool, ctx);
            }
        }
    }

    // =========================================================================
    // Summaries
    // =========================================================================

    private recordOutcome(capability: string, success: boolean, latencyMs: number, ctx: AgentContext): void {
        const aggregator = this.aggregators.get(capability);
        if (aggregator?.record(success, latencyMs)) {
            this.sendSummary(capability, ctx);
        }
    }

    private sendSummary(capability: string, ctx: AgentContext): SummaryReport | undefined {
        const aggregator = this.aggregators.get(capability);
        const pool = this.pools.get(capability);
        if (!aggregator || !pool) return undefined;

        const summary = aggregator.flush({
            supervisorId: this.id,
            queueDepth: pool.queueDepth,
            poolSize: pool.size,
            busy: pool.busyCount,
        });
        if (ctx.parentId) {
            ctx.send({ recipientIds: [ctx.parentId], kind: 'REPORT', payload: summary });
        }
        return summary;
    }

    // =========================================================================
    // Events
    // =========================================================================

    async onEvent(event: EventEnvelope, ctx: AgentContext): Promise<void> {
        const data = event.payload.data;
        switch (event.payload.name) {
            case 'retry-due':
                this.retryDue(readString(data, 'correlationId'), ctx);
                break;
            case 'flush-summaries':
                for (const capability of this.pools.keys()) this.sendSummary(capability, ctx);
                break;
            case 'agent-unhealthy':
            case 'agent-fatal':
                await this.recoverChild(readString(data, 'agentId'), event.payload.name, ctx);
                break;
            case 'agent-joined':
                this.addRemote(readString(data, 'agentId'), readString(data, 'capability'), ctx);
                break;
            case 'agent-left':
                this.removeRemote(readString(data, 'agentId'), ctx);
                break;
            case 'abandon':
                this.abandon(readString(data, 'correlationId'), event.senderId, ctx);
                break;
            case 'system-alert':
                this.alerts.push({ from: event.senderId, receivedAt: Date.now(), data: data ?? {} });
                if (this.alerts.length > MAX_ALERTS) this.alerts.shift();
                logger.warn('Supervisor', `🚨 ${this.id} received system alert from ${event.senderId}`);
                break;
            default:
                logger.debug('Supervisor', `${this.id} ignored event ${event.payload.name}`);
        }
    }

    private retryDue(key: string | undefined, ctx: AgentContext): void {
        const entry = key === undefined ? undefined : this.inFlight.get(key);
        if (!entry || entry.state !== 'WAITING_RETRY') return;
        entry.cancelRetry = undefined;

        const pool = this.pools.get(entry.capability);
        if (!pool) {
            this.failUpward(entry, entry.lastError ?? {
                code: 'NO_CAPABLE_AGENT',
                message: `Pool ${entry.capability} is gone`,
                retryable: false,
            }, ctx);
            return;
        }
        this.route(entry, pool, ctx);
    }

    private abandon(key: string | undefined, requestedBy: string, ctx: AgentContext): void {
        const entry = key === undefined ? undefined : this.inFlight.get(key);
        if (!entry) return;

        this.inFlight.delete(entry.key);
        entry.cancelRetry?.();
        const pool = this.pools.get(entry.capability);
        pool?.removeQueued(entry.key);
        if (entry.state === 'DISPATCHED' && entry.childId !== null) {
            // The child stays busy until its late report; only the trial slot goes back.
            const member = pool?.get(entry.childId);
            if (member?.breaker.currentState() === 'HALF_OPEN') member.breaker.releaseTrial();
        }
        ctx.abandon(entry.original, `abandoned by ${requestedBy}`);
        logger.info('Supervisor', `🗑️ ${entry.key} abandoned at ${this.id}`);
    }

    private findMember(agentId: string): { pool: AgentPool; member: PoolMember } | undefined {
        for (const pool of this.pools.values()) {
            const member = pool.get(agentId);
            if (member) return { pool, member };
        }
        return undefined;
    }

    /**
     * Restart a local child in place; drop it when that is not possible.
     */
    private async recoverChild(agentId: string | undefined, cause: string, ctx: AgentContext): Promise<void> {
        const found = agentId === undefined ? undefined : this.findMember(agentId);
        if (!found) return;
        const { pool, member } = found;

        const runtime = member.runtime;
        if (!runtime) {
            this.removeMember(pool, member, `remote agent ${cause}`, ctx);
            return;
        }

        logger.warn('Supervisor', `♻️ ${this.id} restarting ${member.agentId} (${cause})`);
        // Stopping fails the child's open directive with a retryable report.
        await runtime.retire(`restart after ${cause}`);

        const factory = this.childFactories.get(member.agentId) ?? this.factories.get(pool.capability);
        if (!factory) {
            this.removeMember(pool, member, `no factory to restart after ${cause}`, ctx);
            return;
        }

        const fresh = this.createChildRuntime(member.agentId, pool.capability, factory);
        try {
            await fresh.start();
        } catch (error) {
            await fresh.retire('restart failed');
            const message = error instanceof Error ? error.message : String(error);
            this.removeMember(pool, member, `restart failed: ${message}`, ctx);
            return;
        }

        member.runtime = fresh;
        member.breaker.reset();
        this.restarts++;
        logger.info('Supervisor', `✅ ${this.id} restarted ${member.agentId}`);
    }

    private removeMember(pool: AgentPool, member: PoolMember, reason: string, ctx: AgentContext, notify = true): void {
        pool.remove(member.agentId);
        this.childFactories.delete(member.agentId);
        logger.warn('Supervisor', `📉 ${this.id} removed ${member.agentId} from ${pool.capability}: ${reason}`);

        for (const entry of [...this.inFlight.values()]) {
            if (entry.childId !== member.agentId) continue;
            this.handleFailure(entry, undefined, {
                code: 'AGENT_REMOVED',
                message: `${member.agentId} left the pool`,
                retryable: true,
            }, Date.now() - entry.dispatchedAt, ctx);
        }

        if (notify && ctx.parentId) {
            ctx.send({
                recipientIds: [ctx.parentId],
                kind: 'REPORT',
                payload: {
                    status: 'CAPACITY',
                    supervisorId: this.id,
                    capability: pool.capability,
                    poolSize: pool.size,
                    removedAgentId: member.agentId,
                    reason,
                },
            });
        }
        this.drainQueue(pool, ctx);
    }

    private addRemote(agentId: string | undefined, capability: string | undefined, ctx: AgentContext): void {
        if (agentId === undefined || capability === undefined) return;
        const pool = this.pools.get(capability);
        if (!pool) {
            logger.warn('Supervisor', `⚠️ ${this.id} has no pool for remote ${agentId} (${capability})`);
            return;
        }
        if (!this.bus.registry.has(agentId)) {
            logger.warn('Supervisor', `⚠️ ${this.id} ignored unregistered remote ${agentId}`);
            return;
        }
        try {
            pool.add(agentId, null);
        } catch (error) {
            logger.warn('Supervisor', `⚠️ ${this.id} could not add ${agentId}: ${error instanceof Error ? error.message : String(error)}`);
            return;
        }
        logger.info('Supervisor', `🔗 ${this.id} added remote ${agentId} to ${capability}`);
        this.drainQueue(pool, ctx);
    }

    private removeRemote(agentId: string | undefined, ctx: AgentContext): void {
        const found = agentId === undefined ? undefined : this.findMember(agentId);
        if (!found || found.member.runtime) return;
        this.removeMember(found.pool, found.member, 'remote agent disconnected', ctx, false);
    }

    // =========================================================================
    // Control & Queries
    // =========================================================================

    private handleControl(directive: DirectiveEnvelope, ctx: AgentContext): void {
        const parsed = controlDirectiveSchema.safeParse({
            action: directive.payload.action,
            params: directive.payload.params,
        });
        if (!parsed.success) {
            ctx.reportFailure(directive, {
                code: 'UNKNOWN_ACTION',
                message: `Invalid control directive ${directive.payload.action}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
                retryable: false,
            });
            return;
        }

        const control = parsed.data;
        const pool = this.pools.get(control.params.capability);
        if (!pool) {
            ctx.reportFailure(directive, {
                code: 'NO_CAPABLE_AGENT',
                message: `${this.id} has no pool for ${control.params.capability}`,
                retryable: false,
            });
            return;
        }

        switch (control.action) {
            case 'reduce-concurrency':
                pool.setConcurrencyLimit(control.params.limit);
                logger.warn('Supervisor', `🐢 ${this.id} limited ${pool.capability} to ${pool.concurrencyLimit} concurrent`);
                ctx.reportSuccess(directive, { capability: pool.capability, limit: pool.concurrencyLimit });
                return;
            case 'prefer-alternate': {
                const alternate = control.params.alternate;
                if (!this.pools.has(alternate)) {
                    ctx.reportFailure(directive, {
                        code: 'NO_CAPABLE_AGENT',
                        message: `${this.id} has no pool for alternate ${alternate}`,
                        retryable: false,
                    });
                    return;
                }
                this.preferences.set(pool.capability, alternate);
                logger.warn('Supervisor', `↪️ ${this.id} now routes ${pool.capability} to ${alternate}`);
                ctx.reportSuccess(directive, { capability: pool.capability, alternate });
                return;
            }
        }
    }

    onQuery(query: QueryEnvelope): SupervisorStatus {
        if (query.payload.question !== 'status') {
            throw new TaskError('UNKNOWN_QUESTION', `${this.id} cannot answer "${query.payload.question}"`);
        }
        return this.status();
    }

    status(): SupervisorStatus {
        const now = Date.now();
        return {
            supervisorId: this.id,
            state: this.ctx?.state ?? 'CREATED',
            pools: [...this.pools.values()].map(pool => ({
                capability: pool.capability,
                size: pool.size,
                busy: pool.busyCount,
                concurrencyLimit: pool.concurrencyLimit,
                queueDepth: pool.queueDepth,
                retryOwner: this.policies.get(pool.capability)?.owner ?? 'SUPERVISOR',
                members: pool.list().map(member => {
                    const load = member.runtime === null ? this.bus.registry.health(member.agentId)?.load : undefined;
                    return {
                        agentId: member.agentId,
                        busy: member.busy,
                        remote: member.runtime === null,
                        breaker: member.breaker.snapshot(now),
                        ...(load ? { load } : {}),
                    };
                }),
            })),
            inFlight: this.inFlight.size,
            preferences: Object.fromEntries(this.preferences),
            restarts: this.restarts,
            alerts: [...this.alerts],
        };
    }
}
