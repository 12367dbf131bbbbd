// =============================================================================
// CANOPY CONTROL PLANE - Agent Runtime
// =============================================================================
// Hosts one AgentBehavior: owns its lifecycle, drains its mailbox one envelope
// at a time and enforces the exactly-once report contract for directives.
// =============================================================================

import { config } from '@canopy/config';
import {
    OrchestrationError,
    classifyError,
    createEnvelope,
    createReport,
    isExpired,
    type AgentIdentity,
    type AgentLoad,
    type AgentTier,
    type CoordinateEnvelope,
    type CoordinatePayload,
    type DeadLetterReason,
    type DeliveryReceipt,
    type DirectiveEnvelope,
    type Envelope,
    type EnvelopeKind,
    type EventEnvelope,
    type EventPayload,
    type LifecycleState,
    type OutboundDraft,
    type QueryEnvelope,
    type ReportEnvelope,
    type ReportError,
    type ReportMetrics,
    type TerminalReport,
} from '@canopy/protocol';
import { logger } from './logger.js';
import { tierAddress, type AgentHandle, type MessageBus } from './message-bus.js';

// -----------------------------------------------------------------------------
// Behavior Contract
// -----------------------------------------------------------------------------

/**
 * What an agent does. Every tier is one of these composed into a runtime;
 * all hooks are optional.
 */
export interface AgentBehavior {
    initialize?(ctx: AgentContext): Promise<void> | void;
    onDirective?(directive: DirectiveEnvelope, ctx: AgentContext): Promise<void> | void;
    onReport?(report: ReportEnvelope, ctx: AgentContext): Promise<void> | void;
    /** The return value is the answer, sent back as a correlated REPORT. */
    onQuery?(query: QueryEnvelope, ctx: AgentContext): Promise<unknown> | unknown;
    /** Return a payload to answer the proposer. */
    onCoordinate?(message: CoordinateEnvelope, ctx: AgentContext): Promise<CoordinatePayload | void> | CoordinatePayload | void;
    onEvent?(event: EventEnvelope, ctx: AgentContext): Promise<void> | void;
    shutdown?(ctx: AgentContext): Promise<void> | void;
}

export interface ScheduleOptions {
    priority?: number;
}

/**
 * The runtime's services as seen from inside a behavior.
 */
export interface AgentContext {
    readonly agentId: string;
    readonly identity: Readonly<AgentIdentity>;
    readonly parentId: string | undefined;
    readonly bus: MessageBus;
    readonly state: LifecycleState;

    send<K extends EnvelopeKind>(draft: OutboundDraft<K>): DeliveryReceipt[];
    /** Send an already-built envelope as is. */
    post(envelope: Envelope): DeliveryReceipt[];
    broadcast(tier: AgentTier, event: EventPayload, options?: ScheduleOptions): DeliveryReceipt[];
    deadLetter(envelope: Envelope, reason: DeadLetterReason, detail?: string): void;

    reportSuccess(directive: DirectiveEnvelope, data?: unknown, metrics?: ReportMetrics): boolean;
    reportFailure(directive: DirectiveEnvelope, error: ReportError, metrics?: ReportMetrics): boolean;
    /** The behavior will report on this directive later, from another dispatch. */
    defer(directive: DirectiveEnvelope): void;
    /** Someone else answers this envelope; the runtime sends nothing for it. */
    handOff(envelope: Envelope): void;
    /** Close a deferred directive without a report and dead-letter it as ABANDONED. */
    abandon(directive: DirectiveEnvelope, detail?: string): void;

    /** Post an event to ourselves after a delay. Returns a cancel function. */
    schedule(delayMs: number, event: EventPayload, options?: ScheduleOptions): () => void;
    every(intervalMs: number, event: EventPayload, options?: ScheduleOptions): () => void;
}

export interface RuntimeOptions {
    parentId?: string;
    heartbeatIntervalMs?: number;
    mailboxCapacity?: number;
    /** Off for proxies whose liveness comes from elsewhere. */
    autoHeartbeat?: boolean;
}

interface OpenDirective {
    envelope: DirectiveEnvelope;
    receivedAt: number;
    deferred: boolean;
}

const TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
    CREATED: ['INITIALIZING', 'STOPPED'],
    INITIALIZING: ['RUNNING', 'STOPPED'],
    RUNNING: ['DEGRADED', 'STOPPED'],
    DEGRADED: ['RUNNING', 'STOPPED'],
    STOPPED: [],
};

// -----------------------------------------------------------------------------
// Runtime
// -----------------------------------------------------------------------------

export class AgentRuntime {
    private lifecycle: LifecycleState = 'CREATED';
    private handle: AgentHandle | null = null;
    private loop: Promise<void> | null = null;
    private heartbeatTimer: NodeJS.Timeout | null = null;
    private timers = new Set<NodeJS.Timeout>();
    private open = new Map<string, OpenDirective>();
    private handedOff = new Set<string>();
    private readonly ctx: AgentContext;
    private readonly heartbeatIntervalMs: number;
    private readonly autoHeartbeat: boolean;

    constructor(
        private readonly bus: MessageBus,
        readonly identity: AgentIdentity,
        private readonly behavior: AgentBehavior,
        private readonly options: RuntimeOptions = {},
    ) {
        this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? config.timing.heartbeatInterval;
        this.autoHeartbeat = options.autoHeartbeat ?? true;
        this.ctx = this.createContext();
    }

    get id(): string {
        return this.identity.agentId;
    }

    get state(): LifecycleState {
        return this.lifecycle;
    }

    get parentId(): string | undefined {
        return this.options.parentId;
    }

    /**
     * Register, initialize and begin processing. Rejects with
     * INITIALIZATION_FAILED when the behavior's initialize throws.
     */
    async start(): Promise<void> {
        if (this.lifecycle !== 'CREATED') {
            throw new OrchestrationError('INVALID_TRANSITION', `${this.id} cannot start from ${this.lifecycle}`);
        }

        this.handle = this.bus.register(this.identity, {
            ...(this.options.parentId !== undefined ? { parentId: this.options.parentId } : {}),
            ...(this.options.mailboxCapacity !== undefined ? { mailboxCapacity: this.options.mailboxCapacity } : {}),
        });
        this.transition('INITIALIZING');

        try {
            await this.behavior.initialize?.(this.ctx);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Runtime', `❌ ${this.id} failed to initialize: ${message}`);
            this.halt('initialization failed');
            throw new OrchestrationError('INITIALIZATION_FAILED', `${this.id} failed to initialize: ${message}`, { cause: error });
        }

        this.transition('RUNNING');
        if (this.autoHeartbeat) {
            this.heartbeatTimer = setInterval(() => this.heartbeat(), this.heartbeatIntervalMs);
        }
        this.loop = this.run().catch((error: unknown) => {
            logger.error('Runtime', `❌ ${this.id} loop crashed: ${error instanceof Error ? error.message : String(error)}`);
            this.halt('loop crashed');
        });
    }

    /**
     * Stop processing. Pending envelopes are dead-lettered and open
     * directives fail with AGENT_STOPPED. Does not wait for the loop.
     */
    async stop(reason: string = 'requested'): Promise<void> {
        if (this.lifecycle === 'STOPPED') return;
        this.halt(reason);

        try {
            await this.behavior.shutdown?.(this.ctx);
        } catch (error) {
            logger.error('Runtime', `❌ ${this.id} shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    /**
     * Stop and leave the registry.
     */
    async retire(reason: string = 'retired'): Promise<void> {
        await this.stop(reason);
        if (this.handle) this.bus.unregister(this.id);
    }

    /**
     * Resolves once the loop has exited. Only meaningful after stop().
     */
    async stopped(): Promise<void> {
        await this.loop;
    }

    /** Remote proxies pass on the load their node reported. */
    heartbeat(load?: AgentLoad): void {
        if (this.lifecycle === 'STOPPED') return;
        this.handle?.heartbeat(load);
    }

    // -------------------------------------------------------------------------
    // Lifecycle
    // -------------------------------------------------------------------------

    private transition(to: LifecycleState): void {
        const from = this.lifecycle;
        if (from === to) return;
        if (!TRANSITIONS[from].includes(to)) {
            throw new OrchestrationError('INVALID_TRANSITION', `${this.id}: ${from} → ${to} is not allowed`);
        }
        this.lifecycle = to;
        this.handle?.setState(to);
        logger.lifecycle(this.id, from, to);
    }

    private halt(reason: string): void {
        if (this.lifecycle === 'STOPPED') return;
        this.transition('STOPPED');

        if (this.heartbeatTimer) {
            clearInterval(this.heartbeatTimer);
            this.heartbeatTimer = null;
        }
        for (const timer of this.timers) clearTimeout(timer);
        this.timers.clear();

        if (this.handle) {
            for (const envelope of this.handle.mailbox.close()) {
                this.bus.deadLetter(envelope, this.id, 'AGENT_STOPPED', reason);
            }
        }
        for (const { envelope } of [...this.open.values()]) {
            this.finish(envelope, {
                status: 'FAILED',
                error: { code: 'AGENT_STOPPED', message: `${this.id} stopped: ${reason}`, retryable: true },
            });
        }
    }

    private async run(): Promise<void> {
        const handle = this.requireHandle();
        while (this.lifecycle === 'RUNNING' || this.lifecycle === 'DEGRADED') {
            const envelope = await handle.mailbox.take();
            if (!envelope) break;

            if (isExpired(envelope)) {
                this.bus.deadLetter(envelope, this.id, 'EXPIRED', 'expired before dispatch');
                if (envelope.kind === 'DIRECTIVE') this.reportExpired(envelope);
                continue;
            }

            await this.dispatch(envelope);
            if (this.autoHeartbeat) this.heartbeat();
        }
    }

    // -------------------------------------------------------------------------
    // Dispatch
    // -------------------------------------------------------------------------

    private async dispatch(envelope: Envelope): Promise<void> {
        try {
            switch (envelope.kind) {
                case 'DIRECTIVE':
                    await this.handleDirective(envelope);
                    break;
                case 'REPORT':
                    await this.behavior.onReport?.(envelope, this.ctx);
                    break;
                case 'QUERY':
                    await this.handleQuery(envelope);
                    break;
                case 'COORDINATE':
                    await this.handleCoordinate(envelope);
                    break;
                case 'EVENT':
                    await this.behavior.onEvent?.(envelope, this.ctx);
                    break;
            }
            if (this.lifecycle === 'DEGRADED') {
                this.transition('RUNNING');
                this.handle?.resetFailures();
            }
        } catch (error) {
            await this.handleError(envelope, error);
        } finally {
            this.handedOff.delete(envelope.id);
        }
    }

    private async handleDirective(directive: DirectiveEnvelope): Promise<void> {
        this.open.set(directive.id, { envelope: directive, receivedAt: Date.now(), deferred: false });

        if (!this.behavior.onDirective) {
            throw new OrchestrationError('UNKNOWN_ACTION', `${this.id} does not accept directives`);
        }
        await this.behavior.onDirective(directive, this.ctx);

        const open = this.open.get(directive.id);
        if (open && !open.deferred) {
            logger.warn('Runtime', `⚠️ ${this.id} finished ${directive.id} without a report`);
            this.finish(directive, {
                status: 'FAILED',
                error: { code: 'NO_REPORT', message: `${this.id} produced no report`, retryable: false },
            });
        }
    }

    private async handleQuery(query: QueryEnvelope): Promise<void> {
        if (!this.behavior.onQuery) {
            throw new OrchestrationError('UNKNOWN_ACTION', `${this.id} does not answer queries`);
        }
        const answer = await this.behavior.onQuery(query, this.ctx);
        if (this.handedOff.has(query.id)) return;
        this.bus.send(createReport(query, this.id, { status: 'SUCCESS', data: answer }));
    }

    private async handleCoordinate(message: CoordinateEnvelope): Promise<void> {
        const response = await this.behavior.onCoordinate?.(message, this.ctx);
        if (!response || this.handedOff.has(message.id)) return;
        this.bus.send(createEnvelope({
            senderId: this.id,
            recipientIds: [message.senderId],
            kind: 'COORDINATE',
            payload: response,
            priority: message.priority,
            correlationId: message.correlationId ?? message.id,
        }));
    }

    private async handleError(envelope: Envelope, error: unknown): Promise<void> {
        const classified = classifyError(error);
        const failure: ReportError = { code: classified.code, message: classified.message, retryable: classified.retryable };

        if (envelope.kind === 'DIRECTIVE') {
            this.finish(envelope, { status: 'FAILED', error: failure });
        } else if (envelope.kind === 'QUERY' && !this.handedOff.has(envelope.id)) {
            this.bus.send(createReport(envelope, this.id, { status: 'FAILED', error: failure }));
        }

        if (classified.fatal) {
            logger.error('Runtime', `💥 ${this.id} hit a fatal error: ${classified.message}`);
            this.notifyParent('agent-fatal', { agentId: this.id, code: classified.code, message: classified.message });
            await this.stop(`fatal: ${classified.message}`);
            return;
        }

        if (!classified.unexpected) {
            logger.debug('Runtime', `${this.id} ${envelope.kind} ${envelope.id} failed: ${classified.code}`);
            return;
        }

        logger.warn('Runtime', `⚠️ ${this.id} ${envelope.kind} handler threw: ${classified.message}`);
        this.handle?.recordFailure();
        if (this.lifecycle === 'RUNNING') this.transition('DEGRADED');
    }

    // -------------------------------------------------------------------------
    // Reports
    // -------------------------------------------------------------------------

    private finish(directive: DirectiveEnvelope, payload: TerminalReport): boolean {
        const open = this.open.get(directive.id);
        if (!open) {
            logger.warn('Runtime', `⚠️ ${this.id} ignored a second report for ${directive.id}`);
            return false;
        }
        this.open.delete(directive.id);

        const metrics: ReportMetrics = { ...payload.metrics, latencyMs: Date.now() - open.receivedAt };
        this.bus.send(createReport(directive, this.id, { ...payload, metrics }));
        return true;
    }

    /** The sender still holds the directive open; close it with one failure. */
    private reportExpired(directive: DirectiveEnvelope): void {
        logger.warn('Runtime', `⌛ ${this.id} dropped ${directive.id}: expired before dispatch`);
        this.bus.send(createReport(directive, this.id, {
            status: 'FAILED',
            error: { code: 'EXPIRED', message: 'Directive expired before dispatch', retryable: false },
        }));
    }

    private notifyParent(name: string, data: Record<string, unknown>): void {
        const parentId = this.options.parentId;
        if (!parentId) return;
        this.bus.send(createEnvelope({
            senderId: this.id,
            recipientIds: [parentId],
            kind: 'EVENT',
            payload: { name, data },
            priority: 9,
        }));
    }

    // -------------------------------------------------------------------------
    // Context
    // -------------------------------------------------------------------------

    private requireHandle(): AgentHandle {
        if (!this.handle) {
            throw new OrchestrationError('INVALID_TRANSITION', `${this.id} has not been started`);
        }
        return this.handle;
    }

    private selfEvent(event: EventPayload, options: ScheduleOptions): void {
        if (this.lifecycle === 'STOPPED') return;
        this.bus.send(createEnvelope({
            senderId: this.id,
            recipientIds: [this.id],
            kind: 'EVENT',
            payload: event,
            ...(options.priority !== undefined ? { priority: options.priority } : {}),
        }));
    }

    private createContext(): AgentContext {
        const runtime = this;
        const bus = this.bus;

        return {
            get agentId() {
                return runtime.id;
            },
            get identity() {
                return runtime.identity;
            },
            get parentId() {
                return runtime.options.parentId;
            },
            get state() {
                return runtime.lifecycle;
            },
            bus,

            send<K extends EnvelopeKind>(draft: OutboundDraft<K>): DeliveryReceipt[] {
                return bus.send(createEnvelope({ ...draft, senderId: runtime.id }));
            },

            post(envelope: Envelope): DeliveryReceipt[] {
                return bus.send(envelope);
            },

            broadcast(tier: AgentTier, event: EventPayload, options: ScheduleOptions = {}): DeliveryReceipt[] {
                return bus.broadcast(tier, createEnvelope({
                    senderId: runtime.id,
                    recipientIds: [tierAddress(tier)],
                    kind: 'EVENT',
                    payload: event,
                    ...(options.priority !== undefined ? { priority: options.priority } : {}),
                }));
            },

            deadLetter(envelope: Envelope, reason: DeadLetterReason, detail?: string): void {
                bus.deadLetter(envelope, runtime.id, reason, detail);
            },

            reportSuccess(directive: DirectiveEnvelope, data?: unknown, metrics?: ReportMetrics): boolean {
                return runtime.finish(directive, {
                    status: 'SUCCESS',
                    ...(data !== undefined ? { data } : {}),
                    ...(metrics !== undefined ? { metrics } : {}),
                });
            },

            reportFailure(directive: DirectiveEnvelope, error: ReportError, metrics?: ReportMetrics): boolean {
                return runtime.finish(directive, {
                    status: 'FAILED',
                    error,
                    ...(metrics !== undefined ? { metrics } : {}),
                });
            },

            defer(directive: DirectiveEnvelope): void {
                const open = runtime.open.get(directive.id);
                if (open) open.deferred = true;
            },

            handOff(envelope: Envelope): void {
                runtime.handedOff.add(envelope.id);
                runtime.open.delete(envelope.id);
            },

            abandon(directive: DirectiveEnvelope, detail?: string): void {
                runtime.open.delete(directive.id);
                bus.deadLetter(directive, runtime.id, 'ABANDONED', detail);
            },

            schedule(delayMs: number, event: EventPayload, options: ScheduleOptions = {}): () => void {
                const timer = setTimeout(() => {
                    runtime.timers.delete(timer);
                    runtime.selfEvent(event, options);
                }, delayMs);
                runtime.timers.add(timer);
                return () => {
                    clearTimeout(timer);
                    runtime.timers.delete(timer);
                };
            },

            every(intervalMs: number, event: EventPayload, options: ScheduleOptions = {}): () => void {
                const timer = setInterval(() => runtime.selfEvent(event, options), intervalMs);
                runtime.timers.add(timer);
                return () => {
                    clearInterval(timer);
                    runtime.timers.delete(timer);
                };
            },
        };
    }
}
