// =============================================================================
// CANOPY CONTROL PLANE - Agent Pool
// =============================================================================
// Children of one supervisor that share a capability, with a bounded queue of
// work waiting for an idle member.
// =============================================================================

import { config } from '@canopy/config';
import { OrchestrationError } from '@canopy/protocol';
import type { AgentRuntime } from './agent-runtime.js';
import { CircuitBreaker, type BreakerOptions } from './circuit-breaker.js';

export interface PoolMember {
    agentId: string;
    /** Null for remote proxies; the bridge owns their runtime. */
    runtime: AgentRuntime | null;
    breaker: CircuitBreaker;
    busy: boolean;
    joinedAt: number;
}

export interface PoolOptions {
    maxSize?: number;
    maxQueueDepth?: number;
    concurrencyLimit?: number;
    breaker?: BreakerOptions;
}

export class AgentPool {
    private members: PoolMember[] = [];
    private queue: string[] = [];
    private cursor = 0;
    private limit: number;
    readonly maxSize: number;
    readonly maxQueueDepth: number;

    constructor(
        readonly capability: string,
        private readonly options: PoolOptions = {},
    ) {
        this.maxSize = options.maxSize ?? config.supervisor.maxPoolSize;
        this.maxQueueDepth = options.maxQueueDepth ?? config.supervisor.maxQueueDepth;
        this.limit = options.concurrencyLimit ?? this.maxSize;
    }

    // -------------------------------------------------------------------------
    // Membership
    // -------------------------------------------------------------------------

    add(agentId: string, runtime: AgentRuntime | null): PoolMember {
        if (this.members.length >= this.maxSize) {
            throw new OrchestrationError('POOL_FULL', `Pool ${this.capability} is full (${this.maxSize})`);
        }
        if (this.get(agentId)) {
            throw new OrchestrationError('DUPLICATE_IDENTITY', `${agentId} is already in pool ${this.capability}`);
        }
        const member: PoolMember = {
            agentId,
            runtime,
            breaker: new CircuitBreaker(agentId, this.options.breaker),
            busy: false,
            joinedAt: Date.now(),
        };
        this.members.push(member);
        return member;
    }

    remove(agentId: string): PoolMember | undefined {
        const index = this.members.findIndex(m => m.agentId === agentId);
        if (index === -1) return undefined;
        const [member] = this.members.splice(index, 1);
        if (this.cursor > index) this.cursor--;
        return member;
    }

    get(agentId: string): PoolMember | undefined {
        return this.members.find(m => m.agentId === agentId);
    }

    list(): PoolMember[] {
        return [...this.members];
    }

    get size(): number {
        return this.members.length;
    }

    get busyCount(): number {
        return this.members.filter(m => m.busy).length;
    }

    // -------------------------------------------------------------------------
    // Selection
    // -------------------------------------------------------------------------

    get concurrencyLimit(): number {
        return this.limit;
    }

    setConcurrencyLimit(limit: number): void {
        this.limit = Math.max(1, Math.floor(limit));
    }

    hasCapacity(): boolean {
        return this.busyCount < this.limit;
    }

    /**
     * Next idle member that `usable` accepts, round-robin. Undefined when the
     * concurrency limit is reached or nobody qualifies.
     */
    nextIdle(usable: (member: PoolMember) => boolean = () => true): PoolMember | undefined {
        if (!this.hasCapacity()) return undefined;
        const count = this.members.length;
        for (let i = 0; i < count; i++) {
            const index = (this.cursor + i) % count;
            const member = this.members[index];
            if (!member.busy && usable(member)) {
                this.cursor = (index + 1) % count;
                return member;
            }
        }
        return undefined;
    }

    markBusy(agentId: string): void {
        const member = this.get(agentId);
        if (member) member.busy = true;
    }

    markIdle(agentId: string): void {
        const member = this.get(agentId);
        if (member) member.busy = false;
    }

    // -------------------------------------------------------------------------
    // Waiting Work
    // -------------------------------------------------------------------------

    get queueDepth(): number {
        return this.queue.length;
    }

    /**
     * Queue a correlation key. False when the queue is at its bound.
     */
    enqueue(key: string): boolean {
        if (this.queue.length >= this.maxQueueDepth) return false;
        this.queue.push(key);
        return true;
    }

    peek(): string | undefined {
        return this.queue[0];
    }

    dequeue(): string | undefined {
        return this.queue.shift();
    }

    removeQueued(key: string): boolean {
        const index = this.queue.indexOf(key);
        if (index === -1) return false;
        this.queue.splice(index, 1);
        return true;
    }
}
