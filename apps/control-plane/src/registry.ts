import {
    OrchestrationError,
    type AgentHealth,
    type AgentIdentity,
    type AgentLoad,
    type AgentTier,
    type LifecycleState,
} from '@canopy/protocol';

/**
 * Changes to an agent's health record. This is the only way health is
 * mutated, and only registration handles issue these.
 */
export type HealthUpdate =
    | { type: 'HEARTBEAT'; load?: AgentLoad }
    | { type: 'STATE'; state: LifecycleState }
    | { type: 'FAILURE' }
    | { type: 'RECOVERED' };

export interface RegisteredAgent {
    identity: Readonly<AgentIdentity>;
    health: AgentHealth;
    parentId?: string;
    registeredAt: number;
}

export interface FindOptions {
    tier?: AgentTier;
}

/**
 * Agent Registry - capability-indexed directory of live agents.
 *
 * Constructed once by the system and passed by reference; nothing reaches it
 * through module state. Every mutation is a single synchronous update of the
 * index structures.
 */
export class AgentRegistry {
    private agents = new Map<string, RegisteredAgent>();
    private capabilityIndex = new Map<string, Set<string>>();

    /**
     * Register a new agent. Fails if the id is taken.
     */
    add(identity: AgentIdentity, parentId?: string): void {
        if (this.agents.has(identity.agentId)) {
            throw new OrchestrationError('DUPLICATE_IDENTITY', `Agent ${identity.agentId} is already registered`);
        }

        const frozen: Readonly<AgentIdentity> = Object.freeze({
            agentId: identity.agentId,
            capabilities: [...new Set(identity.capabilities)],
            tier: identity.tier,
        });
        const now = Date.now();

        this.agents.set(identity.agentId, {
            identity: frozen,
            health: { lastHeartbeat: now, state: 'CREATED', failureCount: 0 },
            ...(parentId !== undefined ? { parentId } : {}),
            registeredAt: now,
        });

        for (const capability of frozen.capabilities) {
            let ids = this.capabilityIndex.get(capability);
            if (!ids) {
                ids = new Set();
                this.capabilityIndex.set(capability, ids);
            }
            ids.add(identity.agentId);
        }
    }

    /**
     * Remove an agent and all of its index entries.
     */
    remove(agentId: string): boolean {
        const entry = this.agents.get(agentId);
        if (!entry) return false;

        for (const capability of entry.identity.capabilities) {
            const ids = this.capabilityIndex.get(capability);
            if (!ids) continue;
            ids.delete(agentId);
            if (ids.size === 0) this.capabilityIndex.delete(capability);
        }
        return this.agents.delete(agentId);
    }

    /**
     * Apply a health update. Returns false for unknown agents.
     */
    reportHealth(agentId: string, update: HealthUpdate): boolean {
        const entry = this.agents.get(agentId);
        if (!entry) return false;

        switch (update.type) {
            case 'HEARTBEAT':
                entry.health.lastHeartbeat = Date.now();
                if (update.load) entry.health.load = { ...update.load };
                break;
            case 'STATE':
                entry.health.state = update.state;
                break;
            case 'FAILURE':
                entry.health.failureCount++;
                break;
            case 'RECOVERED':
                entry.health.failureCount = 0;
                break;
        }
        return true;
    }

    has(agentId: string): boolean {
        return this.agents.has(agentId);
    }

    identity(agentId: string): AgentIdentity | undefined {
        const entry = this.agents.get(agentId);
        return entry ? { ...entry.identity, capabilities: [...entry.identity.capabilities] } : undefined;
    }

    /**
     * Copy of the health record; callers cannot mutate the original.
     */
    health(agentId: string): AgentHealth | undefined {
        const entry = this.agents.get(agentId);
        return entry ? { ...entry.health } : undefined;
    }

    parentOf(agentId: string): string | undefined {
        return this.agents.get(agentId)?.parentId;
    }

    childrenOf(parentId: string): string[] {
        const result: string[] = [];
        for (const [agentId, entry] of this.agents) {
            if (entry.parentId === parentId) result.push(agentId);
        }
        return result;
    }

    /**
     * Agents advertising a capability, in registration order.
     */
    findByCapability(capability: string, options: FindOptions = {}): string[] {
        const ids = this.capabilityIndex.get(capability);
        if (!ids) return [];
        const result = [...ids];
        if (options.tier === undefined) return result;
        return result.filter(id => this.agents.get(id)?.identity.tier === options.tier);
    }

    findByTier(tier: AgentTier): string[] {
        const result: string[] = [];
        for (const [agentId, entry] of this.agents) {
            if (entry.identity.tier === tier) result.push(agentId);
        }
        return result;
    }

    /**
     * Snapshot of every registered agent.
     */
    list(): RegisteredAgent[] {
        return Array.from(this.agents.values()).map(entry => ({
            ...entry,
            health: { ...entry.health },
        }));
    }

    getStats(): { total: number; byTier: Record<AgentTier, number>; capabilities: number } {
        const byTier: Record<AgentTier, number> = { execution: 0, tactical: 0, strategic: 0 };
        for (const entry of this.agents.values()) {
            byTier[entry.identity.tier]++;
        }
        return { total: this.agents.size, byTier, capabilities: this.capabilityIndex.size };
    }

    /**
     * Teardown: forget everything.
     */
    clear(): void {
        this.agents.clear();
        this.capabilityIndex.clear();
    }
}
