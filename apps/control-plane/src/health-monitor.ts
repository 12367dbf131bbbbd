// =============================================================================
// CANOPY CONTROL PLANE - Health Monitor
// =============================================================================
// Watches heartbeat age for every registered agent and tells the agent's
// supervisor when it goes stale.
// =============================================================================

import { config } from '@canopy/config';
import { createEnvelope, type AgentLoad, type AgentTier, type LifecycleState } from '@canopy/protocol';
import { logger } from './logger.js';
import type { MessageBus } from './message-bus.js';

export const HEALTH_MONITOR_ID = 'health-monitor';

export interface HealthMonitorOptions {
    staleAfterMs?: number;
    intervalMs?: number;
}

export interface AgentStatus {
    agentId: string;
    tier: AgentTier;
    capabilities: string[];
    parentId?: string;
    state: LifecycleState;
    status: 'ONLINE' | 'STALE' | 'OFFLINE';
    lastHeartbeat: number;
    heartbeatAgeMs: number;
    failureCount: number;
    pending: number;
    load?: AgentLoad;
}

export class HealthMonitor {
    private timer: NodeJS.Timeout | null = null;
    // agentId → heartbeat timestamp we already reported as stale
    private notified = new Map<string, number>();
    private readonly staleAfterMs: number;
    private readonly intervalMs: number;

    constructor(
        private readonly bus: MessageBus,
        options: HealthMonitorOptions = {},
    ) {
        this.staleAfterMs = options.staleAfterMs ?? config.timing.staleAfter;
        this.intervalMs = options.intervalMs ?? config.timing.healthCheckInterval;
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => this.sweep(), this.intervalMs);
        logger.info('Health', `⏱️ Checking heartbeats every ${this.intervalMs / 1000}s (stale after ${this.staleAfterMs / 1000}s)`);
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        this.notified.clear();
    }

    /**
     * One pass over the registry. Returns the agents reported this pass.
     */
    sweep(now: number = Date.now()): string[] {
        const reported: string[] = [];
        const registry = this.bus.registry;

        for (const { identity, health, parentId } of registry.list()) {
            const agentId = identity.agentId;
            if (health.state === 'STOPPED' || health.state === 'CREATED') continue;

            const age = now - health.lastHeartbeat;
            if (age <= this.staleAfterMs) {
                this.notified.delete(agentId);
                continue;
            }
            // One event per stale episode; a fresh heartbeat re-arms it.
            if (this.notified.get(agentId) === health.lastHeartbeat) continue;
            this.notified.set(agentId, health.lastHeartbeat);

            if (!parentId) {
                logger.warn('Health', `💔 ${agentId} stale for ${age}ms and has no supervisor`);
                continue;
            }

            logger.warn('Health', `💔 ${agentId} stale for ${age}ms, notifying ${parentId}`);
            this.bus.send(createEnvelope({
                senderId: HEALTH_MONITOR_ID,
                recipientIds: [parentId],
                kind: 'EVENT',
                payload: {
                    name: 'agent-unhealthy',
                    data: { agentId, lastHeartbeat: health.lastHeartbeat, staleForMs: age },
                },
                priority: 9,
            }));
            reported.push(agentId);
        }

        // Forget agents that are gone.
        for (const agentId of this.notified.keys()) {
            if (!registry.has(agentId)) this.notified.delete(agentId);
        }
        return reported;
    }

    // -------------------------------------------------------------------------
    // Status Queries
    // -------------------------------------------------------------------------

    getAgentsStatus(now: number = Date.now()): AgentStatus[] {
        return this.bus.registry.list().map(({ identity, health, parentId }) => {
            const heartbeatAge = now - health.lastHeartbeat;
            let status: AgentStatus['status'] = health.state === 'STOPPED' ? 'OFFLINE' : 'ONLINE';
            if (status === 'ONLINE' && heartbeatAge > this.staleAfterMs) {
                status = 'STALE';
            }
            return {
                agentId: identity.agentId,
                tier: identity.tier,
                capabilities: [...identity.capabilities],
                ...(parentId !== undefined ? { parentId } : {}),
                state: health.state,
                status,
                lastHeartbeat: health.lastHeartbeat,
                heartbeatAgeMs: heartbeatAge,
                failureCount: health.failureCount,
                pending: this.bus.pendingFor(identity.agentId),
                ...(health.load ? { load: health.load } : {}),
            };
        });
    }

    getStatus(now: number = Date.now()) {
        return {
            agents: this.getAgentsStatus(now),
            summary: this.getMonitoringSummary(now),
        };
    }

    getMonitoringSummary(now: number = Date.now()) {
        const agents = this.getAgentsStatus(now);
        const capabilities = new Set<string>();
        agents.forEach(a => a.capabilities.forEach(c => capabilities.add(c)));

        return {
            timestamp: now,
            agents: {
                total: agents.length,
                online: agents.filter(a => a.status === 'ONLINE').length,
                stale: agents.filter(a => a.status === 'STALE').length,
                offline: agents.filter(a => a.status === 'OFFLINE').length,
                degraded: agents.filter(a => a.state === 'DEGRADED').length,
            },
            capabilities: Array.from(capabilities),
            deadLetters: this.bus.deadLetters.getStats(),
        };
    }
}
