// =============================================================================
// CANOPY PROTOCOL - Common Types
// =============================================================================

import type { Envelope } from './messages.js';

export const AGENT_TIERS = ['execution', 'tactical', 'strategic'] as const;

export type AgentTier = (typeof AGENT_TIERS)[number];

/**
 * Who an agent is. Immutable once registered.
 */
export interface AgentIdentity {
    agentId: string;
    capabilities: string[];          // ['echo', 'text'] - routing is by capability only
    tier: AgentTier;
}

/**
 * Agent lifecycle. STOPPED is terminal.
 */
export type LifecycleState = 'CREATED' | 'INITIALIZING' | 'RUNNING' | 'DEGRADED' | 'STOPPED';

/**
 * Liveness record kept by the registry.
 */
export interface AgentHealth {
    lastHeartbeat: number;
    state: LifecycleState;
    failureCount: number;            // Rolling count, reset on recovery
    load?: AgentLoad;                // Only remote agents report one
}

/**
 * What a remote node says about itself with each heartbeat.
 */
export interface AgentLoad {
    busy: boolean;
    cpuUsage: number;                // 0-100 percentage
    memoryUsage: number;             // 0-100 percentage
}

export type DeadLetterReason =
    | 'EXPIRED'
    | 'UNKNOWN_RECIPIENT'
    | 'AGENT_REMOVED'
    | 'AGENT_STOPPED'
    | 'MAILBOX_FULL'
    | 'ABANDONED';

/**
 * An envelope that was not, or could not be, handed to a handler.
 */
export interface DeadLetterRecord {
    envelope: Envelope;
    recipientId: string;
    reason: DeadLetterReason;
    recordedAt: number;
    detail?: string;
}

export type DeliveryReceipt =
    | { recipientId: string; status: 'DELIVERED' }
    | { recipientId: string; status: 'DEAD_LETTERED'; reason: DeadLetterReason };

export type BreakerState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';
