// =============================================================================
// CANOPY CONTROL PLANE - Message Bus
// =============================================================================
// Local, best-effort delivery into per-agent mailboxes. Nothing vanishes:
// whatever cannot be delivered is recorded in the dead-letter store.
// =============================================================================

import { config } from '@canopy/config';
import {
    isExpired,
    type AgentHealth,
    type AgentIdentity,
    type AgentLoad,
    type AgentTier,
    type DeadLetterReason,
    type DeliveryReceipt,
    type Envelope,
    type LifecycleState,
} from '@canopy/protocol';
import { DeadLetterStore } from './dead-letters.js';
import { logger } from './logger.js';
import { Mailbox } from './mailbox.js';
import { AgentRegistry, type FindOptions } from './registry.js';

/**
 * What an agent gets back from registration: its mailbox and the health
 * reporting path. Held by the agent's runtime only.
 */
export interface AgentHandle {
    readonly identity: Readonly<AgentIdentity>;
    readonly mailbox: Mailbox;
    heartbeat(load?: AgentLoad): void;
    setState(state: LifecycleState): void;
    recordFailure(): void;
    resetFailures(): void;
    health(): AgentHealth | undefined;
}

export interface RegisterOptions {
    parentId?: string;
    mailboxCapacity?: number;
}

export interface BusOptions {
    mailboxCapacity?: number;
}

/**
 * Address used as the recipient list of broadcast envelopes.
 */
export function tierAddress(tier: AgentTier): string {
    return `tier:${tier}`;
}

export class MessageBus {
    private mailboxes = new Map<string, Mailbox>();
    private readonly mailboxCapacity: number;

    constructor(
        readonly registry: AgentRegistry,
        readonly deadLetters: DeadLetterStore,
        options: BusOptions = {},
    ) {
        this.mailboxCapacity = options.mailboxCapacity ?? config.bus.mailboxCapacity;
    }

    // -------------------------------------------------------------------------
    // Membership
    // -------------------------------------------------------------------------

    /**
     * Add an agent to the registry and give it a mailbox.
     */
    register(identity: AgentIdentity, options: RegisterOptions = {}): AgentHandle {
        this.registry.add(identity, options.parentId);

        const agentId = identity.agentId;
        const mailbox = new Mailbox(agentId, options.mailboxCapacity ?? this.mailboxCapacity);
        this.mailboxes.set(agentId, mailbox);

        const registry = this.registry;
        const frozen: Readonly<AgentIdentity> = Object.freeze({ ...identity, capabilities: [...identity.capabilities] });
        logger.debug('Bus', `📥 Registered ${agentId} (${identity.tier}) [${identity.capabilities.join(', ')}]`);

        return {
            identity: frozen,
            mailbox,
            heartbeat: (load?: AgentLoad) => {
                registry.reportHealth(agentId, load ? { type: 'HEARTBEAT', load } : { type: 'HEARTBEAT' });
            },
            setState: (state: LifecycleState) => {
                registry.reportHealth(agentId, { type: 'STATE', state });
            },
            recordFailure: () => {
                registry.reportHealth(agentId, { type: 'FAILURE' });
            },
            resetFailures: () => {
                registry.reportHealth(agentId, { type: 'RECOVERED' });
            },
            health: () => registry.health(agentId),
        };
    }

    /**
     * Remove an agent. Anything still queued for it is dead-lettered.
     */
    unregister(agentId: string): { removed: boolean; deadLettered: number } {
        const removed = this.registry.remove(agentId);
        const mailbox = this.mailboxes.get(agentId);
        this.mailboxes.delete(agentId);

        let deadLettered = 0;
        if (mailbox) {
            for (const envelope of mailbox.close()) {
                this.deadLetter(envelope, agentId, 'AGENT_REMOVED');
                deadLettered++;
            }
        }
        if (removed) {
            logger.debug('Bus', `📤 Unregistered ${agentId} (${deadLettered} dead-lettered)`);
        }
        return { removed, deadLettered };
    }

    findByCapability(capability: string, options: FindOptions = {}): string[] {
        return this.registry.findByCapability(capability, options);
    }

    // -------------------------------------------------------------------------
    // Delivery
    // -------------------------------------------------------------------------

    /**
     * Deliver to every recipient named on the envelope.
     */
    send(envelope: Envelope): DeliveryReceipt[] {
        const expired = isExpired(envelope);
        return envelope.recipientIds.map(recipientId =>
            expired ? this.reject(envelope, recipientId, 'EXPIRED') : this.deliver(envelope, recipientId)
        );
    }

    /**
     * Deliver one copy of the same envelope to every agent of a tier.
     */
    broadcast(tier: AgentTier, envelope: Envelope): DeliveryReceipt[] {
        const expired = isExpired(envelope);
        return this.registry.findByTier(tier).map(recipientId =>
            expired ? this.reject(envelope, recipientId, 'EXPIRED') : this.deliver(envelope, recipientId)
        );
    }

    deadLetter(envelope: Envelope, recipientId: string, reason: DeadLetterReason, detail?: string): void {
        this.deadLetters.record(envelope, recipientId, reason, detail);
    }

    /**
     * Envelopes waiting for an agent.
     */
    pendingFor(agentId: string): number {
        return this.mailboxes.get(agentId)?.length ?? 0;
    }

    private deliver(envelope: Envelope, recipientId: string): DeliveryReceipt {
        const mailbox = this.mailboxes.get(recipientId);
        if (!mailbox || !this.registry.has(recipientId)) {
            return this.reject(envelope, recipientId, 'UNKNOWN_RECIPIENT');
        }

        switch (mailbox.offer(envelope)) {
            case 'ACCEPTED':
                return { recipientId, status: 'DELIVERED' };
            case 'FULL':
                return this.reject(envelope, recipientId, 'MAILBOX_FULL');
            case 'CLOSED':
                return this.reject(envelope, recipientId, 'AGENT_STOPPED');
        }
    }

    private reject(envelope: Envelope, recipientId: string, reason: DeadLetterReason): DeliveryReceipt {
        this.deadLetter(envelope, recipientId, reason);
        return { recipientId, status: 'DEAD_LETTERED', reason };
    }
}
