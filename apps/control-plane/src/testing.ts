// =============================================================================
// CANOPY CONTROL PLANE - Test Helpers
// =============================================================================
// A "caller" is a bare bus registration without a runtime: tests use it as the
// sender of directives and read what comes back straight from its mailbox.
// =============================================================================

import {
    createEnvelope,
    type AgentTier,
    type DirectiveEnvelope,
    type DirectivePayload,
    type Envelope,
    type EventEnvelope,
    type ReportEnvelope,
} from '@canopy/protocol';
import { vi } from 'vitest';
import { DeadLetterStore } from './dead-letters.js';
import { MessageBus, type AgentHandle } from './message-bus.js';
import { AgentRegistry } from './registry.js';

export function createTestBus(mailboxCapacity: number = 100) {
    const registry = new AgentRegistry();
    const deadLetters = new DeadLetterStore(1000);
    const bus = new MessageBus(registry, deadLetters, { mailboxCapacity });
    return { registry, deadLetters, bus };
}

export function registerCaller(bus: MessageBus, agentId: string = 'caller', tier: AgentTier = 'strategic'): AgentHandle {
    return bus.register({ agentId, capabilities: [`caller:${agentId}`], tier });
}

export function directive(
    senderId: string,
    recipientId: string,
    payload: Partial<DirectivePayload> = {},
    options: { priority?: number; ttlMs?: number; correlationId?: string; createdAt?: number } = {},
): DirectiveEnvelope {
    return createEnvelope({
        senderId,
        recipientIds: [recipientId],
        kind: 'DIRECTIVE',
        payload: { capability: 'text', action: 'echo', params: {}, ...payload },
        requiresResponse: true,
        ...options,
    });
}

export function nextEnvelope(handle: AgentHandle, timeout: number = 2000): Promise<Envelope> {
    return vi.waitFor(() => {
        const envelope = handle.mailbox.poll();
        if (!envelope) throw new Error(`Nothing for ${handle.identity.agentId} yet`);
        return envelope;
    }, { timeout, interval: 5 });
}

/**
 * Next REPORT for the caller, skipping anything else.
 */
export async function nextReport(handle: AgentHandle, timeout?: number): Promise<ReportEnvelope> {
    for (;;) {
        const envelope = await nextEnvelope(handle, timeout);
        if (envelope.kind === 'REPORT') return envelope;
    }
}

export async function nextEvent(handle: AgentHandle, name: string, timeout?: number): Promise<EventEnvelope> {
    for (;;) {
        const envelope = await nextEnvelope(handle, timeout);
        if (envelope.kind === 'EVENT' && envelope.payload.name === name) return envelope;
    }
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
