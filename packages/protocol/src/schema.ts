// =============================================================================
// CANOPY PROTOCOL - Wire Schemas
// =============================================================================
// zod schemas for everything that crosses a process boundary.
// =============================================================================

import { z } from 'zod';
import { MAX_PRIORITY, MIN_PRIORITY } from './messages.js';
import { AGENT_TIERS } from './types.js';

const id = z.string().min(1);

export const tierSchema = z.enum(AGENT_TIERS);

export const identitySchema = z.object({
    agentId: id,
    capabilities: z.array(id),
    tier: tierSchema,
});

// -----------------------------------------------------------------------------
// Payloads
// -----------------------------------------------------------------------------

const metricsSchema = z.object({
    latencyMs: z.number().nonnegative().optional(),
    sizeBytes: z.number().nonnegative().optional(),
});

export const directivePayloadSchema = z.object({
    capability: id,
    action: id,
    params: z.record(z.unknown()),
    target: id.optional(),
});

export const reportPayloadSchema = z.discriminatedUnion('status', [
    z.object({
        status: z.literal('SUCCESS'),
        data: z.unknown().optional(),
        metrics: metricsSchema.optional(),
    }),
    z.object({
        status: z.literal('FAILED'),
        error: z.object({
            code: id,
            message: z.string(),
            retryable: z.boolean(),
        }),
        metrics: metricsSchema.optional(),
    }),
    z.object({
        status: z.literal('SUMMARY'),
        supervisorId: id,
        capability: id,
        count: z.number().int().nonnegative(),
        successCount: z.number().int().nonnegative(),
        failureCount: z.number().int().nonnegative(),
        successRate: z.number().min(0).max(1),
        avgLatencyMs: z.number().nonnegative(),
        queueDepth: z.number().int().nonnegative(),
        poolSize: z.number().int().nonnegative(),
        busy: z.number().int().nonnegative(),
        windowStartedAt: z.number(),
        windowEndedAt: z.number(),
    }),
    z.object({
        status: z.literal('CAPACITY'),
        supervisorId: id,
        capability: id,
        poolSize: z.number().int().nonnegative(),
        removedAgentId: id,
        reason: z.string(),
    }),
]);

export const queryPayloadSchema = z.object({
    question: id,
    params: z.record(z.unknown()).optional(),
});

export const coordinatePayloadSchema = z.object({
    phase: z.enum(['PROPOSE', 'ACCEPT', 'REJECT']),
    topic: id,
    data: z.unknown().optional(),
});

export const eventPayloadSchema = z.object({
    name: id,
    data: z.record(z.unknown()).optional(),
});

// -----------------------------------------------------------------------------
// Envelope
// -----------------------------------------------------------------------------

const envelopeBase = {
    id,
    senderId: id,
    recipientIds: z.array(id).min(1),
    createdAt: z.number().int().nonnegative(),
    priority: z.number().int().min(MIN_PRIORITY).max(MAX_PRIORITY),
    correlationId: id.optional(),
    ttlMs: z.number().int().nonnegative().optional(),
    requiresResponse: z.boolean().optional(),
};

export const envelopeSchema = z.discriminatedUnion('kind', [
    z.object({ ...envelopeBase, kind: z.literal('DIRECTIVE'), payload: directivePayloadSchema }),
    z.object({ ...envelopeBase, kind: z.literal('REPORT'), payload: reportPayloadSchema }),
    z.object({ ...envelopeBase, kind: z.literal('QUERY'), payload: queryPayloadSchema }),
    z.object({ ...envelopeBase, kind: z.literal('COORDINATE'), payload: coordinatePayloadSchema }),
    z.object({ ...envelopeBase, kind: z.literal('EVENT'), payload: eventPayloadSchema }),
]);

// -----------------------------------------------------------------------------
// Bridge Frames
// -----------------------------------------------------------------------------

const frameBase = {
    traceId: id,
    timestamp: z.number().int().nonnegative(),
};

export const frameSchema = z.discriminatedUnion('type', [
    z.object({
        ...frameBase,
        type: z.literal('AUTH'),
        payload: z.object({ identity: identitySchema, secret: z.string(), version: z.string() }),
    }),
    z.object({
        ...frameBase,
        type: z.literal('AUTH_ACK'),
        payload: z.object({
            success: z.boolean(),
            message: z.string().optional(),
            heartbeatInterval: z.number().int().positive().optional(),
            supervisorId: id.optional(),
        }),
    }),
    z.object({
        ...frameBase,
        type: z.literal('HEARTBEAT'),
        payload: z.object({ busy: z.boolean(), cpuUsage: z.number(), memoryUsage: z.number() }),
    }),
    z.object({
        ...frameBase,
        type: z.literal('HEARTBEAT_ACK'),
        payload: z.object({ received: z.boolean() }),
    }),
    z.object({
        ...frameBase,
        type: z.literal('ENVELOPE'),
        payload: z.object({ envelope: envelopeSchema }),
    }),
    z.object({
        ...frameBase,
        type: z.literal('ERROR'),
        payload: z.object({ code: id, message: z.string(), fatal: z.boolean() }),
    }),
]);
