import { randomUUID } from 'crypto';
import { OrchestrationError } from './errors.js';
import {
    MAX_PRIORITY,
    MIN_PRIORITY,
    type BaseFrame,
    type BridgeFrame,
    type Envelope,
    type EnvelopeKind,
    type EnvelopeOf,
    type FrameType,
    type PayloadByKind,
    type ReportEnvelope,
    type ReportPayload,
} from './messages.js';
import { envelopeSchema, frameSchema } from './schema.js';

export const DEFAULT_PRIORITY = 5;

/**
 * Generate a unique envelope ID.
 */
export function generateEnvelopeId(): string {
    return randomUUID();
}

/**
 * Generate a unique trace ID for frame correlation.
 */
export function generateTraceId(): string {
    return randomUUID();
}

// -----------------------------------------------------------------------------
// Envelopes
// -----------------------------------------------------------------------------

/**
 * Everything an agent supplies when sending; the runtime fills in the sender.
 */
export interface OutboundDraft<K extends EnvelopeKind> {
    recipientIds: readonly string[];
    kind: K;
    payload: PayloadByKind[K];
    priority?: number;
    correlationId?: string;
    ttlMs?: number;
    requiresResponse?: boolean;
    createdAt?: number;
}

export interface EnvelopeDraft<K extends EnvelopeKind> extends OutboundDraft<K> {
    senderId: string;
}

function assertPriority(priority: number): void {
    if (!Number.isInteger(priority) || priority < MIN_PRIORITY || priority > MAX_PRIORITY) {
        throw new OrchestrationError(
            'INVALID_ENVELOPE',
            `Priority must be an integer between ${MIN_PRIORITY} and ${MAX_PRIORITY}, got ${priority}`,
        );
    }
}

/**
 * Freeze plain objects and arrays all the way down. Anything else (buffers,
 * class instances) is left as it is.
 */
export function deepFreeze<T>(value: T): T {
    if (value === null || typeof value !== 'object' || Object.isFrozen(value)) return value;
    const proto: unknown = Object.getPrototypeOf(value);
    if (!Array.isArray(value) && proto !== Object.prototype && proto !== null) return value;

    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
    return value;
}

/**
 * Build a frozen envelope. Envelopes never change after this point, payload
 * included: the payload's plain objects and arrays are frozen in place.
 */
export function createEnvelope<K extends EnvelopeKind>(draft: EnvelopeDraft<K>): EnvelopeOf<K> {
    const priority = draft.priority ?? DEFAULT_PRIORITY;
    assertPriority(priority);
    if (draft.recipientIds.length === 0) {
        throw new OrchestrationError('INVALID_ENVELOPE', 'Envelope needs at least one recipient');
    }
    if (draft.ttlMs !== undefined && (!Number.isInteger(draft.ttlMs) || draft.ttlMs < 0)) {
        throw new OrchestrationError('INVALID_ENVELOPE', `Invalid ttlMs: ${draft.ttlMs}`);
    }

    const envelope: EnvelopeOf<K> = {
        id: generateEnvelopeId(),
        senderId: draft.senderId,
        recipientIds: Object.freeze([...new Set(draft.recipientIds)]),
        kind: draft.kind,
        payload: deepFreeze(draft.payload),
        createdAt: draft.createdAt ?? Date.now(),
        priority,
        ...(draft.correlationId !== undefined ? { correlationId: draft.correlationId } : {}),
        ...(draft.ttlMs !== undefined ? { ttlMs: draft.ttlMs } : {}),
        ...(draft.requiresResponse !== undefined ? { requiresResponse: draft.requiresResponse } : {}),
    };
    return Object.freeze(envelope);
}

/**
 * The id that links a report back to the directive that caused it.
 */
export function correlationOf(envelope: Envelope): string {
    return envelope.correlationId ?? envelope.id;
}

/**
 * Time left before the envelope expires, or undefined when it has no TTL.
 */
export function remainingTtl(envelope: Envelope, now: number = Date.now()): number | undefined {
    if (envelope.ttlMs === undefined) return undefined;
    return Math.max(0, envelope.ttlMs - (now - envelope.createdAt));
}

export function isExpired(envelope: Envelope, now: number = Date.now()): boolean {
    return envelope.ttlMs !== undefined && now - envelope.createdAt >= envelope.ttlMs;
}

/**
 * A new envelope (fresh id) carrying the source's payload and correlation id.
 * A TTL is carried as whatever time the source has left.
 */
export function deriveEnvelope<K extends EnvelopeKind>(
    source: EnvelopeOf<K>,
    overrides: Partial<Omit<EnvelopeDraft<K>, 'kind' | 'correlationId' | 'createdAt'>> & { senderId: string },
): EnvelopeOf<K> {
    const now = Date.now();
    const ttlMs = overrides.ttlMs ?? (source.ttlMs === undefined
        ? undefined
        : Math.max(0, source.ttlMs - (now - source.createdAt)));
    return createEnvelope<K>({
        senderId: overrides.senderId,
        recipientIds: overrides.recipientIds ?? source.recipientIds,
        kind: source.kind,
        payload: overrides.payload ?? source.payload,
        priority: overrides.priority ?? source.priority,
        correlationId: source.correlationId ?? source.id,
        ttlMs,
        requiresResponse: overrides.requiresResponse ?? source.requiresResponse,
        createdAt: now,
    });
}

/**
 * A REPORT back to whoever sent `source`, correlated to it.
 */
export function createReport(source: Envelope, senderId: string, payload: ReportPayload): ReportEnvelope {
    return createEnvelope({
        senderId,
        recipientIds: [source.senderId],
        kind: 'REPORT',
        payload,
        priority: source.priority,
        correlationId: correlationOf(source),
    });
}

/**
 * Parse and validate an envelope from the wire.
 * Returns null if parsing fails.
 */
export function parseEnvelope(data: string): Envelope | null {
    let raw: unknown;
    try {
        raw = JSON.parse(data);
    } catch {
        return null;
    }
    const result = envelopeSchema.safeParse(raw);
    if (!result.success) return null;
    const envelope: Envelope = result.data;
    return deepFreeze(envelope);
}

export function serializeEnvelope(envelope: Envelope): string {
    return JSON.stringify(envelope);
}

// -----------------------------------------------------------------------------
// Frames
// -----------------------------------------------------------------------------

/**
 * Create a base frame with common fields.
 */
export function createBaseFrame(type: FrameType, traceId?: string): BaseFrame {
    return {
        type,
        traceId: traceId ?? generateTraceId(),
        timestamp: Date.now(),
    };
}

/**
 * Parse and validate an incoming frame.
 * Returns null if parsing fails.
 */
export function parseFrame(data: string): BridgeFrame | null {
    let raw: unknown;
    try {
        raw = JSON.parse(data);
    } catch {
        return null;
    }
    const result = frameSchema.safeParse(raw);
    if (!result.success) return null;
    const frame: BridgeFrame = result.data;
    return frame;
}

/**
 * Serialize a frame for transmission.
 */
export function serializeFrame(frame: BridgeFrame): string {
    return JSON.stringify(frame);
}

// -----------------------------------------------------------------------------
// Event Data
// -----------------------------------------------------------------------------

/**
 * Read a string field from loosely-typed event data.
 */
export function readString(data: Record<string, unknown> | undefined, key: string): string | undefined {
    const value = data?.[key];
    return typeof value === 'string' ? value : undefined;
}
