import { describe, expect, it } from 'vitest';
import { OrchestrationError } from './errors.js';
import {
    correlationOf,
    createEnvelope,
    createReport,
    deriveEnvelope,
    isExpired,
    parseEnvelope,
    parseFrame,
    remainingTtl,
    serializeEnvelope,
    serializeFrame,
    readString,
} from './utils.js';

function directive(overrides: { priority?: number; ttlMs?: number; createdAt?: number; correlationId?: string } = {}) {
    return createEnvelope({
        senderId: 'supervisor',
        recipientIds: ['worker-1'],
        kind: 'DIRECTIVE',
        payload: { capability: 'text', action: 'echo', params: { text: 'hi' } },
        ...overrides,
    });
}

describe('createEnvelope', () => {
    it('fills in id, default priority and creation time', () => {
        const envelope = directive({ createdAt: 1000 });

        expect(envelope.id).toMatch(/^[0-9a-f-]{36}$/);
        expect(envelope.priority).toBe(5);
        expect(envelope.createdAt).toBe(1000);
        expect(envelope.correlationId).toBeUndefined();
    });

    it('freezes the envelope and its recipient list', () => {
        const envelope = directive();

        expect(Object.isFrozen(envelope)).toBe(true);
        expect(Object.isFrozen(envelope.recipientIds)).toBe(true);
    });

    it('freezes the payload all the way down', () => {
        const envelope = createEnvelope({
            senderId: 'supervisor',
            recipientIds: ['worker-1'],
            kind: 'DIRECTIVE',
            payload: { capability: 'math', action: 'sum', params: { numbers: [1, 2], options: { round: true } } },
        });

        expect(Object.isFrozen(envelope.payload)).toBe(true);
        expect(Object.isFrozen(envelope.payload.params)).toBe(true);
        expect(Object.isFrozen(envelope.payload.params.numbers)).toBe(true);
        expect(Object.isFrozen(envelope.payload.params.options)).toBe(true);
    });

    it('leaves buffers in a payload unfrozen', () => {
        const blob = Buffer.from('raw');
        const envelope = createEnvelope({
            senderId: 'a',
            recipientIds: ['b'],
            kind: 'EVENT',
            payload: { name: 'upload', data: { blob } },
        });

        expect(Object.isFrozen(envelope.payload.data)).toBe(true);
        expect(Object.isFrozen(blob)).toBe(false);
    });

    it('drops duplicate recipients', () => {
        const envelope = createEnvelope({
            senderId: 'a',
            recipientIds: ['b', 'c', 'b'],
            kind: 'EVENT',
            payload: { name: 'ping' },
        });

        expect(envelope.recipientIds).toEqual(['b', 'c']);
    });

    it.each([-1, 11, 2.5])('rejects priority %s', (priority) => {
        expect(() => directive({ priority })).toThrow(OrchestrationError);
    });

    it('rejects an empty recipient list', () => {
        expect(() => createEnvelope({ senderId: 'a', recipientIds: [], kind: 'EVENT', payload: { name: 'x' } }))
            .toThrow('Envelope needs at least one recipient');
    });

    it('rejects a negative ttl', () => {
        expect(() => directive({ ttlMs: -5 })).toThrow('Invalid ttlMs: -5');
    });
});

describe('expiry', () => {
    it('is expired once ttl has elapsed since creation', () => {
        const envelope = directive({ createdAt: 1000, ttlMs: 500 });

        expect(isExpired(envelope, 1499)).toBe(false);
        expect(isExpired(envelope, 1500)).toBe(true);
        expect(remainingTtl(envelope, 1200)).toBe(300);
        expect(remainingTtl(envelope, 2000)).toBe(0);
    });

    it('never expires without a ttl', () => {
        const envelope = directive({ createdAt: 0 });

        expect(isExpired(envelope, Number.MAX_SAFE_INTEGER)).toBe(false);
        expect(remainingTtl(envelope)).toBeUndefined();
    });
});

describe('correlation', () => {
    it('uses the envelope id when no correlation id is set', () => {
        const envelope = directive();
        expect(correlationOf(envelope)).toBe(envelope.id);
    });

    it('derives a fresh envelope that keeps the correlation', () => {
        const source = directive();
        const derived = deriveEnvelope(source, { senderId: 'supervisor', recipientIds: ['worker-2'] });

        expect(derived.id).not.toBe(source.id);
        expect(derived.correlationId).toBe(source.id);
        expect(derived.recipientIds).toEqual(['worker-2']);
        expect(derived.payload).toEqual(source.payload);
    });

    it('carries only the remaining ttl into a derived envelope', () => {
        const source = directive({ createdAt: Date.now() - 400, ttlMs: 1000 });
        const derived = deriveEnvelope(source, { senderId: 'supervisor' });

        expect(derived.ttlMs).toBeLessThanOrEqual(600);
        expect(derived.ttlMs).toBeGreaterThan(500);
    });

    it('addresses a report to the sender, correlated and at the same priority', () => {
        const source = directive({ priority: 8, correlationId: 'goal-1' });
        const report = createReport(source, 'worker-1', { status: 'SUCCESS', data: 'hi' });

        expect(report.kind).toBe('REPORT');
        expect(report.recipientIds).toEqual(['supervisor']);
        expect(report.correlationId).toBe('goal-1');
        expect(report.priority).toBe(8);
    });
});

describe('wire format', () => {
    it('parses what it serializes', () => {
        const envelope = directive({ ttlMs: 1000, correlationId: 'goal-1' });
        const parsed = parseEnvelope(serializeEnvelope(envelope));

        expect(parsed).toEqual(envelope);
        expect(parsed && Object.isFrozen(parsed)).toBe(true);
        expect(parsed && Object.isFrozen(parsed.payload)).toBe(true);
    });

    it('returns null for malformed json', () => {
        expect(parseEnvelope('{not json')).toBeNull();
    });

    it('returns null for an unknown kind', () => {
        const raw = JSON.stringify({ ...directive(), kind: 'GOSSIP' });
        expect(parseEnvelope(raw)).toBeNull();
    });

    it('returns null for an out-of-range priority', () => {
        const raw = JSON.stringify({ ...directive(), priority: 42 });
        expect(parseEnvelope(raw)).toBeNull();
    });

    it('validates envelopes nested in frames', () => {
        const good = {
            type: 'ENVELOPE',
            traceId: 'trace-1',
            timestamp: 1,
            payload: { envelope: directive() },
        };
        const bad = { ...good, payload: { envelope: { ...directive(), recipientIds: [] } } };

        expect(parseFrame(JSON.stringify(good))?.type).toBe('ENVELOPE');
        expect(parseFrame(JSON.stringify(bad))).toBeNull();
    });

    it('round-trips an auth frame', () => {
        const frame = {
            type: 'AUTH' as const,
            traceId: 'trace-2',
            timestamp: 10,
            payload: {
                identity: { agentId: 'node-1', capabilities: ['text'], tier: 'execution' as const },
                secret: 'test-secret',
                version: '0.1.0',
            },
        };
        expect(parseFrame(serializeFrame(frame))).toEqual(frame);
    });
});

describe('readString', () => {
    it('reads only string fields', () => {
        const data = { agentId: 'a-1', count: 3 };

        expect(readString(data, 'agentId')).toBe('a-1');
        expect(readString(data, 'count')).toBeUndefined();
        expect(readString(undefined, 'agentId')).toBeUndefined();
    });
});
