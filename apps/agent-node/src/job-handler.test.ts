import { createEnvelope, type DirectiveEnvelope, type DirectivePayload } from '@canopy/protocol';
import { textWorker } from '@canopy/workers';
import { describe, expect, it } from 'vitest';
import { handleDirective } from './job-handler.js';

function directive(payload: Partial<DirectivePayload> = {}, options: { ttlMs?: number; createdAt?: number } = {}): DirectiveEnvelope {
    return createEnvelope({
        senderId: 'sup',
        recipientIds: ['node-1'],
        kind: 'DIRECTIVE',
        payload: { capability: 'text', action: 'echo', params: { text: 'hi' }, ...payload },
        requiresResponse: true,
        ...options,
    });
}

describe('handleDirective', () => {
    it('reports the result back to the sender', async () => {
        const sent = directive();

        const report = await handleDirective(sent, textWorker, 'node-1');

        expect(report).toMatchObject({ kind: 'REPORT', senderId: 'node-1', recipientIds: ['sup'], correlationId: sent.id });
        expect(report.payload).toMatchObject({ status: 'SUCCESS', data: { result: 'hi' }, metrics: { sizeBytes: 15 } });
    });

    it('reports invalid params as a non-retryable failure', async () => {
        const report = await handleDirective(directive({ params: { text: 42 } }), textWorker, 'node-1');

        expect(report.payload).toMatchObject({
            status: 'FAILED',
            error: { code: 'INVALID_PARAMS', message: 'echo: text: Expected string, received number', retryable: false },
        });
    });

    it('reports actions the worker does not have', async () => {
        const report = await handleDirective(directive({ action: 'translate' }), textWorker, 'node-1');

        expect(report.payload).toMatchObject({ status: 'FAILED', error: { code: 'UNKNOWN_ACTION', retryable: false } });
    });

    it('answers an expired directive without running it', async () => {
        const stale = directive({ action: 'translate' }, { ttlMs: 100, createdAt: Date.now() - 1000 });

        const report = await handleDirective(stale, textWorker, 'node-1');

        expect(report.payload).toEqual({
            status: 'FAILED',
            error: { code: 'EXPIRED', message: 'Directive expired before execution', retryable: false },
        });
    });
});
