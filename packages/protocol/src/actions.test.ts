import { describe, expect, it } from 'vitest';
import { defineWorker, executeAction } from './actions.js';
import { OrchestrationError } from './errors.js';
import { createEnvelope } from './utils.js';

const worker = defineWorker({
    capability: 'text',
    actions: {
        echo: (params) => params.text,
        shout: (params) => String(params.text).toUpperCase(),
    },
});

function directiveFor(action: string) {
    return createEnvelope({
        senderId: 'supervisor',
        recipientIds: ['worker-1'],
        kind: 'DIRECTIVE',
        payload: { capability: 'text', action, params: { text: 'hi' } },
    });
}

describe('defineWorker', () => {
    it('builds a closed catalog of the declared actions', () => {
        expect(worker.catalog.capability).toBe('text');
        expect(worker.catalog.actions).toEqual(['echo', 'shout']);
        expect(worker.catalog.has('echo')).toBe(true);
        expect(worker.catalog.has('delete')).toBe(false);
        expect(Object.isFrozen(worker.catalog.actions)).toBe(true);
    });

    it('rejects a worker without actions', () => {
        expect(() => defineWorker({ capability: 'empty', actions: {} }))
            .toThrow('Capability empty declares no actions');
    });

    it('rejects invalid names', () => {
        expect(() => defineWorker({ capability: 'has space', actions: { a: () => 1 } })).toThrow(OrchestrationError);
        expect(() => defineWorker({ capability: 'ok', actions: { '-bad': () => 1 } })).toThrow(OrchestrationError);
    });
});

describe('executeAction', () => {
    it('runs the named handler', async () => {
        const directive = directiveFor('shout');
        const result = await executeAction(worker, 'shout', { text: 'hi' }, { agentId: 'worker-1', directive });

        expect(result).toBe('HI');
    });

    it('rejects an action outside the catalog with UNKNOWN_ACTION', async () => {
        const directive = directiveFor('delete');

        await expect(executeAction(worker, 'delete', {}, { agentId: 'worker-1', directive }))
            .rejects.toMatchObject({ code: 'UNKNOWN_ACTION', correlationId: directive.id });
    });
});
