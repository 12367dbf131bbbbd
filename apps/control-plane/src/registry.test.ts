import { OrchestrationError } from '@canopy/protocol';
import { describe, expect, it } from 'vitest';
import { AgentRegistry } from './registry.js';

describe('AgentRegistry', () => {
    it('rejects a duplicate id and keeps the first registration', () => {
        const registry = new AgentRegistry();
        registry.add({ agentId: 'a-1', capabilities: ['text'], tier: 'execution' });

        expect(() => registry.add({ agentId: 'a-1', capabilities: ['math'], tier: 'execution' }))
            .toThrow(OrchestrationError);
        expect(registry.identity('a-1')?.capabilities).toEqual(['text']);
        expect(registry.findByCapability('math')).toEqual([]);
    });

    it('finds agents by capability in registration order, optionally by tier', () => {
        const registry = new AgentRegistry();
        registry.add({ agentId: 'sup', capabilities: ['text'], tier: 'tactical' });
        registry.add({ agentId: 'w-1', capabilities: ['text'], tier: 'execution' }, 'sup');
        registry.add({ agentId: 'w-2', capabilities: ['text', 'math'], tier: 'execution' }, 'sup');

        expect(registry.findByCapability('text')).toEqual(['sup', 'w-1', 'w-2']);
        expect(registry.findByCapability('text', { tier: 'execution' })).toEqual(['w-1', 'w-2']);
        expect(registry.childrenOf('sup')).toEqual(['w-1', 'w-2']);
        expect(registry.parentOf('w-2')).toBe('sup');
    });

    it('drops index entries on removal', () => {
        const registry = new AgentRegistry();
        registry.add({ agentId: 'w-1', capabilities: ['text'], tier: 'execution' });

        expect(registry.remove('w-1')).toBe(true);
        expect(registry.remove('w-1')).toBe(false);
        expect(registry.findByCapability('text')).toEqual([]);
        expect(registry.getStats().capabilities).toBe(0);
    });

    it('changes health only through updates and hands out copies', () => {
        const registry = new AgentRegistry();
        registry.add({ agentId: 'w-1', capabilities: ['text'], tier: 'execution' });

        registry.reportHealth('w-1', { type: 'FAILURE' });
        registry.reportHealth('w-1', { type: 'FAILURE' });
        registry.reportHealth('w-1', { type: 'STATE', state: 'DEGRADED' });

        const copy = registry.health('w-1');
        expect(copy).toMatchObject({ state: 'DEGRADED', failureCount: 2 });
        if (copy) copy.failureCount = 99;
        expect(registry.health('w-1')?.failureCount).toBe(2);

        registry.reportHealth('w-1', { type: 'RECOVERED' });
        expect(registry.health('w-1')?.failureCount).toBe(0);
        expect(registry.reportHealth('ghost', { type: 'HEARTBEAT' })).toBe(false);
    });

    it('counts agents per tier', () => {
        const registry = new AgentRegistry();
        registry.add({ agentId: 'c', capabilities: ['coordination'], tier: 'strategic' });
        registry.add({ agentId: 's', capabilities: ['text'], tier: 'tactical' });
        registry.add({ agentId: 'w', capabilities: ['text'], tier: 'execution' });

        expect(registry.getStats()).toEqual({
            total: 3,
            byTier: { execution: 1, tactical: 1, strategic: 1 },
            capabilities: 2,
        });
    });
});
