import { afterEach, describe, expect, it } from 'vitest';
import { HEALTH_MONITOR_ID, HealthMonitor } from './health-monitor.js';
import type { MessageBus } from './message-bus.js';
import { createTestBus, directive, nextEvent, registerCaller } from './testing.js';

const STALE_AFTER = 1000;

function setup() {
    const context = createTestBus();
    const parent = registerCaller(context.bus, 'sup', 'tactical');
    const monitor = new HealthMonitor(context.bus, { staleAfterMs: STALE_AFTER, intervalMs: 10 });
    return { ...context, parent, monitor };
}

function registerChild(bus: MessageBus, agentId: string = 'child') {
    const handle = bus.register({ agentId, capabilities: ['text'], tier: 'execution' }, { parentId: 'sup' });
    handle.setState('RUNNING');
    return handle;
}

function heartbeatOf(bus: MessageBus, agentId: string): number {
    return bus.registry.health(agentId)?.lastHeartbeat ?? 0;
}

const monitors: HealthMonitor[] = [];

afterEach(() => {
    for (const monitor of monitors.splice(0)) monitor.stop();
});

describe('HealthMonitor sweep', () => {
    it('tells the parent once per stale episode', () => {
        const { bus, parent, monitor } = setup();
        registerChild(bus);
        const lastHeartbeat = heartbeatOf(bus, 'child');
        const late = lastHeartbeat + STALE_AFTER + 1;

        expect(monitor.sweep(lastHeartbeat + STALE_AFTER)).toEqual([]);
        expect(monitor.sweep(late)).toEqual(['child']);
        expect(monitor.sweep(late + 5000)).toEqual([]);

        const event = parent.mailbox.poll();
        expect(event).toMatchObject({
            senderId: HEALTH_MONITOR_ID,
            kind: 'EVENT',
            priority: 9,
            payload: { name: 'agent-unhealthy', data: { agentId: 'child', lastHeartbeat, staleForMs: STALE_AFTER + 1 } },
        });
        expect(parent.mailbox.length).toBe(0);
    });

    it('re-arms after a fresh heartbeat', () => {
        const { bus, monitor } = setup();
        const child = registerChild(bus);
        const first = heartbeatOf(bus, 'child');

        expect(monitor.sweep(first + STALE_AFTER + 1)).toEqual(['child']);
        child.heartbeat();
        const second = heartbeatOf(bus, 'child');
        expect(monitor.sweep(second)).toEqual([]);
        expect(monitor.sweep(second + STALE_AFTER + 1)).toEqual(['child']);
    });

    it('skips agents that are not running yet or already stopped', () => {
        const { bus, monitor } = setup();
        bus.register({ agentId: 'fresh', capabilities: ['text'], tier: 'execution' }, { parentId: 'sup' });
        registerChild(bus, 'gone').setState('STOPPED');

        expect(monitor.sweep(Date.now() + 10 * STALE_AFTER)).toEqual([]);
    });

    it('logs but does not report agents without a parent', () => {
        const { bus, monitor } = setup();
        bus.registry.reportHealth('sup', { type: 'STATE', state: 'RUNNING' });

        expect(monitor.sweep(heartbeatOf(bus, 'sup') + STALE_AFTER + 1)).toEqual([]);
    });

    it('sweeps on its own timer once started', async () => {
        const { bus, parent } = setup();
        const monitor = new HealthMonitor(bus, { staleAfterMs: 0, intervalMs: 5 });
        monitors.push(monitor);
        registerChild(bus);

        monitor.start();
        const event = await nextEvent(parent, 'agent-unhealthy');

        expect(event.payload.data).toMatchObject({ agentId: 'child' });
    });
});

describe('HealthMonitor status', () => {
    it('classifies agents as online, stale or offline', () => {
        const { bus, monitor } = setup();
        registerChild(bus, 'ok');
        registerChild(bus, 'off').setState('STOPPED');
        bus.send(directive('sup', 'ok'));
        const now = heartbeatOf(bus, 'ok');

        const byId = new Map(monitor.getAgentsStatus(now).map(s => [s.agentId, s]));
        expect(byId.get('ok')).toMatchObject({ status: 'ONLINE', state: 'RUNNING', parentId: 'sup', pending: 1 });
        expect(byId.get('off')).toMatchObject({ status: 'OFFLINE' });

        const later = new Map(monitor.getAgentsStatus(now + STALE_AFTER + 1).map(s => [s.agentId, s]));
        expect(later.get('ok')?.status).toBe('STALE');
    });

    it('shows the load a remote agent last reported', () => {
        const { bus, monitor } = setup();
        registerChild(bus, 'local');
        registerChild(bus, 'remote').heartbeat({ busy: false, cpuUsage: 12, memoryUsage: 48 });

        const byId = new Map(monitor.getAgentsStatus().map(s => [s.agentId, s]));

        expect(byId.get('remote')?.load).toEqual({ busy: false, cpuUsage: 12, memoryUsage: 48 });
        expect(byId.get('local')).not.toHaveProperty('load');
    });

    it('summarizes the fleet', () => {
        const { bus, monitor } = setup();
        registerChild(bus, 'a');
        registerChild(bus, 'b').setState('DEGRADED');

        const summary = monitor.getMonitoringSummary(heartbeatOf(bus, 'a'));

        expect(summary.agents).toEqual({ total: 3, online: 3, stale: 0, offline: 0, degraded: 1 });
        expect(summary.capabilities).toEqual(['caller:sup', 'text']);
    });
});
