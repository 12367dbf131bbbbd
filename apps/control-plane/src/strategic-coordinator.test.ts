import { createEnvelope, createReport, type DirectiveEnvelope, type SummaryReport } from '@canopy/protocol';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { AgentRuntime } from './agent-runtime.js';
import type { AgentHandle, MessageBus } from './message-bus.js';
import { StrategicCoordinator, type StrategicCoordinatorOptions } from './strategic-coordinator.js';
import { createTestBus, directive, nextEnvelope, nextEvent, nextReport, registerCaller, sleep } from './testing.js';

const runtimes: AgentRuntime[] = [];

afterEach(async () => {
    for (const runtime of runtimes.splice(0)) await runtime.stop('test over');
});

/**
 * A stand-in supervisor: a bare registration the test answers for by hand.
 */
function registerSupervisor(bus: MessageBus, agentId: string, capabilities: string[]) {
    const handle = bus.register({ agentId, capabilities, tier: 'tactical' }, { parentId: 'coordinator' });
    handle.setState('RUNNING');
    return handle;
}

async function startCoordinator(options: Partial<StrategicCoordinatorOptions> = {}) {
    const { bus, deadLetters } = createTestBus();
    const caller = registerCaller(bus, 'gateway');
    const coordinator = new StrategicCoordinator({
        coordinatorId: 'coordinator',
        thresholds: { minSamples: 5, minSuccessRate: 0.8, maxAvgLatencyMs: 1000, maxQueueDepth: 10 },
        ...options,
    });
    const runtime = new AgentRuntime(bus, coordinator.identity, coordinator);
    runtimes.push(runtime);
    await runtime.start();
    return { bus, deadLetters, caller, coordinator, runtime };
}

function summary(overrides: Partial<SummaryReport> = {}): SummaryReport {
    return {
        status: 'SUMMARY',
        supervisorId: 'sup-text',
        capability: 'text',
        count: 10,
        successCount: 10,
        failureCount: 0,
        successRate: 1,
        avgLatencyMs: 20,
        queueDepth: 0,
        poolSize: 4,
        busy: 0,
        windowStartedAt: 0,
        windowEndedAt: 1,
        ...overrides,
    };
}

function sendSummary(bus: MessageBus, report: SummaryReport): void {
    bus.send(createEnvelope({ senderId: report.supervisorId, recipientIds: ['coordinator'], kind: 'REPORT', payload: report }));
}

describe('StrategicCoordinator goals', () => {
    it('sends a single-step goal to the supervisor for its capability', async () => {
        const { bus, caller } = await startCoordinator();
        const sup = registerSupervisor(bus, 'sup-text', ['text']);
        const goal = directive('gateway', 'coordinator', { params: { text: 'hi' } });

        bus.send(goal);
        const part = await nextEnvelope(sup);
        expect(part.kind).toBe('DIRECTIVE');
        expect(part.payload).toEqual({ capability: 'text', action: 'echo', params: { text: 'hi' } });

        bus.send(createReport(part, 'sup-text', { status: 'SUCCESS', data: 'hi' }));
        const report = await nextReport(caller);
        expect(report.correlationId).toBe(goal.id);
        expect(report.payload).toMatchObject({ status: 'SUCCESS', data: 'hi' });
    });

    it('splits a goal into steps and reports results in step order', async () => {
        const { bus, caller } = await startCoordinator();
        const text = registerSupervisor(bus, 'sup-text', ['text']);
        const math = registerSupervisor(bus, 'sup-math', ['math']);

        bus.send(directive('gateway', 'coordinator', {
            capability: 'plan',
            action: 'run',
            params: {
                steps: [
                    { capability: 'text', action: 'reverse', params: { text: 'abc' } },
                    { capability: 'math', action: 'sum', params: { numbers: [1, 2] } },
                ],
            },
        }));
        const textPart = await nextEnvelope(text);
        const mathPart = await nextEnvelope(math);

        bus.send(createReport(mathPart, 'sup-math', { status: 'SUCCESS', data: 3 }));
        bus.send(createReport(textPart, 'sup-text', { status: 'SUCCESS', data: 'cba' }));
        const report = await nextReport(caller);

        expect(report.payload).toMatchObject({ status: 'SUCCESS', data: ['cba', 3] });
    });

    it('fails the goal on a failed part and abandons the others', async () => {
        const { bus, caller, coordinator } = await startCoordinator();
        const text = registerSupervisor(bus, 'sup-text', ['text']);
        const math = registerSupervisor(bus, 'sup-math', ['math']);

        bus.send(directive('gateway', 'coordinator', {
            params: {
                steps: [
                    { capability: 'text', action: 'echo' },
                    { capability: 'math', action: 'average', params: { numbers: [] } },
                ],
            },
        }));
        const textPart = await nextEnvelope(text);
        const mathPart = await nextEnvelope(math);

        bus.send(createReport(mathPart, 'sup-math', {
            status: 'FAILED',
            error: { code: 'EMPTY_INPUT', message: 'average: nothing to average', retryable: false },
        }));
        const report = await nextReport(caller);
        const abandon = await nextEvent(text, 'abandon');

        expect(report.payload).toMatchObject({ status: 'FAILED', error: { code: 'EMPTY_INPUT' } });
        expect(abandon.payload.data).toEqual({ correlationId: textPart.id });
        expect(coordinator.status()).toMatchObject({ goals: 0, parts: 0 });
    });

    it('fails with a retryable NO_CAPABLE_SUPERVISOR when no live supervisor serves the capability', async () => {
        const { bus, caller } = await startCoordinator();
        registerSupervisor(bus, 'sup-text', ['text']).setState('STOPPED');

        bus.send(directive('gateway', 'coordinator'));
        const report = await nextReport(caller);

        expect(report.payload).toMatchObject({
            status: 'FAILED',
            error: { code: 'NO_CAPABLE_SUPERVISOR', message: 'No live supervisor for text', retryable: true },
        });
    });

    it('uses the configured alternate when the capability has no supervisor', async () => {
        const { bus } = await startCoordinator({ alternates: { text: 'text-backup' } });
        const backup = registerSupervisor(bus, 'sup-backup', ['text-backup']);

        bus.send(directive('gateway', 'coordinator'));
        const part = await nextEnvelope(backup);

        expect(part.payload).toMatchObject({ capability: 'text-backup', action: 'echo' });
    });

    it('rejects malformed steps with INVALID_PLAN', async () => {
        const { bus, caller } = await startCoordinator();

        bus.send(directive('gateway', 'coordinator', { params: { steps: [{ capability: 'text' }] } }));
        const report = await nextReport(caller);

        expect(report.payload).toMatchObject({
            status: 'FAILED',
            error: { code: 'INVALID_PLAN', message: 'Invalid steps: 0.action Required' },
        });
    });

    it('refuses a goal whose correlation id is already running', async () => {
        const { bus, caller } = await startCoordinator();
        registerSupervisor(bus, 'sup-text', ['text']);

        bus.send(directive('gateway', 'coordinator', {}, { correlationId: 'goal-7' }));
        bus.send(directive('gateway', 'coordinator', {}, { correlationId: 'goal-7' }));
        const report = await nextReport(caller);

        expect(report.payload).toMatchObject({ status: 'FAILED', error: { code: 'DUPLICATE_CORRELATION' } });
    });

    it('cancels a running goal on request', async () => {
        const { bus, caller } = await startCoordinator();
        const sup = registerSupervisor(bus, 'sup-text', ['text']);
        const goal = directive('gateway', 'coordinator');

        bus.send(goal);
        const part = await nextEnvelope(sup);
        bus.send(createEnvelope({
            senderId: 'gateway',
            recipientIds: ['coordinator'],
            kind: 'EVENT',
            payload: { name: 'cancel', data: { correlationId: goal.id } },
        }));

        const report = await nextReport(caller);
        const abandon = await nextEvent(sup, 'abandon');
        expect(report.payload).toMatchObject({ status: 'FAILED', error: { code: 'ABANDONED', retryable: false } });
        expect(abandon.payload.data).toEqual({ correlationId: part.id });
    });
});

describe('StrategicCoordinator thresholds', () => {
    it('halves concurrency for a breaching capability without an alternate', async () => {
        const { bus, coordinator } = await startCoordinator();
        const sup = registerSupervisor(bus, 'sup-text', ['text']);

        sendSummary(bus, summary({ successCount: 2, failureCount: 8, successRate: 0.2 }));
        const control = await nextEnvelope(sup);

        expect(control.kind).toBe('DIRECTIVE');
        expect(control.payload).toEqual({
            capability: 'supervision',
            action: 'reduce-concurrency',
            params: { capability: 'text', limit: 2 },
        });
        expect(coordinator.status().decisions).toMatchObject([
            { supervisorId: 'sup-text', action: 'reduce-concurrency', reasons: ['success rate 0.20 < 0.8'] },
        ]);
    });

    it('fails over to the alternate when one is configured', async () => {
        const { bus, coordinator } = await startCoordinator({ alternates: { text: 'text-backup' } });
        const sup = registerSupervisor(bus, 'sup-text', ['text']);

        sendSummary(bus, summary({ avgLatencyMs: 5000 }));
        const control = await nextEnvelope(sup);

        expect(control.payload).toEqual({
            capability: 'supervision',
            action: 'prefer-alternate',
            params: { capability: 'text', alternate: 'text-backup' },
        });
        expect(coordinator.status().failovers).toEqual({ text: 'text-backup' });
    });

    it('acts once per breach episode', async () => {
        const { bus, coordinator } = await startCoordinator();
        const sup = registerSupervisor(bus, 'sup-text', ['text']);

        sendSummary(bus, summary({ queueDepth: 50 }));
        await nextEnvelope(sup);
        sendSummary(bus, summary({ queueDepth: 60 }));
        await sleep(30);
        expect(sup.mailbox.length).toBe(0);

        sendSummary(bus, summary());
        sendSummary(bus, summary({ queueDepth: 70 }));
        await nextEnvelope(sup);
        expect(coordinator.status().decisions).toHaveLength(2);
    });

    it('ignores summaries with too few samples', async () => {
        const { bus, coordinator } = await startCoordinator();
        const sup = registerSupervisor(bus, 'sup-text', ['text']);

        sendSummary(bus, summary({ count: 2, successCount: 0, failureCount: 2, successRate: 0 }));
        await sleep(30);

        expect(sup.mailbox.length).toBe(0);
        expect(coordinator.status().lastSummaries).toHaveLength(1);
    });

    it('records capacity losses', async () => {
        const { bus, coordinator } = await startCoordinator();
        registerSupervisor(bus, 'sup-text', ['text']);

        bus.send(createEnvelope({
            senderId: 'sup-text',
            recipientIds: ['coordinator'],
            kind: 'REPORT',
            payload: {
                status: 'CAPACITY',
                supervisorId: 'sup-text',
                capability: 'text',
                poolSize: 1,
                removedAgentId: 'sup-text/text-2',
                reason: 'restart failed',
            },
        }));

        await vi.waitFor(() => expect(coordinator.status().capacity).toHaveLength(1));
        expect(coordinator.status().capacity[0]).toMatchObject({ removedAgentId: 'sup-text/text-2', poolSize: 1 });
    });
});

describe('StrategicCoordinator health sweep', () => {
    it('broadcasts one system alert per silent supervisor', async () => {
        const { bus, coordinator } = await startCoordinator({ silenceThresholdMs: 40, sweepIntervalMs: 15 });
        const sup = registerSupervisor(bus, 'sup-text', ['text']);

        const alert = await nextEvent(sup, 'system-alert');
        expect(alert.senderId).toBe('coordinator');
        expect(alert.payload.data).toMatchObject({ supervisorId: 'sup-text' });

        await sleep(60);
        expect(sup.mailbox.length).toBe(0);
        expect(coordinator.status().supervisors).toMatchObject([{ supervisorId: 'sup-text', alerted: true }]);

        sendSummary(bus, summary({ count: 1 }));
        await vi.waitFor(() => expect(coordinator.status().supervisors[0]?.alerted).toBe(false), { interval: 2 });
    });
});

describe('StrategicCoordinator unhealthy supervisors', () => {
    function reportUnhealthy(bus: MessageBus, agentId: string): void {
        bus.send(createEnvelope({
            senderId: 'health-monitor',
            recipientIds: ['coordinator'],
            kind: 'EVENT',
            payload: { name: 'agent-unhealthy', data: { agentId, staleForMs: 90_000 } },
        }));
    }

    async function nextDirective(handle: AgentHandle): Promise<DirectiveEnvelope> {
        for (;;) {
            const envelope = await nextEnvelope(handle);
            if (envelope.kind === 'DIRECTIVE') return envelope;
        }
    }

    it('moves the parts of an unhealthy supervisor to another one', async () => {
        const { bus, caller, coordinator } = await startCoordinator();
        const first = registerSupervisor(bus, 'sup-a', ['text']);
        const second = registerSupervisor(bus, 'sup-b', ['text']);
        const goal = directive('gateway', 'coordinator', { params: { text: 'hi' } });

        bus.send(goal);
        const stranded = await nextDirective(first);
        reportUnhealthy(bus, 'sup-a');
        const moved = await nextDirective(second);

        expect(moved.payload).toEqual({ capability: 'text', action: 'echo', params: { text: 'hi' } });
        expect((await nextEvent(first, 'system-alert')).payload.data).toEqual({ supervisorId: 'sup-a', reason: 'unhealthy' });
        expect((await nextEvent(first, 'abandon')).payload.data).toEqual({ correlationId: stranded.id });
        expect(coordinator.status().unhealthy).toEqual(['sup-a']);

        bus.send(createReport(moved, 'sup-b', { status: 'SUCCESS', data: 'hi' }));
        const report = await nextReport(caller);
        expect(report.correlationId).toBe(goal.id);
        expect(report.payload).toMatchObject({ status: 'SUCCESS', data: 'hi' });
    });

    it('fails the goal when nobody can take over and routes again once the supervisor reports', async () => {
        const { bus, caller, coordinator } = await startCoordinator();
        const sup = registerSupervisor(bus, 'sup-text', ['text']);
        const goal = directive('gateway', 'coordinator', { params: { text: 'hi' } });

        bus.send(goal);
        await nextDirective(sup);
        reportUnhealthy(bus, 'sup-text');
        const failed = await nextReport(caller);

        expect(failed.correlationId).toBe(goal.id);
        expect(failed.payload).toEqual({
            status: 'FAILED',
            error: {
                code: 'SUPERVISOR_UNHEALTHY',
                message: 'sup-text stopped heartbeating and no other supervisor serves text',
                retryable: true,
            },
            metrics: expect.anything(),
        });

        bus.send(directive('gateway', 'coordinator'));
        expect((await nextReport(caller)).payload).toMatchObject({ status: 'FAILED', error: { code: 'NO_CAPABLE_SUPERVISOR' } });

        sendSummary(bus, summary({ supervisorId: 'sup-text', count: 1 }));
        await vi.waitFor(() => expect(coordinator.status().unhealthy).toEqual([]));
        bus.send(directive('gateway', 'coordinator', { params: { text: 'again' } }));
        expect((await nextDirective(sup)).payload).toMatchObject({ params: { text: 'again' } });
    });
});

describe('StrategicCoordinator queries', () => {
    it('answers status queries', async () => {
        const { bus, caller } = await startCoordinator();
        bus.send(createEnvelope({ senderId: 'gateway', recipientIds: ['coordinator'], kind: 'QUERY', payload: { question: 'status' } }));

        const report = await nextReport(caller);

        expect(report.payload).toMatchObject({ status: 'SUCCESS', data: { coordinatorId: 'coordinator', goals: 0 } });
    });
});
