// =============================================================================
// CANOPY CONTROL PLANE - System
// =============================================================================
// Wires the hierarchy together: one bus, one strategic coordinator, the
// tactical supervisors below it and a gateway for callers outside the bus.
// =============================================================================

import { config } from '@canopy/config';
import { OrchestrationError, type DirectivePayload } from '@canopy/protocol';
import { AgentRuntime } from './agent-runtime.js';
import { RemoteBridge, type RemoteBridgeOptions } from './bridge/remote-bridge.js';
import { DeadLetterStore } from './dead-letters.js';
import { Gateway, type GatewayOptions, type SubmitOptions } from './gateway.js';
import { HealthMonitor, type HealthMonitorOptions } from './health-monitor.js';
import { logger } from './logger.js';
import { MessageBus } from './message-bus.js';
import { AgentRegistry } from './registry.js';
import { StrategicCoordinator, type StrategicCoordinatorOptions } from './strategic-coordinator.js';
import { TacticalSupervisor, type TacticalSupervisorOptions } from './tactical-supervisor.js';

export interface SystemOptions {
    coordinator?: Partial<StrategicCoordinatorOptions>;
    supervisors: TacticalSupervisorOptions[];
    gateway?: Omit<GatewayOptions, 'coordinatorId'>;
    health?: HealthMonitorOptions;
    mailboxCapacity?: number;
    deadLetterCapacity?: number;
}

type SystemState = 'IDLE' | 'RUNNING' | 'STOPPED';

export class CanopySystem {
    readonly registry = new AgentRegistry();
    readonly deadLetters: DeadLetterStore;
    readonly bus: MessageBus;
    readonly monitor: HealthMonitor;
    readonly coordinator: StrategicCoordinator;
    readonly gateway: Gateway;
    readonly supervisors = new Map<string, TacticalSupervisor>();
    private coordinatorRuntime: AgentRuntime;
    private gatewayRuntime: AgentRuntime;
    private supervisorRuntimes: AgentRuntime[] = [];
    private state: SystemState = 'IDLE';

    constructor(options: SystemOptions) {
        this.deadLetters = new DeadLetterStore(options.deadLetterCapacity ?? config.bus.deadLetterCapacity);
        this.bus = new MessageBus(this.registry, this.deadLetters, {
            ...(options.mailboxCapacity !== undefined ? { mailboxCapacity: options.mailboxCapacity } : {}),
        });
        this.monitor = new HealthMonitor(this.bus, options.health);

        this.coordinator = new StrategicCoordinator({
            ...options.coordinator,
            coordinatorId: options.coordinator?.coordinatorId ?? 'coordinator',
        });
        this.coordinatorRuntime = new AgentRuntime(this.bus, this.coordinator.identity, this.coordinator);

        for (const spec of options.supervisors) {
            if (this.supervisors.has(spec.supervisorId)) {
                throw new OrchestrationError('DUPLICATE_IDENTITY', `Supervisor ${spec.supervisorId} declared twice`);
            }
            const supervisor = new TacticalSupervisor(this.bus, spec);
            this.supervisors.set(spec.supervisorId, supervisor);
            this.supervisorRuntimes.push(new AgentRuntime(this.bus, supervisor.identity, supervisor, {
                parentId: this.coordinator.id,
            }));
        }

        this.gateway = new Gateway({ ...options.gateway, coordinatorId: this.coordinator.id });
        this.gatewayRuntime = new AgentRuntime(this.bus, this.gateway.identity, this.gateway);
    }

    get running(): boolean {
        return this.state === 'RUNNING';
    }

    /**
     * Start parents before children so every registration finds its parent.
     */
    async start(): Promise<void> {
        if (this.state !== 'IDLE') {
            throw new OrchestrationError('INVALID_TRANSITION', `System cannot start from ${this.state}`);
        }
        await this.coordinatorRuntime.start();
        for (const runtime of this.supervisorRuntimes) {
            await runtime.start();
        }
        await this.gatewayRuntime.start();
        this.monitor.start();
        this.state = 'RUNNING';
        logger.info('System', `🌲 Running: ${this.coordinator.id} → [${[...this.supervisors.keys()].join(', ')}]`);
    }

    submit(goal: DirectivePayload, options?: SubmitOptions): Promise<unknown> {
        return this.gateway.submit(goal, options);
    }

    /**
     * Attach a bridge for remote agents to this system's bus.
     */
    createBridge(options?: RemoteBridgeOptions): RemoteBridge {
        return new RemoteBridge(this.bus, options);
    }

    async shutdown(): Promise<void> {
        if (this.state === 'STOPPED') return;
        this.state = 'STOPPED';
        this.monitor.stop();
        await this.gatewayRuntime.retire('system shutdown');
        for (const runtime of [...this.supervisorRuntimes].reverse()) {
            await runtime.retire('system shutdown');
        }
        await this.coordinatorRuntime.retire('system shutdown');
        this.registry.clear();
        logger.info('System', '👋 Stopped');
    }

    getStats() {
        return {
            agents: this.registry.getStats(),
            deadLetters: this.deadLetters.getStats(),
            inFlight: this.gateway.inFlight,
            health: this.monitor.getStatus().summary,
        };
    }
}

export function createSystem(options: SystemOptions): CanopySystem {
    return new CanopySystem(options);
}
