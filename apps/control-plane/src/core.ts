// =============================================================================
// CANOPY CONTROL PLANE - Library Entry
// =============================================================================

export { createSystem, CanopySystem, type SystemOptions } from './system.js';

// Bus
export { Mailbox, type OfferResult } from './mailbox.js';
export { AgentRegistry, type RegisteredAgent, type FindOptions, type HealthUpdate } from './registry.js';
export { DeadLetterStore, type DeadLetterFilter, type DeadLetterStats } from './dead-letters.js';
export { MessageBus, tierAddress, type AgentHandle, type BusOptions, type RegisterOptions } from './message-bus.js';
export { HealthMonitor, HEALTH_MONITOR_ID, type AgentStatus, type HealthMonitorOptions } from './health-monitor.js';

// Agents
export {
    AgentRuntime,
    type AgentBehavior,
    type AgentContext,
    type RuntimeOptions,
    type ScheduleOptions,
} from './agent-runtime.js';
export { createWorker } from './worker.js';

// Tactical tier
export { AgentPool, type PoolMember, type PoolOptions } from './agent-pool.js';
export { CircuitBreaker, type BreakerOptions, type BreakerSnapshot } from './circuit-breaker.js';
export { backoffDelay, resolveRetryPolicy, DEFAULT_RETRY_POLICY, type RetryOwner, type RetryPolicy } from './retry.js';
export { ReportAggregator, type SummaryExtras } from './report-aggregator.js';
export { CONTROL_CAPABILITY, controlDirectiveSchema, controlPayload, type ControlDirective } from './control.js';
export {
    TacticalSupervisor,
    type BehaviorFactory,
    type ChildSpec,
    type PoolSpec,
    type SupervisorStatus,
    type TacticalSupervisorOptions,
} from './tactical-supervisor.js';

// Strategic tier
export { defaultPlanner, type GoalPlanner } from './goal-planner.js';
export {
    StrategicCoordinator,
    type CoordinatorStatus,
    type Decision,
    type StrategicCoordinatorOptions,
    type Thresholds,
} from './strategic-coordinator.js';
export { Gateway, type GatewayOptions, type SubmitOptions } from './gateway.js';

// Remote agents
export { RemoteBridge, createRemoteProxy, type RemoteBridgeOptions } from './bridge/remote-bridge.js';
export { startBridgeServer, stopBridgeServer } from './bridge/ws-server.js';
export { socketChannel } from '@canopy/protocol';
