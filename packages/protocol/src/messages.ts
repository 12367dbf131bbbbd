// =============================================================================
// CANOPY PROTOCOL - Envelopes and Bridge Frames
// =============================================================================
// Envelopes are the only thing agents exchange. Bridge frames wrap them when
// they cross a process boundary; they add no new envelope kinds.
// =============================================================================

import type { AgentIdentity, AgentLoad } from './types.js';

export type EnvelopeKind = 'DIRECTIVE' | 'REPORT' | 'QUERY' | 'COORDINATE' | 'EVENT';

export const MIN_PRIORITY = 0;
export const MAX_PRIORITY = 10;

// -----------------------------------------------------------------------------
// Payloads
// -----------------------------------------------------------------------------

/**
 * Higher tier → lower tier: perform `action` of `capability`.
 */
export interface DirectivePayload {
    capability: string;
    action: string;
    params: Record<string, unknown>;
    target?: string;                 // Preferred agent id, if any
}

export interface ReportMetrics {
    latencyMs?: number;
    sizeBytes?: number;
}

export interface ReportError {
    code: string;
    message: string;
    retryable: boolean;
}

export interface SuccessReport {
    status: 'SUCCESS';
    data?: unknown;
    metrics?: ReportMetrics;
}

export interface FailureReport {
    status: 'FAILED';
    error: ReportError;
    metrics?: ReportMetrics;
}

/**
 * Tactical → strategic: compressed outcome counts for one capability.
 */
export interface SummaryReport {
    status: 'SUMMARY';
    supervisorId: string;
    capability: string;
    count: number;
    successCount: number;
    failureCount: number;
    successRate: number;             // 0-1, 1 when count is 0
    avgLatencyMs: number;
    queueDepth: number;
    poolSize: number;
    busy: number;
    windowStartedAt: number;
    windowEndedAt: number;
}

/**
 * Tactical → strategic: a pool lost a member it could not restart.
 */
export interface CapacityReport {
    status: 'CAPACITY';
    supervisorId: string;
    capability: string;
    poolSize: number;
    removedAgentId: string;
    reason: string;
}

export type TerminalReport = SuccessReport | FailureReport;
export type ReportPayload = SuccessReport | FailureReport | SummaryReport | CapacityReport;

export interface QueryPayload {
    question: string;
    params?: Record<string, unknown>;
}

export type CoordinatePhase = 'PROPOSE' | 'ACCEPT' | 'REJECT';

export interface CoordinatePayload {
    phase: CoordinatePhase;
    topic: string;
    data?: unknown;
}

export interface EventPayload {
    name: string;
    data?: Record<string, unknown>;
}

export interface PayloadByKind {
    DIRECTIVE: DirectivePayload;
    REPORT: ReportPayload;
    QUERY: QueryPayload;
    COORDINATE: CoordinatePayload;
    EVENT: EventPayload;
}

// -----------------------------------------------------------------------------
// Envelope
// -----------------------------------------------------------------------------

export interface EnvelopeOf<K extends EnvelopeKind> {
    readonly id: string;
    readonly senderId: string;
    readonly recipientIds: readonly string[];
    readonly kind: K;
    readonly payload: PayloadByKind[K];
    readonly createdAt: number;
    readonly priority: number;       // 0-10, 10 = most urgent
    readonly correlationId?: string;
    readonly ttlMs?: number;
    readonly requiresResponse?: boolean;
}

export type DirectiveEnvelope = EnvelopeOf<'DIRECTIVE'>;
export type ReportEnvelope = EnvelopeOf<'REPORT'>;
export type QueryEnvelope = EnvelopeOf<'QUERY'>;
export type CoordinateEnvelope = EnvelopeOf<'COORDINATE'>;
export type EventEnvelope = EnvelopeOf<'EVENT'>;

export type Envelope =
    | DirectiveEnvelope
    | ReportEnvelope
    | QueryEnvelope
    | CoordinateEnvelope
    | EventEnvelope;

// -----------------------------------------------------------------------------
// Bridge Frames
// -----------------------------------------------------------------------------

export type FrameType =
    | 'AUTH'
    | 'AUTH_ACK'
    | 'HEARTBEAT'
    | 'HEARTBEAT_ACK'
    | 'ENVELOPE'
    | 'ERROR';

export interface BaseFrame {
    type: FrameType;
    traceId: string;
    timestamp: number;
}

/**
 * Remote → control plane: first frame after connecting.
 */
export interface AuthFrame extends BaseFrame {
    type: 'AUTH';
    payload: {
        identity: AgentIdentity;
        secret: string;
        version: string;
    };
}

/**
 * Control plane → remote: authentication result.
 */
export interface AuthAckFrame extends BaseFrame {
    type: 'AUTH_ACK';
    payload: {
        success: boolean;
        message?: string;
        heartbeatInterval?: number;  // How often to send heartbeats (ms)
        supervisorId?: string;       // Parent the proxy was registered under
    };
}

export interface HeartbeatFrame extends BaseFrame {
    type: 'HEARTBEAT';
    payload: AgentLoad;
}

export interface HeartbeatAckFrame extends BaseFrame {
    type: 'HEARTBEAT_ACK';
    payload: {
        received: boolean;
    };
}

/**
 * Either direction: one envelope, forwarded verbatim.
 */
export interface EnvelopeFrame extends BaseFrame {
    type: 'ENVELOPE';
    payload: {
        envelope: Envelope;
    };
}

export interface ErrorFrame extends BaseFrame {
    type: 'ERROR';
    payload: {
        code: string;
        message: string;
        fatal: boolean;              // If true, the connection will be terminated
    };
}

export type BridgeFrame =
    | AuthFrame
    | AuthAckFrame
    | HeartbeatFrame
    | HeartbeatAckFrame
    | EnvelopeFrame
    | ErrorFrame;
