// =============================================================================
// CANOPY PROTOCOL - Errors
// =============================================================================

import type { ReportError } from './messages.js';

export type OrchestrationErrorCode =
    | 'DUPLICATE_IDENTITY'
    | 'DUPLICATE_CORRELATION'
    | 'UNKNOWN_RECIPIENT'
    | 'UNKNOWN_AGENT'
    | 'POOL_EXHAUSTED'
    | 'POOL_FULL'
    | 'NO_CAPABLE_SUPERVISOR'
    | 'SUPERVISOR_UNHEALTHY'
    | 'NO_CAPABLE_AGENT'
    | 'CIRCUIT_OPEN'
    | 'UNKNOWN_ACTION'
    | 'INVALID_ENVELOPE'
    | 'INVALID_TRANSITION'
    | 'INVALID_DEFINITION'
    | 'INITIALIZATION_FAILED'
    | 'RETRIES_EXHAUSTED'
    | 'NO_REPORT'
    | 'EXPIRED'
    | 'ABANDONED'
    | 'AGENT_STOPPED'
    | 'MAILBOX_FULL'
    | 'TIMEOUT';

/**
 * Routing and lifecycle faults raised by the core itself.
 */
export class OrchestrationError extends Error {
    readonly code: OrchestrationErrorCode;
    readonly retryable: boolean;
    readonly correlationId?: string;

    constructor(
        code: OrchestrationErrorCode,
        message: string,
        options: { retryable?: boolean; correlationId?: string; cause?: unknown } = {},
    ) {
        super(message, { cause: options.cause });
        this.name = 'OrchestrationError';
        this.code = code;
        this.retryable = options.retryable ?? false;
        this.correlationId = options.correlationId;
    }
}

/**
 * Thrown by an action handler for a failure it understands. Becomes a FAILED
 * report; the agent stays healthy.
 */
export class TaskError extends Error {
    readonly code: string;
    readonly retryable: boolean;

    constructor(code: string, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'TaskError';
        this.code = code;
        this.retryable = options.retryable ?? false;
    }
}

/**
 * Thrown by a handler when the agent cannot go on. The runtime stops it.
 */
export class FatalAgentError extends Error {
    readonly code: string;

    constructor(message: string, options: { code?: string; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'FatalAgentError';
        this.code = options.code ?? 'FATAL';
    }
}

/**
 * What a caller at the gateway sees.
 */
export class GatewayError extends Error {
    readonly code: string;
    readonly correlationId: string;
    readonly retryable: boolean;

    constructor(code: string, message: string, correlationId: string, retryable: boolean) {
        super(message);
        this.name = 'GatewayError';
        this.code = code;
        this.correlationId = correlationId;
        this.retryable = retryable;
    }
}

export interface ClassifiedError extends ReportError {
    fatal: boolean;
    /** False for TaskErrors and routing faults, true for anything the handler did not expect. */
    unexpected: boolean;
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN', 'ENOTFOUND']);

function errnoCode(error: Error): string | undefined {
    const code: unknown = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : undefined;
}

/**
 * Transient infrastructure errors: connection and timeout class failures.
 */
export function isTransientError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    if (error.name === 'TimeoutError' || error.name === 'AbortError') return true;
    const code = errnoCode(error);
    return code !== undefined && TRANSIENT_CODES.has(code);
}

/**
 * Map anything a handler threw onto the report error shape.
 */
export function classifyError(error: unknown): ClassifiedError {
    if (error instanceof TaskError) {
        return { code: error.code, message: error.message, retryable: error.retryable, fatal: false, unexpected: false };
    }
    if (error instanceof FatalAgentError) {
        return { code: error.code, message: error.message, retryable: false, fatal: true, unexpected: true };
    }
    if (error instanceof OrchestrationError) {
        return { code: error.code, message: error.message, retryable: error.retryable, fatal: false, unexpected: false };
    }
    if (error instanceof Error) {
        const transient = isTransientError(error);
        return {
            code: transient ? (errnoCode(error) ?? 'TRANSIENT') : 'HANDLER_ERROR',
            message: error.message,
            retryable: transient,
            fatal: false,
            unexpected: true,
        };
    }
    return { code: 'HANDLER_ERROR', message: String(error), retryable: false, fatal: false, unexpected: true };
}
