// =============================================================================
// CANOPY AGENT NODE - Connection Handler
// =============================================================================

import WebSocket from 'ws';
import { config } from '@canopy/config';
import {
    createBaseFrame,
    createReport,
    parseFrame,
    serializeFrame,
    socketChannel,
    type AgentIdentity,
    type AuthAckFrame,
    type BridgeFrame,
    type DefinedWorker,
    type Envelope,
    type FrameChannel,
    type QueryEnvelope,
} from '@canopy/protocol';
import { log, COLORS } from './logger.js';
import { LoadSampler } from './metrics.js';
import { handleDirective } from './job-handler.js';

export const NODE_VERSION = '0.1.0';

export interface ClientOptions {
    identity: AgentIdentity;
    worker: DefinedWorker;
    secret?: string;
}

// -----------------------------------------------------------------------------
// Bridge Client
// -----------------------------------------------------------------------------

/**
 * One authenticated session with the control plane over a frame channel.
 */
export class BridgeClient {
    private authenticated = false;
    private heartbeatInterval: NodeJS.Timeout | null = null;
    private supervisorId: string | null = null;
    private active = 0;
    private readonly load = new LoadSampler();

    constructor(
        private readonly channel: FrameChannel,
        private readonly options: ClientOptions,
    ) {
        channel.onMessage(data => this.onMessage(data));
        channel.onClose(() => this.cleanup());
    }

    get agentId(): string {
        return this.options.identity.agentId;
    }

    get isAuthenticated(): boolean {
        return this.authenticated;
    }

    get parentId(): string | null {
        return this.supervisorId;
    }

    get activeJobs(): number {
        return this.active;
    }

    start(): void {
        this.send({
            ...createBaseFrame('AUTH'),
            type: 'AUTH',
            payload: {
                identity: this.options.identity,
                secret: this.options.secret ?? config.auth.nodeSecret,
                version: NODE_VERSION,
            },
        });
    }

    private onMessage(data: string): void {
        const frame = parseFrame(data);
        if (!frame) {
            log('warn', 'Protocol', '⚠️ Invalid frame format');
            return;
        }

        switch (frame.type) {
            case 'AUTH_ACK':
                this.handleAuthAck(frame);
                break;
            case 'HEARTBEAT_ACK':
                break;
            case 'ENVELOPE':
                this.handleEnvelope(frame.payload.envelope);
                break;
            case 'ERROR':
                log('error', 'Server', `Error: ${frame.payload.code} - ${frame.payload.message}`);
                if (frame.payload.fatal) this.cleanup();
                break;
            default:
                log('warn', 'Protocol', `Unhandled frame type: ${frame.type}`);
        }
    }

    private handleAuthAck(frame: AuthAckFrame): void {
        if (frame.payload.success) {
            this.authenticated = true;
            this.supervisorId = frame.payload.supervisorId ?? null;
            log('info', 'Auth', `🎉 Authenticated as ${COLORS.magenta}${this.agentId}${COLORS.reset} under ${this.supervisorId ?? 'unknown supervisor'}`);
            this.startHeartbeat(frame.payload.heartbeatInterval ?? config.timing.heartbeatInterval);
        } else {
            log('error', 'Auth', `❌ Auth failed: ${frame.payload.message ?? 'rejected'}`);
            this.channel.close();
        }
    }

    private handleEnvelope(envelope: Envelope): void {
        if (!this.authenticated) return;

        switch (envelope.kind) {
            case 'DIRECTIVE':
                this.active++;
                handleDirective(envelope, this.options.worker, this.agentId)
                    .then(report => this.sendEnvelope(report))
                    .catch((error: unknown) => {
                        log('error', 'Job', `Report for ${envelope.id} lost: ${error instanceof Error ? error.message : String(error)}`);
                    })
                    .finally(() => {
                        this.active--;
                    });
                break;
            case 'QUERY':
                this.answerQuery(envelope);
                break;
            case 'EVENT':
                log('debug', 'Event', `📣 ${envelope.payload.name} from ${envelope.senderId}`);
                break;
            default:
                log('debug', 'Protocol', `Ignoring ${envelope.kind} from ${envelope.senderId}`);
        }
    }

    private answerQuery(query: QueryEnvelope): void {
        if (query.payload.question !== 'status') {
            this.sendEnvelope(createReport(query, this.agentId, {
                status: 'FAILED',
                error: { code: 'UNKNOWN_QUESTION', message: `Cannot answer "${query.payload.question}"`, retryable: false },
            }));
            return;
        }
        this.sendEnvelope(createReport(query, this.agentId, {
            status: 'SUCCESS',
            data: {
                agentId: this.agentId,
                capability: this.options.worker.capability,
                actions: [...this.options.worker.catalog.actions],
                activeJobs: this.active,
            },
        }));
    }

    private sendEnvelope(envelope: Envelope): void {
        this.send({ ...createBaseFrame('ENVELOPE'), type: 'ENVELOPE', payload: { envelope } });
    }

    // -------------------------------------------------------------------------
    // Heartbeat
    // -------------------------------------------------------------------------

    private startHeartbeat(intervalMs: number): void {
        if (this.heartbeatInterval) clearInterval(this.heartbeatInterval);
        log('info', 'Heartbeat', `⏱️ Starting heartbeat every ${intervalMs / 1000}s`);
        this.heartbeatInterval = setInterval(() => this.sendHeartbeat(), intervalMs);
        this.sendHeartbeat();
    }

    private sendHeartbeat(): void {
        if (!this.authenticated || !this.channel.isOpen) return;
        this.send({
            ...createBaseFrame('HEARTBEAT'),
            type: 'HEARTBEAT',
            payload: this.load.sample(this.active),
        });
        log('debug', 'Heartbeat', `💓 Sent (Jobs: ${this.active})`);
    }

    private send(frame: BridgeFrame): void {
        if (this.channel.isOpen) this.channel.send(serializeFrame(frame));
    }

    cleanup(): void {
        this.authenticated = false;
        if (this.heartbeatInterval) {
            clearInterval(this.heartbeatInterval);
            this.heartbeatInterval = null;
        }
    }

    close(): void {
        this.cleanup();
        this.channel.close();
    }
}

// -----------------------------------------------------------------------------
// WebSocket Transport
// -----------------------------------------------------------------------------

let socket: WebSocket | null = null;
let client: BridgeClient | null = null;
let reconnectTimer: NodeJS.Timeout | null = null;
let reconnectAttempt = 0;
let stopping = false;

export function getClient(): BridgeClient | null {
    return client;
}

export function connect(options: ClientOptions): void {
    const url = config.controlPlane.wsUrl;
    log('info', 'Connection', `🔌 Connecting to ${url}...`);

    const current = new WebSocket(url);
    socket = current;

    current.on('open', () => {
        log('info', 'Connection', '✅ Connected! Sending AUTH...');
        reconnectAttempt = 0;
        client = new BridgeClient(socketChannel(current), options);
        client.start();
    });

    current.on('close', () => {
        log('warn', 'Connection', '❌ Disconnected from Control Plane');
        client?.cleanup();
        client = null;
        if (!stopping) scheduleReconnect(options);
    });

    current.on('error', (err) => {
        log('error', 'Socket', `Error: ${err.message}`);
    });
}

function scheduleReconnect(options: ClientOptions): void {
    const { reconnectBaseDelay, reconnectMaxDelay, reconnectMultiplier } = config.timing;
    const delay = Math.min(
        reconnectBaseDelay * Math.pow(reconnectMultiplier, reconnectAttempt),
        reconnectMaxDelay
    );
    reconnectAttempt++;
    log('info', 'Reconnect', `🔄 Attempting in ${delay / 1000}s (attempt ${reconnectAttempt})`);
    reconnectTimer = setTimeout(() => {
        reconnectTimer = null;
        connect(options);
    }, delay);
}

export function closeSocket(): void {
    stopping = true;
    if (reconnectTimer) {
        clearTimeout(reconnectTimer);
        reconnectTimer = null;
    }
    client?.close();
    client = null;
    socket?.close();
}
