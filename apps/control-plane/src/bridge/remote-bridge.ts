// =============================================================================
// CANOPY CONTROL PLANE - Remote Bridge
// =============================================================================
// Lets agents in other processes join a tactical supervisor's pool. Each
// authenticated connection gets a proxy agent on the local bus; envelopes in
// the proxy's mailbox go out as frames and frames coming in go on the bus.
// =============================================================================

import { config } from '@canopy/config';
import {
    createBaseFrame,
    createEnvelope,
    parseFrame,
    serializeFrame,
    type AgentIdentity,
    type AuthFrame,
    type BridgeFrame,
    type Envelope,
    type FrameChannel,
} from '@canopy/protocol';
import { AgentRuntime, type AgentBehavior, type AgentContext } from '../agent-runtime.js';
import { logger } from '../logger.js';
import type { MessageBus } from '../message-bus.js';

export interface RemoteBridgeOptions {
    secret?: string;
    authTimeoutMs?: number;
    heartbeatIntervalMs?: number;
}

type SessionState = 'AWAITING_AUTH' | 'AUTHENTICATED' | 'CLOSED';

/**
 * Stands in for the remote agent: forwards whatever it receives and leaves
 * the answer to the remote side.
 */
export function createRemoteProxy(forward: (envelope: Envelope) => void): AgentBehavior {
    const relay = (envelope: Envelope, ctx: AgentContext): void => {
        forward(envelope);
        ctx.handOff(envelope);
    };
    return {
        onDirective: relay,
        onReport: relay,
        onQuery: relay,
        onCoordinate: relay,
        onEvent: relay,
    };
}

// -----------------------------------------------------------------------------
// Session
// -----------------------------------------------------------------------------

class BridgeSession {
    private state: SessionState = 'AWAITING_AUTH';
    private proxy: AgentRuntime | null = null;
    private supervisorId: string | null = null;
    private capability: string | null = null;
    private authTimer: NodeJS.Timeout | null;

    constructor(
        private readonly bridge: RemoteBridge,
        private readonly bus: MessageBus,
        private readonly channel: FrameChannel,
        private readonly options: Required<RemoteBridgeOptions>,
    ) {
        this.authTimer = setTimeout(() => {
            logger.warn('Auth', '⏰ Auth timeout, closing connection');
            this.sendError('AUTH_TIMEOUT', 'Authentication timeout', true);
            this.channel.close();
        }, options.authTimeoutMs);

        channel.onMessage(data => this.onMessage(data));
        channel.onClose(() => {
            this.teardown().catch((error: unknown) => {
                logger.error('Bridge', `❌ Teardown failed: ${error instanceof Error ? error.message : String(error)}`);
            });
        });
    }

    get agentId(): string | null {
        return this.proxy?.id ?? null;
    }

    private onMessage(data: string): void {
        const frame = parseFrame(data);
        if (!frame) {
            logger.warn('Protocol', '⚠️ Invalid frame received');
            this.sendError('INVALID_FRAME', 'Could not parse frame', false);
            return;
        }

        switch (frame.type) {
            case 'AUTH':
                this.handleAuth(frame).catch((error: unknown) => {
                    const message = error instanceof Error ? error.message : String(error);
                    logger.error('Auth', `❌ ${frame.payload.identity.agentId}: ${message}`);
                    this.rejectAuth(frame, message);
                });
                break;
            case 'HEARTBEAT':
                if (!this.requireAuth()) return;
                this.proxy?.heartbeat(frame.payload);
                this.send({ ...createBaseFrame('HEARTBEAT_ACK', frame.traceId), type: 'HEARTBEAT_ACK', payload: { received: true } });
                break;
            case 'ENVELOPE':
                if (!this.requireAuth()) return;
                this.handleEnvelope(frame.payload.envelope);
                break;
            case 'ERROR':
                logger.warn('Bridge', `⚠️ Remote error ${frame.payload.code}: ${frame.payload.message}`);
                break;
            default:
                logger.warn('Protocol', `Unexpected frame type: ${frame.type}`);
        }
    }

    private async handleAuth(frame: AuthFrame): Promise<void> {
        if (this.authTimer) {
            clearTimeout(this.authTimer);
            this.authTimer = null;
        }
        if (this.state !== 'AWAITING_AUTH') {
            this.sendError('ALREADY_AUTHENTICATED', 'Connection is already authenticated', false);
            return;
        }

        const { identity, secret, version } = frame.payload;
        if (secret !== this.options.secret) {
            logger.warn('Auth', `❌ Invalid secret from ${identity.agentId}`);
            this.rejectAuth(frame, 'Invalid credentials');
            return;
        }

        const placement = this.findSupervisor(identity);
        if (!placement) {
            logger.warn('Auth', `❌ No supervisor for ${identity.agentId} [${identity.capabilities.join(', ')}]`);
            this.rejectAuth(frame, 'No supervisor for any advertised capability');
            return;
        }

        const proxy = new AgentRuntime(
            this.bus,
            { agentId: identity.agentId, capabilities: [placement.capability], tier: 'execution' },
            createRemoteProxy(envelope => this.forward(envelope)),
            { parentId: placement.supervisorId, autoHeartbeat: false },
        );
        await proxy.start();

        if (!this.channel.isOpen) {
            // The remote left while we were registering it.
            await proxy.retire('disconnected during auth');
            return;
        }

        this.proxy = proxy;
        this.supervisorId = placement.supervisorId;
        this.capability = placement.capability;
        this.state = 'AUTHENTICATED';

        logger.info('Bridge', `🔗 ${identity.agentId} (v${version}) joined ${placement.supervisorId} for ${placement.capability}`);
        this.send({
            ...createBaseFrame('AUTH_ACK', frame.traceId),
            type: 'AUTH_ACK',
            payload: {
                success: true,
                heartbeatInterval: this.options.heartbeatIntervalMs,
                supervisorId: placement.supervisorId,
            },
        });
        this.notifySupervisor('agent-joined');
    }

    private findSupervisor(identity: AgentIdentity): { supervisorId: string; capability: string } | undefined {
        for (const capability of identity.capabilities) {
            const [supervisorId] = this.bus.findByCapability(capability, { tier: 'tactical' });
            if (supervisorId !== undefined) return { supervisorId, capability };
        }
        return undefined;
    }

    private handleEnvelope(envelope: Envelope): void {
        const agentId = this.proxy?.id;
        if (envelope.senderId !== agentId) {
            logger.warn('Bridge', `⚠️ ${agentId ?? 'unknown'} tried to send as ${envelope.senderId}`);
            this.sendError('SENDER_MISMATCH', `Envelopes must be sent as ${agentId ?? 'the authenticated agent'}`, false);
            return;
        }
        this.bus.send(envelope);
    }

    private forward(envelope: Envelope): void {
        if (!this.channel.isOpen) {
            this.bus.deadLetter(envelope, this.proxy?.id ?? 'bridge', 'AGENT_STOPPED', 'connection closed');
            return;
        }
        this.send({ ...createBaseFrame('ENVELOPE'), type: 'ENVELOPE', payload: { envelope } });
    }

    private notifySupervisor(name: 'agent-joined' | 'agent-left'): void {
        const agentId = this.proxy?.id;
        if (!agentId || !this.supervisorId) return;
        this.bus.send(createEnvelope({
            senderId: agentId,
            recipientIds: [this.supervisorId],
            kind: 'EVENT',
            payload: { name, data: { agentId, capability: this.capability ?? '' } },
            priority: 9,
        }));
    }

    async teardown(): Promise<void> {
        if (this.state === 'CLOSED') return;
        const wasAuthenticated = this.state === 'AUTHENTICATED';
        this.state = 'CLOSED';
        if (this.authTimer) {
            clearTimeout(this.authTimer);
            this.authTimer = null;
        }
        this.bridge.untrack(this);

        const proxy = this.proxy;
        if (!wasAuthenticated || !proxy) return;

        this.notifySupervisor('agent-left');
        const { deadLettered } = this.bus.unregister(proxy.id);
        await proxy.stop('disconnected');
        logger.info('Bridge', `🔌 ${proxy.id} disconnected (${deadLettered} pending dead-lettered)`);
    }

    close(): void {
        this.channel.close();
    }

    private requireAuth(): boolean {
        if (this.state === 'AUTHENTICATED') return true;
        this.sendError('NOT_AUTHENTICATED', 'Authenticate first', true);
        this.channel.close();
        return false;
    }

    private rejectAuth(frame: AuthFrame, message: string): void {
        this.send({ ...createBaseFrame('AUTH_ACK', frame.traceId), type: 'AUTH_ACK', payload: { success: false, message } });
        this.channel.close();
    }

    private sendError(code: string, message: string, fatal: boolean): void {
        this.send({ ...createBaseFrame('ERROR'), type: 'ERROR', payload: { code, message, fatal } });
    }

    private send(frame: BridgeFrame): void {
        if (this.channel.isOpen) this.channel.send(serializeFrame(frame));
    }
}

// -----------------------------------------------------------------------------
// Bridge
// -----------------------------------------------------------------------------

export class RemoteBridge {
    private sessions = new Set<BridgeSession>();
    private readonly options: Required<RemoteBridgeOptions>;

    constructor(
        private readonly bus: MessageBus,
        options: RemoteBridgeOptions = {},
    ) {
        this.options = {
            secret: options.secret ?? config.auth.nodeSecret,
            authTimeoutMs: options.authTimeoutMs ?? config.timing.authTimeout,
            heartbeatIntervalMs: options.heartbeatIntervalMs ?? config.timing.heartbeatInterval,
        };
    }

    /**
     * Take a new connection. It must authenticate before anything else.
     */
    accept(channel: FrameChannel): void {
        logger.info('Connection', '🔌 New connection received, awaiting AUTH...');
        this.sessions.add(new BridgeSession(this, this.bus, channel, this.options));
    }

    untrack(session: BridgeSession): void {
        this.sessions.delete(session);
    }

    /**
     * Remote agents currently connected.
     */
    connected(): string[] {
        const ids: string[] = [];
        for (const session of this.sessions) {
            const agentId = session.agentId;
            if (agentId) ids.push(agentId);
        }
        return ids;
    }

    async close(): Promise<void> {
        const sessions = [...this.sessions];
        for (const session of sessions) {
            session.close();
            await session.teardown();
        }
    }
}
