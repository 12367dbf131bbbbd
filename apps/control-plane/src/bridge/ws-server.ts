import { socketChannel } from '@canopy/protocol';
import { WebSocket, WebSocketServer } from 'ws';
import { logger } from '../logger.js';
import type { RemoteBridge } from './remote-bridge.js';

/**
 * Listen for remote agents and hand each connection to the bridge.
 */
export function startBridgeServer(bridge: RemoteBridge, port: number): WebSocketServer {
    const wss = new WebSocketServer({ port });
    wss.on('connection', (socket: WebSocket) => {
        socket.on('error', (err) => {
            logger.error('Socket', `Socket error: ${err.message}`);
        });
        bridge.accept(socketChannel(socket));
    });
    logger.info('Control Plane', `🚀 Bridge listening on port ${port}`);
    return wss;
}

export function stopBridgeServer(wss: WebSocketServer): Promise<void> {
    return new Promise((resolve, reject) => {
        wss.close(err => (err ? reject(err) : resolve()));
    });
}
