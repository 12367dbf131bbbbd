// =============================================================================
// CANOPY PROTOCOL - WebSocket Channel
// =============================================================================
// The one FrameChannel over a real socket, used by both ends of the bridge.
// =============================================================================

import { WebSocket, type RawData } from 'ws';
import type { FrameChannel } from './channel.js';

export function rawToString(data: RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString();
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString();
    return data.toString();
}

/**
 * Adapt an open socket to a frame channel. Socket errors are left to the
 * caller.
 */
export function socketChannel(socket: WebSocket): FrameChannel {
    return {
        get isOpen() {
            return socket.readyState === WebSocket.OPEN;
        },
        send(data: string) {
            socket.send(data);
        },
        close() {
            socket.close();
        },
        onMessage(listener) {
            socket.on('message', (data: RawData) => listener(rawToString(data)));
        },
        onClose(listener) {
            socket.on('close', () => listener());
        },
    };
}
