// =============================================================================
// CANOPY PROTOCOL - Frame Channels
// =============================================================================
// A bidirectional pipe of serialized frames. The WebSocket adapters implement
// it for real connections; the in-memory pair connects both ends of the
// bridge inside one process.
// =============================================================================

export interface FrameChannel {
    send(data: string): void;
    close(): void;
    onMessage(listener: (data: string) => void): void;
    onClose(listener: () => void): void;
    readonly isOpen: boolean;
}

class MemoryChannel implements FrameChannel {
    private messageListeners: Array<(data: string) => void> = [];
    private closeListeners: Array<() => void> = [];
    private open = true;
    peer: MemoryChannel | null = null;

    get isOpen(): boolean {
        return this.open;
    }

    send(data: string): void {
        const peer = this.peer;
        if (!this.open || !peer) return;
        // Delivered on a later tick, like a socket would.
        void Promise.resolve().then(() => peer.receive(data));
    }

    close(): void {
        this.shutdown();
        this.peer?.shutdown();
    }

    onMessage(listener: (data: string) => void): void {
        this.messageListeners.push(listener);
    }

    onClose(listener: () => void): void {
        this.closeListeners.push(listener);
    }

    private receive(data: string): void {
        if (!this.open) return;
        for (const listener of this.messageListeners) listener(data);
    }

    private shutdown(): void {
        if (!this.open) return;
        this.open = false;
        const listeners = this.closeListeners;
        void Promise.resolve().then(() => listeners.forEach(listener => listener()));
    }
}

/**
 * Two connected in-process channel ends.
 */
export function createMemoryChannelPair(): [FrameChannel, FrameChannel] {
    const a = new MemoryChannel();
    const b = new MemoryChannel();
    a.peer = b;
    b.peer = a;
    return [a, b];
}
