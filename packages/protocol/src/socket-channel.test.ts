import { describe, expect, it } from 'vitest';
import { rawToString } from './socket-channel.js';

describe('rawToString', () => {
    it('reads a single buffer', () => {
        expect(rawToString(Buffer.from('{"type":"AUTH"}'))).toBe('{"type":"AUTH"}');
    });

    it('joins fragmented buffers in order', () => {
        expect(rawToString([Buffer.from('{"type":'), Buffer.from('"HEARTBEAT"}')])).toBe('{"type":"HEARTBEAT"}');
    });

    it('reads an ArrayBuffer', () => {
        const bytes = new TextEncoder().encode('frame');
        const buffer = new ArrayBuffer(bytes.byteLength);
        new Uint8Array(buffer).set(bytes);

        expect(rawToString(buffer)).toBe('frame');
    });
});
