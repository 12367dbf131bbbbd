// =============================================================================
// CANOPY WORKERS - Text
// =============================================================================

import { defineWorker } from '@canopy/protocol';
import { z } from 'zod';
import { parseParams } from './params.js';

const textParams = z.object({ text: z.string() });

export function createTextWorker(capability: string = 'text') {
    return defineWorker({
        capability,
        actions: {
            echo: (params) => {
                const { text } = parseParams(textParams, params, 'echo');
                return { result: text };
            },
            reverse: (params) => {
                const { text } = parseParams(textParams, params, 'reverse');
                return { result: [...text].reverse().join('') };
            },
            uppercase: (params) => {
                const { text } = parseParams(textParams, params, 'uppercase');
                return { result: text.toUpperCase() };
            },
            'word-count': (params) => {
                const { text } = parseParams(textParams, params, 'word-count');
                const words = text.trim().split(/\s+/).filter(word => word.length > 0);
                return { result: words.length };
            },
        },
    });
}

export const textWorker = createTextWorker();
