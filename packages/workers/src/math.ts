// =============================================================================
// CANOPY WORKERS - Math
// =============================================================================

import { TaskError, defineWorker } from '@canopy/protocol';
import { z } from 'zod';
import { parseParams } from './params.js';

const numbersParams = z.object({ numbers: z.array(z.number()) });

export function createMathWorker(capability: string = 'math') {
    return defineWorker({
        capability,
        actions: {
            sum: (params) => {
                const { numbers } = parseParams(numbersParams, params, 'sum');
                return { result: numbers.reduce((a, b) => a + b, 0) };
            },
            product: (params) => {
                const { numbers } = parseParams(numbersParams, params, 'product');
                return { result: numbers.reduce((a, b) => a * b, 1) };
            },
            average: (params) => {
                const { numbers } = parseParams(numbersParams, params, 'average');
                if (numbers.length === 0) {
                    throw new TaskError('EMPTY_INPUT', 'average: numbers must not be empty');
                }
                return { result: numbers.reduce((a, b) => a + b, 0) / numbers.length };
            },
        },
    });
}

export const mathWorker = createMathWorker();
