// =============================================================================
// CANOPY WORKERS
// =============================================================================
// Worker definitions shared by the control plane's local pools and remote
// agent nodes.
// =============================================================================

import type { DefinedWorker } from '@canopy/protocol';
import { mathWorker } from './math.js';
import { textWorker } from './text.js';

export { createTextWorker, textWorker } from './text.js';
export { createMathWorker, mathWorker } from './math.js';
export { parseParams } from './params.js';

/**
 * Built-in workers by capability.
 */
export const builtinWorkers: Record<string, DefinedWorker> = {
    text: textWorker,
    math: mathWorker,
};
