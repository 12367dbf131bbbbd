// =============================================================================
// CANOPY AGENT NODE - Capabilities
// =============================================================================
// Host specs for the startup banner, and the worker this node runs.
// =============================================================================

import os from 'os';
import { OrchestrationError, type DefinedWorker } from '@canopy/protocol';
import { builtinWorkers } from '@canopy/workers';

export interface NodeSpecs {
    os: string;
    arch: string;
    cpuCores: number;
    totalMemoryGB: number;
}

export function getNodeSpecs(): NodeSpecs {
    return {
        os: os.platform(),
        arch: os.arch(),
        cpuCores: os.cpus().length,
        totalMemoryGB: Math.round(os.totalmem() / (1024 ** 3)),
    };
}

/**
 * The built-in worker for a capability name.
 */
export function resolveWorker(capability: string): DefinedWorker {
    const worker = builtinWorkers[capability];
    if (!worker) {
        const known = Object.keys(builtinWorkers).join(', ');
        throw new OrchestrationError('INVALID_DEFINITION', `No built-in worker for "${capability}" (known: ${known})`);
    }
    return worker;
}
