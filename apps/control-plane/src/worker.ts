import { executeAction, type DefinedWorker } from '@canopy/protocol';
import type { AgentBehavior } from './agent-runtime.js';

/**
 * Execution-tier behavior: run the directive's action from the worker's
 * catalog and report the result.
 */
export function createWorker<A extends string>(worker: DefinedWorker<A>): AgentBehavior {
    return {
        async initialize() {
            await worker.initialize?.();
        },

        async onDirective(directive, ctx) {
            const { action, params } = directive.payload;
            const result = await executeAction(worker, action, params, { agentId: ctx.agentId, directive });
            const serialized = result === undefined ? undefined : JSON.stringify(result);
            ctx.reportSuccess(
                directive,
                result,
                serialized === undefined ? undefined : { sizeBytes: Buffer.byteLength(serialized) },
            );
        },

        async shutdown() {
            await worker.shutdown?.();
        },
    };
}
