// =============================================================================
// CANOPY PROTOCOL - Action Catalogs
// =============================================================================
// Each capability exposes a closed set of actions. The set is fixed when the
// worker is defined, so routing can reject unknown actions before any agent
// sees them and a definition cannot forget to implement one.
// =============================================================================

import { OrchestrationError } from './errors.js';
import type { DirectiveEnvelope } from './messages.js';

export interface ActionContext {
    agentId: string;
    directive: DirectiveEnvelope;
}

export type ActionHandler = (params: Record<string, unknown>, ctx: ActionContext) => unknown;

export interface ActionCatalog<A extends string = string> {
    readonly capability: string;
    readonly actions: readonly A[];
    has(action: string): action is A;
}

export interface WorkerDefinition<A extends string = string> {
    capability: string;
    actions: { [K in A]: ActionHandler };
    /** One-time setup, e.g. acquiring an external client. */
    initialize?: () => Promise<void>;
    shutdown?: () => Promise<void>;
}

export interface DefinedWorker<A extends string = string> extends WorkerDefinition<A> {
    readonly catalog: ActionCatalog<A>;
}

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:-]*$/;

function ownKey<T extends object>(obj: T, key: PropertyKey): key is keyof T {
    return Object.prototype.hasOwnProperty.call(obj, key);
}

/**
 * Validate a worker definition and attach its action catalog.
 */
export function defineWorker<A extends string>(definition: WorkerDefinition<A>): DefinedWorker<A> {
    const { capability, actions } = definition;
    if (!NAME_PATTERN.test(capability)) {
        throw new OrchestrationError('INVALID_DEFINITION', `Invalid capability name: "${capability}"`);
    }

    const names: A[] = [];
    for (const key of Object.keys(actions)) {
        if (!ownKey(actions, key)) continue;
        if (!NAME_PATTERN.test(key)) {
            throw new OrchestrationError('INVALID_DEFINITION', `Invalid action name "${key}" for ${capability}`);
        }
        if (typeof actions[key] !== 'function') {
            throw new OrchestrationError('INVALID_DEFINITION', `Action ${capability}.${key} has no handler`);
        }
        names.push(key);
    }
    if (names.length === 0) {
        throw new OrchestrationError('INVALID_DEFINITION', `Capability ${capability} declares no actions`);
    }

    const frozen = Object.freeze([...names]);
    const catalog: ActionCatalog<A> = {
        capability,
        actions: frozen,
        has(action: string): action is A {
            return frozen.some(name => name === action);
        },
    };

    return { ...definition, catalog };
}

/**
 * Run one action of a defined worker. Unknown actions are a routing fault.
 */
export async function executeAction<A extends string>(
    worker: DefinedWorker<A>,
    action: string,
    params: Record<string, unknown>,
    ctx: ActionContext,
): Promise<unknown> {
    if (!worker.catalog.has(action)) {
        throw new OrchestrationError(
            'UNKNOWN_ACTION',
            `Capability ${worker.capability} has no action "${action}"`,
            { correlationId: ctx.directive.correlationId ?? ctx.directive.id },
        );
    }
    const handler: ActionHandler = worker.actions[action];
    return handler(params, ctx);
}
