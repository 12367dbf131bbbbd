import type { DirectivePayload } from '@canopy/protocol';
import { z } from 'zod';

/**
 * Capability name of the directives a coordinator sends to its supervisors.
 */
export const CONTROL_CAPABILITY = 'supervision';

export const controlDirectiveSchema = z.discriminatedUnion('action', [
    z.object({
        action: z.literal('reduce-concurrency'),
        params: z.object({
            capability: z.string().min(1),
            limit: z.number().int().positive(),
        }),
    }),
    z.object({
        action: z.literal('prefer-alternate'),
        params: z.object({
            capability: z.string().min(1),
            alternate: z.string().min(1),
        }),
    }),
]);

export type ControlDirective = z.infer<typeof controlDirectiveSchema>;

export function controlPayload(directive: ControlDirective): DirectivePayload {
    return { capability: CONTROL_CAPABILITY, action: directive.action, params: directive.params };
}
