import { TaskError, type DirectivePayload } from '@canopy/protocol';
import { z } from 'zod';

/**
 * Turns a goal into the domain directives that achieve it.
 */
export interface GoalPlanner {
    plan(goal: DirectivePayload): DirectivePayload[];
}

const stepSchema = z.object({
    capability: z.string().min(1),
    action: z.string().min(1),
    params: z.record(z.unknown()).default({}),
    target: z.string().min(1).optional(),
});

const stepsSchema = z.array(stepSchema).min(1);

/**
 * A goal is its own single directive, unless it lists `params.steps`, in
 * which case each step becomes one directive.
 */
export const defaultPlanner: GoalPlanner = {
    plan(goal) {
        const steps = goal.params.steps;
        if (steps === undefined) return [goal];

        const parsed = stepsSchema.safeParse(steps);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new TaskError('INVALID_PLAN', `Invalid steps: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`);
        }
        return parsed.data.map(step => ({
            capability: step.capability,
            action: step.action,
            params: step.params,
            ...(step.target !== undefined ? { target: step.target } : {}),
        }));
    },
};
