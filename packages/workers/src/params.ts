import { TaskError } from '@canopy/protocol';
import type { z } from 'zod';

/**
 * Validate action params, turning a mismatch into a non-retryable TaskError.
 */
export function parseParams<T extends z.ZodTypeAny>(schema: T, params: Record<string, unknown>, action: string): z.output<T> {
    const result = schema.safeParse(params);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        throw new TaskError('INVALID_PARAMS', `${action}: ${where}${issue?.message ?? 'invalid params'}`);
    }
    return result.data;
}
