import { describe, expect, it } from 'vitest';
import { FatalAgentError, OrchestrationError, TaskError, classifyError, isTransientError } from './errors.js';

function errnoError(code: string): Error {
    return Object.assign(new Error(`socket failed: ${code}`), { code });
}

describe('classifyError', () => {
    it('keeps a task error as an expected failure', () => {
        const result = classifyError(new TaskError('BAD_INPUT', 'no text', { retryable: true }));

        expect(result).toEqual({ code: 'BAD_INPUT', message: 'no text', retryable: true, fatal: false, unexpected: false });
    });

    it('marks a fatal agent error as fatal and not retryable', () => {
        const result = classifyError(new FatalAgentError('disk gone', { code: 'DISK' }));

        expect(result.code).toBe('DISK');
        expect(result.fatal).toBe(true);
        expect(result.retryable).toBe(false);
    });

    it('passes orchestration errors through', () => {
        const result = classifyError(new OrchestrationError('CIRCUIT_OPEN', 'open', { retryable: true }));

        expect(result).toEqual({ code: 'CIRCUIT_OPEN', message: 'open', retryable: true, fatal: false, unexpected: false });
    });

    it('treats connection failures as transient', () => {
        const result = classifyError(errnoError('ECONNRESET'));

        expect(result.code).toBe('ECONNRESET');
        expect(result.retryable).toBe(true);
        expect(result.unexpected).toBe(true);
    });

    it('treats any other error as an unexpected handler error', () => {
        expect(classifyError(new TypeError('x is undefined'))).toEqual({
            code: 'HANDLER_ERROR',
            message: 'x is undefined',
            retryable: false,
            fatal: false,
            unexpected: true,
        });
    });

    it('stringifies thrown non-errors', () => {
        expect(classifyError('boom').message).toBe('boom');
    });
});

describe('isTransientError', () => {
    it('recognizes timeouts by name', () => {
        const error = new Error('took too long');
        error.name = 'TimeoutError';
        expect(isTransientError(error)).toBe(true);
    });

    it('ignores unknown errno codes', () => {
        expect(isTransientError(errnoError('EACCES'))).toBe(false);
    });
});
