import { TaskError } from '@canopy/protocol';
import { describe, expect, it } from 'vitest';
import { defaultPlanner } from './goal-planner.js';

describe('defaultPlanner', () => {
    it('plans a goal without steps as itself', () => {
        const goal = { capability: 'text', action: 'echo', params: { text: 'hi' } };

        expect(defaultPlanner.plan(goal)).toEqual([goal]);
    });

    it('turns each step into a directive payload', () => {
        const plan = defaultPlanner.plan({
            capability: 'plan',
            action: 'run',
            params: {
                steps: [
                    { capability: 'text', action: 'reverse', params: { text: 'abc' } },
                    { capability: 'math', action: 'sum', target: 'sup/math-1' },
                ],
            },
        });

        expect(plan).toEqual([
            { capability: 'text', action: 'reverse', params: { text: 'abc' } },
            { capability: 'math', action: 'sum', params: {}, target: 'sup/math-1' },
        ]);
    });

    it('rejects an empty step list', () => {
        const plan = () => defaultPlanner.plan({ capability: 'plan', action: 'run', params: { steps: [] } });

        expect(plan).toThrow(TaskError);
        expect(plan).toThrow('Invalid steps:  Array must contain at least 1 element(s)');
    });

    it('points at the offending step', () => {
        const plan = () => defaultPlanner.plan({
            capability: 'plan',
            action: 'run',
            params: { steps: [{ capability: 'text', action: 'echo' }, { capability: '', action: 'sum' }] },
        });

        expect(plan).toThrow('Invalid steps: 1.capability String must contain at least 1 character(s)');
    });
});
