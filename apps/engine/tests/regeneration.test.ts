/**
 * Tests for regeneration.ts
 */

import { StageFailure } from '../src/errors';
import {
    adjustParams,
    attemptsRemaining,
    initialRegeneration,
    transitionRegeneration,
} from '../src/pipeline/regeneration';
import { RecommendedAction, ValidationReport } from '../src/pipeline/types';
import { RELAXED_PARAMS } from './fixtures';

function report(action: RecommendedAction, ruleIds: string[] = []): ValidationReport {
    return {
        severity: action === 'accept' ? 'pass' : 'fail',
        metrics: {},
        violations: ruleIds.map(ruleId => ({ ruleId, message: ruleId, hard: true })),
        recommendedAction: action,
    };
}

describe('transitionRegeneration', () => {
    it('should accept a passing first draft', () => {
        let state = initialRegeneration(2, RELAXED_PARAMS);
        state = transitionRegeneration(state, { type: 'DRAFTED' });
        expect(state.phase).toBe('VALIDATING');

        state = transitionRegeneration(state, { type: 'VALIDATED', report: report('accept') });
        expect(state.phase).toBe('ACCEPTED');
        expect(state.attempt).toBe(1);
        expect(state.reports).toHaveLength(1);
    });

    it('should regenerate with adjusted parameters, then escalate at the bound', () => {
        let state = initialRegeneration(2, RELAXED_PARAMS);
        state = transitionRegeneration(state, { type: 'DRAFTED' });
        state = transitionRegeneration(state, {
            type: 'VALIDATED',
            report: report('regenerate', ['word_count.below_min']),
        });

        expect(state.phase).toBe('REGENERATING');
        expect(state.params).toEqual({ detailLevel: 3, maxStories: 6, toneStrictness: 'relaxed' });
        expect(state.adjustmentsApplied).toEqual(['word_count.below_min']);

        state = transitionRegeneration(state, { type: 'RETRY' });
        expect(state.phase).toBe('DRAFTING');
        expect(state.attempt).toBe(2);
        expect(attemptsRemaining(state)).toBe(0);

        state = transitionRegeneration(state, { type: 'DRAFTED' });
        state = transitionRegeneration(state, {
            type: 'VALIDATED',
            report: report('regenerate', ['word_count.below_min']),
        });
        expect(state.phase).toBe('ESCALATED');
        expect(state.reports).toHaveLength(2);
    });

    it('should escalate when the gate says so', () => {
        let state = initialRegeneration(3, RELAXED_PARAMS);
        state = transitionRegeneration(state, { type: 'DRAFTED' });
        state = transitionRegeneration(state, { type: 'VALIDATED', report: report('escalate') });
        expect(state.phase).toBe('ESCALATED');
    });

    it('should reject events the phase does not accept', () => {
        const state = initialRegeneration(2, RELAXED_PARAMS);
        expect(() => transitionRegeneration(state, { type: 'RETRY' })).toThrow(StageFailure);
        expect(() => transitionRegeneration(state, { type: 'VALIDATED', report: report('accept') }))
            .toThrow('Invalid transition VALIDATED from DRAFTING (attempt 1)');
    });
});

describe('adjustParams', () => {
    it('should clamp detail level and story count', () => {
        const { params } = adjustParams(
            { detailLevel: 1, maxStories: 1, toneStrictness: 'relaxed' },
            report('regenerate', ['word_count.above_max'])
        );
        expect(params).toEqual({ detailLevel: 1, maxStories: 1, toneStrictness: 'relaxed' });
    });

    it('should switch to strict tone on voice violations', () => {
        const { params, applied } = adjustParams(RELAXED_PARAMS, report('regenerate', ['voice.active_below_min', 'segments.empty']));
        expect(params.toneStrictness).toBe('strict');
        expect(applied).toEqual(['voice.active_below_min']);
    });

    it('should use configured adjustments over the defaults', () => {
        const { params } = adjustParams(
            RELAXED_PARAMS,
            report('regenerate', ['word_count.below_target', 'pacing.below_range']),
            { 'word_count.below_target': { maxStories: 2 }, 'pacing.below_range': { detailLevel: -1 } }
        );
        expect(params).toEqual({ detailLevel: 1, maxStories: 7, toneStrictness: 'relaxed' });
    });
});
