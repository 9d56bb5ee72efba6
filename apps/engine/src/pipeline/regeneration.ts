/**
 * Regeneration Controller
 *
 * Bounded feedback loop around compose and validate:
 * DRAFTING -> VALIDATING -> ACCEPTED | REGENERATING | ESCALATED,
 * REGENERATING -> DRAFTING. Adjustments are keyed by violated rule id.
 */

import { StageFailure } from '../errors';
import { createLogger } from '../logger';
import { ParamAdjustment } from './runConfig';
import { CompositionParams, RegenerationState, ValidationReport } from './types';

const logger = createLogger('regeneration');

const MIN_DETAIL_LEVEL = 1;
const MAX_DETAIL_LEVEL = 3;

export const DEFAULT_ADJUSTMENTS: Readonly<Record<string, ParamAdjustment>> = {
    'word_count.below_min': { detailLevel: 1, maxStories: 1 },
    'word_count.above_max': { detailLevel: -1, maxStories: -1 },
    'word_count.below_target': { detailLevel: 1 },
    'word_count.above_target': { detailLevel: -1 },
    'voice.active_below_min': { toneStrictness: 'strict' },
    'voice.active_below_target': { toneStrictness: 'strict' },
    'verbs.strong_below_target': { toneStrictness: 'strict' },
};

export type RegenerationEvent =
    | { type: 'DRAFTED' }
    | { type: 'VALIDATED'; report: ValidationReport }
    | { type: 'RETRY' };

export function initialRegeneration(maxAttempts: number, params: CompositionParams): RegenerationState {
    return {
        phase: 'DRAFTING',
        attempt: 1,
        maxAttempts,
        params,
        reports: [],
        adjustmentsApplied: [],
    };
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

/**
 * Apply the adjustment of every violated rule, in report order
 */
export function adjustParams(
    params: CompositionParams,
    report: ValidationReport,
    overrides: Record<string, ParamAdjustment> = {}
): { params: CompositionParams; applied: string[] } {
    const table: Record<string, ParamAdjustment> = { ...DEFAULT_ADJUSTMENTS, ...overrides };
    const applied: string[] = [];
    let next = { ...params };

    for (const violation of report.violations) {
        const adjustment = table[violation.ruleId];
        if (!adjustment) continue;

        next = {
            detailLevel: clamp(next.detailLevel + (adjustment.detailLevel ?? 0), MIN_DETAIL_LEVEL, MAX_DETAIL_LEVEL),
            maxStories: Math.max(1, next.maxStories + (adjustment.maxStories ?? 0)),
            toneStrictness: adjustment.toneStrictness ?? next.toneStrictness,
        };
        applied.push(violation.ruleId);
    }

    return { params: next, applied };
}

function invalid(state: RegenerationState, event: RegenerationEvent): StageFailure {
    return new StageFailure(
        'regeneration',
        `Invalid transition ${event.type} from ${state.phase} (attempt ${state.attempt})`
    );
}

/**
 * Advance the controller. Throws StageFailure on an event the current phase
 * does not accept.
 */
export function transitionRegeneration(
    state: RegenerationState,
    event: RegenerationEvent,
    overrides: Record<string, ParamAdjustment> = {}
): RegenerationState {
    switch (event.type) {
        case 'DRAFTED':
            if (state.phase !== 'DRAFTING') throw invalid(state, event);
            return { ...state, phase: 'VALIDATING' };

        case 'VALIDATED': {
            if (state.phase !== 'VALIDATING') throw invalid(state, event);
            const reports = [...state.reports, event.report];
            const action = event.report.recommendedAction;

            if (action === 'accept') {
                return { ...state, phase: 'ACCEPTED', reports };
            }

            if (action === 'regenerate' && state.attempt < state.maxAttempts) {
                const { params, applied } = adjustParams(state.params, event.report, overrides);
                logger.info('Regenerating draft', {
                    attempt: state.attempt,
                    adjustments: applied,
                    params,
                });
                return {
                    ...state,
                    phase: 'REGENERATING',
                    reports,
                    params,
                    adjustmentsApplied: [...state.adjustmentsApplied, ...applied],
                };
            }

            logger.warn('Escalating draft for review', {
                attempt: state.attempt,
                maxAttempts: state.maxAttempts,
                severity: event.report.severity,
            });
            return { ...state, phase: 'ESCALATED', reports };
        }

        case 'RETRY':
            if (state.phase !== 'REGENERATING') throw invalid(state, event);
            return { ...state, phase: 'DRAFTING', attempt: state.attempt + 1 };
    }
}

export function attemptsRemaining(state: RegenerationState): number {
    return Math.max(0, state.maxAttempts - state.attempt);
}

export default { initialRegeneration, transitionRegeneration, adjustParams, attemptsRemaining };
