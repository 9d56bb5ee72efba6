/**
 * Quality Gate
 *
 * Validate an enhanced draft against the structure template's rules before
 * it is accepted. Hard violations fail the draft; soft ones only warn.
 */

import { createLogger } from '../logger';
import { countWords, sentencesOf } from '../utils/text';
import { containsTerm, getLexicon } from './lexicon';
import { ValidationRules } from './runConfig';
import { StructureTemplate } from './templates';
import {
    RecommendedAction,
    ScriptDraft,
    Severity,
    ValidationReport,
    Violation,
} from './types';

const logger = createLogger('quality-gate');

/**
 * Narration speed used for the runtime estimate
 */
const SPOKEN_WORDS_PER_SECOND = 2.5;

const PASSIVE_PATTERN = /\b(is|are|was|were|be|been)\s+(?:being\s+)?(\w+ed)\b/i;

export interface QualityGateOptions {
    attemptsRemaining: number;
    strict: boolean;
}

function round(value: number, places = 4): number {
    const factor = 10 ** places;
    return Math.round(value * factor) / factor;
}

export function scriptText(draft: ScriptDraft): string {
    return draft.segments.map(segment => segment.text).join(' ');
}

export function activeVoiceRatio(sentences: string[]): number {
    if (sentences.length === 0) return 0;
    const passive = sentences.filter(sentence => PASSIVE_PATTERN.test(sentence)).length;
    return round(1 - passive / sentences.length);
}

export function strongVerbRatio(sentences: string[], verbs: string[] = getLexicon().strongVerbs): number {
    if (sentences.length === 0) return 0;
    const strong = sentences.filter(sentence => verbs.some(verb => containsTerm(sentence, verb))).length;
    return round(strong / sentences.length);
}

export function wordCountDeviation(wordCount: number, rules: ValidationRules): number {
    if (wordCount < rules.targetMinWords) {
        return round((rules.targetMinWords - wordCount) / rules.targetMinWords);
    }
    if (wordCount > rules.targetMaxWords) {
        return round((wordCount - rules.targetMaxWords) / rules.targetMaxWords);
    }
    return 0;
}

function introPresent(draft: ScriptDraft): boolean {
    const first = draft.segments[0];
    return first !== undefined && first.kind === 'intro' && first.text.trim().length > 0;
}

function ctaPresent(draft: ScriptDraft): boolean {
    const last = draft.segments[draft.segments.length - 1];
    if (!last || last.kind !== 'outro') return false;
    const cta = last.metadata.cta;
    return cta !== undefined && cta.length > 0 && last.text.trimEnd().endsWith(cta);
}

function transitionsPresent(draft: ScriptDraft): boolean {
    return draft.segments
        .filter(segment => segment.kind === 'story')
        .slice(1)
        .every(segment => {
            const transition = segment.metadata.transition;
            return transition !== undefined && segment.text.startsWith(transition);
        });
}

/**
 * Merge run-level overrides over the template's rules
 */
export function resolveRules(template: StructureTemplate, overrides: Partial<ValidationRules> = {}): ValidationRules {
    const rules: ValidationRules = { ...template.validation };
    for (const [key, value] of Object.entries(overrides)) {
        if (value === undefined) continue;
        Object.assign(rules, { [key]: value });
    }
    return rules;
}

export function recommendAction(
    severity: Severity,
    options: QualityGateOptions
): RecommendedAction {
    const retryOrEscalate: RecommendedAction = options.attemptsRemaining > 0 ? 'regenerate' : 'escalate';
    if (severity === 'fail') return retryOrEscalate;
    if (severity === 'warn' && options.strict) return retryOrEscalate;
    return 'accept';
}

/**
 * Run quality checks on a draft
 */
export function runQualityGate(
    draft: ScriptDraft,
    rules: ValidationRules,
    options: QualityGateOptions
): ValidationReport {
    const text = scriptText(draft);
    const sentences = sentencesOf(text);
    const wordCount = countWords(text);
    const storySegments = draft.segments.filter(segment => segment.kind === 'story').length;

    const metrics: Record<string, number> = {
        word_count: wordCount,
        word_count_deviation: wordCountDeviation(wordCount, rules),
        sentence_count: sentences.length,
        active_voice_ratio: activeVoiceRatio(sentences),
        strong_verb_ratio: strongVerbRatio(sentences),
        marker_intro: introPresent(draft) ? 1 : 0,
        marker_transitions: transitionsPresent(draft) ? 1 : 0,
        marker_cta: ctaPresent(draft) ? 1 : 0,
        story_segments: storySegments,
        pacing_wps: round(wordCount / rules.targetSeconds),
        estimated_seconds: Math.round(wordCount / SPOKEN_WORDS_PER_SECOND),
    };

    const violations: Violation[] = [];
    const hard = (ruleId: string, message: string) => violations.push({ ruleId, message, hard: true });
    const soft = (ruleId: string, message: string) => violations.push({ ruleId, message, hard: false });

    if (storySegments === 0) {
        hard('segments.empty', 'Draft has no story segments');
    }

    if (wordCount < rules.minWords) {
        hard('word_count.below_min', `Word count ${wordCount} is below the minimum of ${rules.minWords}`);
    } else if (wordCount > rules.maxWords) {
        hard('word_count.above_max', `Word count ${wordCount} exceeds the maximum of ${rules.maxWords}`);
    } else if (wordCount < rules.targetMinWords) {
        soft('word_count.below_target', `Word count ${wordCount} is below the target of ${rules.targetMinWords}`);
    } else if (wordCount > rules.targetMaxWords) {
        soft('word_count.above_target', `Word count ${wordCount} is above the target of ${rules.targetMaxWords}`);
    }

    if (!metrics.marker_intro) {
        hard('marker.intro_missing', 'Script does not open with an intro segment');
    }
    if (rules.requireTransitions && !metrics.marker_transitions) {
        hard('marker.transition_missing', 'A story segment after the first has no transition');
    }
    if (!metrics.marker_cta) {
        hard('marker.cta_missing', 'Outro does not end with a call to action');
    }

    if (metrics.active_voice_ratio < rules.activeVoiceMin) {
        hard('voice.active_below_min', `Active voice ratio ${metrics.active_voice_ratio} is below ${rules.activeVoiceMin}`);
    } else if (metrics.active_voice_ratio < rules.activeVoiceTarget) {
        soft('voice.active_below_target', `Active voice ratio ${metrics.active_voice_ratio} is below the target of ${rules.activeVoiceTarget}`);
    }

    if (metrics.strong_verb_ratio < rules.strongVerbTarget) {
        soft('verbs.strong_below_target', `Strong verb ratio ${metrics.strong_verb_ratio} is below the target of ${rules.strongVerbTarget}`);
    }

    if (metrics.pacing_wps < rules.pacingMinWps) {
        soft('pacing.below_range', `Pacing ${metrics.pacing_wps} words/s is below ${rules.pacingMinWps}`);
    } else if (metrics.pacing_wps > rules.pacingMaxWps) {
        soft('pacing.above_range', `Pacing ${metrics.pacing_wps} words/s is above ${rules.pacingMaxWps}`);
    }

    const severity: Severity = violations.some(violation => violation.hard)
        ? 'fail'
        : violations.length > 0 ? 'warn' : 'pass';

    const report: ValidationReport = {
        severity,
        metrics,
        violations,
        recommendedAction: recommendAction(severity, options),
    };

    if (severity === 'fail') {
        logger.warn('Quality gate failed', {
            violations: violations.map(violation => violation.ruleId),
            action: report.recommendedAction,
        });
    } else {
        logger.info('Quality gate passed', { severity, wordCount, action: report.recommendedAction });
    }

    return report;
}

export default { runQualityGate, resolveRules, recommendAction };
