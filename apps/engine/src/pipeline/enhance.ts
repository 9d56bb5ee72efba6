/**
 * Script Enhancers
 *
 * Post-composition passes run in a fixed order: tone rules, transitions,
 * call to action. Each pass leaves a draft it already touched unchanged,
 * so re-running the chain after a resume is safe.
 */

import { createLogger } from '../logger';
import { escapeRegExp } from '../utils/text';
import { sumWords } from './compose';
import { getPhrases, stableHash } from './lexicon';
import { ScriptDraft, SegmentDraft, ToneStrictness } from './types';

const logger = createLogger('enhance');

const MAX_TONE_PASSES = 10;
const DEFAULT_CTA_TOPIC = 'AI';

export interface Enhancer {
    name: string;
    apply(draft: ScriptDraft): ScriptDraft;
}

function matchCase(matched: string, replacement: string): string {
    const first = matched.charAt(0);
    if (first !== first.toLowerCase() && first === first.toUpperCase()) {
        return replacement.charAt(0).toUpperCase() + replacement.slice(1);
    }
    return replacement;
}

function tonePass(text: string, strictness: ToneStrictness): string {
    const { weakPhrases, hedges } = getPhrases().tone;
    let result = text;

    const rules = Object.entries(weakPhrases).sort((a, b) => b[0].length - a[0].length);
    for (const [weak, strong] of rules) {
        result = result.replace(
            new RegExp(`\\b${escapeRegExp(weak)}\\b`, 'gi'),
            matched => matchCase(matched, strong)
        );
    }

    if (strictness === 'strict') {
        for (const hedge of hedges) {
            result = result.replace(new RegExp(`\\b${escapeRegExp(hedge)}\\b,?\\s*`, 'gi'), '');
        }
    }

    result = result
        .replace(/\s+/g, ' ')
        .replace(/\s+([,.!?;:])/g, '$1')
        .trim();

    if (strictness === 'strict') {
        result = result.replace(
            /(^|[.!?]\s+)(\p{Ll})/gu,
            (_matched, lead: string, letter: string) => lead + letter.toUpperCase()
        );
    }

    return result;
}

/**
 * Apply tone rules until the text stops changing
 */
export function applyTone(text: string, strictness: ToneStrictness): string {
    let current = text;
    for (let pass = 0; pass < MAX_TONE_PASSES; pass++) {
        const next = tonePass(current, strictness);
        if (next === current) break;
        current = next;
    }
    return current;
}

export const toneEnhancer: Enhancer = {
    name: 'tone',
    apply(draft) {
        const segments = draft.segments.map(segment => ({
            ...segment,
            text: applyTone(segment.text, draft.params.toneStrictness),
        }));
        return { ...draft, segments, wordCount: sumWords(segments), toneApplied: true };
    },
};

/**
 * Prefix every story after the first with a transition phrase. Phrases
 * already in the draft are not reused while unused ones remain.
 */
export const transitionEnhancer: Enhancer = {
    name: 'transitions',
    apply(draft) {
        const library = getPhrases().transitions;
        const used = new Set<string>();
        for (const segment of draft.segments) {
            if (segment.metadata.transition) used.add(segment.metadata.transition);
        }

        let storyIndex = 0;
        const segments = draft.segments.map((segment): SegmentDraft => {
            if (segment.kind !== 'story') return segment;
            const index = storyIndex++;
            if (index === 0 || segment.metadata.transition) return segment;

            const pool = [...library[segment.metadata.segmentType ?? 'news'], ...library.general];
            const unused = pool.filter(phrase => !used.has(phrase));
            const candidates = unused.length > 0 ? unused : pool;
            const phrase = candidates[stableHash(segment.storyRef?.id ?? String(segment.position)) % candidates.length];
            used.add(phrase);

            return {
                ...segment,
                text: `${phrase} ${segment.text}`.trim(),
                metadata: { ...segment.metadata, transition: phrase },
            };
        });

        return { ...draft, segments, wordCount: sumWords(segments) };
    },
};

/**
 * Close the outro with a call to action built around the lead keyword
 */
export const ctaEnhancer: Enhancer = {
    name: 'cta',
    apply(draft) {
        const outro = draft.segments.filter(segment => segment.kind === 'outro').pop();
        if (!outro || outro.metadata.cta) return draft;

        const lead = draft.segments.find(segment => segment.kind === 'story');
        const topic = lead?.metadata.keywords?.[0] ?? DEFAULT_CTA_TOPIC;
        const patterns = getPhrases().cta;
        const cta = patterns[stableHash(draft.title) % patterns.length].replace(/\{\{topic\}\}/g, topic);

        const segments = draft.segments.map(segment => segment === outro
            ? { ...segment, text: `${segment.text} ${cta}`.trim(), metadata: { ...segment.metadata, cta } }
            : segment
        );

        return { ...draft, segments, wordCount: sumWords(segments) };
    },
};

export const ENHANCERS: Enhancer[] = [toneEnhancer, transitionEnhancer, ctaEnhancer];

/**
 * Run every enhancer in order
 */
export function enhanceDraft(draft: ScriptDraft, enhancers: Enhancer[] = ENHANCERS): ScriptDraft {
    const enhanced = enhancers.reduce((current, enhancer) => enhancer.apply(current), draft);

    logger.debug('Draft enhanced', {
        passes: enhancers.map(enhancer => enhancer.name),
        wordCount: enhanced.wordCount,
    });

    return enhanced;
}

export default { enhanceDraft, applyTone, ENHANCERS };
