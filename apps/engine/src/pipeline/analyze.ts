/**
 * Segment Analysis
 *
 * Turn the selected stories into segment plans: impact score, keywords,
 * analogy, highlight, segment type and a takeaway line. Segment text stays
 * empty; the composer writes it.
 */

import { createLogger } from '../logger';
import { TextGenerator, TAKEAWAY_PROMPT } from '../providers/ai';
import { GenerationPolicy, generateWithRetry } from './generate';
import { containsTerm, getLexicon } from './lexicon';
import { DroppedStory, ScoredStory, SegmentDraft, SegmentType, StoryRecord } from './types';

const logger = createLogger('analyze');

const MAX_KEYWORDS = 5;
const MIN_FALLBACK_WORD_LENGTH = 5;

/**
 * Numeric magnitudes: percentages, multipliers, money and large counts
 */
const MAGNITUDE_PATTERN = /\$\s?\d+(?:[.,]\d+)?(?:\s?(?:trillion|billion|million|bn|m|k)\b)?|\b\d+(?:\.\d+)?\s?(?:%|x\b|percent\b|trillion\b|billion\b|million\b)/gi;

export interface AnalyzeContext {
    generator: TextGenerator | null;
    policy?: GenerationPolicy;
    signal?: AbortSignal;
}

export interface AnalysisResult {
    segments: SegmentDraft[];
    dropped: DroppedStory[];
}

function storyText(story: Pick<StoryRecord, 'title' | 'bodyExcerpt'>): string {
    return `${story.title} ${story.bodyExcerpt}`;
}

export function findMagnitudes(text: string): string[] {
    return [...text.matchAll(MAGNITUDE_PATTERN)].map(match => match[0].trim());
}

export function findNoveltyTerms(text: string): string[] {
    return getLexicon().noveltyTerms.filter(term => containsTerm(text, term));
}

/**
 * Category base plus novelty (0.1 per term, max 0.3) and magnitude
 * (0.1 per figure, max 0.2), capped at 1
 */
export function calculateImpact(story: Pick<StoryRecord, 'title' | 'bodyExcerpt' | 'category'>): number {
    const text = storyText(story);
    const base = getLexicon().categoryBase[story.category];
    const novelty = Math.min(0.3, 0.1 * findNoveltyTerms(text).length);
    const magnitude = Math.min(0.2, 0.1 * findMagnitudes(text).length);

    return Math.round(Math.min(1, base + novelty + magnitude) * 100) / 100;
}

/**
 * Lexicon terms found in the text, longest first; frequent long words
 * when no lexicon term matches
 */
export function extractKeywords(text: string): string[] {
    const lexicon = getLexicon();
    const matched = lexicon.keywordTerms
        .filter(term => containsTerm(text, term))
        .sort((a, b) => b.length - a.length || a.localeCompare(b));

    if (matched.length > 0) {
        return matched.slice(0, MAX_KEYWORDS);
    }

    const stopWords = new Set(lexicon.stopWords);
    const counts = new Map<string, number>();
    for (const word of text.toLowerCase().match(/[\p{L}\p{N}-]+/gu) ?? []) {
        if (word.length < MIN_FALLBACK_WORD_LENGTH || stopWords.has(word)) continue;
        counts.set(word, (counts.get(word) ?? 0) + 1);
    }

    // Map order is first occurrence, so the sort is stable on ties
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, MAX_KEYWORDS)
        .map(([word]) => word);
}

export function suggestAnalogy(text: string, keywords: string[]): string {
    const lexicon = getLexicon();
    const entry = lexicon.analogies.find(analogy =>
        analogy.terms.some(term => keywords.includes(term) || containsTerm(text, term))
    );
    return entry ? entry.text : lexicon.defaultAnalogy;
}

export function classifySegmentType(text: string): SegmentType {
    const { segmentTypes } = getLexicon();
    const order: Array<Exclude<SegmentType, 'news'>> = ['funding', 'research', 'policy'];
    return order.find(type => segmentTypes[type].some(term => containsTerm(text, term))) ?? 'news';
}

export function wowHighlight(magnitudes: string[], noveltyTerms: string[]): string | undefined {
    if (magnitudes.length > 0) {
        return `That ${magnitudes[0]} figure is the number to remember.`;
    }
    if (noveltyTerms.length > 0) {
        return `Call it a ${noveltyTerms[0]} moment for the industry.`;
    }
    return undefined;
}

export function templateTakeaway(type: SegmentType, keyword: string | undefined): string {
    return getLexicon().takeaways[type].replace(/\{\{keyword\}\}/g, keyword ?? 'AI');
}

function missingField(story: ScoredStory): string | null {
    if (!story.id) return 'missing id';
    if (!story.title || !story.title.trim()) return 'missing title';
    return null;
}

function compareSegments(a: SegmentDraft, b: SegmentDraft): number {
    const impactA = a.metadata.impactScore ?? 0;
    const impactB = b.metadata.impactScore ?? 0;
    if (impactA !== impactB) return impactB - impactA;

    const scoreA = a.storyRef?.score ?? 0;
    const scoreB = b.storyRef?.score ?? 0;
    if (scoreA !== scoreB) return scoreB - scoreA;

    const idA = a.storyRef?.id ?? '';
    const idB = b.storyRef?.id ?? '';
    return idA < idB ? -1 : idA > idB ? 1 : 0;
}

/**
 * Build one segment plan per selected story, ordered by impact
 */
export async function analyzeStories(
    selected: ScoredStory[],
    context: AnalyzeContext
): Promise<AnalysisResult> {
    const segments: SegmentDraft[] = [];
    const dropped: DroppedStory[] = [];

    for (const story of selected) {
        const problem = missingField(story);
        if (problem) {
            logger.warn('Dropping story', { id: story.id || null, reason: problem });
            dropped.push({ id: story.id || null, reason: problem });
            continue;
        }

        const text = storyText(story);
        const keywords = extractKeywords(text);
        const magnitudes = findMagnitudes(text);
        const novelty = findNoveltyTerms(text);
        const segmentType = classifySegmentType(text);

        const takeaway = context.generator
            ? await generateWithRetry(
                context.generator,
                TAKEAWAY_PROMPT({
                    title: story.title,
                    excerpt: story.bodyExcerpt,
                    sourceName: story.sourceName,
                    keywords,
                }),
                'analyze',
                context.policy,
                { signal: context.signal }
            )
            : templateTakeaway(segmentType, keywords[0]);

        segments.push({
            storyRef: story,
            kind: 'story',
            text: '',
            position: 0,
            metadata: {
                impactScore: calculateImpact(story),
                keywords,
                analogy: suggestAnalogy(text, keywords),
                wowHighlight: wowHighlight(magnitudes, novelty),
                segmentType,
                takeaway,
            },
        });
    }

    const ordered = segments
        .sort(compareSegments)
        .map((segment, index) => ({ ...segment, position: index + 1 }));

    logger.info('Stories analyzed', { segments: ordered.length, dropped: dropped.length });

    return { segments: ordered, dropped };
}

export default {
    analyzeStories,
    calculateImpact,
    extractKeywords,
    suggestAnalogy,
    classifySegmentType,
};
