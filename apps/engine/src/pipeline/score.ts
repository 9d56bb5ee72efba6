/**
 * Story Scoring
 *
 * Score stories on freshness, source priority and trending relevance, then
 * select a bounded top-K. Every component is already multiplied by its
 * weight, so the breakdown always sums to the score.
 */

import { createLogger } from '../logger';
import { ScoreWeights } from './runConfig';
import { DEFAULT_TRENDING_CAP } from './trending';
import { ScoreBreakdown, ScoredStory, StoryCategory, StoryRecord, TrendingTable } from './types';

const logger = createLogger('score');

/**
 * Hours after which a story keeps half its freshness
 */
export const FRESHNESS_HALF_LIFE_HOURS: Record<StoryCategory, number> = {
    trending: 12,
    news: 24,
    company: 72,
    research: 168,
};

/**
 * Freshness used when a story carries no publication date
 */
export const MISSING_DATE_FRESHNESS = 0.4;

const MS_PER_HOUR = 60 * 60 * 1000;

export interface ScoringContext {
    /** Recorded run start; never the wall clock */
    now: Date;
    trending: TrendingTable | null;
}

/**
 * Exponential decay by category half-life; future dates count as brand new
 */
export function calculateFreshness(story: Pick<StoryRecord, 'publishedAt' | 'category'>, now: Date): number {
    if (!story.publishedAt) {
        return MISSING_DATE_FRESHNESS;
    }

    const published = Date.parse(story.publishedAt);
    if (Number.isNaN(published)) {
        return MISSING_DATE_FRESHNESS;
    }

    const ageHours = Math.max(0, (now.getTime() - published) / MS_PER_HOUR);
    return Math.pow(2, -ageHours / FRESHNESS_HALF_LIFE_HOURS[story.category]);
}

/**
 * Matched keyword weights plus the story's own boost, capped and scaled to 0..1.
 * Matching is a case-insensitive substring test; each keyword counts once.
 */
export function calculateTrending(
    story: Pick<StoryRecord, 'title' | 'bodyExcerpt' | 'trendingBoost'>,
    table: TrendingTable | null
): number {
    const cap = table?.cap ?? DEFAULT_TRENDING_CAP;
    const text = `${story.title} ${story.bodyExcerpt}`.toLowerCase();

    let total = Math.max(0, story.trendingBoost);
    for (const [keyword, weight] of Object.entries(table?.keywords ?? {})) {
        if (keyword && text.includes(keyword)) {
            total += weight;
        }
    }

    return Math.min(cap, total) / cap;
}

/**
 * Score a single story
 */
export function scoreStory(
    story: StoryRecord,
    weights: ScoreWeights,
    context: ScoringContext
): ScoredStory {
    const scoreBreakdown: ScoreBreakdown = {
        freshness: weights.freshness * calculateFreshness(story, context.now),
        sourcePriority: weights.sourcePriority * Math.min(1, Math.max(0, story.sourceWeight)),
        trending: weights.trending * calculateTrending(story, context.trending),
    };

    return {
        ...story,
        score: scoreBreakdown.freshness + scoreBreakdown.sourcePriority + scoreBreakdown.trending,
        scoreBreakdown,
    };
}

/**
 * Score desc, then newer first (missing dates last), then id asc
 */
export function compareScored(a: ScoredStory, b: ScoredStory): number {
    if (a.score !== b.score) {
        return b.score - a.score;
    }

    const aTime = a.publishedAt ? Date.parse(a.publishedAt) : null;
    const bTime = b.publishedAt ? Date.parse(b.publishedAt) : null;
    if (aTime !== bTime) {
        if (aTime === null) return 1;
        if (bTime === null) return -1;
        return bTime - aTime;
    }

    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Score every story and keep the best topK (all of them when fewer exist)
 */
export function scoreAndSelect(
    stories: StoryRecord[],
    weights: ScoreWeights,
    topK: number,
    context: ScoringContext
): ScoredStory[] {
    const ranked = stories
        .map(story => scoreStory(story, weights, context))
        .sort(compareScored);
    const selected = ranked.slice(0, Math.max(0, topK));

    logger.debug('Stories scored', {
        candidates: stories.length,
        selected: selected.length,
        trendingVersion: context.trending?.version ?? null,
    });

    return selected;
}

export default {
    calculateFreshness,
    calculateTrending,
    scoreStory,
    compareScored,
    scoreAndSelect,
};
