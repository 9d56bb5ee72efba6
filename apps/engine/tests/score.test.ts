/**
 * Tests for score.ts
 */

import {
    calculateFreshness,
    calculateTrending,
    MISSING_DATE_FRESHNESS,
    scoreAndSelect,
    scoreStory,
} from '../src/pipeline/score';
import { TrendingTable } from '../src/pipeline/types';
import { storyRecord } from './fixtures';

const NOW = new Date('2025-09-02T12:00:00.000Z');

const table: TrendingTable = {
    version: 'test',
    cap: 2,
    keywords: { gpu: 1, 'data center': 0.5 },
};

describe('calculateFreshness', () => {
    it('should use the fixed value for a missing date', () => {
        expect(calculateFreshness({ publishedAt: null, category: 'news' }, NOW)).toBe(MISSING_DATE_FRESHNESS);
    });

    it('should halve after one category half-life', () => {
        expect(calculateFreshness({ publishedAt: '2025-09-01T12:00:00.000Z', category: 'news' }, NOW)).toBeCloseTo(0.5);
        expect(calculateFreshness({ publishedAt: '2025-08-26T12:00:00.000Z', category: 'research' }, NOW)).toBeCloseTo(0.5);
        expect(calculateFreshness({ publishedAt: '2025-09-02T00:00:00.000Z', category: 'trending' }, NOW)).toBeCloseTo(0.5);
    });

    it('should treat future dates as brand new', () => {
        expect(calculateFreshness({ publishedAt: '2025-09-03T00:00:00.000Z', category: 'news' }, NOW)).toBe(1);
    });
});

describe('calculateTrending', () => {
    it('should sum matched keyword weights and scale by the cap', () => {
        const story = { title: 'New GPU cluster', bodyExcerpt: 'A data center in Ohio', trendingBoost: 0 };
        expect(calculateTrending(story, table)).toBe(0.75);
    });

    it('should add the story boost and cap the total', () => {
        const story = { title: 'New GPU cluster', bodyExcerpt: 'A data center in Ohio', trendingBoost: 1 };
        expect(calculateTrending(story, table)).toBe(1);
    });

    it('should be zero without a table or boost', () => {
        expect(calculateTrending({ title: 'GPU', bodyExcerpt: '', trendingBoost: 0 }, null)).toBe(0);
    });
});

describe('scoreStory', () => {
    it('should return a breakdown that sums to the score', () => {
        const scored = scoreStory(
            storyRecord({ publishedAt: '2025-09-01T12:00:00.000Z', sourceWeight: 0.5, title: 'Quiet news' }),
            { freshness: 0.4, sourcePriority: 0.3, trending: 0.3 },
            { now: NOW, trending: table }
        );

        expect(scored.scoreBreakdown.freshness).toBeCloseTo(0.2);
        expect(scored.scoreBreakdown.sourcePriority).toBeCloseTo(0.15);
        expect(scored.scoreBreakdown.trending).toBe(0);
        expect(scored.score).toBeCloseTo(0.35);
    });
});

describe('scoreAndSelect', () => {
    const weights = { freshness: 0, sourcePriority: 1, trending: 0 };
    const stories = [
        storyRecord({ id: 'id-c', sourceWeight: 0.5, publishedAt: null }),
        storyRecord({ id: 'id-d', sourceWeight: 0.9, publishedAt: null }),
        storyRecord({ id: 'id-a-old', sourceWeight: 0.5, publishedAt: '2025-09-01T00:00:00.000Z' }),
        storyRecord({ id: 'id-b', sourceWeight: 0.5, publishedAt: '2025-09-02T00:00:00.000Z' }),
        storyRecord({ id: 'id-a', sourceWeight: 0.5, publishedAt: '2025-09-02T00:00:00.000Z' }),
    ];

    it('should order by score, then newest, then id', () => {
        const selected = scoreAndSelect(stories, weights, 10, { now: NOW, trending: null });
        expect(selected.map(story => story.id)).toEqual(['id-d', 'id-a', 'id-b', 'id-a-old', 'id-c']);
    });

    it('should keep only the top K', () => {
        const selected = scoreAndSelect(stories, weights, 3, { now: NOW, trending: null });
        expect(selected.map(story => story.id)).toEqual(['id-d', 'id-a', 'id-b']);
    });

    it('should not depend on input order', () => {
        const forward = scoreAndSelect(stories, weights, 5, { now: NOW, trending: null });
        const reversed = scoreAndSelect([...stories].reverse(), weights, 5, { now: NOW, trending: null });
        expect(reversed).toEqual(forward);
    });
});
