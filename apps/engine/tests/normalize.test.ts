/**
 * Tests for normalize.ts
 */

import {
    canonicalUrl,
    cleanText,
    contentFingerprint,
    normalizeAndDedupe,
    normalizeItem,
    prefersCandidate,
    toRawItems,
} from '../src/pipeline/normalize';
import { rawItem, storyRecord } from './fixtures';

describe('canonicalUrl', () => {
    it('should drop tracking parameters, fragment and trailing slash', () => {
        expect(canonicalUrl('https://Example.com/a/b/?utm_source=x&b=2&a=1#frag'))
            .toBe('https://example.com/a/b?a=1&b=2');
    });

    it('should keep non-tracking parameters sorted', () => {
        expect(canonicalUrl('https://example.com/story?z=1&fbclid=abc&id=7'))
            .toBe('https://example.com/story?id=7&z=1');
    });

    it('should order parameters the same whatever their case', () => {
        expect(canonicalUrl('https://example.com/p?B=1&a=2')).toBe('https://example.com/p?a=2&b=1');
        expect(canonicalUrl('https://example.com/p?b=1&a=2')).toBe('https://example.com/p?a=2&b=1');
    });

    it('should lower-case values that are not URLs', () => {
        expect(canonicalUrl('Not A URL')).toBe('not a url');
    });

    it('should return null for blank input', () => {
        expect(canonicalUrl('   ')).toBeNull();
        expect(canonicalUrl(null)).toBeNull();
    });
});

describe('cleanText', () => {
    it('should strip tags and decode entities', () => {
        expect(cleanText('<p>Chips &amp; <b>models</b></p>')).toBe('Chips & models');
    });

    it('should be stable when applied twice', () => {
        const once = cleanText('  <div>GPU&nbsp;prices&nbsp;&quot;fall&quot;</div> ');
        expect(once).toBe('GPU prices "fall"');
        expect(cleanText(once)).toBe(once);
    });
});

describe('contentFingerprint', () => {
    it('should match titles that differ only in case and punctuation', () => {
        expect(contentFingerprint(null, 'Quantum Leap!')).toBe(contentFingerprint(null, 'quantum leap'));
    });

    it('should prefer the URL over the title', () => {
        expect(contentFingerprint('https://example.com/a', 'One title'))
            .toBe(contentFingerprint('https://example.com/a', 'Another title'));
    });
});

describe('normalizeItem', () => {
    it('should return null when the title is empty after cleaning', () => {
        expect(normalizeItem(rawItem({ title: '<p> </p>' }))).toBeNull();
    });

    it('should normalize dates to ISO and clamp the source weight', () => {
        const story = normalizeItem(rawItem({
            title: 'Chip launch',
            publishedAt: '2025-09-01T10:00:00Z',
            sourceWeight: 1.4,
        }));
        expect(story?.publishedAt).toBe('2025-09-01T10:00:00.000Z');
        expect(story?.sourceWeight).toBe(1);
    });

    it('should drop unparseable dates', () => {
        expect(normalizeItem(rawItem({ title: 'Chip launch', publishedAt: 'yesterday' }))?.publishedAt).toBeNull();
    });
});

describe('prefersCandidate', () => {
    it('should prefer the higher source weight', () => {
        expect(prefersCandidate(storyRecord({ sourceWeight: 0.9 }), storyRecord({ sourceWeight: 0.5 }))).toBe(true);
        expect(prefersCandidate(storyRecord({ sourceWeight: 0.4 }), storyRecord({ sourceWeight: 0.5 }))).toBe(false);
    });

    it('should prefer the earlier publication on equal weight', () => {
        const earlier = storyRecord({ publishedAt: '2025-09-01T00:00:00.000Z' });
        const later = storyRecord({ publishedAt: '2025-09-02T00:00:00.000Z' });
        expect(prefersCandidate(earlier, later)).toBe(true);
        expect(prefersCandidate(later, earlier)).toBe(false);
    });

    it('should prefer any date over a missing one', () => {
        const dated = storyRecord({ publishedAt: '2025-09-01T00:00:00.000Z' });
        const undated = storyRecord({ publishedAt: null });
        expect(prefersCandidate(dated, undated)).toBe(true);
        expect(prefersCandidate(undated, dated)).toBe(false);
    });

    it('should keep the incumbent on a full tie', () => {
        expect(prefersCandidate(storyRecord(), storyRecord())).toBe(false);
    });
});

describe('normalizeAndDedupe', () => {
    const items = [
        rawItem({ sourceIndex: 1, itemIndex: 1, sourceWeight: 0.9, title: 'quantum leap' }),
        rawItem({
            sourceIndex: 1,
            itemIndex: 0,
            sourceWeight: 0.9,
            title: 'Chip launch (updated)',
            url: 'https://example.com/story',
        }),
        rawItem({ sourceIndex: 0, itemIndex: 1, title: 'Quantum Leap!' }),
        rawItem({
            sourceIndex: 0,
            itemIndex: 0,
            title: 'Chip launch',
            url: 'https://example.com/story?utm_source=rss',
        }),
    ];

    it('should collapse duplicates and keep the preferred record', () => {
        const result = normalizeAndDedupe(items);

        expect(result.removed).toBe(2);
        expect(result.stories.map(story => story.title)).toEqual(['Chip launch (updated)', 'quantum leap']);
    });

    it('should order survivors by configuration position, not input order', () => {
        const forward = normalizeAndDedupe(items);
        const reversed = normalizeAndDedupe([...items].reverse());
        expect(reversed.stories).toEqual(forward.stories);
    });

    it('should merge URLs whose parameters differ only in case', () => {
        const result = normalizeAndDedupe([
            rawItem({ title: 'Rate cut', url: 'https://example.com/p?B=1&a=2' }),
            rawItem({ itemIndex: 1, title: 'Rate cut', url: 'https://example.com/p?b=1&a=2' }),
        ]);

        expect(result.removed).toBe(1);
        expect(result.stories.map(story => story.url)).toEqual(['https://example.com/p?a=2&b=1']);
    });

    it('should count items without a title as removed', () => {
        const result = normalizeAndDedupe([rawItem({ title: '' }), rawItem({ itemIndex: 1, title: 'Kept' })]);
        expect(result.removed).toBe(1);
        expect(result.stories.map(story => story.title)).toEqual(['Kept']);
    });

    it('should be idempotent', () => {
        const first = normalizeAndDedupe(items);
        const second = normalizeAndDedupe(toRawItems(first.stories));

        expect(second.stories).toEqual(first.stories);
        expect(second.removed).toBe(0);
    });
});
