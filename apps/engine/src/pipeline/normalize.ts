/**
 * Normalizer / Deduplicator
 *
 * Turns raw adapter items into canonical StoryRecords and collapses items
 * that share a content fingerprint. Output order is the first-seen order of
 * each survivor, where first-seen means configuration order
 * (sourceIndex, then itemIndex), never network arrival order.
 */

import crypto from 'crypto';
import { RawItem, StoryRecord } from './types';

const TRACKING_PARAMS = new Set(['fbclid', 'gclid', 'mc_cid', 'mc_eid', 'ref', 'cmpid']);
const EXCERPT_MAX_CHARS = 800;

const HTML_ENTITIES: Array<[RegExp, string]> = [
    [/&nbsp;/g, ' '],
    [/&quot;/g, '"'],
    [/&#39;|&apos;/g, "'"],
    [/&lt;/g, '<'],
    [/&gt;/g, '>'],
    [/&amp;/g, '&'],
];

export interface DedupResult {
    stories: StoryRecord[];
    removed: number;
}

function isTrackingParam(name: string): boolean {
    const key = name.toLowerCase();
    return key.startsWith('utm_') || TRACKING_PARAMS.has(key);
}

/**
 * Canonical form of a story URL: lower-cased, tracking parameters removed,
 * remaining parameters sorted, fragment and trailing slash dropped
 */
export function canonicalUrl(raw: string | null | undefined): string | null {
    const trimmed = raw?.trim();
    if (!trimmed) return null;

    let parsed: URL;
    try {
        parsed = new URL(trimmed);
    } catch {
        return trimmed.toLowerCase();
    }

    // Names and values compare case-insensitively
    const kept = [...parsed.searchParams.entries()]
        .filter(([name]) => !isTrackingParam(name))
        .map(([name, value]): [string, string] => [name.toLowerCase(), value.toLowerCase()])
        .sort(([a, av], [b, bv]) => (a === b ? (av < bv ? -1 : av > bv ? 1 : 0) : a < b ? -1 : 1));
    const query = kept
        .map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(value)}`)
        .join('&');
    const path = parsed.pathname.replace(/\/+$/, '');

    return `${parsed.protocol}//${parsed.host}${path}${query ? `?${query}` : ''}`.toLowerCase();
}

function cleanOnce(text: string): string {
    let result = text.replace(/<[^>]*>/g, ' ');
    for (const [pattern, replacement] of HTML_ENTITIES) {
        result = result.replace(pattern, replacement);
    }
    return result.replace(/\s+/g, ' ').trim();
}

/**
 * Strip markup and entities, collapse whitespace. Stable under repetition.
 */
export function cleanText(text: string | null | undefined): string {
    let current = text ?? '';
    for (let i = 0; i < 5; i++) {
        const next = cleanOnce(current);
        if (next === current) break;
        current = next;
    }
    return current;
}

/**
 * Lower-cased, punctuation-free title used when a story has no URL
 */
export function normalizeTitleKey(title: string): string {
    return cleanText(title)
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, ' ')
        .trim();
}

/**
 * Content fingerprint: derived from the canonical URL, or the normalized
 * title when there is no URL. Source-reported ids are never used.
 */
export function contentFingerprint(url: string | null, title: string): string {
    const basis = url ? `url:${url}` : `title:${normalizeTitleKey(title)}`;
    return crypto.createHash('sha256').update(basis).digest('hex').slice(0, 16);
}

function truncateExcerpt(text: string): string {
    if (text.length <= EXCERPT_MAX_CHARS) return text;
    const cut = text.slice(0, EXCERPT_MAX_CHARS);
    const lastSpace = cut.lastIndexOf(' ');
    return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trim();
}

function normalizeDate(value: string | null): string | null {
    if (!value) return null;
    const time = Date.parse(value);
    return Number.isNaN(time) ? null : new Date(time).toISOString();
}

/**
 * Normalize a single raw item; null when it has no usable title
 */
export function normalizeItem(item: RawItem): StoryRecord | null {
    const title = cleanText(item.title);
    if (!title) return null;

    const url = canonicalUrl(item.url);

    return {
        id: contentFingerprint(url, title),
        title,
        bodyExcerpt: truncateExcerpt(cleanText(item.summary)),
        url,
        sourceName: item.sourceName,
        sourceWeight: Math.min(1, Math.max(0, item.sourceWeight)),
        publishedAt: normalizeDate(item.publishedAt),
        category: item.category,
        trendingBoost: Math.max(0, item.trendingBoost || 0),
        rawRef: {
            sourceName: item.sourceName,
            sourceIndex: item.sourceIndex,
            itemIndex: item.itemIndex,
            payload: item.payload,
        },
    };
}

function compareFirstSeen(a: RawItem, b: RawItem): number {
    return a.sourceIndex - b.sourceIndex || a.itemIndex - b.itemIndex;
}

/**
 * True when candidate should replace the incumbent for the same fingerprint.
 * Higher source weight wins, then the earlier publication date (a missing
 * date loses to any date); otherwise the incumbent, seen first, stays.
 */
export function prefersCandidate(candidate: StoryRecord, incumbent: StoryRecord): boolean {
    if (candidate.sourceWeight !== incumbent.sourceWeight) {
        return candidate.sourceWeight > incumbent.sourceWeight;
    }

    if (candidate.publishedAt && incumbent.publishedAt) {
        return Date.parse(candidate.publishedAt) < Date.parse(incumbent.publishedAt);
    }
    return candidate.publishedAt !== null && incumbent.publishedAt === null;
}

/**
 * Normalize raw items and collapse duplicates
 */
export function normalizeAndDedupe(items: RawItem[]): DedupResult {
    const ordered = [...items].sort(compareFirstSeen);
    // Map preserves insertion order, i.e. each fingerprint's first-seen slot
    const survivors = new Map<string, StoryRecord>();
    let removed = 0;

    for (const item of ordered) {
        const story = normalizeItem(item);
        if (!story) {
            removed++;
            continue;
        }

        const incumbent = survivors.get(story.id);
        if (!incumbent) {
            survivors.set(story.id, story);
            continue;
        }

        removed++;
        if (prefersCandidate(story, incumbent)) {
            survivors.set(story.id, story);
        }
    }

    return { stories: [...survivors.values()], removed };
}

/**
 * Rebuild raw items from stories (resume and idempotence checks)
 */
export function toRawItems(stories: StoryRecord[]): RawItem[] {
    return stories.map(story => ({
        sourceName: story.sourceName,
        sourceIndex: story.rawRef.sourceIndex,
        itemIndex: story.rawRef.itemIndex,
        sourceWeight: story.sourceWeight,
        category: story.category,
        title: story.title,
        url: story.url,
        summary: story.bodyExcerpt,
        publishedAt: story.publishedAt,
        trendingBoost: story.trendingBoost,
        payload: story.rawRef.payload,
    }));
}

export default {
    canonicalUrl,
    cleanText,
    contentFingerprint,
    normalizeItem,
    normalizeAndDedupe,
    toRawItems,
};
