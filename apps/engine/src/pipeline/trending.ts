/**
 * Trending keyword tables
 *
 * Keyword weights live in a versioned catalogue. The table in force for a
 * run is chosen once, from the run's start time, and frozen: scoring never
 * sees a table change mid-run.
 */

import { z } from 'zod';
import catalogData from '../../data/trending.json';
import { ConfigError } from '../errors';
import { createLogger } from '../logger';
import { formatIssues, RunConfig } from './runConfig';
import { TrendingTable } from './types';

const logger = createLogger('trending');

export const DEFAULT_TRENDING_CAP = 3;

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;

const KeywordWeightsSchema = z.record(z.number().min(0));

const TrendingCatalogSchema = z.object({
    versions: z.array(z.object({
        version: z.string().min(1),
        effectiveFrom: z.string().refine(value => !Number.isNaN(Date.parse(value)), {
            message: 'Expected an ISO-8601 date',
        }),
        cap: z.number().positive().default(DEFAULT_TRENDING_CAP),
        base: KeywordWeightsSchema,
        weekday: z.object({
            sunday: KeywordWeightsSchema.optional(),
            monday: KeywordWeightsSchema.optional(),
            tuesday: KeywordWeightsSchema.optional(),
            wednesday: KeywordWeightsSchema.optional(),
            thursday: KeywordWeightsSchema.optional(),
            friday: KeywordWeightsSchema.optional(),
            saturday: KeywordWeightsSchema.optional(),
        }).default({}),
    })),
});

export type TrendingCatalog = z.infer<typeof TrendingCatalogSchema>;

/**
 * Validate a trending catalogue document
 */
export function parseTrendingCatalog(input: unknown): TrendingCatalog {
    const result = TrendingCatalogSchema.safeParse(input);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ConfigError(`Invalid trending catalogue: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

let bundledCatalog: TrendingCatalog | null = null;

/**
 * The catalogue shipped in data/trending.json
 */
export function loadTrendingCatalog(): TrendingCatalog {
    if (!bundledCatalog) {
        bundledCatalog = parseTrendingCatalog(catalogData);
    }
    return bundledCatalog;
}

function freezeTable(version: string, cap: number, keywords: Record<string, number>): TrendingTable {
    const normalized: Record<string, number> = {};
    for (const [keyword, weight] of Object.entries(keywords)) {
        const key = keyword.trim().toLowerCase();
        if (!key) continue;
        normalized[key] = Math.max(normalized[key] ?? 0, weight);
    }
    return Object.freeze({ version, cap, keywords: Object.freeze(normalized) });
}

/**
 * Pick the catalogue version in force at `at`: the latest effectiveFrom not
 * after it, with that UTC weekday's rotation merged over the base keywords
 */
export function selectTrendingTable(catalog: TrendingCatalog, at: Date): TrendingTable {
    const time = at.getTime();
    const candidates = catalog.versions
        .filter(version => Date.parse(version.effectiveFrom) <= time)
        .sort((a, b) => Date.parse(b.effectiveFrom) - Date.parse(a.effectiveFrom));

    const current = candidates[0];
    if (!current) {
        logger.warn('No trending table in force, scoring without keywords', { at: at.toISOString() });
        return freezeTable('none', DEFAULT_TRENDING_CAP, {});
    }

    const day = WEEKDAYS[at.getUTCDay()];
    const keywords: Record<string, number> = { ...current.base };
    for (const [keyword, weight] of Object.entries(current.weekday[day] ?? {})) {
        keywords[keyword] = Math.max(keywords[keyword] ?? 0, weight);
    }

    return freezeTable(`${current.version}/${day}`, current.cap, keywords);
}

/**
 * Resolve the table for a run: inline keywords from the run configuration
 * win over the catalogue; an explicit cap always applies
 */
export function resolveTrendingTable(
    trending: RunConfig['trending'],
    startedAt: Date,
    catalog: TrendingCatalog = loadTrendingCatalog()
): TrendingTable {
    if (trending.keywords) {
        return freezeTable('inline', trending.cap ?? DEFAULT_TRENDING_CAP, trending.keywords);
    }

    const selected = selectTrendingTable(catalog, startedAt);
    if (trending.cap === undefined) {
        return selected;
    }
    return freezeTable(selected.version, trending.cap, { ...selected.keywords });
}

export default { loadTrendingCatalog, selectTrendingTable, resolveTrendingTable, parseTrendingCatalog };
