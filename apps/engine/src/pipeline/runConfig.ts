/**
 * Run Configuration
 *
 * Schema for the input of a single pipeline run. Malformed input is rejected
 * with a ConfigError before any node executes.
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { STORY_CATEGORIES } from './types';

const isoDate = z.string().refine(value => !Number.isNaN(Date.parse(value)), {
    message: 'Expected an ISO-8601 date',
});

/**
 * Fields shared by every source kind
 */
const SourceBaseSchema = z.object({
    name: z.string().trim().min(1),
    weight: z.number().min(0).max(1).default(0.5),
    category: z.enum(STORY_CATEGORIES).default('news'),
    maxItems: z.number().int().positive().default(20),
    timeoutSeconds: z.number().positive().default(10),
    retryCount: z.number().int().min(0).max(10).default(1),
    retryBackoffSeconds: z.number().min(0).default(1),
    enabled: z.boolean().default(true),
});

export const StaticItemSchema = z.object({
    title: z.string(),
    url: z.string().nullable().default(null),
    summary: z.string().default(''),
    publishedAt: isoDate.nullable().default(null),
    trendingBoost: z.number().min(0).default(0),
});

export const RssSourceSchema = SourceBaseSchema.extend({
    kind: z.literal('rss'),
    sourceUrl: z.string().url(),
});

export const StaticSourceSchema = SourceBaseSchema.extend({
    kind: z.literal('static'),
    sourceUrl: z.string().default('static://inline'),
    items: z.array(StaticItemSchema).default([]),
});

export const SheetSourceSchema = SourceBaseSchema.extend({
    kind: z.literal('sheet'),
    sourceUrl: z.string().url(),
    fallback: z.array(RssSourceSchema).default([]),
});

export const SourceConfigSchema = z.discriminatedUnion('kind', [
    RssSourceSchema,
    StaticSourceSchema,
    SheetSourceSchema,
]);

export const ValidationRulesSchema = z.object({
    minWords: z.number().int().min(0),
    maxWords: z.number().int().positive(),
    targetMinWords: z.number().int().min(0),
    targetMaxWords: z.number().int().positive(),
    activeVoiceMin: z.number().min(0).max(1),
    activeVoiceTarget: z.number().min(0).max(1),
    strongVerbTarget: z.number().min(0).max(1),
    pacingMinWps: z.number().positive(),
    pacingMaxWps: z.number().positive(),
    targetSeconds: z.number().positive(),
    requireTransitions: z.boolean(),
});

/**
 * Lower and upper bounds that must stay ordered
 */
const RULE_BOUNDS: ReadonlyArray<readonly [keyof ValidationRules, keyof ValidationRules]> = [
    ['minWords', 'maxWords'],
    ['targetMinWords', 'targetMaxWords'],
    ['activeVoiceMin', 'activeVoiceTarget'],
    ['pacingMinWps', 'pacingMaxWps'],
];

/**
 * Bounds that contradict each other; pairs with a side missing are skipped
 */
export function ruleConflicts(rules: Partial<ValidationRules>): string[] {
    const conflicts: string[] = [];
    for (const [lower, upper] of RULE_BOUNDS) {
        const low = rules[lower];
        const high = rules[upper];
        if (typeof low === 'number' && typeof high === 'number' && low > high) {
            conflicts.push(`${lower} (${low}) exceeds ${upper} (${high})`);
        }
    }
    return conflicts;
}

export const ParamAdjustmentSchema = z.object({
    detailLevel: z.number().int().min(-2).max(2).optional(),
    maxStories: z.number().int().min(-5).max(5).optional(),
    toneStrictness: z.enum(['strict', 'relaxed']).optional(),
});

export const RunConfigSchema = z.object({
    sources: z.array(SourceConfigSchema).min(1),
    topK: z.number().int().positive().default(5),
    weights: z.object({
        freshness: z.number().min(0),
        sourcePriority: z.number().min(0),
        trending: z.number().min(0),
    }),
    maxGenerationAttempts: z.number().int().min(1).max(10).default(2),
    structureTemplateId: z.string().min(1).default('daily-briefing'),
    strictValidation: z.boolean().default(false),
    fetchConcurrency: z.number().int().positive().optional(),
    trending: z.object({
        cap: z.number().positive().optional(),
        keywords: z.record(z.number().min(0)).optional(),
    }).default({}),
    composition: z.object({
        detailLevel: z.number().int().min(1).max(3).default(2),
        maxStories: z.number().int().positive().optional(),
    }).default({}),
    validation: ValidationRulesSchema.partial().default({}),
    regeneration: z.object({
        adjustments: z.record(ParamAdjustmentSchema).optional(),
    }).default({}),
}).superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.sources.forEach((source, index) => {
        if (seen.has(source.name)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['sources', index, 'name'],
                message: `Duplicate source name "${source.name}"`,
            });
        }
        seen.add(source.name);
    });

    for (const conflict of ruleConflicts(value.validation)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['validation'], message: conflict });
    }

    const { freshness, sourcePriority, trending } = value.weights;
    if (freshness + sourcePriority + trending === 0) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['weights'],
            message: 'At least one score weight must be positive',
        });
    }
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type RssSourceConfig = z.infer<typeof RssSourceSchema>;
export type StaticSourceConfig = z.infer<typeof StaticSourceSchema>;
export type SheetSourceConfig = z.infer<typeof SheetSourceSchema>;
export type StaticItem = z.infer<typeof StaticItemSchema>;
export type ValidationRules = z.infer<typeof ValidationRulesSchema>;
export type ParamAdjustment = z.infer<typeof ParamAdjustmentSchema>;
export type ScoreWeights = RunConfig['weights'];

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

/**
 * Validate raw run input
 */
export function parseRunConfig(input: unknown): RunConfig {
    const result = RunConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ConfigError(`Invalid run configuration: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

/**
 * Read and validate a run configuration file
 */
export function loadRunConfig(filePath: string): RunConfig {
    let raw: string;
    try {
        raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Cannot read run configuration at ${filePath}`, [
            error instanceof Error ? error.message : 'Unknown error',
        ]);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Run configuration at ${filePath} is not valid JSON`, [
            error instanceof Error ? error.message : 'Unknown error',
        ]);
    }

    return parseRunConfig(parsed);
}

export default { parseRunConfig, loadRunConfig, ruleConflicts, RunConfigSchema };
