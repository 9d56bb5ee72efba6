/**
 * Pipeline Types
 *
 * Shared type definitions for the content staging pipeline. Everything
 * stored in PipelineState must stay JSON-serializable: it is written to the
 * checkpoint store after every node.
 */

import type { RunConfig, SourceConfig } from './runConfig';

/**
 * Story category, drives freshness half-life and impact base
 */
export const STORY_CATEGORIES = ['news', 'research', 'company', 'trending'] as const;
export type StoryCategory = typeof STORY_CATEGORIES[number];

/**
 * Item as returned by a source adapter, before normalization
 */
export interface RawItem {
    sourceName: string;
    sourceIndex: number;
    itemIndex: number;
    sourceWeight: number;
    category: StoryCategory;
    title: string;
    url: string | null;
    summary: string;
    publishedAt: string | null;
    trendingBoost: number;
    payload: Record<string, unknown>;
}

export interface RawRef {
    sourceName: string;
    sourceIndex: number;
    itemIndex: number;
    payload: Record<string, unknown>;
}

/**
 * Normalized, deduplicated story. Read-only after the normalizer.
 */
export interface StoryRecord {
    id: string;
    title: string;
    bodyExcerpt: string;
    url: string | null;
    sourceName: string;
    sourceWeight: number;
    publishedAt: string | null;
    category: StoryCategory;
    trendingBoost: number;
    rawRef: RawRef;
}

export interface ScoreBreakdown {
    freshness: number;
    sourcePriority: number;
    trending: number;
}

export interface ScoredStory extends StoryRecord {
    score: number;
    scoreBreakdown: ScoreBreakdown;
}

export type SegmentKind = 'intro' | 'story' | 'bridge' | 'outro';
export const SEGMENT_TYPES = ['news', 'funding', 'research', 'policy'] as const;
export type SegmentType = typeof SEGMENT_TYPES[number];

export interface SegmentMetadata {
    impactScore?: number;
    keywords?: string[];
    analogy?: string;
    wowHighlight?: string;
    segmentType?: SegmentType;
    takeaway?: string;
    transition?: string;
    cta?: string;
}

export interface SegmentDraft {
    storyRef: ScoredStory | null;
    kind: SegmentKind;
    text: string;
    position: number;
    metadata: SegmentMetadata;
}

export type ToneStrictness = 'strict' | 'relaxed';

/**
 * Knobs the regeneration controller adjusts between attempts
 */
export interface CompositionParams {
    detailLevel: number;
    maxStories: number;
    toneStrictness: ToneStrictness;
}

export interface ScriptDraft {
    title: string;
    templateId: string;
    segments: SegmentDraft[];
    wordCount: number;
    generationAttempt: number;
    toneApplied: boolean;
    params: CompositionParams;
}

export type Severity = 'pass' | 'warn' | 'fail';
export type RecommendedAction = 'accept' | 'regenerate' | 'escalate';

export interface Violation {
    ruleId: string;
    message: string;
    hard: boolean;
}

export interface ValidationReport {
    severity: Severity;
    metrics: Record<string, number>;
    violations: Violation[];
    recommendedAction: RecommendedAction;
}

/**
 * Trending keyword table in force for a run. Frozen once loaded.
 */
export interface TrendingTable {
    readonly version: string;
    readonly cap: number;
    readonly keywords: Readonly<Record<string, number>>;
}

export type RegenerationPhase = 'DRAFTING' | 'VALIDATING' | 'ACCEPTED' | 'REGENERATING' | 'ESCALATED';

export interface RegenerationState {
    phase: RegenerationPhase;
    attempt: number;
    maxAttempts: number;
    params: CompositionParams;
    reports: ValidationReport[];
    adjustmentsApplied: string[];
}

export interface FetchFailure {
    source: string;
    kind: 'timeout' | 'error';
    message: string;
}

export interface DroppedStory {
    id: string | null;
    reason: string;
}

export interface DiagnosticEvent {
    level: 'info' | 'warn' | 'error';
    node: string;
    message: string;
    details?: Record<string, unknown>;
}

export interface RunDiagnostics {
    fetchFailures: FetchFailure[];
    dedupRemovedCount: number;
    finalScoreBreakdown: Array<{ id: string; score: number; breakdown: ScoreBreakdown }>;
    droppedStories: DroppedStory[];
    attemptsUsed: number;
    events: DiagnosticEvent[];
}

/**
 * Handed to human reviewers when regeneration cannot produce a passing draft
 */
export interface ReviewPackage {
    runId: string;
    reason: string;
    draft: ScriptDraft | null;
    report: ValidationReport | null;
    reports: ValidationReport[];
    createdAt: string;
}

export interface ArtifactRecord {
    runId: string;
    location: string;
    savedAt: string;
}

/**
 * Accepted script plus the evidence it passed validation
 */
export interface ScriptArtifact {
    runId: string;
    draft: ScriptDraft;
    report: ValidationReport;
    diagnostics: Pick<RunDiagnostics, 'fetchFailures' | 'dedupRemovedCount' | 'finalScoreBreakdown' | 'attemptsUsed'>;
}

export const PIPELINE_STATE_VERSION = 1;

/**
 * Full pipeline state carried between graph nodes
 */
export interface PipelineState {
    schemaVersion: typeof PIPELINE_STATE_VERSION;
    runId: string;
    startedAt: string;
    config: RunConfig;
    sources: SourceConfig[];
    trending: TrendingTable | null;
    rawItems: RawItem[];
    stories: StoryRecord[];
    selected: ScoredStory[];
    segments: SegmentDraft[];
    regeneration: RegenerationState;
    draft: ScriptDraft | null;
    report: ValidationReport | null;
    artifact: ArtifactRecord | null;
    review: ReviewPackage | null;
    diagnostics: RunDiagnostics;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a restored checkpoint payload to PipelineState
 */
export function isPipelineState(value: unknown): value is PipelineState {
    if (!isRecord(value)) return false;
    return value.schemaVersion === PIPELINE_STATE_VERSION &&
        typeof value.runId === 'string' &&
        typeof value.startedAt === 'string' &&
        isRecord(value.config) &&
        Array.isArray(value.sources) &&
        Array.isArray(value.rawItems) &&
        Array.isArray(value.stories) &&
        Array.isArray(value.selected) &&
        Array.isArray(value.segments) &&
        isRecord(value.regeneration) &&
        isRecord(value.diagnostics);
}

export { isRecord };
