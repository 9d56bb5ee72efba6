/**
 * Pipeline Orchestrator
 *
 * Builds the stage graph from the pipeline document, prepares the initial
 * state for a run and hands both to the graph engine. Malformed run input
 * or pipeline documents are rejected here, before any node runs.
 */

import { v4 as uuid } from 'uuid';
import pipelineData from '../../data/pipeline.json';
import config from '../config';
import { ConfigError, SerializedError, serializeError, StageFailure } from '../errors';
import { compilePipeline, loadPipelineDocument, parsePipelineDocument, PipelineDocument } from '../graph/definition';
import { runGraph } from '../graph/engine';
import { createLogger } from '../logger';
import { getTextGenerator } from '../providers/ai';
import { FileArtifactStore } from '../providers/artifacts/ArtifactStore';
import { createReviewNotifier } from '../providers/review/ReviewNotifier';
import { defaultSourceAdapters } from '../providers/sources';
import { CheckpointStore, createCheckpointStore } from '../storage/checkpoints';
import { defaultGenerationPolicy } from './generate';
import { createPipelineComponents, initialParams, PipelineDeps } from './nodes';
import { resolveRules } from './qualityGate';
import { initialRegeneration } from './regeneration';
import { RunConfig, ruleConflicts } from './runConfig';
import { getTemplateRegistry, StructureTemplate, TemplateRegistry } from './templates';
import {
    ArtifactRecord,
    isPipelineState,
    PIPELINE_STATE_VERSION,
    PipelineState,
    ReviewPackage,
    RunDiagnostics,
} from './types';

const logger = createLogger('orchestrator');

export type PipelineOutcome = 'accepted' | 'escalated' | 'failed' | 'cancelled';

export interface PipelineRunOptions {
    runId?: string;
    resume?: boolean;
    signal?: AbortSignal;
    store?: CheckpointStore;
    deps?: Partial<PipelineDeps>;
    document?: PipelineDocument;
    clock?: () => Date;
    maxSteps?: number;
    cancelGraceMs?: number;
}

export interface PipelineRunResult {
    runId: string;
    outcome: PipelineOutcome;
    artifact: ArtifactRecord | null;
    review: ReviewPackage | null;
    diagnostics: RunDiagnostics;
    executed: string[];
    resumedFrom: string | null;
    error: SerializedError | null;
    state: PipelineState;
}

export function createInitialState(runConfig: RunConfig, runId: string, startedAt: Date): PipelineState {
    return {
        schemaVersion: PIPELINE_STATE_VERSION,
        runId,
        startedAt: startedAt.toISOString(),
        config: runConfig,
        sources: [],
        trending: null,
        rawItems: [],
        stories: [],
        selected: [],
        segments: [],
        regeneration: initialRegeneration(runConfig.maxGenerationAttempts, initialParams(runConfig)),
        draft: null,
        report: null,
        artifact: null,
        review: null,
        diagnostics: {
            fetchFailures: [],
            dedupRemovedCount: 0,
            finalScoreBreakdown: [],
            droppedStories: [],
            attemptsUsed: 0,
            events: [],
        },
    };
}

/**
 * Pipeline document from PIPELINE_PATH, or the bundled default
 */
export function defaultPipelineDocument(): PipelineDocument {
    return config.engine.pipelinePath
        ? loadPipelineDocument(config.engine.pipelinePath)
        : parsePipelineDocument(pipelineData);
}

export function createPipelineDeps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
    const clock = overrides.clock ?? (() => new Date());
    return {
        adapters: overrides.adapters ?? defaultSourceAdapters,
        generator: overrides.generator !== undefined ? overrides.generator : getTextGenerator(),
        templates: overrides.templates ?? getTemplateRegistry(),
        artifacts: overrides.artifacts ?? new FileArtifactStore(config.storage.artifactDir, clock),
        notifier: overrides.notifier ?? createReviewNotifier(),
        generationPolicy: overrides.generationPolicy ?? defaultGenerationPolicy(),
        trendingCatalog: overrides.trendingCatalog,
        clock,
    };
}

/**
 * Template for a run; its rules with the run's overrides applied must not contradict each other
 */
export function runTemplate(runConfig: RunConfig, templates: TemplateRegistry): StructureTemplate {
    const template = templates.get(runConfig.structureTemplateId);
    const conflicts = ruleConflicts(resolveRules(template, runConfig.validation));
    if (conflicts.length > 0) {
        throw new ConfigError(
            `Validation rules for template "${template.id}" contradict each other: ${conflicts.join('; ')}`,
            conflicts
        );
    }
    return template;
}

function outcomeOf(status: 'completed' | 'failed' | 'cancelled', state: PipelineState): PipelineOutcome {
    if (status !== 'completed') return status;
    if (state.artifact) return 'accepted';
    if (state.review) return 'escalated';
    return 'failed';
}

/**
 * Run (or resume) the content staging pipeline for one run configuration
 */
export async function runPipeline(runConfig: RunConfig, options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
    const runId = options.runId ?? uuid();
    const clock = options.clock ?? (() => new Date());
    const deps = createPipelineDeps({ ...options.deps, clock: options.deps?.clock ?? clock });

    // Unknown templates and bad documents are configuration errors, not run failures
    runTemplate(runConfig, deps.templates);
    const graph = compilePipeline(options.document ?? defaultPipelineDocument(), createPipelineComponents(deps));

    const store = options.store ?? createCheckpointStore();
    logger.info('Starting pipeline run', {
        runId,
        resume: options.resume ?? false,
        sources: runConfig.sources.length,
        template: runConfig.structureTemplateId,
        checkpoints: store.name,
    });

    const result = await runGraph(graph, createInitialState(runConfig, runId, clock()), runId, {
        store,
        restore: payload => isPipelineState(payload) && payload.runId === runId ? payload : null,
        resume: options.resume,
        signal: options.signal,
        maxSteps: options.maxSteps,
        concurrency: runConfig.fetchConcurrency,
        cancelGraceMs: options.cancelGraceMs,
        clock,
    });

    const state = result.state;
    const outcome = outcomeOf(result.status, state);
    const error = result.error ?? (outcome === 'failed'
        ? serializeError(new StageFailure('engine', `Run ended at "${result.lastNode}" without an artifact or review package`))
        : null);

    const diagnostics: RunDiagnostics = error
        ? {
            ...state.diagnostics,
            events: [...state.diagnostics.events, {
                level: 'error',
                node: result.lastNode ?? 'engine',
                message: error.message,
                details: { code: error.code },
            }],
        }
        : state.diagnostics;

    logger.info('Pipeline run finished', {
        runId,
        outcome,
        executed: result.executed.length,
        attemptsUsed: diagnostics.attemptsUsed,
        fetchFailures: diagnostics.fetchFailures.length,
    });

    return {
        runId,
        outcome,
        artifact: state.artifact,
        review: state.review,
        diagnostics,
        executed: result.executed,
        resumedFrom: result.resumedFrom,
        error,
        state,
    };
}

export default { runPipeline, runTemplate, createInitialState, createPipelineDeps, defaultPipelineDocument };
