/**
 * Pipeline Nodes
 *
 * One graph component per stage. Nodes read the pipeline state, call the
 * stage logic and return the next state; the engine owns checkpointing.
 */

import { AllSourcesFailed, SerializedError, StageFailure } from '../errors';
import type { ComponentRegistry, NodeHandler } from '../graph/definition';
import type { FanOutTask, Router } from '../graph/StateGraph';
import type { ArtifactStore } from '../providers/artifacts/ArtifactStore';
import type { TextGenerator } from '../providers/ai';
import type { ReviewNotifier } from '../providers/review/ReviewNotifier';
import { FetchResult, isSourceItem, SourceAdapterRegistry, SourceItem } from '../providers/sources';
import { analyzeStories } from './analyze';
import { composeScript } from './compose';
import { enhanceDraft } from './enhance';
import { GenerationPolicy } from './generate';
import { normalizeAndDedupe } from './normalize';
import { resolveRules, runQualityGate } from './qualityGate';
import { attemptsRemaining, transitionRegeneration } from './regeneration';
import { RunConfig, SourceConfig } from './runConfig';
import { scoreAndSelect } from './score';
import { TemplateRegistry } from './templates';
import { resolveTrendingTable, TrendingCatalog } from './trending';
import {
    CompositionParams,
    DiagnosticEvent,
    FetchFailure,
    PipelineState,
    RawItem,
    ReviewPackage,
    ScriptArtifact,
    ScriptDraft,
    ValidationReport,
} from './types';

export interface PipelineDeps {
    adapters: SourceAdapterRegistry;
    generator: TextGenerator | null;
    templates: TemplateRegistry;
    artifacts: ArtifactStore;
    notifier: ReviewNotifier;
    generationPolicy: GenerationPolicy;
    trendingCatalog?: TrendingCatalog;
    clock: () => Date;
}

export const VALIDATION_OUTCOME_ROUTER = 'validation_outcome';

/**
 * Composition parameters of the first attempt
 */
export function initialParams(config: RunConfig): CompositionParams {
    return {
        detailLevel: config.composition.detailLevel,
        maxStories: config.composition.maxStories ?? config.topK,
        toneStrictness: config.strictValidation ? 'strict' : 'relaxed',
    };
}

function withEvents(state: PipelineState, ...events: DiagnosticEvent[]): PipelineState['diagnostics'] {
    return { ...state.diagnostics, events: [...state.diagnostics.events, ...events] };
}

export function toFetchFailure(source: string, error: Pick<SerializedError, 'message'> & { code: string }): FetchFailure {
    return {
        source,
        kind: error.code === 'FETCH_TIMEOUT' ? 'timeout' : 'error',
        message: error.message,
    };
}

function requireDraft(state: PipelineState, stage: string): ScriptDraft {
    if (!state.draft) {
        throw new StageFailure(stage, 'No draft in pipeline state');
    }
    return state.draft;
}

function fetchSource(
    adapters: SourceAdapterRegistry,
    source: SourceConfig,
    signal: AbortSignal
): Promise<FetchResult<SourceItem>> {
    switch (source.kind) {
        case 'rss':
            return adapters.rss.fetch(source, signal);
        case 'static':
            return adapters.static.fetch(source, signal);
        case 'sheet':
            throw new StageFailure('fetch_sources', `Sheet source "${source.name}" was not expanded`);
    }
}

function describeEscalation(state: PipelineState, report: ValidationReport | null): string {
    const { attempt, maxAttempts } = state.regeneration;
    if (!report) {
        return `Escalated after ${attempt} of ${maxAttempts} attempts without a validation report`;
    }
    const hard = report.violations.filter(violation => violation.hard).map(violation => violation.ruleId);
    const listed = hard.length > 0 ? hard : report.violations.map(violation => violation.ruleId);
    return `Validation ${report.severity} after ${attempt} of ${maxAttempts} attempts: ${listed.join(', ') || 'no violations recorded'}`;
}

/**
 * Build the node components and routers for a set of collaborators
 */
export function createPipelineComponents(deps: PipelineDeps): ComponentRegistry<PipelineState> {
    const loadSources: NodeHandler<PipelineState> = async (state, context) => {
        const sources: SourceConfig[] = [];
        const failures: FetchFailure[] = [];
        const events: DiagnosticEvent[] = [];

        for (const source of state.config.sources) {
            if (!source.enabled) {
                events.push({ level: 'info', node: context.nodeName, message: `Source "${source.name}" is disabled` });
                continue;
            }
            if (source.kind !== 'sheet') {
                sources.push(source);
                continue;
            }

            const result = await deps.adapters.sheet.fetch(source, context.signal);
            if (result.success) {
                sources.push(...result.items);
                events.push({
                    level: 'info',
                    node: context.nodeName,
                    message: `Sheet "${source.name}" listed ${result.items.length} sources`,
                });
            } else {
                const fallback = source.fallback.filter(entry => entry.enabled);
                failures.push(toFetchFailure(source.name, result.error));
                sources.push(...fallback);
                events.push({
                    level: 'warn',
                    node: context.nodeName,
                    message: `Sheet "${source.name}" unavailable, using ${fallback.length} fallback sources`,
                    details: { error: result.error.message },
                });
            }
        }

        if (sources.length === 0) {
            throw new StageFailure(context.nodeName, 'No enabled sources to fetch');
        }

        const trending = resolveTrendingTable(state.config.trending, new Date(state.startedAt), deps.trendingCatalog);
        context.logger.info('Sources loaded', { sources: sources.length, trendingVersion: trending.version });

        return {
            ...state,
            sources,
            trending,
            diagnostics: {
                ...withEvents(state, ...events),
                fetchFailures: [...state.diagnostics.fetchFailures, ...failures],
            },
        };
    };

    const fetchSources: NodeHandler<PipelineState> = async (state, context) => {
        const tasks: FanOutTask<SourceItem[]>[] = state.sources.map((source, index) => ({
            key: `${index}:${source.name}`,
            run: async signal => {
                const result = await fetchSource(deps.adapters, source, signal);
                if (!result.success) throw result.error;
                return result.items;
            },
            restore: output => Array.isArray(output) && output.every(isSourceItem) ? output : null,
        }));

        const results = await context.fanOut(tasks, { concurrency: state.config.fetchConcurrency });

        const rawItems: RawItem[] = [];
        const failures: FetchFailure[] = [];
        results.forEach((result, sourceIndex) => {
            const source = state.sources[sourceIndex];
            if (result.status === 'failed') {
                failures.push(toFetchFailure(source.name, result.error));
                return;
            }
            result.value.forEach((item, itemIndex) => {
                rawItems.push({
                    ...item,
                    sourceName: source.name,
                    sourceIndex,
                    itemIndex,
                    sourceWeight: source.weight,
                    category: source.category,
                });
            });
        });

        if (results.length > 0 && failures.length === results.length) {
            throw new AllSourcesFailed(failures);
        }

        context.logger.info('Sources fetched', {
            sources: results.length,
            failed: failures.length,
            items: rawItems.length,
        });

        return {
            ...state,
            rawItems,
            diagnostics: {
                ...withEvents(state, ...failures.map((failure): DiagnosticEvent => ({
                    level: 'warn',
                    node: context.nodeName,
                    message: `Source "${failure.source}" failed (${failure.kind})`,
                    details: { error: failure.message },
                }))),
                fetchFailures: [...state.diagnostics.fetchFailures, ...failures],
            },
        };
    };

    const normalize: NodeHandler<PipelineState> = async (state, context) => {
        const { stories, removed } = normalizeAndDedupe(state.rawItems);
        context.logger.info('Stories normalized', { stories: stories.length, removed });
        return {
            ...state,
            stories,
            diagnostics: { ...state.diagnostics, dedupRemovedCount: removed },
        };
    };

    const score: NodeHandler<PipelineState> = async (state, context) => {
        const selected = scoreAndSelect(state.stories, state.config.weights, state.config.topK, {
            now: new Date(state.startedAt),
            trending: state.trending,
        });
        context.logger.info('Stories selected', { candidates: state.stories.length, selected: selected.length });
        return {
            ...state,
            selected,
            diagnostics: {
                ...state.diagnostics,
                finalScoreBreakdown: selected.map(story => ({
                    id: story.id,
                    score: story.score,
                    breakdown: story.scoreBreakdown,
                })),
            },
        };
    };

    const analyze: NodeHandler<PipelineState> = async (state, context) => {
        const { segments, dropped } = await analyzeStories(state.selected, {
            generator: deps.generator,
            policy: deps.generationPolicy,
            signal: context.signal,
        });
        return {
            ...state,
            segments,
            diagnostics: {
                ...withEvents(state, ...dropped.map((story): DiagnosticEvent => ({
                    level: 'warn',
                    node: context.nodeName,
                    message: `Story dropped: ${story.reason}`,
                    details: { id: story.id },
                }))),
                droppedStories: [...state.diagnostics.droppedStories, ...dropped],
            },
        };
    };

    const compose: NodeHandler<PipelineState> = async (state, context) => {
        let regeneration = state.regeneration;
        if (regeneration.phase === 'REGENERATING') {
            regeneration = transitionRegeneration(regeneration, { type: 'RETRY' });
        }

        const template = deps.templates.get(state.config.structureTemplateId);
        const draft = await composeScript(state.segments, template, regeneration.params, {
            startedAt: state.startedAt,
            attempt: regeneration.attempt,
            generator: deps.generator,
            policy: deps.generationPolicy,
            signal: context.signal,
        });
        regeneration = transitionRegeneration(regeneration, { type: 'DRAFTED' });

        return {
            ...state,
            draft,
            report: null,
            regeneration,
            diagnostics: { ...state.diagnostics, attemptsUsed: regeneration.attempt },
        };
    };

    const enhance: NodeHandler<PipelineState> = async state => ({
        ...state,
        draft: enhanceDraft(requireDraft(state, 'enhance')),
    });

    const validate: NodeHandler<PipelineState> = async (state, context) => {
        const draft = requireDraft(state, 'validate');
        const template = deps.templates.get(state.config.structureTemplateId);
        const report = runQualityGate(draft, resolveRules(template, state.config.validation), {
            attemptsRemaining: attemptsRemaining(state.regeneration),
            strict: state.config.strictValidation,
        });
        const regeneration = transitionRegeneration(
            state.regeneration,
            { type: 'VALIDATED', report },
            state.config.regeneration.adjustments
        );

        return {
            ...state,
            report,
            regeneration,
            diagnostics: withEvents(state, {
                level: report.severity === 'fail' ? 'warn' : 'info',
                node: context.nodeName,
                message: `Attempt ${regeneration.attempt} validated: ${report.severity}, ${regeneration.phase.toLowerCase()}`,
                details: { violations: report.violations.map(violation => violation.ruleId) },
            }),
        };
    };

    const accept: NodeHandler<PipelineState> = async state => {
        const draft = requireDraft(state, 'accept');
        if (!state.report || state.report.severity === 'fail' || state.regeneration.phase !== 'ACCEPTED') {
            throw new StageFailure('accept', 'Draft has not passed validation');
        }

        const artifact: ScriptArtifact = {
            runId: state.runId,
            draft,
            report: state.report,
            diagnostics: {
                fetchFailures: state.diagnostics.fetchFailures,
                dedupRemovedCount: state.diagnostics.dedupRemovedCount,
                finalScoreBreakdown: state.diagnostics.finalScoreBreakdown,
                attemptsUsed: state.diagnostics.attemptsUsed,
            },
        };

        return { ...state, artifact: await deps.artifacts.save(artifact) };
    };

    const escalate: NodeHandler<PipelineState> = async state => {
        const review: ReviewPackage = {
            runId: state.runId,
            reason: describeEscalation(state, state.report),
            draft: state.draft,
            report: state.report,
            reports: state.regeneration.reports,
            createdAt: deps.clock().toISOString(),
        };
        await deps.notifier.notify(review);
        return { ...state, review };
    };

    const validationOutcome: Router<PipelineState> = state => {
        switch (state.regeneration.phase) {
            case 'ACCEPTED':
                return 'accept';
            case 'REGENERATING':
                return 'regenerate';
            case 'ESCALATED':
                return 'escalate';
            default:
                throw new StageFailure('validate', `No route for regeneration phase ${state.regeneration.phase}`);
        }
    };

    return {
        nodes: {
            load_sources: loadSources,
            fetch_sources: fetchSources,
            normalize,
            score,
            analyze,
            compose,
            enhance,
            validate,
            accept,
            escalate,
        },
        routers: {
            [VALIDATION_OUTCOME_ROUTER]: validationOutcome,
        },
    };
}

export default createPipelineComponents;
