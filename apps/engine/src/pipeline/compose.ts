/**
 * Script Composition
 *
 * Assemble a draft from analyzed segments: headline summary, per-story deep
 * dives in impact order, closing synthesis. Text comes from the structure
 * template; the synthesis comes from the text generator when one is set.
 */

import { StageFailure } from '../errors';
import { createLogger } from '../logger';
import { SYNTHESIS_PROMPT, TextGenerator } from '../providers/ai';
import { countWords, ensureSentence, joinList, sentencesOf, stripTerminal } from '../utils/text';
import { GenerationPolicy, generateWithRetry } from './generate';
import { renderPart, StructureTemplate } from './templates';
import { CompositionParams, ScoredStory, ScriptDraft, SegmentDraft } from './types';

const logger = createLogger('compose');

/**
 * Excerpt sentences carried per deep dive, by detail level
 */
const SENTENCES_PER_DETAIL_LEVEL: Record<number, number> = { 1: 2, 2: 4, 3: 8 };
const SYNTHESIS_WORD_BUDGET = 60;

export interface ComposeContext {
    startedAt: string;
    attempt: number;
    generator: TextGenerator | null;
    policy?: GenerationPolicy;
    signal?: AbortSignal;
}

interface StorySegment extends SegmentDraft {
    storyRef: ScoredStory;
}

function isStorySegment(segment: SegmentDraft): segment is StorySegment {
    return segment.kind === 'story' && segment.storyRef !== null;
}

export function excerptBody(excerpt: string, detailLevel: number): string {
    const limit = SENTENCES_PER_DETAIL_LEVEL[detailLevel] ?? SENTENCES_PER_DETAIL_LEVEL[2];
    return ensureSentence(sentencesOf(excerpt).slice(0, limit).join(' '));
}

export function sumWords(segments: SegmentDraft[]): number {
    return segments.reduce((total, segment) => total + countWords(segment.text), 0);
}

function byImpact(a: SegmentDraft, b: SegmentDraft): number {
    return (b.metadata.impactScore ?? 0) - (a.metadata.impactScore ?? 0) || a.position - b.position;
}

/**
 * Compose a draft for one generation attempt
 */
export async function composeScript(
    segments: SegmentDraft[],
    template: StructureTemplate,
    params: CompositionParams,
    context: ComposeContext
): Promise<ScriptDraft> {
    const stories = segments
        .filter(isStorySegment)
        .sort(byImpact)
        .slice(0, Math.max(1, params.maxStories));

    const lead = stories[0];
    if (!lead) {
        throw new StageFailure('compose', 'No stories left to compose');
    }

    const keywords = [...new Set(stories.flatMap(segment => segment.metadata.keywords ?? []))];
    const topKeywords = joinList(keywords.slice(0, 3)) || 'AI';
    const leadHeadline = stripTerminal(lead.storyRef.title);

    const title = renderPart(template.title, {
        date: context.startedAt.slice(0, 10),
        leadHeadline,
    }, 'title');

    const intro = renderPart(template.intro, {
        storyCount: stories.length,
        leadHeadline,
        headlineList: stories.map(segment => ensureSentence(segment.storyRef.title)).join(' '),
    }, 'intro');

    const bridge = renderPart(template.bridge, { leadSource: lead.storyRef.sourceName }, 'bridge');

    const deepDives = stories.map(segment => {
        const type = segment.metadata.segmentType ?? 'news';
        const text = renderPart(template.segments[type], {
            headline: ensureSentence(segment.storyRef.title),
            source: segment.storyRef.sourceName,
            body: segment.storyRef.bodyExcerpt ? excerptBody(segment.storyRef.bodyExcerpt, params.detailLevel) : '',
            highlight: segment.metadata.wowHighlight,
            analogy: segment.metadata.analogy,
            takeaway: segment.metadata.takeaway ? ensureSentence(segment.metadata.takeaway) : undefined,
        }, `segments.${type}`);

        const { transition: _transition, cta: _cta, ...metadata } = segment.metadata;
        return { ...segment, text, metadata };
    });

    const synthesis = context.generator
        ? await generateWithRetry(
            context.generator,
            SYNTHESIS_PROMPT({
                headlines: stories.map(segment => segment.storyRef.title),
                keywords,
                wordBudget: SYNTHESIS_WORD_BUDGET,
            }),
            'compose',
            context.policy,
            { signal: context.signal }
        )
        : renderPart(template.synthesis, { storyCount: stories.length, topKeywords }, 'synthesis');

    const closing = renderPart(template.closing, { synthesis: ensureSentence(synthesis), topKeywords }, 'closing');

    const ordered: SegmentDraft[] = ([
        { storyRef: null, kind: 'intro', text: intro, position: 0, metadata: {} },
        { storyRef: null, kind: 'bridge', text: bridge, position: 0, metadata: {} },
        ...deepDives,
        { storyRef: null, kind: 'outro', text: closing, position: 0, metadata: {} },
    ] satisfies SegmentDraft[]).map((segment, index) => ({ ...segment, position: index + 1 }));

    const draft: ScriptDraft = {
        title,
        templateId: template.id,
        segments: ordered,
        wordCount: sumWords(ordered),
        generationAttempt: context.attempt,
        toneApplied: false,
        params,
    };

    logger.info('Draft composed', {
        templateId: template.id,
        attempt: context.attempt,
        stories: stories.length,
        wordCount: draft.wordCount,
    });

    return draft;
}

export default { composeScript, excerptBody, sumWords };
