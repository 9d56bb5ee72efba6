/**
 * Builders shared by the pipeline tests
 */

import { GenerationParams, TextGenerator } from '../src/providers/ai';
import {
    CompositionParams,
    RawItem,
    ScoredStory,
    ScriptDraft,
    SegmentDraft,
    StoryRecord,
} from '../src/pipeline/types';

export function rawItem(overrides: Partial<RawItem> = {}): RawItem {
    return {
        sourceName: 'wire',
        sourceIndex: 0,
        itemIndex: 0,
        sourceWeight: 0.5,
        category: 'news',
        title: 'Untitled',
        url: null,
        summary: '',
        publishedAt: null,
        trendingBoost: 0,
        payload: {},
        ...overrides,
    };
}

export function storyRecord(overrides: Partial<StoryRecord> = {}): StoryRecord {
    return {
        id: 'story-1',
        title: 'Untitled',
        bodyExcerpt: '',
        url: null,
        sourceName: 'wire',
        sourceWeight: 0.5,
        publishedAt: null,
        category: 'news',
        trendingBoost: 0,
        rawRef: { sourceName: 'wire', sourceIndex: 0, itemIndex: 0, payload: {} },
        ...overrides,
    };
}

export function scoredStory(overrides: Partial<ScoredStory> = {}): ScoredStory {
    return {
        ...storyRecord(),
        score: 0.5,
        scoreBreakdown: { freshness: 0.2, sourcePriority: 0.15, trending: 0.15 },
        ...overrides,
    };
}

export function storySegment(
    story: Partial<ScoredStory>,
    metadata: SegmentDraft['metadata'] = {},
    position = 1
): SegmentDraft {
    return {
        storyRef: scoredStory(story),
        kind: 'story',
        text: '',
        position,
        metadata: { segmentType: 'news', ...metadata },
    };
}

export const RELAXED_PARAMS: CompositionParams = {
    detailLevel: 2,
    maxStories: 5,
    toneStrictness: 'relaxed',
};

export function draftOf(segments: SegmentDraft[], overrides: Partial<ScriptDraft> = {}): ScriptDraft {
    return {
        title: 'T',
        templateId: 'daily-briefing',
        segments: segments.map((segment, index) => ({ ...segment, position: index + 1 })),
        wordCount: 0,
        generationAttempt: 1,
        toneApplied: false,
        params: RELAXED_PARAMS,
        ...overrides,
    };
}

export function segment(kind: SegmentDraft['kind'], text: string, metadata: SegmentDraft['metadata'] = {}): SegmentDraft {
    return { storyRef: null, kind, text, position: 0, metadata };
}

type Reply = string | Error | 'hang';

/**
 * Scripted text generator: answers from a queue, then repeats the last reply
 */
export class FakeGenerator implements TextGenerator {
    readonly name = 'fake';
    readonly prompts: string[] = [];

    constructor(private readonly replies: Reply[]) { }

    isConfigured(): boolean {
        return true;
    }

    async generate(prompt: string, _params?: GenerationParams): Promise<string> {
        this.prompts.push(prompt);
        const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
        if (reply === undefined || reply === 'hang') {
            return new Promise<string>(() => undefined);
        }
        if (reply instanceof Error) {
            throw reply;
        }
        return reply;
    }
}
