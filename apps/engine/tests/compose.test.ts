/**
 * Tests for compose.ts
 */

import { StageFailure } from '../src/errors';
import { composeScript, excerptBody } from '../src/pipeline/compose';
import { getTemplateRegistry } from '../src/pipeline/templates';
import { FakeGenerator, RELAXED_PARAMS, storySegment } from './fixtures';

const template = getTemplateRegistry().get('short-briefing');
const context = { startedAt: '2025-09-02T12:00:00.000Z', attempt: 1, generator: null };

const gpu = storySegment(
    {
        id: 'gpu',
        title: 'GPU prices fall',
        sourceName: 'Chip Wire',
        bodyExcerpt: 'Prices dropped sharply. Supply recovered. Buyers returned. Vendors cut lead times. Analysts expect more.',
    },
    {
        impactScore: 0.6,
        keywords: ['gpu'],
        takeaway: 'The takeaway: gpu keeps moving',
        transition: 'Meanwhile,',
    },
    2
);

const agents = storySegment(
    { id: 'agents', title: 'Agents ship widely!', sourceName: 'Agent Daily' },
    { impactScore: 0.8, keywords: ['ai agents', 'gpu'], takeaway: 'Agents matter.' },
    1
);

describe('excerptBody', () => {
    it('should keep more sentences at higher detail levels', () => {
        const excerpt = 'One. Two. Three. Four. Five.';
        expect(excerptBody(excerpt, 1)).toBe('One. Two.');
        expect(excerptBody(excerpt, 2)).toBe('One. Two. Three. Four.');
        expect(excerptBody(excerpt, 3)).toBe(excerpt);
    });
});

describe('composeScript', () => {
    it('should assemble intro, bridge, stories by impact and outro', async () => {
        const draft = await composeScript([gpu, agents], template, { ...RELAXED_PARAMS, detailLevel: 1 }, context);

        expect(draft.title).toBe('AI in 150 seconds: Agents ship widely');
        expect(draft.segments.map(segment => segment.kind)).toEqual(['intro', 'bridge', 'story', 'story', 'outro']);
        expect(draft.segments.map(segment => segment.position)).toEqual([1, 2, 3, 4, 5]);
        expect(draft.segments.map(segment => segment.text)).toEqual([
            '2 AI stories, under three minutes. Agents ship widely tops the list.',
            "Here's the rundown.",
            'Agents ship widely! Agents matter.',
            'GPU prices fall. Prices dropped sharply. Supply recovered. The takeaway: gpu keeps moving.',
            'The thread through all of it: ai agents and gpu.',
        ]);
        expect(draft.wordCount).toBe(43);
        expect(draft.generationAttempt).toBe(1);
        expect(draft.toneApplied).toBe(false);
        expect(draft.templateId).toBe('short-briefing');
    });

    it('should drop enhancer metadata from earlier attempts', async () => {
        const draft = await composeScript([gpu, agents], template, RELAXED_PARAMS, context);
        expect(draft.segments[3].metadata.transition).toBeUndefined();
        expect(draft.segments[3].metadata.keywords).toEqual(['gpu']);
    });

    it('should limit the number of stories', async () => {
        const draft = await composeScript([gpu, agents], template, { ...RELAXED_PARAMS, maxStories: 1 }, context);

        expect(draft.segments.filter(segment => segment.kind === 'story')).toHaveLength(1);
        expect(draft.segments[0].text).toBe('1 AI stories, under three minutes. Agents ship widely tops the list.');
    });

    it('should take the synthesis from the generator', async () => {
        const generator = new FakeGenerator(['Everything points at agents']);
        const draft = await composeScript([gpu, agents], template, RELAXED_PARAMS, {
            ...context,
            generator,
            policy: { timeoutMs: 1000, retries: 0, backoffMs: 0 },
        });

        expect(draft.segments[draft.segments.length - 1].text).toBe('Everything points at agents.');
        expect(generator.prompts[0]).toContain('1. Agents ship widely!');
    });

    it('should fail when no story segments are left', async () => {
        await expect(composeScript([], template, RELAXED_PARAMS, context)).rejects.toThrow(StageFailure);
    });

    it('should produce the same draft for the same input', async () => {
        const first = await composeScript([gpu, agents], template, RELAXED_PARAMS, context);
        const second = await composeScript([agents, gpu], template, RELAXED_PARAMS, context);
        expect(second).toEqual(first);
    });
});
