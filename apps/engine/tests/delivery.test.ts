/**
 * Tests for artifact storage and review delivery
 */

import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { StageFailure } from '../src/errors';
import { ReviewPackage, ScriptArtifact } from '../src/pipeline/types';
import { FileArtifactStore, generateSlug } from '../src/providers/artifacts/ArtifactStore';
import {
    createReviewNotifier,
    LoggingReviewNotifier,
    WebhookReviewNotifier,
} from '../src/providers/review/ReviewNotifier';
import { draftOf, segment } from './fixtures';

const draft = draftOf([segment('intro', 'Hello.'), segment('outro', 'Bye.')], { title: 'AI Briefing: Chips!' });

const artifact: ScriptArtifact = {
    runId: 'run-1',
    draft,
    report: { severity: 'pass', metrics: {}, violations: [], recommendedAction: 'accept' },
    diagnostics: { fetchFailures: [], dedupRemovedCount: 0, finalScoreBreakdown: [], attemptsUsed: 1 },
};

const review: ReviewPackage = {
    runId: 'run-2',
    reason: 'Validation fail after 2 of 2 attempts: word_count.below_min',
    draft,
    report: null,
    reports: [],
    createdAt: '2025-09-02T12:00:00.000Z',
};

describe('generateSlug', () => {
    it('should lower-case and strip punctuation', () => {
        expect(generateSlug('run-1 AI Briefing: Chips!')).toBe('run-1-ai-briefing-chips');
    });
});

describe('FileArtifactStore', () => {
    let directory: string;

    beforeEach(() => {
        directory = fs.mkdtempSync(path.join(os.tmpdir(), 'artifacts-'));
    });

    afterEach(() => {
        fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should write the artifact as JSON named after run and title', async () => {
        const store = new FileArtifactStore(path.join(directory, 'scripts'), () => new Date('2025-09-02T12:00:00Z'));

        const record = await store.save(artifact);

        const location = path.join(directory, 'scripts', 'run-1-ai-briefing-chips.json');
        expect(record).toEqual({ runId: 'run-1', location, savedAt: '2025-09-02T12:00:00.000Z' });
        expect(JSON.parse(fs.readFileSync(location, 'utf-8'))).toEqual(artifact);
    });

    it('should overwrite an earlier save of the same run', async () => {
        const store = new FileArtifactStore(directory);

        await store.save(artifact);
        await store.save({ ...artifact, diagnostics: { ...artifact.diagnostics, attemptsUsed: 2 } });

        expect(fs.readdirSync(directory)).toEqual(['run-1-ai-briefing-chips.json']);
    });
});

describe('WebhookReviewNotifier', () => {
    function clientAnswering(status: number) {
        const posted: unknown[] = [];
        const client = axios.create({
            adapter: async (config: InternalAxiosRequestConfig) => {
                posted.push(typeof config.data === 'string' ? JSON.parse(config.data) : config.data);
                const response = { data: {}, status, statusText: String(status), headers: {}, config };
                if (status >= 400) {
                    throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
                }
                return response;
            },
        });
        return { client, posted };
    }

    it('should post the review package', async () => {
        const { client, posted } = clientAnswering(200);

        await new WebhookReviewNotifier('https://example.com/hooks/review', client).notify(review);

        expect(posted).toHaveLength(1);
        expect(posted[0]).toMatchObject({ runId: 'run-2', reason: review.reason });
    });

    it('should raise a stage failure with the response status', async () => {
        const { client } = clientAnswering(502);

        const error = await new WebhookReviewNotifier('https://example.com/hooks/review', client)
            .notify(review)
            .catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(StageFailure);
        expect(error instanceof StageFailure && error.message).toBe('Stage "escalate" failed: Review webhook failed with status 502');
    });
});

describe('createReviewNotifier', () => {
    it('should log when no webhook is configured', () => {
        expect(createReviewNotifier('')).toBeInstanceOf(LoggingReviewNotifier);
        expect(createReviewNotifier('https://example.com/hooks/review')).toBeInstanceOf(WebhookReviewNotifier);
    });
});
