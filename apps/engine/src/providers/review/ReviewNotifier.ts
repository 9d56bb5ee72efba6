/**
 * Review Notifier
 *
 * Hands an escalated draft to human reviewers. The logging notifier only
 * writes the package summary to the log; the webhook notifier posts the
 * whole package as JSON.
 */

import axios, { AxiosInstance } from 'axios';
import config from '../../config';
import { StageFailure } from '../../errors';
import { createLogger } from '../../logger';
import { ReviewPackage } from '../../pipeline/types';

const logger = createLogger('review');

const WEBHOOK_TIMEOUT_MS = 10000;

export interface ReviewNotifier {
    /**
     * Notifier name for logging
     */
    readonly name: string;

    notify(review: ReviewPackage): Promise<void>;
}

export class LoggingReviewNotifier implements ReviewNotifier {
    readonly name = 'log';

    async notify(review: ReviewPackage): Promise<void> {
        logger.warn('Draft escalated for manual review', {
            runId: review.runId,
            reason: review.reason,
            title: review.draft?.title ?? null,
            attempts: review.reports.length,
            violations: review.report?.violations.map(violation => violation.ruleId) ?? [],
        });
    }
}

export class WebhookReviewNotifier implements ReviewNotifier {
    readonly name = 'webhook';

    private client: AxiosInstance;

    constructor(private readonly url: string, client?: AxiosInstance) {
        this.client = client ?? axios.create({
            timeout: WEBHOOK_TIMEOUT_MS,
            headers: {
                'Content-Type': 'application/json',
            },
        });
    }

    async notify(review: ReviewPackage): Promise<void> {
        try {
            await this.client.post(this.url, review);
            logger.info('Review package delivered', { runId: review.runId });
        } catch (error) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            logger.error('Review webhook failed', {
                runId: review.runId,
                status,
                error: error instanceof Error ? error.message : 'Unknown error',
            });
            throw new StageFailure(
                'escalate',
                `Review webhook failed${status ? ` with status ${status}` : ''}`,
                error
            );
        }
    }
}

export function createReviewNotifier(webhookUrl: string = config.review.webhookUrl): ReviewNotifier {
    return webhookUrl ? new WebhookReviewNotifier(webhookUrl) : new LoggingReviewNotifier();
}

export default createReviewNotifier;
