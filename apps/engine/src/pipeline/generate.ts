/**
 * Generation Calls
 *
 * Every call into the text generator goes through here: bounded by a
 * timeout, retried with linear backoff, and surfaced as a StageFailure once
 * retries are exhausted.
 */

import config from '../config';
import { GenerationError, GenerationTimeout, PipelineError, StageFailure } from '../errors';
import { createLogger } from '../logger';
import { GenerationParams, TextGenerator } from '../providers/ai';
import { AbortedError, retry, withTimeout } from '../utils/retry';

const logger = createLogger('generate');

export interface GenerationPolicy {
    timeoutMs: number;
    retries: number;
    backoffMs: number;
}

export function defaultGenerationPolicy(): GenerationPolicy {
    return {
        timeoutMs: config.ai.timeoutMs,
        retries: config.ai.retries,
        backoffMs: config.ai.backoffMs,
    };
}

async function generateOnce(
    generator: TextGenerator,
    prompt: string,
    params: GenerationParams
): Promise<string> {
    let text: string;
    try {
        text = await generator.generate(prompt, params);
    } catch (error) {
        if (error instanceof PipelineError) throw error;
        throw new GenerationError(
            error instanceof Error ? error.message : 'Unknown error',
            generator.name
        );
    }

    if (!text.trim()) {
        throw new GenerationError('Empty response', generator.name);
    }
    return text.trim();
}

/**
 * Generate text for a pipeline stage, retrying timeouts and provider errors
 */
export async function generateWithRetry(
    generator: TextGenerator,
    prompt: string,
    stage: string,
    policy: GenerationPolicy = defaultGenerationPolicy(),
    params: GenerationParams = {}
): Promise<string> {
    try {
        return await retry(
            () => withTimeout(
                generateOnce(generator, prompt, params),
                policy.timeoutMs,
                () => new GenerationTimeout(policy.timeoutMs)
            ),
            {
                retries: policy.retries,
                backoffMs: policy.backoffMs,
                signal: params.signal,
                shouldRetry: error => !(error instanceof AbortedError),
                onRetry: (error, attempt) => {
                    logger.warn('Retry attempt', {
                        stage,
                        provider: generator.name,
                        attempt,
                        error: error.message,
                    });
                },
            }
        );
    } catch (error) {
        if (error instanceof AbortedError) {
            throw error;
        }

        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.error('Generation failed', { stage, provider: generator.name, error: message });
        throw new StageFailure(
            stage,
            `generation failed after ${policy.retries + 1} attempts: ${message}`,
            error
        );
    }
}

export default { generateWithRetry, defaultGenerationPolicy };
