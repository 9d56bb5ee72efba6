/**
 * Text Generator Factory
 *
 * Returns the configured generation collaborator, or null when the pipeline
 * should stay template-only.
 */

import config from '../../config';
import { ConfigError } from '../../errors';
import { createLogger } from '../../logger';
import { TextGenerator } from './AiProvider';
import { GeminiProvider } from './GeminiProvider';
import { OpenAiProvider } from './OpenAiProvider';

const logger = createLogger('ai-provider');

let currentProvider: TextGenerator | null | undefined;

/**
 * Get the configured text generator
 */
export function getTextGenerator(): TextGenerator | null {
    if (currentProvider !== undefined) {
        return currentProvider;
    }

    switch (config.ai.provider) {
        case 'gemini': {
            const gemini = new GeminiProvider();
            if (!gemini.isConfigured()) {
                throw new ConfigError('Gemini provider not configured - missing GEMINI_API_KEY');
            }
            currentProvider = gemini;
            logger.info('Using Gemini text generator', { model: config.gemini.model });
            break;
        }

        case 'openai': {
            const openai = new OpenAiProvider();
            if (!openai.isConfigured()) {
                throw new ConfigError('OpenAI provider not configured - missing OPENAI_API_KEY');
            }
            currentProvider = openai;
            logger.info('Using OpenAI text generator', { model: config.openai.model });
            break;
        }

        case 'none':
        default:
            currentProvider = null;
            logger.info('No text generator configured, composing from templates only');
            break;
    }

    return currentProvider;
}

/**
 * Reset the provider (for testing)
 */
export function resetTextGenerator(): void {
    currentProvider = undefined;
}

export default { getTextGenerator, resetTextGenerator };
