import OpenAI from 'openai';
import config from '../../config';
import { GenerationError } from '../../errors';
import { createLogger } from '../../logger';
import { GenerationParams, TextGenerator } from './AiProvider';
import { SYSTEM_PROMPT } from './prompts';

const logger = createLogger('openai-provider');

/**
 * OpenAI-based text generator
 */
export class OpenAiProvider implements TextGenerator {
    readonly name = 'OpenAI';
    private client: OpenAI | null = null;

    constructor(
        private readonly apiKey: string = config.openai.apiKey,
        private readonly model: string = config.openai.model
    ) {}

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    private getClient(): OpenAI {
        if (!this.client) {
            this.client = new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });
        }
        return this.client;
    }

    async generate(prompt: string, params?: GenerationParams): Promise<string> {
        logger.debug('Generating completion', { promptLength: prompt.length });

        try {
            const response = await this.getClient().chat.completions.create(
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: params?.systemPrompt || SYSTEM_PROMPT },
                        { role: 'user', content: prompt },
                    ],
                    temperature: params?.temperature ?? 0.5,
                    max_tokens: params?.maxTokens ?? 400,
                },
                { signal: params?.signal }
            );

            const content = response.choices[0]?.message?.content || '';
            logger.debug('Completion generated', {
                tokens: response.usage?.total_tokens
            });

            return content.trim();
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error';
            logger.error('OpenAI API error', { error: message });
            throw new GenerationError(`OpenAI API error: ${message}`, this.name);
        }
    }
}
