import axios from 'axios';
import config from '../../config';
import { GenerationError } from '../../errors';
import { createLogger } from '../../logger';
import { GenerationParams, TextGenerator } from './AiProvider';
import { SYSTEM_PROMPT } from './prompts';

const logger = createLogger('gemini-provider');

interface GeminiResponse {
    candidates?: Array<{
        content?: { parts?: Array<{ text?: string }> };
    }>;
}

interface GeminiErrorBody {
    error?: { message?: string };
}

/**
 * Google Gemini text generator over the REST API
 */
export class GeminiProvider implements TextGenerator {
    readonly name = 'Gemini';
    private baseUrl = 'https://generativelanguage.googleapis.com/v1';

    constructor(
        private readonly apiKey: string = config.gemini.apiKey,
        private readonly model: string = config.gemini.model,
        private readonly timeoutMs: number = config.ai.timeoutMs
    ) {}

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    async generate(prompt: string, params?: GenerationParams): Promise<string> {
        logger.debug('Generating completion with Gemini', { promptLength: prompt.length });

        try {
            const systemPrompt = params?.systemPrompt || SYSTEM_PROMPT;
            const fullPrompt = `${systemPrompt}\n\n${prompt}`;

            const response = await axios.post<GeminiResponse>(
                `${this.baseUrl}/models/${this.model}:generateContent?key=${this.apiKey}`,
                {
                    contents: [
                        {
                            parts: [{ text: fullPrompt }]
                        }
                    ],
                    generationConfig: {
                        temperature: params?.temperature ?? 0.5,
                        maxOutputTokens: params?.maxTokens ?? 400,
                    }
                },
                {
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    timeout: this.timeoutMs,
                    signal: params?.signal,
                }
            );

            const content = response.data.candidates?.[0]?.content?.parts?.[0]?.text || '';
            logger.debug('Gemini completion generated', {
                responseLength: content.length
            });

            return content.trim();
        } catch (error) {
            let errorMessage = error instanceof Error ? error.message : 'Unknown error';
            if (axios.isAxiosError<GeminiErrorBody>(error)) {
                errorMessage = error.response?.data?.error?.message || error.message;
            }

            logger.error('Gemini API error', { error: errorMessage });
            throw new GenerationError(`Gemini API error: ${errorMessage}`, this.name);
        }
    }
}
