/**
 * Text Generator Interface
 *
 * Defines the contract for the optional generation collaborator that writes
 * takeaway lines and closing syntheses. Implementations wrap OpenAI, Gemini
 * or a test fake; the pipeline runs template-only when none is configured.
 */

export interface GenerationParams {
    temperature?: number;
    maxTokens?: number;
    systemPrompt?: string;
    signal?: AbortSignal;
}

export interface TextGenerator {
    /**
     * Provider name for logging
     */
    readonly name: string;

    /**
     * Generate a text completion for a prompt
     */
    generate(prompt: string, params?: GenerationParams): Promise<string>;

    /**
     * Check if the provider is properly configured
     */
    isConfigured(): boolean;
}
