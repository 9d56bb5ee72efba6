export type { TextGenerator, GenerationParams } from './AiProvider';
export { OpenAiProvider } from './OpenAiProvider';
export { GeminiProvider } from './GeminiProvider';
export { getTextGenerator, resetTextGenerator } from './factory';
export * from './prompts';
