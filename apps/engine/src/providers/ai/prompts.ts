/**
 * Prompt Templates for Script Generation
 *
 * All prompts are centralized here for easy modification.
 */

export const SYSTEM_PROMPT = `You write spoken scripts for a short daily technology news video.

RULES:
1. Use active voice and strong, concrete verbs.
2. Stay factual: use only the details given in the prompt.
3. Never invent numbers, quotes, names or dates.
4. Write for the ear: short sentences, no lists, no markdown, no emojis.
5. Answer with the requested text only.`;

export interface TakeawayPromptInput {
    title: string;
    excerpt: string;
    sourceName: string;
    keywords: string[];
}

export const TAKEAWAY_PROMPT = (story: TakeawayPromptInput): string => `
Write ONE sentence (under 30 words) telling a busy executive why this story matters.

Headline: ${story.title}
Source: ${story.sourceName}
Details: ${story.excerpt || '(no details provided)'}
Keywords: ${story.keywords.join(', ') || '(none)'}
`;

export interface SynthesisPromptInput {
    headlines: string[];
    keywords: string[];
    wordBudget: number;
}

export const SYNTHESIS_PROMPT = (input: SynthesisPromptInput): string => `
Write the closing synthesis of today's briefing in about ${input.wordBudget} words.
Connect the stories below into one theme and end with what to watch next.

Stories:
${input.headlines.map((headline, index) => `${index + 1}. ${headline}`).join('\n')}

Themes: ${input.keywords.join(', ') || '(none)'}
`;
