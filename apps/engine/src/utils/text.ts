/**
 * Spoken-script text helpers
 */

export function countWords(text: string): number {
    return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Split on terminal punctuation followed by whitespace
 */
export function sentencesOf(text: string): string[] {
    return text
        .split(/(?<=[.!?])\s+/)
        .map(sentence => sentence.trim())
        .filter(sentence => sentence.length > 0);
}

/**
 * Terminate with a full stop unless the text already ends a sentence
 */
export function ensureSentence(text: string): string {
    const trimmed = text.trim();
    if (!trimmed) return trimmed;
    return /[.!?]["')\]]?$/.test(trimmed) ? trimmed : `${trimmed}.`;
}

export function stripTerminal(text: string): string {
    return text.trim().replace(/[.!?:;,]+$/, '');
}

export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * "a", "a and b", "a, b and c"
 */
export function joinList(items: string[]): string {
    if (items.length <= 1) return items.join('');
    return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}
