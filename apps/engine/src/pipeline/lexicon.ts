/**
 * Editorial word lists: analysis terms, analogies, transition and CTA
 * phrases, tone rules. Loaded from data/ and validated once.
 */

import { z } from 'zod';
import lexiconData from '../../data/lexicon.json';
import phraseData from '../../data/phrases.json';
import { ConfigError } from '../errors';
import { escapeRegExp } from '../utils/text';
import { formatIssues } from './runConfig';

const TermList = z.array(z.string().min(1));

const LexiconSchema = z.object({
    categoryBase: z.object({
        news: z.number(),
        company: z.number(),
        research: z.number(),
        trending: z.number(),
    }),
    noveltyTerms: TermList,
    keywordTerms: TermList,
    stopWords: TermList,
    analogies: z.array(z.object({
        id: z.string(),
        terms: TermList,
        text: z.string().min(1),
    })),
    defaultAnalogy: z.string().min(1),
    segmentTypes: z.object({
        funding: TermList,
        research: TermList,
        policy: TermList,
    }),
    takeaways: z.object({
        news: z.string(),
        funding: z.string(),
        research: z.string(),
        policy: z.string(),
    }),
    strongVerbs: TermList,
});

const PhraseSchema = z.object({
    transitions: z.object({
        general: TermList.min(1),
        funding: TermList,
        research: TermList,
        policy: TermList,
        news: TermList,
    }),
    cta: TermList.min(1),
    tone: z.object({
        weakPhrases: z.record(z.string()),
        hedges: TermList,
    }),
});

export type Lexicon = z.infer<typeof LexiconSchema>;
export type PhraseLibrary = z.infer<typeof PhraseSchema>;

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ConfigError(`Invalid ${label}: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

let lexicon: Lexicon | null = null;
let phrases: PhraseLibrary | null = null;

export function getLexicon(): Lexicon {
    if (!lexicon) {
        lexicon = parseOrThrow(LexiconSchema, lexiconData, 'lexicon');
    }
    return lexicon;
}

export function getPhrases(): PhraseLibrary {
    if (!phrases) {
        phrases = parseOrThrow(PhraseSchema, phraseData, 'phrase library');
    }
    return phrases;
}

/**
 * Small deterministic string hash for stable phrase picks
 */
export function stableHash(value: string): number {
    let hash = 5381;
    for (let i = 0; i < value.length; i++) {
        hash = ((hash << 5) + hash + value.charCodeAt(i)) >>> 0;
    }
    return hash;
}

/**
 * Whole-word (or whole-phrase) test, case-insensitive
 */
export function containsTerm(text: string, term: string): boolean {
    const escaped = escapeRegExp(term.toLowerCase());
    return new RegExp(`(^|[^\\p{L}\\p{N}])${escaped}($|[^\\p{L}\\p{N}])`, 'u').test(text.toLowerCase());
}

export default { getLexicon, getPhrases, stableHash, containsTerm };
