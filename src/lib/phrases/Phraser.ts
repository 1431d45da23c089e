/**
 * Phraser - Part-of-speech phrase chunks
 *
 * Runs one rule of POS patterns and keeps the outermost span of every run of
 * overlapping matches. Needs a tagged document (see WinkProcessor.analyze).
 */
import { spanText } from '@/lib/labels';
import { Matcher, type MatcherConfig, type PatternLiteral } from '@/lib/matcher';
import type { TokenSequence } from '@/lib/tokens';

// ==================== TYPE DEFINITIONS ====================

export interface Phrase {
    start: number;
    end: number;
    text: string;
}

// ==================== PATTERNS ====================

export const NOUN_PHRASE_PATTERNS: PatternLiteral[] = [
    [
        { POS: { IN: ['ADJ', 'ADV', 'DET', 'NUM', 'PROPN'] }, OP: '*' },
        { POS: { IN: ['ADP', 'CONJ', 'CCONJ'] }, OP: '?' },
        { POS: { IN: ['ADJ', 'ADP', 'ADV', 'NOUN', 'NUM', 'PRON', 'PROPN'] }, OP: '+' },
    ],
];

export const VERB_PHRASE_PATTERNS: PatternLiteral[] = [
    [{ POS: { IN: ['ADV', 'AUX', 'PART', 'VERB'] }, OP: '+' }],
];

// ==================== PHRASER ====================

export class Phraser<D extends TokenSequence = TokenSequence> {
    private matcher: Matcher<D>;

    constructor(readonly name: string, patterns: PatternLiteral[], config: Partial<MatcherConfig> = {}) {
        this.matcher = new Matcher<D>(config);
        this.matcher.add(name, patterns);
    }

    /**
     * Phrases ordered by start, longest first. A match ending inside the
     * previous kept phrase is skipped.
     */
    extract(doc: D): Phrase[] {
        const matches = this.matcher
            .match(doc)
            .sort((a, b) => a.start - b.start || b.end - a.end);

        const phrases: Phrase[] = [];
        let lastEnd = 0;
        for (const { start, end } of matches) {
            if (lastEnd >= end) continue;
            lastEnd = end;
            phrases.push({ start, end, text: spanText(doc, start, end) });
        }
        return phrases;
    }
}

export function createNounPhraser<D extends TokenSequence = TokenSequence>(config: Partial<MatcherConfig> = {}): Phraser<D> {
    return new Phraser<D>('NOUN_PHRASE', NOUN_PHRASE_PATTERNS, config);
}

export function createVerbPhraser<D extends TokenSequence = TokenSequence>(config: Partial<MatcherConfig> = {}): Phraser<D> {
    return new Phraser<D>('VERB_PHRASE', VERB_PHRASE_PATTERNS, config);
}
