/**
 * WinkProcessor - Linguistic analysis producing matchable documents
 *
 * Based on wink-nlp v2 + wink-eng-lite-web-model v1.
 *
 * Turns raw text into a Doc carrying POS, LEMMA, IS_STOP, IS_SENT_START and
 * ENT_TYPE annotations plus the original inter-token whitespace, so that
 * patterns over tagger/lemmatizer attributes can run without allowMissing.
 */

import winkNLP from 'wink-nlp';
import model from 'wink-eng-lite-web-model';
import { Doc } from '@/lib/tokens';

// ==================== TYPE DEFINITIONS ====================

type WinkNLP = ReturnType<typeof winkNLP>;

export interface SentenceBoundary {
    text: string;
    start: number;  // Token index
    end: number;    // Exclusive token index
}

// ==================== WINK PROCESSOR ====================

export class WinkProcessor {
    private nlp: WinkNLP | null = null;

    /**
     * Lazy initialization (only when first used)
     * Pipeline: tokenization + sbd + pos + ner
     */
    private ensureInitialized(): WinkNLP {
        if (!this.nlp) {
            this.nlp = winkNLP(model, ['sbd', 'pos', 'ner']);
            console.log('[WinkProcessor] Initialized with pipeline: tokenization → sbd → pos → ner');
        }
        return this.nlp;
    }

    /**
     * Tokenize and annotate text
     */
    analyze(text: string): Doc {
        const nlp = this.ensureInitialized();
        const its = nlp.its;
        const wdoc = nlp.readDoc(text);

        const words = toStrings(wdoc.tokens().out());
        const lemmas = toStrings(wdoc.tokens().out(its.lemma));
        const tags = toStrings(wdoc.tokens().out(its.pos));
        const stopFlags = toBooleans(wdoc.tokens().out(its.stopWordFlag));

        // Align tokens with the source text to recover trailing whitespace
        const offsets: Array<[number, number]> = [];
        let cursor = 0;
        for (const word of words) {
            const found = text.indexOf(word, cursor);
            const start = found !== -1 ? found : cursor;
            offsets.push([start, start + word.length]);
            cursor = start + word.length;
        }
        const spaces = offsets.map(([, end], i) => {
            const next = i + 1 < offsets.length ? offsets[i + 1][0] : text.length;
            return next > end && /^\s+$/.test(text.slice(end, next));
        });

        const sentenceStarts = new Set<number>();
        for (const [start] of toSpans(wdoc.sentences().out(its.span))) {
            sentenceStarts.add(start);
        }

        const entityTypes: string[] = words.map(() => '');
        const entitySpans = toSpans(wdoc.entities().out(its.span));
        const entityLabels = toStrings(wdoc.entities().out(its.type));
        entitySpans.forEach(([start, last], i) => {
            for (let t = start; t <= last && t < entityTypes.length; t++) {
                entityTypes[t] = entityLabels[i] ?? '';
            }
        });

        return new Doc(words, {
            spaces,
            annotations: {
                LEMMA: words.map((word, i) => lemmas[i] || word.toLowerCase()),
                POS: words.map((_, i) => tags[i] || 'X'),
                ENT_TYPE: entityTypes,
                IS_STOP: words.map((_, i) => stopFlags[i] ?? false),
                IS_SENT_START: words.map((_, i) => sentenceStarts.has(i)),
            },
        });
    }

    /**
     * Sentence boundaries as token ranges
     */
    getSentences(text: string): SentenceBoundary[] {
        const nlp = this.ensureInitialized();
        const wdoc = nlp.readDoc(text);
        const texts = toStrings(wdoc.sentences().out());
        return toSpans(wdoc.sentences().out(nlp.its.span)).map(([start, last], i) => ({
            text: texts[i] ?? '',
            start,
            end: last + 1,
        }));
    }
}

// ==================== OUTPUT NARROWING ====================

function toStrings(values: unknown): string[] {
    if (!Array.isArray(values)) return [];
    return values.map((value: unknown) => (typeof value === 'string' ? value : ''));
}

function toBooleans(values: unknown): boolean[] {
    if (!Array.isArray(values)) return [];
    return values.map((value: unknown) => value === true);
}

// its.span yields inclusive [first, last] token indexes
function toSpans(values: unknown): Array<[number, number]> {
    if (!Array.isArray(values)) return [];
    const spans: Array<[number, number]> = [];
    for (const value of values) {
        if (Array.isArray(value) && typeof value[0] === 'number' && typeof value[1] === 'number') {
            spans.push([value[0], value[1]]);
        }
    }
    return spans;
}

// ==================== SINGLETON INSTANCE ====================

let winkInstance: WinkProcessor | null = null;

export function getWinkProcessor(): WinkProcessor {
    if (!winkInstance) {
        winkInstance = new WinkProcessor();
    }
    return winkInstance;
}
