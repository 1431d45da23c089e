/**
 * Labeler - Named pattern sets producing labeled spans
 *
 * Each label owns a rule in an internal Matcher. Labeling a document returns
 * the matched spans plus, per token, the labels of every span covering it.
 */
import { Matcher, type MatchCallback, type MatcherConfig, type PatternLiteral } from '@/lib/matcher';
import type { TokenSequence } from '@/lib/tokens';

// ==================== TYPE DEFINITIONS ====================

export interface Labeling {
    label: string;
    start: number;
    end: number;
    text: string;
}

export interface LabelResult {
    labelings: Labeling[];
    /** Token index -> labels of the matches covering it, in match order */
    tokenLabels: string[][];
}

export interface LabelerOptions extends Partial<MatcherConfig> {
    labelings?: Array<[label: string, patterns: PatternLiteral[]]>;
    /** Drop nested spans and merge head-to-tail overlaps (later label wins) */
    onlyLongest?: boolean;
}

// ==================== LABELER ====================

export class Labeler<D extends TokenSequence = TokenSequence> {
    private matcher: Matcher<D>;
    private onlyLongest: boolean;

    constructor(options: LabelerOptions = {}) {
        const { labelings = [], onlyLongest = false, ...config } = options;
        this.matcher = new Matcher<D>(config);
        this.onlyLongest = onlyLongest;
        for (const [label, patterns] of labelings) {
            this.add(label, patterns);
        }
    }

    get labels(): string[] {
        return this.matcher.keys();
    }

    add(label: string, patterns: PatternLiteral[], onMatch: MatchCallback<D> | null = null): void {
        this.matcher.add(label, patterns, onMatch);
    }

    remove(label: string): void {
        this.matcher.remove(label);
    }

    label(doc: D): LabelResult {
        const tokenLabels: string[][] = Array.from({ length: doc.length }, () => []);
        let labelings: Labeling[] = [];

        for (const { key, start, end } of this.matcher.match(doc)) {
            for (let i = start; i < end; i++) {
                if (!tokenLabels[i].includes(key)) tokenLabels[i].push(key);
            }
            labelings.push({ label: key, start, end, text: spanText(doc, start, end) });
        }

        sortLabelings(labelings);
        if (this.onlyLongest) {
            labelings = keepLongest(labelings, (start, end) => spanText(doc, start, end));
        }

        return { labelings, tokenLabels };
    }
}

// ==================== SPAN HELPERS ====================

export function sortLabelings(labelings: Labeling[]): Labeling[] {
    return labelings.sort((a, b) => a.start - b.start || (b.end - b.start) - (a.end - a.start));
}

/**
 * Spans strictly inside another span are dropped. Spans overlapping
 * head-to-tail become one span over both, labeled with the later one's label.
 */
export function keepLongest(
    labelings: Labeling[],
    textOf: (start: number, end: number) => string
): Labeling[] {
    const kept = new Map<string, Labeling>();
    const keep = (labeling: Labeling) => {
        kept.set(`${labeling.start}:${labeling.end}:${labeling.label}`, labeling);
    };

    for (const span of labelings) {
        let result: Labeling | null = span;
        for (const other of labelings) {
            const identical = span.start === other.start && span.end === other.end;
            const disjoint = span.start >= other.end || span.end <= other.start;
            if (identical || disjoint) continue;

            const nested = (span.start > other.start && span.end <= other.end)
                || (span.start >= other.start && span.end < other.end);
            if (nested) {
                result = null;
                break;
            }

            if (span.start < other.start && span.end < other.end) {
                result = { label: other.label, start: span.start, end: other.end, text: textOf(span.start, other.end) };
                break;
            }
            if (span.start > other.start && span.end > other.end) {
                result = { label: span.label, start: other.start, end: span.end, text: textOf(other.start, span.end) };
                break;
            }
        }
        if (result) keep(result);
    }

    return sortLabelings(Array.from(kept.values()));
}

export function spanText<D extends TokenSequence>(doc: D, start: number, end: number): string {
    let text = '';
    for (let i = start; i < end; i++) {
        const token = doc.token(i);
        text += i < end - 1 ? token.text + token.whitespace : token.text;
    }
    return text;
}
