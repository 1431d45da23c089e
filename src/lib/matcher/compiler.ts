/**
 * Pattern Compiler
 *
 * Combines the token-spec fragments of one pattern into a regular expression
 * per attribute. All expressions are built from one position table, so a given
 * position carries the same quantifier whichever attribute is being matched
 * and every expression has exactly one named group per position.
 */
import { InvalidPatternError } from './errors';
import { orderAttributes, REGEX_ATTRIBUTE, type AttributeKey } from './attributes';
import { ANY_VALUE, compileTokenSpec, parseTokenSpec, SEP } from './predicates';
import type { Quantifier } from './schema';

// ==================== TYPE DEFINITIONS ====================

export interface PositionRow {
    index: number;
    quantifier: Quantifier;
    /** Attributes this position constrains, with their value fragments */
    fragments: Map<AttributeKey, string>;
    /** Free-text REGEX position, sized in characters rather than tokens */
    isRegex: boolean;
}

export interface AttributePass {
    attribute: AttributeKey;
    source: string;
    regex: RegExp;
    /**
     * Expression with repeating anchors held to the token counts an earlier
     * pass resolved them to (1-based position -> count).
     */
    pinned(counts: ReadonlyMap<number, number>): RegExp;
}

export interface CompiledPattern {
    positions: PositionRow[];
    /** Evaluation order: TEXT/LOWER/LEMMA first, REGEX last */
    passes: AttributePass[];
    /** 1-based positions that always consume at least one token */
    anchors: Set<number>;
    /** Token count when every position consumes exactly one token */
    fixedLength: number | null;
    attributes: AttributeKey[];
}

const ANCHOR_QUANTIFIERS: ReadonlySet<Quantifier> = new Set(['1', '+']);
const REPEATING: ReadonlySet<Quantifier> = new Set(['+', '*']);

// Carrier for patterns made only of `{}` specs
const DEFAULT_ATTRIBUTE: AttributeKey = 'TEXT';

export function groupName(position: number): string {
    return `__p${position + 1}`;
}

// ==================== COMPILATION ====================

export function compilePattern(pattern: unknown): CompiledPattern {
    if (!Array.isArray(pattern)) {
        throw new InvalidPatternError('A pattern must be a list of token specs');
    }
    if (pattern.length === 0) {
        throw new InvalidPatternError('A pattern must contain at least one token spec');
    }

    const positions = buildPositionTable(pattern);

    const seen = new Set<AttributeKey>();
    for (const row of positions) {
        for (const key of row.fragments.keys()) seen.add(key);
    }
    const attributes = seen.size > 0 ? orderAttributes(seen) : [DEFAULT_ATTRIBUTE];

    const repeatingAnchors = positions
        .filter(row => !row.isRegex && row.quantifier === '+')
        .map(row => row.index + 1);

    const passes = attributes.map((attribute): AttributePass => {
        const source = attribute === REGEX_ATTRIBUTE
            ? buildTextSource(positions)
            : buildAttributeSource(positions, attribute, new Map());
        const regex = compileSource(source, attribute);
        const variants = new Map<string, RegExp>();

        const pinned = (counts: ReadonlyMap<number, number>): RegExp => {
            if (attribute === REGEX_ATTRIBUTE) return regex;
            const known = repeatingAnchors.filter(position => counts.has(position));
            if (known.length === 0) return regex;

            const key = known.map(position => `${position}:${counts.get(position)}`).join(',');
            let variant = variants.get(key);
            if (!variant) {
                variant = compileSource(buildAttributeSource(positions, attribute, counts), attribute);
                variants.set(key, variant);
            }
            return variant;
        };

        return { attribute, source, regex, pinned };
    });

    const anchors = new Set<number>();
    for (const row of positions) {
        if (!row.isRegex && ANCHOR_QUANTIFIERS.has(row.quantifier)) {
            anchors.add(row.index + 1);
        }
    }

    const fixed = positions.every(row => !row.isRegex && (row.quantifier === '1' || row.quantifier === '!'));

    return {
        positions,
        passes,
        anchors,
        fixedLength: fixed ? positions.length : null,
        attributes,
    };
}

export function buildPositionTable(pattern: unknown[]): PositionRow[] {
    return pattern.map((spec, index) => {
        const compiled = compileTokenSpec(parseTokenSpec(spec, index));
        return {
            index,
            quantifier: compiled.quantifier,
            fragments: compiled.fragments,
            isRegex: compiled.fragments.has(REGEX_ATTRIBUTE),
        };
    });
}

/**
 * Quantifier used at a position for an attribute it does not constrain.
 * Negation only applies to the constrained attribute, elsewhere the position
 * is a plain single token.
 */
export function alignedQuantifier(row: PositionRow): Quantifier {
    return row.quantifier === '!' ? '1' : row.quantifier;
}

function buildAttributeSource(
    positions: PositionRow[],
    attribute: AttributeKey,
    counts: ReadonlyMap<number, number>
): string {
    const anyUnit = `${ANY_VALUE}${SEP}`;

    return positions.map((row, i) => {
        if (row.isRegex) {
            return group(row.index, `(?:${anyUnit})+?`);
        }

        const fragment = row.fragments.get(attribute);
        const unit = fragment === undefined ? anyUnit : `(?:${fragment})${SEP}`;

        const count = row.quantifier === '+' ? counts.get(row.index + 1) : undefined;
        if (count !== undefined) {
            return group(row.index, `(?:${unit}){${count}}`);
        }

        // A filler leaves the span of a repeating position to its own attribute
        if (fragment === undefined) {
            return group(row.index, wrapQuantifier(alignedQuantifier(row), anyUnit, row.quantifier === '+'));
        }

        if (row.quantifier === '!') {
            return group(row.index, `(?!${unit})${anyUnit}`);
        }

        // Earlier of two adjacent repeating wraps on the same attribute turns lazy
        const next = positions[i + 1];
        const lazy = REPEATING.has(row.quantifier)
            && next !== undefined
            && REPEATING.has(next.quantifier)
            && next.fragments.has(attribute);

        return group(row.index, wrapQuantifier(row.quantifier, unit, lazy));
    }).join('');
}

/**
 * Expression over the natural text: REGEX positions pass through verbatim,
 * other positions are whitespace-delimited words.
 */
function buildTextSource(positions: PositionRow[]): string {
    return positions.map(row => {
        const expression = row.fragments.get(REGEX_ATTRIBUTE);
        if (expression !== undefined) {
            return `${group(row.index, expression)}\\s*`;
        }
        return group(row.index, wrapQuantifier(alignedQuantifier(row), '\\S+\\s*', false));
    }).join('');
}

export function wrapQuantifier(quantifier: Quantifier, unit: string, lazy: boolean): string {
    const suffix = lazy ? '?' : '';
    switch (quantifier) {
        case '1':
        case '!':
            return unit;
        case '+':
            return `(?:${unit})+${suffix}`;
        case '?':
            return `(?:${unit})?`;
        case '*':
            return `(?:${unit})*${suffix}`;
    }
}

function group(index: number, body: string): string {
    return `(?<${groupName(index)}>${body})`;
}

function compileSource(source: string, attribute: AttributeKey): RegExp {
    // Token attributes are tried at each token start (sticky); free text is scanned
    const flags = attribute === REGEX_ATTRIBUTE
        ? 'dgmu'
        : attribute === 'LOWER' ? 'diuy' : 'duy';
    try {
        return new RegExp(source, flags);
    } catch (error) {
        throw new InvalidPatternError(
            `Invalid regular expression for ${attribute}: ${error instanceof Error ? error.message : String(error)}`,
            { attribute }
        );
    }
}
