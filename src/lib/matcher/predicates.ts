/**
 * Predicate Compiler
 *
 * Parses one token-spec literal into typed predicates and compiles them to
 * value fragments: regular-expression sources that match one whole attribute
 * value, never the separator that follows it.
 */
import { InvalidPatternError } from './errors';
import {
    EXTENSION_FIELD,
    extensionKey,
    normalizeAttributeName,
    OP_FIELD,
    REGEX_ATTRIBUTE,
    type AttributeKey,
} from './attributes';
import { isComparisonOperator, isQuantifier, type ComparisonOperator, type Quantifier } from './schema';

// ==================== TYPE DEFINITIONS ====================

export type Predicate =
    | { type: 'equals'; value: string }
    | { type: 'in'; values: string[] }
    | { type: 'notIn'; values: string[] }
    | { type: 'compare'; op: ComparisonOperator; length: number }
    | { type: 'regex'; pattern: string };

export interface ParsedTokenSpec {
    quantifier: Quantifier;
    constraints: Map<AttributeKey, Predicate[]>;
}

export interface CompiledTokenSpec {
    quantifier: Quantifier;
    /** Attribute -> value fragment. `REGEX` holds the raw free-text expression. */
    fragments: Map<AttributeKey, string>;
}

// ==================== REGEX BUILDING BLOCKS ====================

/** Separator as a regex escape, for use inside pattern sources */
export const SEP = '\\u001e';
/** Any single character of one attribute value */
export const VALUE_CHAR = `[^${SEP}]`;
/** Any whole attribute value */
export const ANY_VALUE = `${VALUE_CHAR}*`;
/** Fragment that can never match */
export const NEVER = '(?!)';

const SYNTAX_CHARS = /[\\^$.*+?()[\]{}|/]/g;

export function escapeRegExp(literal: string): string {
    return literal.replace(SYNTAX_CHARS, '\\$&');
}

// ==================== PARSING ====================

export function parseTokenSpec(spec: unknown, position: number): ParsedTokenSpec {
    if (typeof spec !== 'object' || spec === null || Array.isArray(spec)) {
        throw new InvalidPatternError(`Token spec at position ${position} must be an object`, { position });
    }

    let quantifier: Quantifier = '1';
    const constraints = new Map<AttributeKey, Predicate[]>();
    const add = (key: AttributeKey, predicates: Predicate[]) => {
        constraints.set(key, [...(constraints.get(key) ?? []), ...predicates]);
    };

    for (const [rawKey, value] of Object.entries(spec)) {
        const upper = rawKey.toUpperCase();

        if (upper === OP_FIELD) {
            if (!isQuantifier(value)) {
                throw new InvalidPatternError(
                    `Invalid quantifier ${JSON.stringify(value)} at position ${position}; expected one of 1, +, !, ?, *`,
                    { position }
                );
            }
            quantifier = value;
            continue;
        }

        if (rawKey === EXTENSION_FIELD) {
            if (!isPlainObject(value)) {
                throw new InvalidPatternError(`Extension spec "_" at position ${position} must be an object`, { position });
            }
            for (const [name, extValue] of Object.entries(value)) {
                add(extensionKey(name), parseValue(extValue, false, position, `_.${name}`));
            }
            continue;
        }

        if (upper === REGEX_ATTRIBUTE) {
            if (typeof value !== 'string') {
                throw new InvalidPatternError(`REGEX at position ${position} must be a string`, { position });
            }
            add(REGEX_ATTRIBUTE, [{ type: 'regex', pattern: value }]);
            continue;
        }

        const attr = normalizeAttributeName(rawKey);
        if (!attr) {
            throw new InvalidPatternError(`Unknown attribute "${rawKey}" at position ${position}`, { position, attribute: rawKey });
        }
        add(attr, parseValue(value, attr === 'LENGTH', position, attr));
    }

    if (constraints.has(REGEX_ATTRIBUTE)) {
        if (constraints.size > 1) {
            throw new InvalidPatternError(`REGEX token spec at position ${position} cannot constrain other attributes`, { position });
        }
        if (quantifier !== '1') {
            throw new InvalidPatternError(`REGEX token spec at position ${position} does not take a quantifier`, { position });
        }
    }

    return { quantifier, constraints };
}

function parseValue(value: unknown, isLength: boolean, position: number, attribute: string): Predicate[] {
    if (typeof value === 'string') {
        return [{ type: 'equals', value }];
    }
    if (typeof value === 'boolean') {
        return [{ type: 'equals', value: value ? 'true' : 'false' }];
    }
    if (typeof value === 'number' && Number.isInteger(value)) {
        return isLength
            ? [{ type: 'compare', op: '==', length: value }]
            : [{ type: 'equals', value: String(value) }];
    }
    if (isPlainObject(value)) {
        const entries = Object.entries(value);
        if (entries.length === 0) {
            throw new InvalidPatternError(`Empty predicate for ${attribute} at position ${position}`, { position, attribute });
        }
        return entries.map(([rawOp, arg]) => parsePredicate(rawOp.toUpperCase(), arg, position, attribute));
    }
    throw new InvalidPatternError(
        `Unsupported value ${JSON.stringify(value) ?? String(value)} for ${attribute} at position ${position}; expected string, boolean, integer or predicate object`,
        { position, attribute }
    );
}

function parsePredicate(op: string, arg: unknown, position: number, attribute: string): Predicate {
    const fail = (message: string): never => {
        throw new InvalidPatternError(`${message} (${attribute} at position ${position})`, { position, attribute, predicate: op });
    };

    if (op === 'IN' || op === 'NOT_IN') {
        if (!Array.isArray(arg)) return fail(`${op} expects a list`);
        const values = arg.map((item: unknown) => {
            if (typeof item === 'string') return item;
            if (typeof item === 'boolean') return item ? 'true' : 'false';
            if (typeof item === 'number' && Number.isInteger(item)) return String(item);
            return fail(`${op} members must be strings, booleans or integers`);
        });
        return op === 'IN' ? { type: 'in', values } : { type: 'notIn', values };
    }
    if (op === 'REGEX') {
        if (typeof arg !== 'string') return fail('REGEX expects a string');
        return { type: 'regex', pattern: arg };
    }
    if (isComparisonOperator(op)) {
        if (typeof arg !== 'number' || !Number.isInteger(arg) || arg < 0) {
            return fail(`${op} expects a non-negative integer`);
        }
        return { type: 'compare', op, length: arg };
    }
    return fail(`Unknown predicate "${op}"`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ==================== COMPILATION ====================

export function compileTokenSpec(spec: ParsedTokenSpec): CompiledTokenSpec {
    const fragments = new Map<AttributeKey, string>();
    for (const [key, predicates] of spec.constraints) {
        if (key === REGEX_ATTRIBUTE) {
            fragments.set(key, predicates.map(p => (p.type === 'regex' ? p.pattern : '')).join(''));
            continue;
        }
        const compiled = predicates.map(compilePredicate);
        fragments.set(key, compiled.length === 1 ? compiled[0] : conjoin(compiled));
    }
    return { quantifier: spec.quantifier, fragments };
}

export function compilePredicate(predicate: Predicate): string {
    switch (predicate.type) {
        case 'equals':
            return escapeRegExp(predicate.value);
        case 'in':
            return alternation(predicate.values);
        case 'notIn':
            return predicate.values.length === 0
                ? ANY_VALUE
                : `(?!${alternation(predicate.values)}${SEP})${ANY_VALUE}`;
        case 'compare':
            return lengthFragment(predicate.op, predicate.length);
        case 'regex':
            return tokenRegexFragment(predicate.pattern);
    }
}

function alternation(values: string[]): string {
    if (values.length === 0) return NEVER;
    if (values.length === 1) return escapeRegExp(values[0]);
    return `(?:${values.map(escapeRegExp).join('|')})`;
}

// Every fragment must hold on its own; lookaheads check each against the whole value
function conjoin(fragments: string[]): string {
    return `(?:${fragments.map(f => `(?=(?:${f})${SEP})`).join('')}${ANY_VALUE})`;
}

export function lengthFragment(op: ComparisonOperator, n: number): string {
    switch (op) {
        case '==':
            return `${VALUE_CHAR}{${n}}`;
        case '!=':
            return n === 0 ? `${VALUE_CHAR}+` : `(?:${VALUE_CHAR}{0,${n - 1}}|${VALUE_CHAR}{${n + 1},})`;
        case '>=':
            return `${VALUE_CHAR}{${n},}`;
        case '<=':
            return `${VALUE_CHAR}{0,${n}}`;
        case '>':
            return `${VALUE_CHAR}{${n + 1},}`;
        case '<':
            return n === 0 ? NEVER : `${VALUE_CHAR}{0,${n - 1}}`;
    }
}

/**
 * User expression confined to one attribute value. `^`/`$` are dropped since
 * the engine supplies token boundaries; an unanchored side gets a lazy
 * wildcard so the expression may match anywhere inside the value.
 */
export function tokenRegexFragment(pattern: string): string {
    const { source, anchoredStart, anchoredEnd } = confineToValue(pattern);
    const lead = anchoredStart ? '' : `${VALUE_CHAR}*?`;
    const tail = anchoredEnd ? '' : `${VALUE_CHAR}*?`;
    return `${lead}(?:${source})${tail}`;
}

interface ConfinedRegex {
    source: string;
    anchoredStart: boolean;
    anchoredEnd: boolean;
}

const NEGATED_ESCAPES: Readonly<Record<string, string>> = {
    S: `[^\\s${SEP}]`,
    W: `[^\\w${SEP}]`,
    D: `[^\\d${SEP}]`,
};

/**
 * Strips anchors and rewrites the constructs that could match the separator:
 * `.`, `\S`, `\W`, `\D` and negated character classes. A class holding one of
 * those escapes is guarded by a lookahead on the separator.
 */
export function confineToValue(pattern: string): ConfinedRegex {
    let source = '';
    let inClass = false;
    let classStart = 0;
    let classNegated = false;
    let classOpen = false;
    let anchoredStart = false;
    let anchoredEnd = false;
    const chars = Array.from(pattern);

    for (let i = 0; i < chars.length; i++) {
        const ch = chars[i];

        if (ch === '\\') {
            const next = chars[i + 1] ?? '';
            i++;
            if (inClass) {
                if (NEGATED_ESCAPES[next]) classOpen = true;
                source += `\\${next}`;
            } else {
                source += NEGATED_ESCAPES[next] ?? `\\${next}`;
            }
            continue;
        }

        if (inClass) {
            source += ch;
            if (ch === ']') {
                inClass = false;
                if (classOpen && !classNegated) {
                    source = `${source.slice(0, classStart)}(?:(?!${SEP})${source.slice(classStart)})`;
                }
            }
            continue;
        }

        switch (ch) {
            case '[':
                inClass = true;
                classStart = source.length;
                classNegated = chars[i + 1] === '^';
                classOpen = false;
                if (classNegated) {
                    source += `[^${SEP}`;
                    i++;
                } else {
                    source += ch;
                }
                break;
            case '^':
                anchoredStart = true;
                break;
            case '$':
                anchoredEnd = true;
                break;
            case '.':
                source += `[^${SEP}\\n\\r\\u2028\\u2029]`;
                break;
            default:
                source += ch;
        }
    }

    return { source, anchoredStart, anchoredEnd };
}
