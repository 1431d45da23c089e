/**
 * Matcher - Rule registry and matching entry point
 *
 * Holds named rules (alternative token patterns plus an optional callback),
 * compiles patterns when they are added, and runs them over token sequences.
 */
import { ANNOTATED_ATTRIBUTES, isTokenAttribute, type TokenSequence } from '@/lib/tokens';
import type { AttributeKey } from './attributes';
import { compilePattern, type CompiledPattern } from './compiler';
import { resolveMatcherConfig, type MatcherConfig } from './config';
import { findPatternMatches } from './engine';
import { CallbackTypeError, InvalidPatternError, MissingAnnotationError, UnknownKeyError } from './errors';
import { ProjectionCache } from './projector';
import { validatePatternLiteral, type PatternLiteral } from './schema';

// ==================== TYPE DEFINITIONS ====================

export interface Match {
    key: string;
    start: number;
    end: number;
}

/**
 * Receives every match of the call; `index` points at the one that fired.
 */
export type MatchCallback<D extends TokenSequence = TokenSequence> = (
    matcher: Matcher<D>,
    doc: D,
    index: number,
    matches: Match[]
) => void;

export interface RuleEntry<D extends TokenSequence = TokenSequence> {
    onMatch: MatchCallback<D> | null;
    patterns: PatternLiteral[];
}

export interface MatchOptions {
    allowMissing?: boolean;
}

interface Rule<D extends TokenSequence> {
    key: string;
    compiled: CompiledPattern[];
    patterns: PatternLiteral[];
    onMatch: MatchCallback<D> | null;
}

// ==================== MATCHER ====================

export class Matcher<D extends TokenSequence = TokenSequence> {
    readonly config: MatcherConfig;
    private rules: Map<string, Rule<D>> = new Map();
    private attributes: Set<AttributeKey> = new Set();

    constructor(config: Partial<MatcherConfig> = {}) {
        this.config = resolveMatcherConfig(config);
    }

    /**
     * Number of rules (keys), not of individual patterns
     */
    get size(): number {
        return this.rules.size;
    }

    has(key: string): boolean {
        return this.rules.has(key);
    }

    keys(): string[] {
        return Array.from(this.rules.keys());
    }

    get(key: string): RuleEntry<D> | undefined {
        const rule = this.rules.get(key);
        if (!rule) return undefined;
        return { onMatch: rule.onMatch, patterns: rule.patterns.map(p => structuredClone(p)) };
    }

    getOrThrow(key: string): RuleEntry<D> {
        const entry = this.get(key);
        if (!entry) {
            throw new UnknownKeyError(key);
        }
        return entry;
    }

    /**
     * Attributes referenced by any registered pattern
     */
    get seenAttributes(): AttributeKey[] {
        return Array.from(this.attributes);
    }

    /**
     * Add alternative patterns under a key.
     * Patterns accumulate across calls; the latest callback replaces the previous one.
     * Either every pattern compiles and is added, or nothing changes.
     */
    add(key: string, patterns: PatternLiteral[], onMatch: MatchCallback<D> | null = null): void {
        if (onMatch !== null && typeof onMatch !== 'function') {
            throw new CallbackTypeError(describe(onMatch));
        }
        if (!Array.isArray(patterns)) {
            throw new InvalidPatternError(`Patterns for "${key}" must be a list of patterns`, { key });
        }

        patterns.forEach((pattern: unknown, patternIndex) => {
            if (!Array.isArray(pattern)) {
                throw new InvalidPatternError(
                    `Pattern ${patternIndex} of "${key}" is not a list of token specs; pass a list of patterns, not a single pattern`,
                    { key, patternIndex }
                );
            }
        });

        if (this.config.validate) {
            const errors: Record<number, string[]> = {};
            patterns.forEach((pattern, patternIndex) => {
                const issues = validatePatternLiteral(pattern);
                if (issues.length > 0) errors[patternIndex] = issues;
            });
            if (Object.keys(errors).length > 0) {
                const summary = Object.entries(errors)
                    .map(([index, issues]) => `pattern ${index}: ${issues.join('; ')}`)
                    .join('\n');
                throw new InvalidPatternError(`Invalid patterns for "${key}":\n${summary}`, { key, errors });
            }
        }

        const compiled = patterns.map((pattern, patternIndex) => {
            try {
                return compilePattern(pattern);
            } catch (error) {
                if (error instanceof InvalidPatternError) {
                    throw new InvalidPatternError(
                        `Pattern ${patternIndex} of "${key}": ${error.message}`,
                        { ...error.context, key, patternIndex }
                    );
                }
                throw error;
            }
        });

        const rule: Rule<D> = this.rules.get(key) ?? { key, compiled: [], patterns: [], onMatch: null };
        rule.compiled.push(...compiled);
        rule.patterns.push(...patterns.map(p => structuredClone(p)));
        rule.onMatch = onMatch;
        this.rules.set(key, rule);

        for (const pattern of compiled) {
            for (const attribute of pattern.attributes) this.attributes.add(attribute);
        }

        if (this.config.debug) {
            console.debug(`[Matcher] Added ${compiled.length} pattern(s) to "${key}"`, compiled.map(c => c.attributes));
        }
    }

    remove(key: string): void {
        if (!this.rules.delete(key)) {
            throw new UnknownKeyError(key);
        }
        this.attributes = new Set(
            Array.from(this.rules.values()).flatMap(rule => rule.compiled.flatMap(c => c.attributes))
        );
    }

    /**
     * Find all matches, then run callbacks in match order.
     * A throwing callback aborts the remaining dispatch.
     */
    match(doc: D, options: MatchOptions = {}): Match[] {
        const allowMissing = options.allowMissing ?? this.config.allowMissing;
        if (!allowMissing) {
            this.checkAnnotations(doc);
        }

        const projections = new ProjectionCache(doc);
        const matches: Match[] = [];
        const seen = new Set<string>();

        for (const rule of this.rules.values()) {
            for (const compiled of rule.compiled) {
                for (const [start, end] of findPatternMatches(projections, compiled, doc.length)) {
                    const id = `${rule.key}\u0000${start}\u0000${end}`;
                    if (seen.has(id)) continue;
                    seen.add(id);
                    matches.push({ key: rule.key, start, end });
                }
            }
        }

        if (this.config.debug) {
            console.debug(`[Matcher] ${matches.length} match(es) over ${doc.length} tokens, ${projections.size} projection(s)`);
        }

        for (let i = 0; i < matches.length; i++) {
            const onMatch = this.rules.get(matches[i].key)?.onMatch;
            if (onMatch) {
                onMatch(this, doc, i, matches);
            }
        }

        return matches;
    }

    private checkAnnotations(doc: D): void {
        for (const [attribute, component] of Object.entries(ANNOTATED_ATTRIBUTES)) {
            if (!component || !isTokenAttribute(attribute) || !this.attributes.has(attribute)) continue;
            if (!doc.hasAnnotation(attribute)) {
                throw new MissingAnnotationError(attribute, component);
            }
        }
    }
}

function describe(value: unknown): string {
    if (Array.isArray(value)) return 'array';
    if (value === null) return 'null';
    return typeof value;
}
