/**
 * Pattern literal shape - JSON-serializable token patterns, with a zod
 * schema used when the matcher runs with `validate: true`.
 */

import { z } from 'zod';

// =============================================================================
// LITERAL TYPES
// =============================================================================

export const QUANTIFIERS = ['1', '+', '!', '?', '*'] as const;

export type Quantifier = typeof QUANTIFIERS[number];

export const COMPARISON_OPERATORS = ['==', '!=', '>=', '<=', '>', '<'] as const;

export type ComparisonOperator = typeof COMPARISON_OPERATORS[number];

export type LiteralValue = string | number | boolean;

export type PredicateObject = { [operator: string]: LiteralValue | LiteralValue[] };

export type TokenSpecValue = LiteralValue | PredicateObject;

/**
 * `{ LOWER: 'hello', OP: '?' }`, `{ LENGTH: { '>=': 3 } }`, `{ _: { is_fruit: true } }`.
 * `{}` matches any single token.
 */
export type TokenSpecLiteral = { [attribute: string]: TokenSpecValue | { [extension: string]: TokenSpecValue } };

export type PatternLiteral = TokenSpecLiteral[];

export function isQuantifier(value: unknown): value is Quantifier {
    return typeof value === 'string' && (QUANTIFIERS as readonly string[]).includes(value);
}

export function isComparisonOperator(value: string): value is ComparisonOperator {
    return (COMPARISON_OPERATORS as readonly string[]).includes(value);
}

// =============================================================================
// SCHEMA
// =============================================================================

const literalSchema = z.union([z.string(), z.boolean(), z.number().int()]);

const predicateSchema = z
    .object({
        IN: z.array(literalSchema),
        NOT_IN: z.array(literalSchema),
        REGEX: z.string(),
        '==': z.number().int().nonnegative(),
        '!=': z.number().int().nonnegative(),
        '>=': z.number().int().nonnegative(),
        '<=': z.number().int().nonnegative(),
        '>': z.number().int().nonnegative(),
        '<': z.number().int().nonnegative(),
    })
    .partial()
    .strict()
    .refine(obj => Object.keys(obj).length > 0, { message: 'Predicate object must not be empty' });

const valueSchema = z.union([literalSchema, predicateSchema]);

/**
 * Keys are validated against canonical upper-case names; callers normalize
 * lower-case keys before parsing.
 */
export const tokenSpecSchema = z
    .object({
        OP: z.enum(QUANTIFIERS).optional(),
        REGEX: z.string().optional(),
        _: z.record(z.string(), valueSchema).optional(),
    })
    .catchall(valueSchema);

export const patternSchema = z.array(tokenSpecSchema).min(1, 'Pattern must contain at least one token spec');

export type ValidatedPattern = z.infer<typeof patternSchema>;

/**
 * Schema issues as `path: message` strings (empty when valid).
 */
export function validatePatternLiteral(pattern: unknown): string[] {
    const result = patternSchema.safeParse(normalizeKeys(pattern));
    if (result.success) return [];
    return result.error.issues.map(issue => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

function normalizeKeys(pattern: unknown): unknown {
    if (!Array.isArray(pattern)) return pattern;
    return pattern.map((spec: unknown) => {
        if (typeof spec !== 'object' || spec === null || Array.isArray(spec)) return spec;
        return Object.fromEntries(
            Object.entries(spec).map(([key, value]) =>
                key === '_' ? [key, value] : [key.toUpperCase(), normalizePredicateKeys(value)]
            )
        );
    });
}

function normalizePredicateKeys(value: unknown): unknown {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key.toUpperCase(), inner]));
}
