/**
 * Attribute keys used by compiled patterns.
 *
 * A key is a built-in token attribute, the `REGEX` pseudo-attribute (free-form
 * expression over the natural text), or `_.<name>` for an extension.
 */
import { isTokenAttribute, type TokenAttribute } from '@/lib/tokens';

export type ExtensionKey = `_.${string}`;

export type AttributeKey = TokenAttribute | 'REGEX' | ExtensionKey;

export const REGEX_ATTRIBUTE = 'REGEX';
export const EXTENSION_FIELD = '_';
export const OP_FIELD = 'OP';

const ALIASES: Readonly<Record<string, TokenAttribute>> = {
    ORTH: 'TEXT',
    SENT_START: 'IS_SENT_START',
};

// Cheap, high-selectivity attributes narrow candidates fastest
const FIRST_PASS: readonly AttributeKey[] = ['TEXT', 'LOWER', 'LEMMA'];

/**
 * Canonical form of a token-spec key, or null when the name is unknown.
 */
export function normalizeAttributeName(raw: string): TokenAttribute | null {
    const upper = raw.toUpperCase();
    const name = ALIASES[upper] ?? upper;
    return isTokenAttribute(name) ? name : null;
}

export function extensionKey(name: string): ExtensionKey {
    return `_.${name}`;
}

export function isExtensionKey(key: AttributeKey): key is ExtensionKey {
    return key.startsWith('_.');
}

export function extensionName(key: ExtensionKey): string {
    return key.slice(2);
}

/**
 * TEXT, LOWER and LEMMA first, REGEX last, others in first-seen order.
 */
export function orderAttributes(keys: Iterable<AttributeKey>): AttributeKey[] {
    const seen = Array.from(keys);
    const rank = (key: AttributeKey): number => {
        const first = FIRST_PASS.indexOf(key);
        if (first !== -1) return first;
        return key === REGEX_ATTRIBUTE ? 2 * FIRST_PASS.length : FIRST_PASS.length;
    };
    return seen
        .map((key, order) => ({ key, order }))
        .sort((a, b) => rank(a.key) - rank(b.key) || a.order - b.order)
        .map(entry => entry.key);
}
