/**
 * Attribute Projector
 *
 * Turns one attribute of every token into a single string so that a compiled
 * pattern can be run as an ordinary regular expression, and keeps the maps
 * needed to translate character offsets back to token indices.
 */
import type { AttributeValue, Token, TokenSequence } from '@/lib/tokens';
import { extensionName, isExtensionKey, REGEX_ATTRIBUTE, type AttributeKey } from './attributes';

/** Follows every token value in non-REGEX projections */
export const TOKEN_SEPARATOR = '\u001e';

export interface AttributeProjection {
    text: string;
    /** Token index -> offset of the token's start; one extra sentinel at `text.length` */
    indexToOffset: number[];
    offsetToIndex: Map<number, number>;
}

export function stringifyValue(value: AttributeValue): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    return String(value);
}

export function readAttribute(token: Token, key: AttributeKey): AttributeValue {
    if (isExtensionKey(key)) {
        return token.getExtension(extensionName(key));
    }
    switch (key) {
        case REGEX_ATTRIBUTE:
            return token.getAttribute('TEXT');
        case 'LEMMA':
            return stringifyValue(token.getAttribute('LEMMA')).toLowerCase();
        // Compared by character count, so the text itself is projected
        case 'LENGTH':
            return token.getAttribute('LOWER');
        default:
            return token.getAttribute(key);
    }
}

export function projectAttribute(doc: TokenSequence, key: AttributeKey): AttributeProjection {
    const natural = key === REGEX_ATTRIBUTE;
    const indexToOffset: number[] = [];
    const offsetToIndex = new Map<number, number>();
    const parts: string[] = [];
    let offset = 0;

    for (let i = 0; i < doc.length; i++) {
        const token = doc.token(i);
        indexToOffset.push(offset);
        offsetToIndex.set(offset, i);

        const value = stringifyValue(readAttribute(token, key));
        const part = natural
            ? value + token.whitespace
            : value.split(TOKEN_SEPARATOR).join(' ') + TOKEN_SEPARATOR;
        parts.push(part);
        offset += part.length;
    }

    indexToOffset.push(offset);
    offsetToIndex.set(offset, doc.length);

    return { text: parts.join(''), indexToOffset, offsetToIndex };
}

/**
 * Token span covering the character span [startOffset, endOffset).
 * Offsets inside a token resolve to the token containing the start and the
 * boundary at or after the end.
 */
export function toTokenSpan(
    projection: AttributeProjection,
    startOffset: number,
    endOffset: number
): [number, number] {
    return [floorIndex(projection, startOffset), ceilIndex(projection, endOffset)];
}

function floorIndex(projection: AttributeProjection, offset: number): number {
    const exact = projection.offsetToIndex.get(offset);
    if (exact !== undefined) return exact;
    const offsets = projection.indexToOffset;
    let lo = 0;
    let hi = offsets.length - 1;
    while (lo < hi) {
        const mid = (lo + hi + 1) >> 1;
        if (offsets[mid] <= offset) lo = mid;
        else hi = mid - 1;
    }
    return lo;
}

function ceilIndex(projection: AttributeProjection, offset: number): number {
    const exact = projection.offsetToIndex.get(offset);
    if (exact !== undefined) return exact;
    const offsets = projection.indexToOffset;
    let lo = 0;
    let hi = offsets.length - 1;
    while (lo < hi) {
        const mid = (lo + hi) >> 1;
        if (offsets[mid] >= offset) hi = mid;
        else lo = mid + 1;
    }
    return lo;
}

/**
 * Projections for one matching call, built on first use.
 */
export class ProjectionCache {
    private projections: Map<AttributeKey, AttributeProjection> = new Map();

    constructor(private doc: TokenSequence) { }

    get(key: AttributeKey): AttributeProjection {
        let projection = this.projections.get(key);
        if (!projection) {
            projection = projectAttribute(this.doc, key);
            this.projections.set(key, projection);
        }
        return projection;
    }

    get size(): number {
        return this.projections.size;
    }
}
