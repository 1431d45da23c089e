/**
 * Doc - In-memory token sequence implementing the matcher's token contract
 *
 * Lexical attributes are derived from token text on demand. Pipeline
 * attributes (POS, TAG, LEMMA, DEP, ENT_TYPE, MORPH) come from supplied
 * annotations; supplying one marks the document as annotated for it.
 */

import type { AttributeValue, Token, TokenAttribute, TokenSequence } from './types';
import { isTokenAttribute } from './types';
import {
    isAlpha,
    isAscii,
    isBracket,
    isCurrency,
    isDigit,
    isLeftPunct,
    isLower,
    isPunct,
    isQuote,
    isRightPunct,
    isSpace,
    isStop,
    isTitle,
    isUpper,
    likeEmail,
    likeNum,
    likeUrl,
    prefixOf,
    suffixOf,
    wordShape,
} from './lexical';

// ==================== TYPE DEFINITIONS ====================

export type SuppliedAttribute =
    | 'POS' | 'TAG' | 'LEMMA' | 'DEP' | 'ENT_TYPE' | 'MORPH' | 'NORM' | 'LANG' | 'IS_STOP' | 'IS_SENT_START';

export type DocAnnotations = Partial<Record<SuppliedAttribute, readonly AttributeValue[]>>;

export type ExtensionDefinition =
    | { getter: (token: Token) => AttributeValue }
    | { default: AttributeValue };

export interface DocOptions {
    /** Whether each word is followed by a space (defaults to true except the last) */
    spaces?: readonly boolean[];
    annotations?: DocAnnotations;
}

export interface DocSpan {
    start: number;
    end: number;
    text: string;
    tokens: DocToken[];
}

export interface TokenData {
    text: string;
    whitespace: string;
    attrs: Map<TokenAttribute, AttributeValue>;
    extensions: Map<string, AttributeValue>;
}

const SUPPLIED_ATTRIBUTES: readonly SuppliedAttribute[] = [
    'POS', 'TAG', 'LEMMA', 'DEP', 'ENT_TYPE', 'MORPH', 'NORM', 'LANG', 'IS_STOP', 'IS_SENT_START',
];

// Only these mark the document as annotated
const PIPELINE_ATTRIBUTES: ReadonlySet<TokenAttribute> = new Set(['POS', 'TAG', 'LEMMA', 'DEP', 'ENT_TYPE', 'MORPH']);

// ==================== DOC ====================

export class Doc implements TokenSequence {
    private data: TokenData[];
    private annotated: Set<TokenAttribute> = new Set();
    private extensionDefs: Map<string, ExtensionDefinition> = new Map();

    constructor(words: readonly string[], options: DocOptions = {}) {
        const { spaces, annotations = {} } = options;
        if (spaces && spaces.length !== words.length) {
            throw new Error(`[Doc] Expected ${words.length} space flags, got ${spaces.length}`);
        }

        this.data = words.map((text, i) => ({
            text,
            whitespace: (spaces ? spaces[i] : i < words.length - 1) ? ' ' : '',
            attrs: new Map(),
            extensions: new Map(),
        }));

        for (const attr of SUPPLIED_ATTRIBUTES) {
            const values = annotations[attr];
            if (!values) continue;
            if (values.length !== words.length) {
                throw new Error(`[Doc] Annotation ${attr} has ${values.length} values for ${words.length} tokens`);
            }
            values.forEach((value, i) => this.data[i].attrs.set(attr, value));
            if (PIPELINE_ATTRIBUTES.has(attr)) {
                this.annotated.add(attr);
            }
        }
    }

    static fromWords(words: readonly string[], options: DocOptions = {}): Doc {
        return new Doc(words, options);
    }

    /**
     * Whitespace tokenization. A run of whitespace becomes a single space.
     */
    static fromText(text: string, annotations?: DocAnnotations): Doc {
        const words: string[] = [];
        const spaces: boolean[] = [];
        const re = /(\S+)(\s*)/g;
        let match: RegExpExecArray | null;
        while ((match = re.exec(text)) !== null) {
            words.push(match[1]);
            spaces.push(match[2].length > 0);
        }
        return new Doc(words, { spaces, annotations });
    }

    get length(): number {
        return this.data.length;
    }

    get text(): string {
        return this.data.map(t => t.text + t.whitespace).join('');
    }

    token(index: number): DocToken {
        if (index < 0 || index >= this.data.length) {
            throw new RangeError(`[Doc] Token index ${index} out of range (0-${this.data.length - 1})`);
        }
        return new DocToken(this, index);
    }

    tokens(): DocToken[] {
        return this.data.map((_, i) => new DocToken(this, i));
    }

    hasAnnotation(attr: TokenAttribute): boolean {
        return this.annotated.has(attr);
    }

    setExtension(name: string, definition: ExtensionDefinition): void {
        this.extensionDefs.set(name, definition);
    }

    hasExtension(name: string): boolean {
        return this.extensionDefs.has(name);
    }

    span(start: number, end: number): DocSpan {
        if (start < 0 || end > this.data.length || start >= end) {
            throw new RangeError(`[Doc] Invalid span [${start}, ${end})`);
        }
        const tokens = this.tokens().slice(start, end);
        const text = this.data
            .slice(start, end)
            .map((t, i, all) => (i < all.length - 1 ? t.text + t.whitespace : t.text))
            .join('');
        return { start, end, text, tokens };
    }

    /**
     * Collapse tokens [start, end) into a single token.
     * The merged token keeps the first token's annotations, overridden by `attrs`.
     */
    merge(start: number, end: number, attrs: Partial<Record<TokenAttribute, AttributeValue>> = {}): DocToken {
        const { text } = this.span(start, end);
        const first = this.data[start];
        const merged: TokenData = {
            text,
            whitespace: this.data[end - 1].whitespace,
            attrs: new Map(first.attrs),
            extensions: new Map(first.extensions),
        };
        for (const [attr, value] of Object.entries(attrs)) {
            if (isTokenAttribute(attr)) merged.attrs.set(attr, value);
        }
        this.data.splice(start, end - start, merged);
        return new DocToken(this, start);
    }

    /** @internal */
    readData(index: number): TokenData {
        return this.data[index];
    }

    /** @internal */
    readExtension(name: string): ExtensionDefinition | undefined {
        return this.extensionDefs.get(name);
    }
}

// ==================== TOKEN VIEW ====================

export class DocToken implements Token {
    constructor(private doc: Doc, readonly index: number) { }

    private get data(): TokenData {
        return this.doc.readData(this.index);
    }

    get text(): string {
        return this.data.text;
    }

    get whitespace(): string {
        return this.data.whitespace;
    }

    getAttribute(attr: TokenAttribute): AttributeValue {
        const data = this.data;
        if (data.attrs.has(attr)) {
            return data.attrs.get(attr);
        }
        const text = data.text;
        switch (attr) {
            case 'TEXT': return text;
            case 'LOWER': return text.toLowerCase();
            case 'NORM': return text.toLowerCase();
            case 'SHAPE': return wordShape(text);
            case 'PREFIX': return prefixOf(text);
            case 'SUFFIX': return suffixOf(text);
            case 'LENGTH': return Array.from(text).length;
            case 'IS_ALPHA': return isAlpha(text);
            case 'IS_ASCII': return isAscii(text);
            case 'IS_DIGIT': return isDigit(text);
            case 'IS_LOWER': return isLower(text);
            case 'IS_UPPER': return isUpper(text);
            case 'IS_TITLE': return isTitle(text);
            case 'IS_PUNCT': return isPunct(text);
            case 'IS_SPACE': return isSpace(text);
            case 'IS_BRACKET': return isBracket(text);
            case 'IS_QUOTE': return isQuote(text);
            case 'IS_LEFT_PUNCT': return isLeftPunct(text);
            case 'IS_RIGHT_PUNCT': return isRightPunct(text);
            case 'IS_CURRENCY': return isCurrency(text);
            case 'IS_STOP': return isStop(text);
            case 'IS_SENT_START': return this.index === 0;
            case 'LIKE_NUM': return likeNum(text);
            case 'LIKE_URL': return likeUrl(text);
            case 'LIKE_EMAIL': return likeEmail(text);
            default: return '';
        }
    }

    getExtension(name: string): AttributeValue {
        const data = this.data;
        if (data.extensions.has(name)) {
            return data.extensions.get(name);
        }
        const definition = this.doc.readExtension(name);
        if (!definition) return undefined;
        return 'getter' in definition ? definition.getter(this) : definition.default;
    }

    setExtension(name: string, value: AttributeValue): void {
        if (!this.doc.hasExtension(name)) {
            throw new Error(`[Doc] Unknown extension "${name}"`);
        }
        this.data.extensions.set(name, value);
    }
}
