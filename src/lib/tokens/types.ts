/**
 * Token contract shared by document producers and the matcher.
 *
 * The matcher never reads concrete token fields: every value goes through
 * `getAttribute` (closed set of built-ins) or `getExtension` (open namespace).
 */

export const TOKEN_ATTRIBUTES = [
    'TEXT',
    'LOWER',
    'NORM',
    'LEMMA',
    'POS',
    'TAG',
    'DEP',
    'SHAPE',
    'PREFIX',
    'SUFFIX',
    'LENGTH',
    'ENT_TYPE',
    'LANG',
    'MORPH',
    'IS_ALPHA',
    'IS_ASCII',
    'IS_DIGIT',
    'IS_LOWER',
    'IS_UPPER',
    'IS_TITLE',
    'IS_PUNCT',
    'IS_SPACE',
    'IS_BRACKET',
    'IS_QUOTE',
    'IS_LEFT_PUNCT',
    'IS_RIGHT_PUNCT',
    'IS_CURRENCY',
    'IS_STOP',
    'IS_SENT_START',
    'LIKE_NUM',
    'LIKE_URL',
    'LIKE_EMAIL',
] as const;

export type TokenAttribute = typeof TOKEN_ATTRIBUTES[number];

/**
 * Attributes an upstream pipeline has to compute before matching.
 * Values name the component usually responsible for them.
 */
export const ANNOTATED_ATTRIBUTES: Readonly<Partial<Record<TokenAttribute, string>>> = {
    POS: 'tagger',
    TAG: 'tagger',
    LEMMA: 'lemmatizer',
    DEP: 'parser',
    MORPH: 'morphologizer',
};

export type AttributeValue = string | number | boolean | null | undefined;

export interface Token {
    readonly index: number;
    readonly text: string;
    /** Whitespace following the token in the original text */
    readonly whitespace: string;
    getAttribute(attr: TokenAttribute): AttributeValue;
    getExtension(name: string): AttributeValue;
}

export interface TokenSequence {
    readonly length: number;
    token(index: number): Token;
    hasAnnotation(attr: TokenAttribute): boolean;
}

export function isTokenAttribute(name: string): name is TokenAttribute {
    return (TOKEN_ATTRIBUTES as readonly string[]).includes(name);
}
