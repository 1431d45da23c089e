/**
 * Lexical attributes derived from token text alone.
 * These never need an upstream annotator.
 */
import stopWords from './stop-words.json';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWords);

const BRACKETS = new Set(['(', ')', '[', ']', '{', '}', '<', '>']);

const QUOTES = new Set([
    '"', "'", '`', '«', '»', '‘', '’', '‚', '‛', '“', '”', '„', '‟', '‹', '›', '❮', '❯', "''", '``',
]);

const LEFT_PUNCT = new Set([
    '(', '[', '{', '<', '"', "'", '«', '‘', '‚', '‛', '“', '„', '‟', '‹', '❮', '``',
]);

const RIGHT_PUNCT = new Set([
    ')', ']', '}', '>', '"', "'", '»', '’', '”', '›', '❯', "''",
]);

const NUMBER_WORDS = new Set([
    'zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten',
    'eleven', 'twelve', 'thirteen', 'fourteen', 'fifteen', 'sixteen', 'seventeen', 'eighteen',
    'nineteen', 'twenty', 'thirty', 'forty', 'fifty', 'sixty', 'seventy', 'eighty', 'ninety',
    'hundred', 'thousand', 'million', 'billion', 'trillion',
]);

const UPPER = /[\p{Lu}\p{Lt}]/u;
const LOWER = /\p{Ll}/u;

export function isAlpha(text: string): boolean {
    return /^\p{L}+$/u.test(text);
}

export function isAscii(text: string): boolean {
    return /^[\x00-\x7f]*$/.test(text);
}

export function isDigit(text: string): boolean {
    return /^\p{Nd}+$/u.test(text);
}

export function isLower(text: string): boolean {
    return LOWER.test(text) && !UPPER.test(text);
}

export function isUpper(text: string): boolean {
    return UPPER.test(text) && !LOWER.test(text);
}

/**
 * Every cased run starts with one upper-case letter followed by lower-case ones.
 */
export function isTitle(text: string): boolean {
    let sawCased = false;
    let previousCased = false;
    for (const ch of text) {
        if (UPPER.test(ch)) {
            if (previousCased) return false;
            previousCased = true;
            sawCased = true;
        } else if (LOWER.test(ch)) {
            if (!previousCased) return false;
            previousCased = true;
            sawCased = true;
        } else {
            previousCased = false;
        }
    }
    return sawCased;
}

export function isPunct(text: string): boolean {
    return /^\p{P}+$/u.test(text) || QUOTES.has(text);
}

export function isSpace(text: string): boolean {
    return /^\s+$/.test(text);
}

export function isBracket(text: string): boolean {
    return BRACKETS.has(text);
}

export function isQuote(text: string): boolean {
    return QUOTES.has(text);
}

export function isLeftPunct(text: string): boolean {
    return LEFT_PUNCT.has(text);
}

export function isRightPunct(text: string): boolean {
    return RIGHT_PUNCT.has(text);
}

export function isCurrency(text: string): boolean {
    return /^\p{Sc}+$/u.test(text);
}

export function isStop(text: string): boolean {
    return STOP_WORDS.has(text.toLowerCase());
}

export function likeNum(text: string): boolean {
    const stripped = text.replace(/^[+\-±~]/, '');
    const compact = stripped.replace(/[,.]/g, '');
    if (compact.length > 0 && /^\d+$/.test(compact)) return true;
    if (/^\d+\/\d+$/.test(stripped)) return true;
    return NUMBER_WORDS.has(stripped.toLowerCase());
}

export function likeUrl(text: string): boolean {
    if (/^(?:https?|ftp):\/\/\S+$/i.test(text)) return true;
    if (/^www\.\S+$/i.test(text)) return true;
    return /^[\w-]+(?:\.[\w-]+)*\.[a-z]{2,}(?:\/\S*)?$/i.test(text) && !text.includes('@');
}

export function likeEmail(text: string): boolean {
    return /^[\w.+-]+@[\w-]+(?:\.[\w-]+)+$/.test(text);
}

/**
 * Orthographic shape: `Xxxx`, `dd`, `xxxx.xx`. Runs longer than four of the
 * same class are truncated.
 */
export function wordShape(text: string): string {
    if (text.length >= 100) return 'LONG';
    let shape = '';
    let last = '';
    let run = 0;
    for (const ch of text) {
        let cls: string;
        if (/\p{L}/u.test(ch)) {
            cls = UPPER.test(ch) ? 'X' : 'x';
        } else if (/\p{Nd}/u.test(ch)) {
            cls = 'd';
        } else {
            cls = ch;
        }
        run = cls === last ? run + 1 : 0;
        if (run < 4) shape += cls;
        last = cls;
    }
    return shape;
}

export function prefixOf(text: string): string {
    return Array.from(text).slice(0, 1).join('');
}

export function suffixOf(text: string): string {
    return Array.from(text).slice(-3).join('');
}
