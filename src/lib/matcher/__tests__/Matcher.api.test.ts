/**
 * Matcher API Tests
 *
 * Rule registration, lookup and the shape of match results.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Doc } from '@/lib/tokens';
import { Matcher, type Match } from '../Matcher';
import {
    CallbackTypeError,
    InvalidPatternError,
    MatcherError,
    MissingAnnotationError,
    UnknownKeyError,
} from '../errors';

describe('Matcher API', () => {
    let matcher: Matcher<Doc>;

    beforeEach(() => {
        matcher = new Matcher<Doc>();
        matcher.add('JS', [[{ ORTH: 'JavaScript' }]]);
        matcher.add('GoogleNow', [[{ ORTH: 'Google' }, { ORTH: 'Now' }]]);
        matcher.add('Java', [[{ LOWER: 'java' }]]);
    });

    describe('registry', () => {
        it('should add, look up and remove rules', () => {
            const fresh = new Matcher();
            expect(fresh.size).toBe(0);

            fresh.add('Rule', [[{ ORTH: 'test' }]]);
            expect(fresh.size).toBe(1);

            fresh.remove('Rule');
            expect(fresh.has('Rule')).toBe(false);

            fresh.add('Rule', [[{ ORTH: 'test' }]]);
            expect(fresh.has('Rule')).toBe(true);
            expect(fresh.get('Rule')).toEqual({ onMatch: null, patterns: [[{ ORTH: 'test' }]] });
        });

        it('should report size and membership by key', () => {
            expect(matcher.size).toBe(3);
            matcher.add('TEST', [[{ ORTH: 'test' }]]);

            expect(matcher.has('TEST')).toBe(true);
            expect(matcher.has('TEST2')).toBe(false);
            expect(matcher.keys()).toEqual(['JS', 'GoogleNow', 'Java', 'TEST']);
        });

        it('should accumulate patterns and keep the latest callback', () => {
            const first = vi.fn();
            const second = vi.fn();
            matcher.add('Java', [[{ ORTH: 'JVM' }]], first);
            matcher.add('Java', [[{ ORTH: 'JDK' }]], second);

            const entry = matcher.getOrThrow('Java');
            expect(entry.patterns).toHaveLength(3);
            expect(entry.onMatch).toBe(second);
        });

        it('should return copies of stored patterns', () => {
            const entry = matcher.getOrThrow('JS');
            entry.patterns[0][0].ORTH = 'TypeScript';

            expect(matcher.match(Doc.fromWords(['JavaScript']))).toEqual([{ key: 'JS', start: 0, end: 1 }]);
        });

        it('should return undefined for unknown keys from get', () => {
            expect(matcher.get('Nope')).toBeUndefined();
            expect(() => matcher.getOrThrow('Nope')).toThrow(UnknownKeyError);
        });

        it('should fail to remove an absent key', () => {
            matcher.remove('JS');
            expect(() => matcher.remove('JS')).toThrow('No rule registered for key "JS"');
        });

        it('should track attributes referenced by rules', () => {
            matcher.add('Noun', [[{ POS: 'NOUN' }]]);
            expect(matcher.seenAttributes).toEqual(['TEXT', 'LOWER', 'POS']);

            matcher.remove('Noun');
            expect(matcher.seenAttributes).toEqual(['TEXT', 'LOWER']);
        });
    });

    describe('matching', () => {
        it('should return nothing when no rule matches', () => {
            expect(matcher.match(Doc.fromWords(['I', 'like', 'cheese', '.']))).toEqual([]);
        });

        it('should match at the start, middle and end', () => {
            expect(matcher.match(Doc.fromWords(['JavaScript', 'is', 'good']))).toEqual([{ key: 'JS', start: 0, end: 1 }]);
            expect(matcher.match(Doc.fromWords(['I', 'like', 'java']))).toEqual([{ key: 'Java', start: 2, end: 3 }]);
            expect(matcher.match(Doc.fromWords(['I', 'like', 'Google', 'Now', 'best'])))
                .toEqual([{ key: 'GoogleNow', start: 2, end: 4 }]);
        });

        it('should list matches of several rules in rule order', () => {
            const doc = Doc.fromWords(['I', 'like', 'Google', 'Now', 'and', 'java', 'best']);

            expect(matcher.match(doc)).toEqual([
                { key: 'GoogleNow', start: 2, end: 4 },
                { key: 'Java', start: 5, end: 6 },
            ]);
        });

        it('should deduplicate identical matches from alternative patterns', () => {
            const fresh = new Matcher();
            fresh.add('A', [[{ ORTH: 'a' }], [{ LOWER: 'a' }]]);

            expect(fresh.match(Doc.fromWords(['a']))).toEqual([{ key: 'A', start: 0, end: 1 }]);
        });

        it('should be deterministic across calls', () => {
            const doc = Doc.fromWords(['java', 'JavaScript', 'java']);
            expect(matcher.match(doc)).toEqual(matcher.match(doc));
        });

        it('should treat empty specs as any token', () => {
            const doc = Doc.fromWords(['a', 'b', 'c']);
            const fresh = new Matcher();
            fresh.add('A.C', [[{ ORTH: 'a' }, {}, { ORTH: 'c' }]]);
            expect(fresh.match(doc)).toEqual([{ key: 'A.C', start: 0, end: 3 }]);

            const other = new Matcher();
            other.add('A.', [[{ ORTH: 'a' }, {}]]);
            expect(other.match(doc)[0]).toEqual({ key: 'A.', start: 0, end: 2 });
        });

        it('should not let other attributes shadow an operator', () => {
            const fresh = new Matcher();
            fresh.add('A.C', [[{ ORTH: 'a' }, { IS_ALPHA: true, OP: '+' }, { ORTH: 'c' }]]);

            expect(fresh.match(Doc.fromWords(['a', 'b', 'c']))).toEqual([{ key: 'A.C', start: 0, end: 3 }]);
        });

        it('should handle negated positions', () => {
            const doc1 = Doc.fromWords('He said , " some words " ...'.split(' '));
            const doc2 = Doc.fromWords('He said , " some three words " ...'.split(' '));
            matcher.add('Quote', [[
                { ORTH: '"' },
                { OP: '!', IS_PUNCT: true },
                { OP: '!', IS_PUNCT: true },
                { ORTH: '"' },
            ]]);

            expect(matcher.match(doc1)).toHaveLength(1);
            expect(matcher.match(doc2)).toHaveLength(0);

            matcher.add('Quote', [[
                { ORTH: '"' },
                { IS_PUNCT: true },
                { IS_PUNCT: true },
                { IS_PUNCT: true },
                { ORTH: '"' },
            ]]);
            expect(matcher.match(doc2)).toHaveLength(0);
        });

        it('should match a zero-or-more position between anchors', () => {
            const fresh = new Matcher();
            fresh.add('Quote', [[{ ORTH: '"' }, { OP: '*', IS_PUNCT: false }, { ORTH: '"' }]]);

            const doc = Doc.fromWords('He said , " some words " ...'.split(' '));
            expect(fresh.match(doc)).toEqual([{ key: 'Quote', start: 3, end: 7 }]);
        });

        it('should collapse one-or-more repetitions to the longest match', () => {
            const doc = Doc.fromWords(['Philippe', 'Philippe']);
            const control = new Matcher();
            control.add('BasicPhilippe', [[{ ORTH: 'Philippe' }]]);
            expect(control.match(doc)).toHaveLength(2);

            matcher.add('KleenePhilippe', [[{ ORTH: 'Philippe', OP: '1' }, { ORTH: 'Philippe', OP: '+' }]]);
            expect(matcher.match(doc)).toEqual([{ key: 'KleenePhilippe', start: 0, end: 2 }]);
        });

        it('should let an any-token operator extend to the end', () => {
            const fresh = new Matcher<Doc>();
            fresh.add('TEST', [[{ ORTH: 'test' }, { OP: '*' }]]);
            const doc = Doc.fromWords(['test', 'hello', 'world']);

            const texts = fresh.match(doc).map(m => doc.span(m.start, m.end).text);
            expect(texts).toEqual(['test hello world']);
        });
    });

    describe('attributes', () => {
        it('should match extension attributes', () => {
            const fresh = new Matcher();
            fresh.add('HAVING_FRUIT', [[{ ORTH: 'an' }, { _: { is_fruit: true } }]]);
            const withFruit = (words: string[]) => {
                const doc = Doc.fromWords(words);
                doc.setExtension('is_fruit', { getter: token => ['apple', 'banana'].includes(token.text) });
                return doc;
            };

            expect(fresh.match(withFruit(['an', 'apple']))).toHaveLength(1);
            expect(fresh.match(withFruit(['an', 'aardvark']))).toHaveLength(0);
        });

        it('should match set membership', () => {
            const fresh = new Matcher();
            fresh.add('A_OR_AN', [[{ ORTH: { IN: ['an', 'a'] } }]]);

            expect(fresh.match(Doc.fromWords(['an', 'a', 'apple']))).toHaveLength(2);
            expect(fresh.match(Doc.fromWords(['aardvark']))).toHaveLength(0);
        });

        it('should match optional set membership', () => {
            const fresh = new Matcher();
            fresh.add('DET_HOUSE', [[{ ORTH: { IN: ['a', 'the'] }, OP: '?' }, { ORTH: 'house' }]]);

            expect(fresh.match(Doc.fromWords(['In', 'a', 'house']))).toEqual([{ key: 'DET_HOUSE', start: 1, end: 3 }]);
            expect(fresh.match(Doc.fromWords(['my', 'house']))).toEqual([{ key: 'DET_HOUSE', start: 1, end: 2 }]);
        });

        it('should match free-text regular expressions', () => {
            const fresh = new Matcher();
            fresh.add('REGEX', [[{ REGEX: '\\bUS\\d+\\b' }]]);
            const doc = Doc.fromWords('This is a test for a regex, US12345.'.split(' '));

            expect(fresh.match(doc)).toEqual([{ key: 'REGEX', start: 7, end: 8 }]);
        });

        it('should match attribute regular expressions', () => {
            const fresh = new Matcher();
            fresh.add('A_OR_AN', [[{ ORTH: { REGEX: '(?:a|an)' } }]]);

            expect(fresh.match(Doc.fromWords(['an', 'a', 'hi']))).toHaveLength(2);
            expect(fresh.match(Doc.fromWords(['bye']))).toHaveLength(0);
        });

        it.each([
            ['baking with ingredients', 1],
            ['ingredients for baking', 1],
            ['eating after baking', 2],
            ['my baking hobby', 1],
            ['ingredients not backed', 0],
        ])('should match partial-token regex in "%s"', (text, count) => {
            const fresh = new Matcher();
            fresh.add('ING_FORM', [[{ LOWER: { REGEX: 'ing\\b' } }]]);

            expect(fresh.match(Doc.fromText(text))).toHaveLength(count);
        });

        it('should match regular expressions over shapes', () => {
            const fresh = new Matcher();
            fresh.add('NON_ALPHA', [[{ SHAPE: { REGEX: '^[^x]+$' } }]]);

            expect(fresh.match(Doc.fromWords(['99', 'problems', '!']))).toHaveLength(2);
            expect(fresh.match(Doc.fromWords(['bye']))).toHaveLength(0);
        });

        it('should keep a class of non-space characters inside one token', () => {
            const fresh = new Matcher();
            fresh.add('A_WORD', [[{ TEXT: { REGEX: '^a[\\S]+$' } }]]);

            expect(fresh.match(Doc.fromWords(['ab', 'cd']))).toEqual([{ key: 'A_WORD', start: 0, end: 1 }]);
            expect(fresh.match(Doc.fromWords(['a', 'b']))).toEqual([]);
        });

        it.each([
            ['==', ['a', 'aaa']],
            ['!=', ['aa']],
            ['>=', ['a']],
            ['<=', ['aaa']],
            ['>', ['a', 'aa']],
            ['<', ['aa', 'aaa']],
        ])('should compare lengths with %s', (cmp, bad) => {
            const fresh = new Matcher();
            fresh.add('LENGTH_COMPARE', [[{ LENGTH: { [cmp]: 2 } }]]);

            expect(fresh.match(Doc.fromWords(['a', 'aa', 'aaa']))).toHaveLength(3 - bad.length);
            expect(fresh.match(Doc.fromWords(bad))).toHaveLength(0);
        });

        it('should match extension set membership', () => {
            const fresh = new Matcher();
            fresh.add('REVERSED', [[{ _: { reversed: { IN: ['eyb', 'ih'] } } }]]);
            const reversedDoc = (words: string[]) => {
                const doc = Doc.fromWords(words);
                doc.setExtension('reversed', { getter: token => Array.from(token.text).reverse().join('') });
                return doc;
            };

            expect(fresh.match(reversedDoc(['hi', 'bye', 'hello']))).toHaveLength(2);
            expect(fresh.match(reversedDoc(['aardvark']))).toHaveLength(0);
        });

        it.each([
            ['IS_ALPHA', 'a'],
            ['IS_ASCII', 'a'],
            ['IS_DIGIT', '1'],
            ['IS_LOWER', 'a'],
            ['IS_UPPER', 'A'],
            ['IS_TITLE', 'Aaaa'],
            ['IS_PUNCT', '.'],
            ['IS_SPACE', '\n'],
            ['IS_BRACKET', '['],
            ['IS_QUOTE', '"'],
            ['IS_LEFT_PUNCT', '``'],
            ['IS_RIGHT_PUNCT', "''"],
            ['IS_STOP', 'the'],
            ['LIKE_NUM', '1'],
            ['LIKE_URL', 'http://example.com'],
            ['LIKE_EMAIL', 'mail@example.com'],
        ])('should match the %s flag', (attribute, text) => {
            const fresh = new Matcher();
            fresh.add('Rule', [[{ [attribute]: true }]]);

            expect(fresh.size).toBe(1);
            expect(fresh.match(Doc.fromWords([text]))).toHaveLength(1);
        });
    });

    describe('errors', () => {
        it('should reject a single pattern passed as the pattern list', () => {
            const fresh = new Matcher();
            const patterns = JSON.parse('[{"TEXT": "hello"}, {"TEXT": "world"}]');

            expect(() => fresh.add('TEST', patterns)).toThrow(InvalidPatternError);
        });

        it('should leave the rule untouched when any pattern is invalid', () => {
            expect(() => matcher.add('Java', [[{ LOWER: 'jvm' }], [{ FOO: 'x' }]]))
                .toThrow('Pattern 1 of "Java": Unknown attribute "FOO" at position 0');
            expect(matcher.getOrThrow('Java').patterns).toEqual([[{ LOWER: 'java' }]]);
        });

        it('should only accept a function or null as callback', () => {
            const fresh = new Matcher();
            const notCallable = JSON.parse('[]');

            expect(() => fresh.add('TEST', [[{ TEXT: 'test' }]], notCallable)).toThrow(CallbackTypeError);
            expect(fresh.has('TEST')).toBe(false);
            expect(fresh.match(Doc.fromWords(['test']))).toEqual([]);
        });

        it('should share the MatcherError base and codes', () => {
            try {
                matcher.remove('Nope');
            } catch (error) {
                expect(error).toBeInstanceOf(MatcherError);
                expect(error).toMatchObject({ code: 'UNKNOWN_KEY', context: { key: 'Nope' } });
            }
            expect.assertions(2);
        });

        it('should require upstream annotations for pipeline attributes', () => {
            const parsed = Doc.fromWords(['Test'], { annotations: { DEP: ['ROOT'] } });
            const tagged = Doc.fromWords(['Test'], {
                annotations: { TAG: ['NN'], POS: ['NOUN'], LEMMA: ['test'] },
            });
            const bare = Doc.fromWords(['Test']);

            const dep = new Matcher();
            dep.add('TEST', [[{ DEP: 'a' }]]);
            expect(() => dep.match(parsed)).not.toThrow();
            expect(() => dep.match(tagged)).toThrow(MissingAnnotationError);
            expect(() => dep.match(bare)).toThrow(MissingAnnotationError);

            for (const attr of ['TAG', 'POS', 'LEMMA']) {
                const tagger = new Matcher();
                tagger.add('TEST', [[{ [attr]: 'a' }]]);
                expect(() => tagger.match(tagged)).not.toThrow();
                expect(() => tagger.match(parsed)).toThrow(MissingAnnotationError);
                expect(() => tagger.match(bare)).toThrow(MissingAnnotationError);
            }

            for (const attr of ['ORTH', 'TEXT']) {
                const text = new Matcher();
                text.add('TEST', [[{ [attr]: 'a' }]]);
                expect(() => text.match(parsed)).not.toThrow();
                expect(() => text.match(tagged)).not.toThrow();
                expect(() => text.match(bare)).not.toThrow();
            }
        });

        it('should skip the annotation check with allowMissing', () => {
            const fresh = new Matcher();
            fresh.add('TEST', [[{ POS: 'NOUN' }]]);

            expect(fresh.match(Doc.fromWords(['Test']), { allowMissing: true })).toEqual([]);
            expect(new Matcher({ allowMissing: true }).match(Doc.fromWords(['Test']))).toEqual([]);
        });

        it('should name the missing component', () => {
            const fresh = new Matcher();
            fresh.add('TEST', [[{ LEMMA: 'be' }]]);

            expect(() => fresh.match(Doc.fromWords(['was']))).toThrow('is the lemmatizer missing?');
        });
    });

    describe('callbacks', () => {
        it('should call the callback with the matcher, document, index and matches', () => {
            const onMatch = vi.fn();
            const fresh = new Matcher<Doc>();
            fresh.add('Rule', [[{ ORTH: 'test' }]], onMatch);
            const doc = Doc.fromWords(['This', 'is', 'a', 'test', '.']);

            const matches = fresh.match(doc);

            expect(onMatch).toHaveBeenCalledTimes(1);
            expect(onMatch).toHaveBeenCalledWith(fresh, doc, 0, matches);
        });

        it('should let callbacks mutate the document in match order', () => {
            const doc = Doc.fromWords('Wow 😀 This is really cool! 😂 😂'.split(' '));
            const seen: number[] = [];
            const labelEmoji = (_m: Matcher<Doc>, target: Doc, i: number, matches: Match[]) => {
                const { start, end } = matches[i];
                seen.push(i);
                target.merge(start, end, { NORM: 'happy emoji' });
            };

            const fresh = new Matcher<Doc>();
            fresh.add('HAPPY', ['😀', '😃', '😂', '🤣', '😊', '😍'].map(emoji => [{ ORTH: emoji }]), labelEmoji);
            const matches = fresh.match(doc);

            expect(matches.map(m => m.start)).toEqual([1, 6, 7]);
            expect(seen).toEqual([0, 1, 2]);
            expect(doc.token(1).getAttribute('NORM')).toBe('happy emoji');
            expect(doc.token(2).getAttribute('NORM')).toBe('this');
        });

        it('should stop dispatch when a callback throws', () => {
            const fresh = new Matcher();
            const after = vi.fn();
            fresh.add('First', [[{ ORTH: 'a' }]], () => { throw new Error('boom'); });
            fresh.add('Second', [[{ ORTH: 'b' }]], after);

            expect(() => fresh.match(Doc.fromWords(['a', 'b']))).toThrow('boom');
            expect(after).not.toHaveBeenCalled();
        });
    });

    describe('validation and logging', () => {
        it('should validate patterns against the schema when enabled', () => {
            const strict = new Matcher({ validate: true });
            const bad = JSON.parse('[[{"LOWER": "a", "OP": "x"}]]');

            expect(() => strict.add('BAD', bad)).toThrow(/^Invalid patterns for "BAD":\npattern 0: 0\.OP: /);
            expect(strict.has('BAD')).toBe(false);
        });

        it('should accept lower-case keys under validation', () => {
            const strict = new Matcher({ validate: true });
            strict.add('OK', [[{ lower: 'a', op: '?' }, { _: { is_fruit: true } }]]);

            expect(strict.has('OK')).toBe(true);
        });

        it('should log pass details in debug mode', () => {
            const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => { });
            const verbose = new Matcher({ debug: true });
            verbose.add('A', [[{ ORTH: 'a' }]]);
            verbose.match(Doc.fromWords(['a']));

            expect(debugSpy).toHaveBeenCalledWith('[Matcher] Added 1 pattern(s) to "A"', [['TEXT']]);
            expect(debugSpy).toHaveBeenCalledWith('[Matcher] 1 match(es) over 1 tokens, 1 projection(s)');
            debugSpy.mockRestore();
        });

        it('should stay quiet by default', () => {
            const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => { });
            matcher.match(Doc.fromWords(['java']));

            expect(debugSpy).not.toHaveBeenCalled();
            debugSpy.mockRestore();
        });
    });
});
