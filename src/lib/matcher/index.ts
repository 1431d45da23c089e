export { Matcher } from './Matcher';
export type { Match, MatchCallback, MatchOptions, RuleEntry } from './Matcher';
export type { MatcherConfig } from './config';
export { DEFAULT_MATCHER_CONFIG, resolveMatcherConfig } from './config';
export {
    MatcherError,
    InvalidPatternError,
    MissingAnnotationError,
    UnknownKeyError,
    CallbackTypeError,
} from './errors';
export type { MatcherErrorCode } from './errors';
export type {
    PatternLiteral,
    TokenSpecLiteral,
    TokenSpecValue,
    PredicateObject,
    LiteralValue,
    Quantifier,
    ComparisonOperator,
} from './schema';
export { QUANTIFIERS, COMPARISON_OPERATORS, patternSchema, validatePatternLiteral } from './schema';
export type { AttributeKey } from './attributes';
export { compilePattern } from './compiler';
export type { CompiledPattern } from './compiler';
