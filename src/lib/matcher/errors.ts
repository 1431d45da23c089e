/**
 * Matcher error taxonomy. Every error carries a stable `code` and an
 * optional context object describing what triggered it.
 */

export type MatcherErrorCode =
    | 'INVALID_PATTERN'
    | 'MISSING_ANNOTATION'
    | 'UNKNOWN_KEY'
    | 'CALLBACK_TYPE';

export class MatcherError extends Error {
    constructor(
        message: string,
        public code: MatcherErrorCode,
        public context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'MatcherError';
    }
}

/**
 * Malformed pattern, token-spec or predicate; raised while adding a rule.
 */
export class InvalidPatternError extends MatcherError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_PATTERN', context);
        this.name = 'InvalidPatternError';
    }
}

export class MissingAnnotationError extends MatcherError {
    constructor(public attribute: string, component: string) {
        super(
            `Attribute ${attribute} is used in a pattern but the document has no ${attribute} annotation (is the ${component} missing?). Pass allowMissing to match anyway.`,
            'MISSING_ANNOTATION',
            { attribute, component }
        );
        this.name = 'MissingAnnotationError';
    }
}

export class UnknownKeyError extends MatcherError {
    constructor(public key: string) {
        super(`No rule registered for key "${key}"`, 'UNKNOWN_KEY', { key });
        this.name = 'UnknownKeyError';
    }
}

export class CallbackTypeError extends MatcherError {
    constructor(received: string) {
        super(`onMatch must be a function or null, got ${received}`, 'CALLBACK_TYPE', { received });
        this.name = 'CallbackTypeError';
    }
}
