export interface MatcherConfig {
    validate: boolean;      // Check pattern literals against the schema before compiling
    allowMissing: boolean;  // Skip the upstream annotation check
    debug: boolean;         // Log compilation and pass details
}

export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
    validate: false,
    allowMissing: false,
    debug: false,
};

export function resolveMatcherConfig(overrides: Partial<MatcherConfig> = {}): MatcherConfig {
    return { ...DEFAULT_MATCHER_CONFIG, ...overrides };
}
