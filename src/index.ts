export * from './lib/tokens';
export * from './lib/matcher';
export * from './lib/labels';
export * from './lib/nlp';
export * from './lib/phrases';
