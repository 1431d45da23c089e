export type { AttributeValue, Token, TokenAttribute, TokenSequence } from './types';
export { TOKEN_ATTRIBUTES, ANNOTATED_ATTRIBUTES, isTokenAttribute } from './types';
export type { DocAnnotations, DocOptions, DocSpan, ExtensionDefinition, SuppliedAttribute } from './Doc';
export { Doc, DocToken } from './Doc';
export * from './lexical';
