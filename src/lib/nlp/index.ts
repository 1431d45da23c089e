export { WinkProcessor, getWinkProcessor } from './WinkProcessor';
export type { SentenceBoundary } from './WinkProcessor';
