export type { OpenGraphExtractor } from './metadata-extractor.js';
export type { OpenGraphDocument } from './open-graph-document.js';
