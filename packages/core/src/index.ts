export { parseOpenGraph } from './services/open-graph-parser.js';
export { resolvePrefixes, DEFAULT_PREFIXES } from './parsing/prefix-resolver.js';
export { matchProperty, scanMetaTags } from './parsing/meta-tag-scanner.js';
export type { PropertyMatch, StructuralParsers } from './parsing/meta-tag-scanner.js';
export { PROPERTY_REGISTRY } from './parsing/property-registry.js';
export type { PropertyRecord } from './parsing/property-registry.js';
export { PropertyTable } from './parsing/property-table.js';
export type { ReadonlyPropertyTable } from './parsing/property-table.js';
export { assembleResult, assembleArticle, findMissingProperties } from './parsing/result-assembler.js';
export type { AssemblyOutcome, StructuredProperties } from './parsing/result-assembler.js';
export * from './parsing/structural-parsers/index.js';
export type { OpenGraphDocument, OpenGraphExtractor } from './interfaces/index.js';
