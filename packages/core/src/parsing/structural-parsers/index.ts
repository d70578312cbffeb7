export { ImageGrouper } from './image-grouper.js';
export { ProfileGate } from './profile-gate.js';
export { ArticleGate } from './article-gate.js';
export type { ConsumeOutcome, StructuralParser, StructuralParserKind } from './types.js';
