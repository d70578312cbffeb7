import type { ReadonlyPropertyTable } from '../property-table.js';

export type StructuralParserKind = 'image' | 'profile' | 'article';

/** Whether the scanner should also record the declaration in the property table. */
export type ConsumeOutcome = 'store' | 'discard';

/**
 * Stateful consumer for one property family. The scanner picks the parser through the
 * registry record's `parser` key and hands it every matching declaration with the namespace
 * prefix stripped (`image:width`, `author`). Results are read from each concrete parser.
 */
export interface StructuralParser {
  consume(property: string, content: string, table: ReadonlyPropertyTable): ConsumeOutcome;
}
