import type { MetaDeclaration, PrefixMap } from '@ogp-extractor/shared/types';
import { PROPERTY_REGISTRY, type PropertyRecord } from './property-registry.js';
import type { PropertyTable } from './property-table.js';
import type { StructuralParser, StructuralParserKind } from './structural-parsers/index.js';

/** One parser per property family, looked up by a registry record's `parser` key. */
export type StructuralParsers = Readonly<Record<StructuralParserKind, StructuralParser>>;

export interface PropertyMatch {
  record: PropertyRecord;
  /** The declared property with its `prefix:` removed, e.g. `image:width`. */
  suffix: string;
}

/**
 * Finds the registry record a (lower-cased) property belongs to.
 *
 * A record matches when the property starts with `<prefix>:<name>`. Records are tried in
 * registry order and the first match wins, so every declaration maps to at most one record.
 */
export function matchProperty(
  property: string,
  prefixes: PrefixMap,
  registry: readonly PropertyRecord[] = PROPERTY_REGISTRY
): PropertyMatch | undefined {
  for (const record of registry) {
    const prefixWithColon = `${prefixes[record.namespace]}:`;
    if (property.startsWith(prefixWithColon + record.name)) {
      return { record, suffix: property.substring(prefixWithColon.length) };
    }
  }
  return undefined;
}

/**
 * Runs every declaration through the registry, in order. Plain properties go straight into
 * the table; structural ones go to their parser, which decides whether the table gets them too.
 *
 * @returns the number of declarations that matched a record
 */
export function scanMetaTags(
  prefixes: PrefixMap,
  declarations: readonly MetaDeclaration[],
  table: PropertyTable,
  parsers: StructuralParsers
): number {
  let matched = 0;

  for (const declaration of declarations) {
    const match = matchProperty(declaration.property.toLowerCase(), prefixes);
    if (!match) continue;
    matched++;

    const { record, suffix } = match;
    const outcome = record.parser
      ? parsers[record.parser].consume(suffix, declaration.content, table)
      : 'store';
    if (outcome === 'store') {
      table.set(record.name, declaration.content);
    }
  }

  return matched;
}
