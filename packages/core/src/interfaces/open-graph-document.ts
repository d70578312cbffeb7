import type { Attribute, MetaDeclaration } from '@ogp-extractor/shared/types';

/**
 * Read-only view of a parsed document, as much of it as Open Graph extraction needs.
 * Implementations own the markup traversal.
 */
export interface OpenGraphDocument {
  /** Attributes of the root (`<html>`) element, in document order. */
  getRootAttributes(): readonly Attribute[];
  /** Attributes of the `<head>` element, or `undefined` unless exactly one exists. */
  getHeadAttributes(): readonly Attribute[] | undefined;
  /** Every `<meta property>` declaration, in document order. */
  getMetaDeclarations(): readonly MetaDeclaration[];
}
