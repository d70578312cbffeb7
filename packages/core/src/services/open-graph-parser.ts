import type { OpenGraphResult } from '@ogp-extractor/shared/types';
import { createServiceLogger } from '@ogp-extractor/shared';
import type { OpenGraphDocument } from '../interfaces/index.js';
import { scanMetaTags } from '../parsing/meta-tag-scanner.js';
import { resolvePrefixes } from '../parsing/prefix-resolver.js';
import { PropertyTable } from '../parsing/property-table.js';
import { assembleResult } from '../parsing/result-assembler.js';
import { ArticleGate, ImageGrouper, ProfileGate } from '../parsing/structural-parsers/index.js';

const logger = createServiceLogger('ogp-core');

/**
 * Extracts Open Graph properties from a document.
 *
 * Returns `null` when the document does not conform to the protocol, i.e. any of `og:title`,
 * `og:type`, `og:url` or a valid `og:image` is missing. Never throws: a failure while reading
 * the document is logged and also yields `null`.
 */
export function parseOpenGraph(document: OpenGraphDocument): OpenGraphResult | null {
  try {
    return parseDocument(document);
  } catch (error) {
    logger.error({ error }, 'Failed to parse Open Graph properties');
    return null;
  }
}

function parseDocument(document: OpenGraphDocument): OpenGraphResult | null {
  const prefixes = resolvePrefixes(document.getRootAttributes(), document.getHeadAttributes());

  const table = new PropertyTable();
  const images = new ImageGrouper();
  const profile = new ProfileGate();
  const article = new ArticleGate();

  const declarations = document.getMetaDeclarations();
  const matched = scanMetaTags(prefixes, declarations, table, { image: images, profile, article });
  logger.debug({ prefixes, declarations: declarations.length, matched }, 'Scanned meta declarations');

  images.finalize();

  const outcome = assembleResult(table, {
    images: images.getImages(),
    profile: profile.getFullName(table),
    authors: article.getAuthors(),
  });

  if (!outcome.conformant) {
    logger.debug(
      { missing: outcome.missing.map((name) => `${prefixes.og}:${name}`) },
      'Document does not conform to the Open Graph protocol'
    );
    return null;
  }

  return outcome.result;
}
