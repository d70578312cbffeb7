import type { OpenGraphArticle, OpenGraphImage, OpenGraphResult } from '@ogp-extractor/shared/types';
import {
  ARTICLE_EXPIRATION_TIME_PROP,
  ARTICLE_MODIFIED_TIME_PROP,
  ARTICLE_PUBLISHED_TIME_PROP,
  ARTICLE_SECTION_PROP,
  DESCRIPTION_PROP,
  IMAGE_PROP,
  SITE_NAME_PROP,
  TITLE_PROP,
  TYPE_PROP,
  URL_PROP,
} from './property-names.js';
import type { ReadonlyPropertyTable } from './property-table.js';

/** Structured values gathered by the structural parsers after the scan. */
export interface StructuredProperties {
  images: OpenGraphImage[] | undefined;
  profile: string | undefined;
  authors: string[] | undefined;
}

export type AssemblyOutcome =
  | { conformant: true; result: OpenGraphResult }
  | { conformant: false; missing: string[] };

/**
 * Names of the required properties (`title`, `type`, `url`, `image`) the document lacks.
 * An empty list means the document conforms to the protocol.
 */
export function findMissingProperties(
  table: ReadonlyPropertyTable,
  images: readonly OpenGraphImage[] | undefined
): string[] {
  const missing = [TITLE_PROP, TYPE_PROP, URL_PROP].filter((name) => !table.has(name));
  if (!images || images.length === 0) {
    missing.push(IMAGE_PROP);
  }
  return missing;
}

export function assembleArticle(
  table: ReadonlyPropertyTable,
  authors: string[] | undefined
): OpenGraphArticle | undefined {
  const article: OpenGraphArticle = {};
  const publishedTime = table.get(ARTICLE_PUBLISHED_TIME_PROP);
  const modifiedTime = table.get(ARTICLE_MODIFIED_TIME_PROP);
  const expirationTime = table.get(ARTICLE_EXPIRATION_TIME_PROP);
  const section = table.get(ARTICLE_SECTION_PROP);

  if (publishedTime !== undefined) article.publishedTime = publishedTime;
  if (modifiedTime !== undefined) article.modifiedTime = modifiedTime;
  if (expirationTime !== undefined) article.expirationTime = expirationTime;
  if (section !== undefined) article.section = section;
  if (authors !== undefined) article.authors = authors;

  return Object.keys(article).length === 0 ? undefined : article;
}

/**
 * Builds the public result, or reports which required properties are missing.
 * There is no partial result: a non-conformant document yields nothing.
 */
export function assembleResult(
  table: ReadonlyPropertyTable,
  structured: StructuredProperties
): AssemblyOutcome {
  const { images, profile, authors } = structured;
  const title = table.get(TITLE_PROP);
  const type = table.get(TYPE_PROP);
  const url = table.get(URL_PROP);

  if (title === undefined || type === undefined || url === undefined || !images || images.length === 0) {
    return { conformant: false, missing: findMissingProperties(table, images) };
  }

  const result: OpenGraphResult = { title, type, url, images };
  const description = table.get(DESCRIPTION_PROP);
  const siteName = table.get(SITE_NAME_PROP);
  const article = assembleArticle(table, authors);

  if (description !== undefined) result.description = description;
  if (siteName !== undefined) result.siteName = siteName;
  if (profile !== undefined) result.profile = profile;
  if (article) result.article = article;

  return { conformant: true, result };
}
