import type { Namespace } from '@ogp-extractor/shared/types';
import {
  ARTICLE_AUTHOR_PROP,
  ARTICLE_EXPIRATION_TIME_PROP,
  ARTICLE_MODIFIED_TIME_PROP,
  ARTICLE_PUBLISHED_TIME_PROP,
  ARTICLE_SECTION_PROP,
  DESCRIPTION_PROP,
  IMAGE_PROP,
  IMAGE_STRUCT_PROP_PREFIX,
  PROFILE_FIRST_NAME_PROP,
  PROFILE_LAST_NAME_PROP,
  SITE_NAME_PROP,
  TITLE_PROP,
  TYPE_PROP,
  URL_PROP,
} from './property-names.js';
import type { StructuralParserKind } from './structural-parsers/index.js';

export interface PropertyRecord {
  /** Canonical name, also the property table key. */
  readonly name: string;
  readonly namespace: Namespace;
  /** Structural parser that decides what happens to matching declarations. */
  readonly parser?: StructuralParserKind;
}

const record = (name: string, namespace: Namespace, parser?: StructuralParserKind): PropertyRecord =>
  Object.freeze(parser ? { name, namespace, parser } : { name, namespace });

/**
 * Properties that matter for extraction, in match priority order.
 *
 * `image` is a prefix of every structured image property, so its record catches them all
 * (`og:image:width` arrives as suffix `image:width`) before `image:` is tried.
 */
export const PROPERTY_REGISTRY: readonly PropertyRecord[] = Object.freeze([
  record(TITLE_PROP, 'og'),
  record(TYPE_PROP, 'og'),
  record(URL_PROP, 'og'),
  record(DESCRIPTION_PROP, 'og'),
  record(SITE_NAME_PROP, 'og'),
  record(IMAGE_PROP, 'og', 'image'),
  record(IMAGE_STRUCT_PROP_PREFIX, 'og', 'image'),
  record(PROFILE_FIRST_NAME_PROP, 'profile', 'profile'),
  record(PROFILE_LAST_NAME_PROP, 'profile', 'profile'),
  record(ARTICLE_SECTION_PROP, 'article', 'article'),
  record(ARTICLE_PUBLISHED_TIME_PROP, 'article', 'article'),
  record(ARTICLE_MODIFIED_TIME_PROP, 'article', 'article'),
  record(ARTICLE_EXPIRATION_TIME_PROP, 'article', 'article'),
  record(ARTICLE_AUTHOR_PROP, 'article', 'article'),
]);
