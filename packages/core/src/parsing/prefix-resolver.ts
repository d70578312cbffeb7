import type { Attribute, Namespace, PrefixMap } from '@ogp-extractor/shared/types';
import { ARTICLE_OBJECT_TYPE, PROFILE_OBJECT_TYPE } from './property-names.js';

export const DEFAULT_PREFIXES: PrefixMap = Object.freeze({
  og: 'og',
  profile: PROFILE_OBJECT_TYPE,
  article: ARTICLE_OBJECT_TYPE,
});

// e.g. "og: http://ogp.me/ns# profile: http://ogp.me/ns/profile# article: http://ogp.me/ns/article#"
// The dot in "ogp.me" is left unescaped and matches any character.
const PREFIX_ATTRIBUTE_PATTERN = /(\w+):\s+http:\/\/ogp.me\/ns(\/\w+)*#/gi;
const XMLNS_NAME_PATTERN = /^xmlns:(\w+)/i;
const XMLNS_VALUE_PATTERN = /^http:\/\/ogp.me\/ns(\/\w+)*#/i;

/**
 * Maps the last path segment of an OGP namespace URI to the namespace it names.
 * No segment is the base `og` vocabulary; segments for unsupported vocabularies map to nothing.
 */
function namespaceForSegment(segment: string | undefined): Namespace | undefined {
  if (!segment) return 'og';

  switch (segment.substring(1)) {
    case PROFILE_OBJECT_TYPE:
      return 'profile';
    case ARTICLE_OBJECT_TYPE:
      return 'article';
    default:
      return undefined;
  }
}

function findAttribute(attributes: readonly Attribute[], name: string): string {
  return attributes.find((attribute) => attribute.name.toLowerCase() === name)?.value ?? '';
}

/**
 * Works out which prefix tokens the document binds to the og, profile and article namespaces.
 *
 * A `prefix` attribute on the root element (or, failing that, on the head element) is used
 * when present. Only when neither carries one are `xmlns:*` attributes on the root element
 * consulted. Namespaces left unbound get their conventional prefix.
 */
export function resolvePrefixes(
  rootAttributes: readonly Attribute[],
  headAttributes?: readonly Attribute[]
): PrefixMap {
  const prefixes: Partial<Record<Namespace, string>> = {};
  // Tokens keep the case they were declared with, while declarations are matched lower-cased,
  // so an upper-case token from a `prefix` attribute never matches anything.
  const bind = (token: string | undefined, segment: string | undefined) => {
    const namespace = namespaceForSegment(segment);
    if (token && namespace) {
      prefixes[namespace] = token;
    }
  };

  let prefixAttribute = findAttribute(rootAttributes, 'prefix');
  if (!prefixAttribute && headAttributes) {
    prefixAttribute = findAttribute(headAttributes, 'prefix');
  }

  if (prefixAttribute) {
    for (const match of prefixAttribute.matchAll(PREFIX_ATTRIBUTE_PATTERN)) {
      bind(match[1], match[2]);
    }
  } else {
    for (const attribute of rootAttributes) {
      const nameMatch = XMLNS_NAME_PATTERN.exec(attribute.name.toLowerCase());
      if (!nameMatch) continue;

      const valueMatch = XMLNS_VALUE_PATTERN.exec(attribute.value);
      if (valueMatch) {
        bind(nameMatch[1], valueMatch[1]);
      }
    }
  }

  return {
    og: prefixes.og ?? DEFAULT_PREFIXES.og,
    profile: prefixes.profile ?? DEFAULT_PREFIXES.profile,
    article: prefixes.article ?? DEFAULT_PREFIXES.article,
  };
}
