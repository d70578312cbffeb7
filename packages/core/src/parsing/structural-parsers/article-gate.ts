import { ARTICLE_AUTHOR_PROP, ARTICLE_OBJECT_TYPE, TYPE_PROP } from '../property-names.js';
import type { ReadonlyPropertyTable } from '../property-table.js';
import type { ConsumeOutcome, StructuralParser } from './types.js';

/**
 * Honours `article:*` properties once `og:type` is `article`.
 *
 * Unlike {@link ProfileGate}, the type is re-read on every declaration until it matches, so an
 * `og:type` declared between article properties still opens the gate for the ones after it.
 * `article:author` may repeat and is collected here instead of in the property table.
 */
export class ArticleGate implements StructuralParser {
  private isArticleType = false;
  private readonly authors: string[] = [];

  consume(property: string, content: string, table: ReadonlyPropertyTable): ConsumeOutcome {
    if (!this.isArticleType) {
      const type = table.get(TYPE_PROP);
      this.isArticleType = type !== undefined && type.toLowerCase() === ARTICLE_OBJECT_TYPE;
    }
    if (!this.isArticleType) {
      return 'discard';
    }

    if (property === ARTICLE_AUTHOR_PROP) {
      this.authors.push(content);
      return 'discard';
    }

    return 'store';
  }

  getAuthors(): string[] | undefined {
    return this.authors.length === 0 ? undefined : [...this.authors];
  }
}
