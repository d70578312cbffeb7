import { load, type CheerioAPI } from 'cheerio';
import type { OpenGraphDocument } from '@ogp-extractor/core/interfaces';
import type { Attribute, MetaDeclaration, OpenGraphResult } from '@ogp-extractor/shared/types';
import { parseOpenGraph } from '@ogp-extractor/core';

const toAttributes = (attribs: Record<string, string> | undefined): Attribute[] =>
  Object.entries(attribs ?? {}).map(([name, value]) => ({ name, value }));

/** {@link OpenGraphDocument} over an HTML string, parsed with cheerio. */
export class HtmlOpenGraphDocument implements OpenGraphDocument {
  private constructor(private readonly $: CheerioAPI) {}

  static fromHtml(html: string): HtmlOpenGraphDocument {
    return new HtmlOpenGraphDocument(load(html));
  }

  getRootAttributes(): Attribute[] {
    return toAttributes(this.$('html').first().attr());
  }

  getHeadAttributes(): Attribute[] | undefined {
    const heads = this.$('head');
    if (heads.length !== 1) {
      return undefined;
    }
    return toAttributes(heads.attr());
  }

  getMetaDeclarations(): MetaDeclaration[] {
    return this.$('meta[property]')
      .toArray()
      .map((element) => {
        const meta = this.$(element);
        return {
          property: meta.attr('property') ?? '',
          content: meta.attr('content') ?? '',
        };
      });
  }
}

export const extractOpenGraphFromHtml = (html: string): OpenGraphResult | null =>
  parseOpenGraph(HtmlOpenGraphDocument.fromHtml(html));
