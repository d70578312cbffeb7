import { describe, it, expect, vi } from 'vitest';
import type { MetaDeclaration, PrefixMap } from '@ogp-extractor/shared/types';
import { matchProperty, scanMetaTags, type StructuralParsers } from './meta-tag-scanner.js';
import { DEFAULT_PREFIXES } from './prefix-resolver.js';
import { PropertyTable } from './property-table.js';
import { ArticleGate, ImageGrouper, ProfileGate } from './structural-parsers/index.js';

const createParsers = (): StructuralParsers => ({
  image: new ImageGrouper(),
  profile: new ProfileGate(),
  article: new ArticleGate(),
});

describe('matchProperty', () => {
  it('maps a plain og property to its record', () => {
    const match = matchProperty('og:title', DEFAULT_PREFIXES);

    expect(match?.record.name).toBe('title');
    expect(match?.suffix).toBe('title');
  });

  it('lets the root image record catch structured image properties first', () => {
    const match = matchProperty('og:image:width', DEFAULT_PREFIXES);

    expect(match?.record.name).toBe('image');
    expect(match?.record.parser).toBe('image');
    expect(match?.suffix).toBe('image:width');
  });

  it('matches on the property prefix, not the whole name', () => {
    const match = matchProperty('og:titles', DEFAULT_PREFIXES);

    expect(match?.record.name).toBe('title');
    expect(match?.suffix).toBe('titles');
  });

  it('uses the resolved prefix for each namespace', () => {
    const prefixes: PrefixMap = { og: 'og', profile: 'person', article: 'article' };

    expect(matchProperty('person:first_name', prefixes)?.record.name).toBe('first_name');
    expect(matchProperty('profile:first_name', prefixes)).toBeUndefined();
  });

  it('returns undefined for properties outside the registry', () => {
    expect(matchProperty('og:locale', DEFAULT_PREFIXES)).toBeUndefined();
    expect(matchProperty('twitter:title', DEFAULT_PREFIXES)).toBeUndefined();
    expect(matchProperty('', DEFAULT_PREFIXES)).toBeUndefined();
  });
});

describe('scanMetaTags', () => {
  it('stores plain properties and keeps the last value', () => {
    const table = new PropertyTable();
    const declarations: MetaDeclaration[] = [
      { property: 'og:title', content: 'First' },
      { property: 'og:site_name', content: 'Example' },
      { property: 'og:title', content: 'Second' },
    ];

    const matched = scanMetaTags(DEFAULT_PREFIXES, declarations, table, createParsers());

    expect(matched).toBe(3);
    expect(table.get('title')).toBe('Second');
    expect(table.get('site_name')).toBe('Example');
  });

  it('lower-cases the declared property before matching', () => {
    const table = new PropertyTable();

    scanMetaTags(DEFAULT_PREFIXES, [{ property: 'OG:Description', content: 'Mixed Case' }], table, createParsers());

    expect(table.get('description')).toBe('Mixed Case');
  });

  it('hands structural properties to their parser and never stores images', () => {
    const table = new PropertyTable();
    const parsers = createParsers();
    const consume = vi.spyOn(parsers.image, 'consume');

    scanMetaTags(
      DEFAULT_PREFIXES,
      [
        { property: 'og:image', content: 'https://example.com/a.png' },
        { property: 'og:image:height', content: '40' },
      ],
      table,
      parsers
    );

    expect(consume).toHaveBeenNthCalledWith(1, 'image', 'https://example.com/a.png', table);
    expect(consume).toHaveBeenNthCalledWith(2, 'image:height', '40', table);
    expect(table.size).toBe(0);
  });

  it('dispatches each declaration to the parser named by its record', () => {
    const table = new PropertyTable();
    const parsers: StructuralParsers = {
      image: { consume: vi.fn(() => 'discard' as const) },
      profile: { consume: vi.fn(() => 'store' as const) },
      article: { consume: vi.fn(() => 'discard' as const) },
    };

    scanMetaTags(
      DEFAULT_PREFIXES,
      [
        { property: 'profile:last_name', content: 'Doe' },
        { property: 'article:author', content: 'https://example.com/a' },
      ],
      table,
      parsers
    );

    expect(parsers.image.consume).not.toHaveBeenCalled();
    expect(parsers.profile.consume).toHaveBeenCalledWith('last_name', 'Doe', table);
    expect(parsers.article.consume).toHaveBeenCalledWith('author', 'https://example.com/a', table);
    expect(table.get('last_name')).toBe('Doe');
    expect(table.has('author')).toBe(false);
  });

  it('stores a structural property under its record name when the parser asks for it', () => {
    const table = new PropertyTable();

    scanMetaTags(
      DEFAULT_PREFIXES,
      [
        { property: 'og:type', content: 'article' },
        { property: 'article:section', content: 'Science' },
      ],
      table,
      createParsers()
    );

    expect(table.get('section')).toBe('Science');
  });

  it('skips declarations that match nothing', () => {
    const table = new PropertyTable();

    const matched = scanMetaTags(
      DEFAULT_PREFIXES,
      [
        { property: 'og:locale', content: 'en_US' },
        { property: 'description', content: 'plain meta' },
      ],
      table,
      createParsers()
    );

    expect(matched).toBe(0);
    expect(table.size).toBe(0);
  });
});
