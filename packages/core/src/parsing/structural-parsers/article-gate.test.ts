import { describe, it, expect } from 'vitest';
import { PropertyTable } from '../property-table.js';
import { ArticleGate } from './article-gate.js';

describe('ArticleGate', () => {
  it('discards article properties until the type is article', () => {
    const gate = new ArticleGate();
    const table = new PropertyTable();

    expect(gate.consume('section', 'News', table)).toBe('discard');
    expect(gate.consume('author', 'https://example.com/early', table)).toBe('discard');
    expect(gate.getAuthors()).toBeUndefined();
  });

  it('opens once the type turns up between article properties', () => {
    const gate = new ArticleGate();
    const table = new PropertyTable();

    expect(gate.consume('section', 'News', table)).toBe('discard');
    table.set('type', 'ARTICLE');
    expect(gate.consume('section', 'News', table)).toBe('store');
  });

  it('stays open after the type changes', () => {
    const gate = new ArticleGate();
    const table = new PropertyTable();
    table.set('type', 'article');
    gate.consume('published_time', '2024-01-01', table);

    table.set('type', 'website');

    expect(gate.consume('modified_time', '2024-01-02', table)).toBe('store');
  });

  it('collects authors in order instead of storing them', () => {
    const gate = new ArticleGate();
    const table = new PropertyTable();
    table.set('type', 'article');

    expect(gate.consume('author', 'https://example.com/a', table)).toBe('discard');
    expect(gate.consume('author', 'https://example.com/b', table)).toBe('discard');
    expect(gate.getAuthors()).toEqual(['https://example.com/a', 'https://example.com/b']);
  });
});
