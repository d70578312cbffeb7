import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { assertFetchableUrl, parseDimension, validateUrl } from './validation.js';

describe('validateUrl', () => {
  it('accepts http and https URLs', () => {
    expect(validateUrl('http://example.com')).toBe(true);
    expect(validateUrl('https://example.com/path?q=1')).toBe(true);
  });

  it('rejects other schemes and malformed input', () => {
    expect(validateUrl('ftp://example.com')).toBe(false);
    expect(validateUrl('example.com')).toBe(false);
    expect(validateUrl('')).toBe(false);
  });
});

describe('assertFetchableUrl', () => {
  it('requires a URL', () => {
    expect(() => assertFetchableUrl('  ')).toThrow('URL is required');
  });

  it('throws a ValidationError on the url field for invalid URLs', () => {
    try {
      assertFetchableUrl('mailto:someone@example.com');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'url', code: 'VALIDATION_ERROR', statusCode: 400 });
    }
  });

  it('accepts a valid URL', () => {
    expect(() => assertFetchableUrl('https://example.com')).not.toThrow();
  });
});

describe('parseDimension', () => {
  it('parses signed base-10 integers', () => {
    expect(parseDimension('640')).toBe(640);
    expect(parseDimension('+12')).toBe(12);
    expect(parseDimension('-3')).toBe(-3);
    expect(parseDimension('007')).toBe(7);
  });

  it('reads anything else as 0', () => {
    expect(parseDimension(undefined)).toBe(0);
    expect(parseDimension('')).toBe(0);
    expect(parseDimension('100px')).toBe(0);
    expect(parseDimension(' 100')).toBe(0);
    expect(parseDimension('1.5')).toBe(0);
    expect(parseDimension('0x10')).toBe(0);
  });

  it('reads values outside the 32-bit range as 0', () => {
    expect(parseDimension('2147483647')).toBe(2147483647);
    expect(parseDimension('2147483648')).toBe(0);
    expect(parseDimension('-2147483649')).toBe(0);
  });
});
