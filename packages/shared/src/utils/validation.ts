import { ValidationError } from '../errors/index.js';

export const validateUrl = (url: string): boolean => {
  try {
    new URL(url);
    return url.startsWith('http://') || url.startsWith('https://');
  } catch {
    return false;
  }
};

export const assertFetchableUrl = (url: string): void => {
  if (!url || url.trim().length === 0) {
    throw new ValidationError('URL is required', 'url');
  }

  if (!validateUrl(url)) {
    throw new ValidationError('Invalid URL format', 'url');
  }
};

/**
 * Parses a base-10 integer the way OGP dimension values are read: optional sign, digits only,
 * within the signed 32-bit range. Anything else is `0`.
 */
export const parseDimension = (value: string | undefined): number => {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) {
    return 0;
  }

  const parsed = Number.parseInt(value, 10);
  if (parsed > 2147483647 || parsed < -2147483648) {
    return 0;
  }
  return parsed;
};
