import { createEnv } from '@t3-oss/env-core';
import { z } from 'zod';

export const env = createEnv({
  server: {
    // Environment
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // Fetching pages for extraction
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    FETCH_MAX_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
    FETCH_MAX_REDIRECTS: z.coerce.number().int().min(0).default(5),
    FETCH_USER_AGENT: z.string().default('Mozilla/5.0 (compatible; OgpExtractor/1.0)'),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

// Type-safe config objects derived from env
export const fetchConfig = {
  timeoutMs: env.FETCH_TIMEOUT_MS,
  maxBytes: env.FETCH_MAX_BYTES,
  maxRedirects: env.FETCH_MAX_REDIRECTS,
  userAgent: env.FETCH_USER_AGENT,
} as const;
