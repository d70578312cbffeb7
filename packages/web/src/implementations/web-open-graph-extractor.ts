import fetch from 'node-fetch';
import type { OpenGraphExtractor } from '@ogp-extractor/core/interfaces';
import type { OpenGraphResult } from '@ogp-extractor/shared/types';
import { assertFetchableUrl, ExternalServiceError, fetchConfig, logger } from '@ogp-extractor/shared';
import { extractOpenGraphFromHtml } from './html-open-graph-document.js';

export interface WebExtractorOptions {
  timeoutMs: number;
  maxBytes: number;
  maxRedirects: number;
  userAgent: string;
}

export class WebOpenGraphExtractor implements OpenGraphExtractor {
  constructor(private readonly options: WebExtractorOptions = fetchConfig) {}

  async extract(url: string): Promise<OpenGraphResult | null> {
    assertFetchableUrl(url);
    logger.info({ url }, 'Extracting Open Graph metadata from URL');

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
        follow: this.options.maxRedirects,
        size: this.options.maxBytes,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        throw new ExternalServiceError(`HTTP ${response.status}: ${response.statusText}`, 'web-fetch');
      }

      const contentType = response.headers.get('content-type') || '';
      if (!contentType.includes('text/html') && !contentType.includes('application/xhtml+xml')) {
        logger.warn({ url, contentType }, 'Non-HTML content type detected');
        return null;
      }

      const html = await response.text();
      const result = extractOpenGraphFromHtml(html);

      logger.info({
        url,
        conformant: result !== null,
        title: result?.title,
        imageCount: result?.images.length,
      }, 'Open Graph metadata extracted');

      return result;

    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }

      logger.error({ url, error }, 'Failed to fetch page');
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(message, 'web-fetch');
    }
  }
}
