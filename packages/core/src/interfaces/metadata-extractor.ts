import type { OpenGraphResult } from '@ogp-extractor/shared/types';

export interface OpenGraphExtractor {
  /** Resolves to `null` when the page does not carry conformant Open Graph markup. */
  extract(url: string): Promise<OpenGraphResult | null>;
}
