export { HtmlOpenGraphDocument, extractOpenGraphFromHtml } from './implementations/html-open-graph-document.js';
export { WebOpenGraphExtractor } from './implementations/web-open-graph-extractor.js';
export type { WebExtractorOptions } from './implementations/web-open-graph-extractor.js';
