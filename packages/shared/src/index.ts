export * from './errors/index.js';
export * from './utils/logger.js';
export * from './utils/validation.js';
export type * from './types/index.js';
export * from './config/index.js';
