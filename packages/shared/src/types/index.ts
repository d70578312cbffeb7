export type * from './metadata.js';
