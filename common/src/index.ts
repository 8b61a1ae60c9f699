export * from './api.js';
export * from './indexing.js';
export * from './logging.js';
