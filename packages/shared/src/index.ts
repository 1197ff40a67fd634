export * from './types.js';
export * from './utils.js';
