export * from './api/index.js';
export * from './constants/constants.js';
export * from './engine/index.js';
export * from './lib/index.js';
