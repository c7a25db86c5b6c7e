export * from './interfaces/index.js';
export * from './memory/index.js';
export * from './redis/index.js';
