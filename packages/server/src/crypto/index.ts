export * from './random.js';
export * from './hash.js';
export * from './encrypt.js';
export * from './jwt.js';
