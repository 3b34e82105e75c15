export * from './collections/index.js';
export * from './resources/index.js';
