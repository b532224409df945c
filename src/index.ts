export * from './geometry/index.js';
export * from './gpstrace/index.js';
export * from './json/index.js';
