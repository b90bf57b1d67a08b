export * from './parameters.js';
export * from './location.js';
export * from './execution.js';
export * from './artifact.js';
export * from './run.js';
