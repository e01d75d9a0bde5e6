export * from './command-service.js';
export * from './graph.js';
export * from './tree.js';
export * from './analyzers.js';
export * from './git.js';
export * from './pipeline.js';
