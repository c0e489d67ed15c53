export * from './config/index.js';
export * from './errors.js';
export * from './languages.js';
export * from './placeholders.js';
export * from './tree-walker.js';
export * from './glossary.js';
export * from './diff-engine.js';
export * from './cache/index.js';
export * from './scheduler/batch-scheduler.js';
export * from './scheduler/progress.js';
export * from './pipeline.js';
