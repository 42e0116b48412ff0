// pipeline-llm core - Claude component for modular pipelines
export * from './llm/index.js';
export * from './pipeline/index.js';

export const VERSION = '0.1.0';
