export * from './diff-engine.js';
