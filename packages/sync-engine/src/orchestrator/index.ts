export * from './task-template.js';
export * from './session-orchestrator.js';
