export * from './session-store.js';
export * from './cursor-store.js';
