export * from './session.js';
export * from './snapshot.js';
