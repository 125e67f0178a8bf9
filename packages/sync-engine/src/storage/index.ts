export * from './keyed-mutex.js';
export * from './json-file.js';
