export * from './request-builder.js';
