/**
 * @ledgerlink/qbxml
 *
 * Desktop accounting dialect: document builder and parser, message envelope, entity registry,
 * canonical extractors and the SOAP codec of the polling connector
 */

export * from './document.js';
export * from './envelope.js';
export * from './entities/index.js';
export * from './extract/index.js';
export * from './soap.js';
