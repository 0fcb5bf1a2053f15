// @module: shared-schemas-root
// @tags: schemas, exports
export * from './rest/offers.js';
export * from './rest/health.js';
export * from './dependencies/catalog.js';
export * from './dependencies/notification.js';
export * from './dependencies/chat.js';
