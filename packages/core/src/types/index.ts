export * from './exchange.js';
export * from './tenant.js';
export * from './service.js';
export * from './listener.js';
