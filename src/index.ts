// Library entry point
export * from './core/index.js';
export * from './config/index.js';
export * from './observability/index.js';
export * from './messaging/index.js';
export * from './tools/index.js';
export * from './providers/index.js';
export * from './agents/index.js';
export * from './manager/index.js';
