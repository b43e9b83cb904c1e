export * from './logger.js';
export * from './errors.js';
export * from './liveness.js';
export * from './text.js';
