export * from './schemas.js';
export * from './harness-config.js';
