export * from './decoder.js';
export * from './observers.js';
export * from './readiness-flag.js';
export * from './channel.js';
export * from './listener.js';
