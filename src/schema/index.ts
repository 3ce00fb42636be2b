export * from './config.js';
export * from './protocol.js';
