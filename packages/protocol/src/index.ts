export * from './types.js';
export * from './framing.js';
export * from './init.js';
