export * from './errors.js';
export * from './logger.js';
export * from './retry.js';
export * from './lock.js';
