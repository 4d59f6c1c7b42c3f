export * from './schemas.js';
export * from './gateway-config.js';
