export * from './logger.js';
export * from './errors.js';
export * from './config.js';
export * from './sanitize.js';
