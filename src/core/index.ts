export * from './logger/index.js';
export * from './utils/index.js';
export * from './errors.js';
export * from './env.js';
export * from './config.js';
export * from './remote/index.js';
export * from './notifications/index.js';
export * from './capture/index.js';
export * from './storage/index.js';
