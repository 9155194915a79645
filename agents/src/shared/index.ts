export * from './base-agent.js';
export * from './config.js';
export * from './logger.js';
export * from './types.js';
