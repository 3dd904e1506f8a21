/**
 * Environment, logging, paths and client configuration
 */

export * from './env.js';
export * from './logger.js';
export * from './paths.js';
export * from './client-config.js';
