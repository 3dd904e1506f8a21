/**
 * Screening primitives shared by every package
 */

export * from './types.js';
export * from './errors.js';
export * from './normalize.js';
export * from './similarity.js';
export * from './vendor-classifier.js';
export * from './version.js';
export * from './lookup.js';
