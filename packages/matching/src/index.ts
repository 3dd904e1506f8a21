export * from './person.js';
export * from './entity.js';
export * from './vendor.js';
export * from './memory-lookup.js';
