export * from './types.js';
export * from './emitter.js';
