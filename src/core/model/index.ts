/**
 * Source model: classification, references and the frozen graph.
 */
export * from './types.js';
export * from './naming.js';
export * from './classifier.js';
export * from './resolver.js';
export * from './graph.js';
export * from './graph-format.js';
export * from './builder.js';
