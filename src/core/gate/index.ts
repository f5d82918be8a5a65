export * from './stage.js';
export * from './orchestrator.js';
