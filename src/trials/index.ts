export * from './runner.js';
export * from './timing-engine.js';
